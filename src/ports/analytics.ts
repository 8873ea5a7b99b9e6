/**
 * Analytics port
 *
 * Call bookkeeping: one call per conversation context, with every state
 * transition recorded. Metering arithmetic lives behind real adapters.
 */

export type CallStatus = "active" | "completed" | "abandoned";

export interface TransitionRecord {
  from: string;
  to: string;
  reason: string;
  at: string;
}

export interface CallRecord {
  contextId: string;
  initialPersona: string;
  status: CallStatus;
  startedAt: string;
  endedAt?: string;
  rating?: number;
  transitions: TransitionRecord[];
}

export interface AnalyticsPort {
  startCall(contextId: string, initialPersona: string): Promise<void>;
  logTransition(contextId: string, from: string, to: string, reason: string): Promise<void>;
  endCall(contextId: string, status: CallStatus, rating?: number): Promise<void>;
}

/**
 * Keeps call records in memory
 */
export class InMemoryCallRecorder implements AnalyticsPort {
  private readonly calls = new Map<string, CallRecord>();

  async startCall(contextId: string, initialPersona: string): Promise<void> {
    this.calls.set(contextId, {
      contextId,
      initialPersona,
      status: "active",
      startedAt: new Date().toISOString(),
      transitions: [],
    });
  }

  async logTransition(contextId: string, from: string, to: string, reason: string): Promise<void> {
    this.recordFor(contextId).transitions.push({
      from,
      to,
      reason,
      at: new Date().toISOString(),
    });
  }

  async endCall(contextId: string, status: CallStatus, rating?: number): Promise<void> {
    const record = this.recordFor(contextId);
    record.status = status;
    record.endedAt = new Date().toISOString();
    if (rating !== undefined) {
      record.rating = rating;
    }
  }

  getRecord(contextId: string): CallRecord | undefined {
    return this.calls.get(contextId);
  }

  /**
   * Transitions can arrive for a call that was never started (a context
   * created without open()); those get an implicit record.
   */
  private recordFor(contextId: string): CallRecord {
    let record = this.calls.get(contextId);
    if (!record) {
      record = {
        contextId,
        initialPersona: "unknown",
        status: "active",
        startedAt: new Date().toISOString(),
        transitions: [],
      };
      this.calls.set(contextId, record);
    }
    return record;
  }
}
