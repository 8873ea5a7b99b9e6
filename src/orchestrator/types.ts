import type { Logger, ILogObj } from "tslog";
import type { AgentSpec } from "../catalog/types.js";
import type { RelayConfig } from "../config/schema.js";
import type { AnalyticsPort } from "../ports/analytics.js";
import type { PersistencePort } from "../ports/persistence.js";
import type { RequirementsSnapshot, StoredRequirement } from "../requirements/types.js";
import type { SessionPort } from "../session/types.js";
import type { HandoffDirection, RelayError } from "../utils/errors.js";
import type { Synthesizer } from "./synthesis.js";

/**
 * Conversation states. `processing` locks the requirements; `completed` is
 * terminal.
 */
export type ConversationState =
  | "gathering"
  | "confirming"
  | "processing"
  | "demo_ready"
  | "demo_active"
  | "completed";

/**
 * Main orchestrator interface, one per conversation context
 */
export interface Orchestrator {
  readonly contextId: string;

  // Lifecycle
  open(): Promise<void>;
  closeSession(rating?: number): Promise<void>;
  dispose(): Promise<void>;

  // Requirements
  storeRequirement(field: string, value: string): Promise<StoredRequirement>;
  confirmRequirements(): Promise<string>;
  finalizeRequirements(): Promise<void>;
  loadSavedAgent(id: string): Promise<AgentSpec>;

  // Handoffs
  startDemo(): Promise<void>;
  tryDemoAgain(): Promise<void>;
  handoffBackToCreator(): Promise<void>;

  // Queries
  getState(): ConversationState;
  getSpec(): AgentSpec | null;
  getRequirements(): RequirementsSnapshot;
  getSummary(): string;
  getMissingRequirements(): { required: string[]; recommended: string[] };
  getSavedAgentId(): string | null;
  isDemoCompleted(): boolean;
  /** Whether startDemo (or tryDemoAgain, with `retry`) would pass its guard now */
  canStartDemo(retry: boolean): boolean;
  hasLiveSession(): boolean;
  getHistory(): StateTransition[];
  whenIdle(): Promise<void>;

  // Events
  on<K extends OrchestratorEventName>(event: K, handler: OrchestratorEventHandler<K>): void;
  off<K extends OrchestratorEventName>(event: K, handler: OrchestratorEventHandler<K>): void;
}

/**
 * Orchestrator construction options
 */
export interface OrchestratorOptions {
  contextId: string;
  session: SessionPort;
  synthesizer: Synthesizer;
  persistence?: PersistencePort;
  analytics?: AnalyticsPort;
  config?: Pick<RelayConfig, "timings" | "engagement" | "creator">;
  logger?: Logger<ILogObj>;
}

/**
 * State transition record
 */
export interface StateTransition {
  from: ConversationState;
  to: ConversationState;
  timestamp: Date;
  reason: string;
}

/**
 * Orchestrator event payloads
 */
export interface OrchestratorEventMap {
  "state:change": StateTransition;
  "synthesis:complete": { spec: AgentSpec };
  "synthesis:failed": { error: RelayError };
  "agent:saved": { id: string };
  "handoff:complete": { direction: HandoffDirection; persona: string };
  "handoff:failed": { direction: HandoffDirection; error: RelayError };
  closed: { rating?: number };
}

export type OrchestratorEventName = keyof OrchestratorEventMap;

export type OrchestratorEventHandler<K extends OrchestratorEventName> = (
  payload: OrchestratorEventMap[K],
) => void;
