/**
 * Error handling for persona-relay
 * Custom error types with context and recovery information
 */

/**
 * Every error code the relay can raise
 */
export type RelayErrorCode =
  | AdvisoryCode
  | "SYNTHESIS_FAILED"
  | "SYNTHESIS_TIMEOUT"
  | "HANDOFF_FAILED"
  | "PERSISTENCE_FAILED"
  | "ANALYTICS_FAILED"
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "UNEXPECTED_ERROR";

/**
 * Codes of errors that are relayed to the user by the live persona
 */
export type AdvisoryCode =
  | "LOCKED"
  | "INCOMPLETE_REQUIREMENTS"
  | "NOT_CONFIRMED"
  | "ALREADY_PROCESSING"
  | "NOT_READY"
  | "INVALID_VALUE"
  | "INVALID_STATE"
  | "NOT_FOUND";

/**
 * Base error class for persona-relay
 */
export class RelayError extends Error {
  readonly code: RelayErrorCode;
  readonly context: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: RelayErrorCode;
      context?: Record<string, unknown>;
      recoverable?: boolean;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "RelayError";
    this.code = options.code;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;

    Error.captureStackTrace(this, RelayError);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * A user-facing rejection of an operation.
 *
 * The `advice` is what the live persona should say. These never end a session.
 */
export class AdvisoryError extends RelayError {
  override readonly code: AdvisoryCode;
  readonly advice: string;

  constructor(
    code: AdvisoryCode,
    advice: string,
    options: { context?: Record<string, unknown>; message?: string } = {},
  ) {
    super(options.message ?? advice, {
      code,
      context: options.context,
      recoverable: true,
    });
    this.name = "AdvisoryError";
    this.code = code;
    this.advice = advice;
  }
}

/**
 * Requirement changes were attempted while the agent is being built
 */
export class LockedError extends AdvisoryError {
  constructor(context: Record<string, unknown> = {}) {
    super(
      "LOCKED",
      "I'm currently creating your agent with the details we confirmed. Once you've tried it, we can make any adjustments you'd like!",
      { context },
    );
    this.name = "LockedError";
  }
}

/**
 * Business name or type missing or unusable
 */
export class IncompleteRequirementsError extends AdvisoryError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(
      "INCOMPLETE_REQUIREMENTS",
      `Before I can continue I still need: ${missing.join(", ")}. Could you share those details?`,
      { context: { missing } },
    );
    this.name = "IncompleteRequirementsError";
    this.missing = missing;
  }
}

/**
 * Finalize was attempted without a confirmed summary
 */
export class NotConfirmedError extends AdvisoryError {
  constructor(state: string) {
    super(
      "NOT_CONFIRMED",
      "Let me first read back a summary of what I've gathered so you can confirm it looks right.",
      { context: { state } },
    );
    this.name = "NotConfirmedError";
  }
}

/**
 * Synthesis is already running for this context
 */
export class AlreadyProcessingError extends AdvisoryError {
  constructor() {
    super("ALREADY_PROCESSING", "I'm already working on your agent! Just a few more moments.");
    this.name = "AlreadyProcessingError";
  }
}

/**
 * The demo agent cannot be reached from the current state
 */
export class NotReadyError extends AdvisoryError {
  constructor(state: string, advice?: string) {
    super(
      "NOT_READY",
      advice ?? "Your agent isn't quite ready yet. Let me finish putting it together first.",
      { context: { state } },
    );
    this.name = "NotReadyError";
  }
}

/**
 * A requirement value that is empty, too short, or a filler phrase
 */
export class InvalidValueError extends AdvisoryError {
  constructor(field: string, value: string) {
    super("INVALID_VALUE", `I didn't quite catch that. Could you tell me the ${field} again?`, {
      context: { field, value },
    });
    this.name = "InvalidValueError";
  }
}

/**
 * Operation not valid in the current state
 */
export class InvalidStateError extends AdvisoryError {
  constructor(operation: string, state: string, advice: string) {
    super("INVALID_STATE", advice, {
      context: { operation, state },
      message: `${operation} is not valid in state '${state}'`,
    });
    this.name = "InvalidStateError";
  }
}

/**
 * Saved agent configuration not found
 */
export class NotFoundError extends AdvisoryError {
  constructor(id: string) {
    super("NOT_FOUND", "I couldn't find a saved agent with that reference. Shall we build a new one?", {
      context: { id },
    });
    this.name = "NotFoundError";
  }
}

/**
 * Spec synthesis error
 */
export class SynthesisError extends RelayError {
  constructor(message: string, options: { contextId: string; cause?: Error }) {
    super(message, {
      code: "SYNTHESIS_FAILED",
      context: { contextId: options.contextId },
      recoverable: true,
      suggestion: "Review the gathered requirements and finalize again",
      cause: options.cause,
    });
    this.name = "SynthesisError";
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends RelayError {
  readonly timeoutMs: number;
  readonly operation: string;

  constructor(
    message: string,
    options: {
      timeoutMs: number;
      operation: string;
    },
  ) {
    super(message, {
      code: "SYNTHESIS_TIMEOUT",
      context: { timeoutMs: options.timeoutMs, operation: options.operation },
      recoverable: true,
      suggestion: "Try increasing timings.synthesisTimeoutMs or simplifying the requirements",
    });
    this.name = "TimeoutError";
    this.timeoutMs = options.timeoutMs;
    this.operation = options.operation;
  }
}

/**
 * Handoff between personas failed
 */
export class HandoffFailedError extends RelayError {
  readonly direction: HandoffDirection;

  constructor(
    message: string,
    options: {
      direction: HandoffDirection;
      contextId: string;
      cause?: Error;
    },
  ) {
    super(message, {
      code: "HANDOFF_FAILED",
      context: { direction: options.direction, contextId: options.contextId },
      recoverable: true,
      suggestion: "The demo can be started again once the creator session is back",
      cause: options.cause,
    });
    this.name = "HandoffFailedError";
    this.direction = options.direction;
  }
}

export type HandoffDirection = "to_demo" | "to_creator";

/**
 * Persistence port failure (never fatal)
 */
export class PersistenceError extends RelayError {
  constructor(message: string, options: { operation: "save" | "load" | "list"; cause?: Error }) {
    super(message, {
      code: "PERSISTENCE_FAILED",
      context: { operation: options.operation },
      recoverable: true,
      suggestion: "Check the agent store directory and permissions",
      cause: options.cause,
    });
    this.name = "PersistenceError";
  }
}

/**
 * Analytics port failure (never fatal)
 */
export class AnalyticsError extends RelayError {
  constructor(message: string, options: { operation: string; cause?: Error }) {
    super(message, {
      code: "ANALYTICS_FAILED",
      context: { operation: options.operation },
      recoverable: true,
      cause: options.cause,
    });
    this.name = "AnalyticsError";
  }
}

/**
 * Configuration error
 */
export class ConfigError extends RelayError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      issues?: ConfigIssue[];
      configPath?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "CONFIG_ERROR",
      context: { configPath: options.configPath, issues: options.issues },
      recoverable: true,
      suggestion: "Check your .relay/config.json for errors",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues as a readable string
   */
  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * Check if error is a specific type
 */
export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

/**
 * Check if error should be relayed to the user rather than logged
 */
export function isAdvisoryError(error: unknown): error is AdvisoryError {
  return error instanceof AdvisoryError;
}

/**
 * Default suggestions for common error codes.
 * Used as fallback when an error doesn't have a specific suggestion.
 */
export const ERROR_SUGGESTIONS: Partial<Record<RelayErrorCode, string>> = {
  SYNTHESIS_FAILED: "Synthesis failed. The context is back in gathering and can be finalized again.",
  SYNTHESIS_TIMEOUT: "Synthesis exceeded its ceiling. Raise timings.synthesisTimeoutMs if this repeats.",
  HANDOFF_FAILED: "The session transport refused a persona. Check the SessionPort adapter logs.",
  PERSISTENCE_FAILED: "The agent was not saved. The conversation continues without it.",
  ANALYTICS_FAILED: "Call bookkeeping failed. The conversation continues without it.",
  CONFIG_ERROR: "Check your .relay/config.json.",
  VALIDATION_ERROR: "Check the input data format. See 'relay --help' for usage.",
  UNEXPECTED_ERROR: "An unexpected error occurred. Run with RELAY_LOG_LEVEL=debug for details.",
};

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof RelayError) {
    let message = `[${error.code}] ${error.message}`;
    const suggestion = error.suggestion ?? ERROR_SUGGESTIONS[error.code];
    if (suggestion) {
      message += `\n  Suggestion: ${suggestion}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return `${error.message}\n  Suggestion: ${ERROR_SUGGESTIONS.UNEXPECTED_ERROR}`;
  }

  return String(error);
}

/**
 * Wrap an async function with error handling
 */
export async function withErrorHandling<T>(
  fn: () => Promise<T>,
  context: { operation: string; recoverable?: boolean },
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof RelayError) {
      throw error;
    }

    throw new RelayError(error instanceof Error ? error.message : String(error), {
      code: "UNEXPECTED_ERROR",
      context: { operation: context.operation },
      recoverable: context.recoverable ?? false,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
