/**
 * Synthesis runner
 *
 * Runs one synthesizer call under a cancellation scope with a hard ceiling.
 * The scope's signal is aborted as soon as the run settles for any reason, so
 * everything sharing it (the engagement loop) stops at once.
 */

import type { AgentSpec } from "../catalog/types.js";
import type { CategoryTable } from "../catalog/schema.js";
import { buildAgentSpec } from "../catalog/builder.js";
import type { RequirementsSnapshot } from "../requirements/types.js";
import { deferred } from "../utils/async.js";
import { SynthesisError, TimeoutError, isRelayError, toError } from "../utils/errors.js";

/**
 * Produces an agent spec from a requirements snapshot
 */
export type Synthesizer = (
  requirements: RequirementsSnapshot,
  signal: AbortSignal,
) => Promise<AgentSpec>;

export type SynthesisOutcome =
  | { status: "succeeded"; spec: AgentSpec }
  | { status: "failed"; error: SynthesisError | TimeoutError }
  | { status: "cancelled" };

export interface SynthesisRun {
  readonly outcome: Promise<SynthesisOutcome>;
  readonly signal: AbortSignal;
  cancel(): void;
  isSettled(): boolean;
}

export interface SynthesisOptions {
  contextId: string;
  requirements: RequirementsSnapshot;
  synthesizer: Synthesizer;
  timeoutMs: number;
}

/**
 * Start a synthesis run. Never rejects: every ending is a SynthesisOutcome.
 */
export function startSynthesis(options: SynthesisOptions): SynthesisRun {
  const controller = new AbortController();
  const result = deferred<SynthesisOutcome>();
  let settled = false;

  const finish = (outcome: SynthesisOutcome): void => {
    if (settled) return;
    settled = true;
    clearTimeout(timer);
    controller.abort();
    result.resolve(outcome);
  };

  const timer = setTimeout(() => {
    finish({
      status: "failed",
      error: new TimeoutError(`Spec synthesis timed out after ${options.timeoutMs}ms`, {
        timeoutMs: options.timeoutMs,
        operation: "synthesis",
      }),
    });
  }, options.timeoutMs);

  Promise.resolve()
    .then(() => options.synthesizer(options.requirements, controller.signal))
    .then(
      (spec) => finish({ status: "succeeded", spec }),
      (error: unknown) => {
        const cause = toError(error);
        finish({
          status: "failed",
          error: new SynthesisError(
            isRelayError(error) ? error.message : `Spec synthesis failed: ${cause.message}`,
            { contextId: options.contextId, cause },
          ),
        });
      },
    );

  return {
    outcome: result.promise,
    signal: controller.signal,
    cancel: () => finish({ status: "cancelled" }),
    isSettled: () => settled,
  };
}

/**
 * Synthesizer backed by the category table
 */
export function createCatalogSynthesizer(table: CategoryTable): Synthesizer {
  return async (requirements) => buildAgentSpec(requirements, table);
}
