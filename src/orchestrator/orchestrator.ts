/**
 * Conversation orchestrator
 *
 * The per-context state machine moving a conversation between the creator
 * persona and the synthesized demo agent. Guard checks and the assignments
 * that follow them run under one mutex; the awaited bodies (synthesis,
 * handoffs, port calls) never do.
 */

import { deepFreeze } from "../catalog/builder.js";
import type { AgentSpec } from "../catalog/types.js";
import { createDefaultConfig } from "../config/schema.js";
import type { SavedAgent } from "../ports/persistence.js";
import { RequirementsStore } from "../requirements/store.js";
import type { RequirementsSnapshot, StoredRequirement } from "../requirements/types.js";
import { SessionController } from "../session/controller.js";
import type { SessionHandle } from "../session/types.js";
import { createMutex, sleep } from "../utils/async.js";
import {
  AlreadyProcessingError,
  AnalyticsError,
  HandoffFailedError,
  IncompleteRequirementsError,
  InvalidStateError,
  LockedError,
  NotConfirmedError,
  NotFoundError,
  NotReadyError,
  PersistenceError,
  toError,
  type HandoffDirection,
} from "../utils/errors.js";
import { createContextLogger, getLogger } from "../utils/logger.js";
import { runEngagementLoop } from "./engagement.js";
import { runHandoff, type HandoffTarget } from "./handoff.js";
import {
  HANDOFF_APOLOGY,
  SYNTHESIS_APOLOGY,
  creatorPersona,
  creatorReturn,
  demoIntroduction,
  demoPersona,
  farewellToCreator,
  farewellToDemo,
  greeting,
  readyAnnouncement,
} from "./personas.js";
import { startSynthesis, type SynthesisOutcome, type SynthesisRun } from "./synthesis.js";
import type {
  ConversationState,
  Orchestrator,
  OrchestratorEventHandler,
  OrchestratorEventMap,
  OrchestratorEventName,
  OrchestratorOptions,
  StateTransition,
} from "./types.js";

type ListenerSets = {
  [K in OrchestratorEventName]: Set<OrchestratorEventHandler<K>>;
};

/**
 * Create a new orchestrator instance
 */
export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  const { contextId, synthesizer, persistence, analytics } = options;
  const { timings, engagement, creator } = options.config ?? createDefaultConfig();
  const logger = options.logger ?? createContextLogger(getLogger(), contextId);
  const sessions = new SessionController(options.session, logger);
  const lock = createMutex();
  const store = new RequirementsStore();

  // Internal state
  let state: ConversationState = "gathering";
  let spec: AgentSpec | null = null;
  let savedAgentId: string | null = null;
  let currentHandle: SessionHandle | null = null;
  let synthesis: SynthesisRun | null = null;
  let handoffInFlight = false;
  let demoCompleted = false;
  let handoffFailed = false;
  let opened = false;
  const history: StateTransition[] = [];
  const pending = new Set<Promise<void>>();

  const listeners: ListenerSets = {
    "state:change": new Set(),
    "synthesis:complete": new Set(),
    "synthesis:failed": new Set(),
    "agent:saved": new Set(),
    "handoff:complete": new Set(),
    "handoff:failed": new Set(),
    closed: new Set(),
  };

  // Event emitter
  function emit<K extends OrchestratorEventName>(event: K, payload: OrchestratorEventMap[K]): void {
    const handlers: Set<OrchestratorEventHandler<K>> = listeners[event];
    for (const handler of handlers) {
      try {
        handler(payload);
      } catch (error) {
        logger.error(`Error in event handler for ${event}:`, error);
      }
    }
  }

  /**
   * Keep a background promise reachable from whenIdle(); failures are logged
   */
  function track(task: Promise<unknown>, label: string): void {
    const tracked: Promise<void> = task
      .then(
        () => undefined,
        (error: unknown) => {
          logger.error({ event: "background:failed", task: label, error: toError(error) });
        },
      )
      .finally(() => {
        pending.delete(tracked);
      });
    pending.add(tracked);
  }

  function transition(to: ConversationState, reason: string): void {
    const record: StateTransition = { from: state, to, timestamp: new Date(), reason };
    state = to;
    history.push(record);
    logger.info(`State ${record.from} → ${to} (${reason})`);
    emit("state:change", record);

    if (analytics) {
      track(
        analytics.logTransition(contextId, record.from, to, reason).catch((error: unknown) => {
          const failure = new AnalyticsError("Failed to log transition", {
            operation: "logTransition",
            cause: toError(error),
          });
          logger.warn(failure.toJSON());
        }),
        "analytics:transition",
      );
    }
  }

  async function speakCurrent(text: string): Promise<boolean> {
    if (!currentHandle) {
      logger.debug("No live session to speak on");
      return false;
    }
    return sessions.speak(currentHandle, text);
  }

  // ---------------------------------------------------------------------------
  // Synthesis
  // ---------------------------------------------------------------------------

  async function onSynthesisSettled(
    run: SynthesisRun,
    requirements: RequirementsSnapshot,
    outcome: SynthesisOutcome,
  ): Promise<void> {
    const accepted = await lock.withLock(() => {
      if (synthesis !== run) return false;
      synthesis = null;
      if (outcome.status === "cancelled" || state !== "processing") return false;

      if (outcome.status === "succeeded") {
        spec = outcome.spec;
        transition("demo_ready", "synthesis_complete");
      } else {
        transition(
          "gathering",
          outcome.error.code === "SYNTHESIS_TIMEOUT" ? "synthesis_timeout" : "synthesis_failed",
        );
      }
      return true;
    });

    if (!accepted) {
      logger.debug(`Discarding synthesis outcome '${outcome.status}'`);
      return;
    }

    if (outcome.status === "succeeded") {
      emit("synthesis:complete", { spec: outcome.spec });
      await Promise.all([
        persist(requirements, outcome.spec),
        speakCurrent(readyAnnouncement(outcome.spec)),
      ]);
    } else if (outcome.status === "failed") {
      logger.warn(outcome.error.toJSON());
      emit("synthesis:failed", { error: outcome.error });
      await speakCurrent(SYNTHESIS_APOLOGY);
    }
  }

  async function persist(requirements: RequirementsSnapshot, agent: AgentSpec): Promise<void> {
    if (!persistence) return;
    try {
      const id = await persistence.save(requirements, agent, { contextId });
      savedAgentId = id;
      logger.info(`Saved agent ${id}`);
      emit("agent:saved", { id });
    } catch (error) {
      const failure =
        error instanceof PersistenceError
          ? error
          : new PersistenceError("Failed to save agent", { operation: "save", cause: toError(error) });
      logger.warn(failure.toJSON());
    }
  }

  async function loadSaved(id: string): Promise<SavedAgent | null> {
    if (!persistence) return null;
    try {
      return await persistence.load(id);
    } catch (error) {
      logger.warn({ event: "agent:load_failed", id, error: toError(error) });
      return null;
    }
  }

  // ---------------------------------------------------------------------------
  // Handoffs
  // ---------------------------------------------------------------------------

  function targetFor(direction: HandoffDirection, agent: AgentSpec): HandoffTarget {
    if (direction === "to_demo") {
      return {
        direction,
        farewell: farewellToDemo(agent, creator.name),
        buildPersona: () => demoPersona(agent),
        introduction: () => demoIntroduction(agent, creator.name),
      };
    }
    return {
      direction,
      farewell: farewellToCreator(creator.name),
      buildPersona: () => creatorPersona(creator),
      introduction: () => creatorReturn(creator.name, agent),
    };
  }

  async function performHandoff(direction: HandoffDirection, agent: AgentSpec): Promise<void> {
    let handle: SessionHandle;
    try {
      handle = await runHandoff(
        {
          contextId,
          sessions,
          current: currentHandle,
          release: () => {
            currentHandle = null;
          },
          timings,
          logger,
        },
        targetFor(direction, agent),
      );
    } catch (error) {
      const failure =
        error instanceof HandoffFailedError
          ? error
          : new HandoffFailedError(`Handoff ${direction} failed`, {
              direction,
              contextId,
              cause: toError(error),
            });
      await restoreAfterFailedHandoff(direction, failure);
      throw failure;
    }

    const committed = await lock.withLock(() => {
      if (state === "completed") return false;
      currentHandle = handle;
      if (direction === "to_demo") {
        handoffFailed = false;
        transition("demo_active", "demo_started");
      } else {
        demoCompleted = true;
        transition("gathering", "demo_finished");
      }
      return true;
    });

    if (!committed) {
      logger.info("Context closed during handoff; stopping the new session");
      await sessions.stop(handle);
      return;
    }

    emit("handoff:complete", { direction, persona: handle.persona });
  }

  /**
   * Leave the context in gathering with a live creator session
   */
  async function restoreAfterFailedHandoff(
    direction: HandoffDirection,
    failure: HandoffFailedError,
  ): Promise<void> {
    const restore = await lock.withLock(() => {
      if (state === "completed") return false;
      if (direction === "to_creator") demoCompleted = true;
      handoffFailed = true;
      transition("gathering", `handoff_failed: ${failure.message}`);
      return currentHandle === null;
    });
    emit("handoff:failed", { direction, error: failure });

    if (!restore) return;

    await sleep(timings.restoreSettleMs);
    try {
      const handle = await sessions.start(creatorPersona(creator));
      if (state === "completed") {
        await sessions.stop(handle);
        return;
      }
      currentHandle = handle;
      await sessions.speak(handle, HANDOFF_APOLOGY);
    } catch (error) {
      logger.error({ event: "handoff:restore_failed", error: toError(error) });
    }
  }

  function demoAvailable(allowRetry: boolean): boolean {
    if (handoffInFlight || !spec) return false;
    if (state === "demo_ready") return true;
    // A stored spec can be retried after a finished demo or a failed handoff
    return allowRetry && state === "gathering" && (demoCompleted || handoffFailed);
  }

  async function beginDemo(allowRetry: boolean): Promise<void> {
    const agent = await lock.withLock(() => {
      if (!spec || !demoAvailable(allowRetry)) {
        throw new NotReadyError(state);
      }
      handoffInFlight = true;
      return spec;
    });

    try {
      await performHandoff("to_demo", agent);
    } finally {
      handoffInFlight = false;
    }
  }

  // ---------------------------------------------------------------------------
  // Orchestrator implementation
  // ---------------------------------------------------------------------------

  const orchestrator: Orchestrator = {
    contextId,

    async open(): Promise<void> {
      await lock.withLock(() => {
        if (opened || state === "completed") {
          throw new InvalidStateError("open", state, "We're already talking!");
        }
        opened = true;
      });

      const handle = await sessions.start(creatorPersona(creator));
      currentHandle = handle;

      if (analytics) {
        try {
          await analytics.startCall(contextId, creator.name);
        } catch (error) {
          logger.warn(
            new AnalyticsError("Failed to start call", {
              operation: "startCall",
              cause: toError(error),
            }).toJSON(),
          );
        }
      }

      await sessions.speak(handle, greeting(creator.name));
    },

    async storeRequirement(field: string, value: string): Promise<StoredRequirement> {
      return lock.withLock(() => {
        if (state === "processing") {
          throw new LockedError({ field });
        }
        if (state === "completed") {
          throw new InvalidStateError(
            "storeRequirement",
            state,
            "Our session has already ended. Start a new one to build another agent.",
          );
        }
        const stored = store.record(field, value);
        logger.debug({ event: "requirement:stored", ...stored });
        return stored;
      });
    },

    async confirmRequirements(): Promise<string> {
      return lock.withLock(() => {
        if (state === "processing") {
          throw new AlreadyProcessingError();
        }
        if (state !== "gathering" && state !== "confirming") {
          throw new InvalidStateError(
            "confirmRequirements",
            state,
            "We've already confirmed your requirements. Let's try the agent first!",
          );
        }
        const missing = store.missingRequired();
        if (missing.length > 0) {
          throw new IncompleteRequirementsError(missing);
        }
        if (state === "gathering") {
          transition("confirming", "requirements_confirmed");
        }
        return store.summary();
      });
    },

    async finalizeRequirements(): Promise<void> {
      const started = await lock.withLock(() => {
        if (state === "processing") {
          throw new AlreadyProcessingError();
        }
        if (state !== "confirming") {
          throw new NotConfirmedError(state);
        }
        transition("processing", "requirements_finalized");
        const requirements = store.snapshot();
        const run = startSynthesis({
          contextId,
          requirements,
          synthesizer,
          timeoutMs: timings.synthesisTimeoutMs,
        });
        synthesis = run;
        return { run, requirements };
      });

      const { run, requirements } = started;
      track(
        run.outcome.then((outcome) => onSynthesisSettled(run, requirements, outcome)),
        "synthesis",
      );
      track(
        runEngagementLoop({
          intervalMs: timings.engagementIntervalMs,
          ceilingMs: timings.synthesisTimeoutMs,
          maxFillers: engagement.maxFillers,
          fillers: engagement.fillers,
          signal: run.signal,
          isSettled: run.isSettled,
          speak: speakCurrent,
        }),
        "engagement",
      );
    },

    async loadSavedAgent(id: string): Promise<AgentSpec> {
      await lock.withLock(() => {
        if (state === "processing") {
          throw new AlreadyProcessingError();
        }
        if (state !== "gathering" && state !== "confirming") {
          throw new InvalidStateError(
            "loadSavedAgent",
            state,
            "Let's finish with the current agent before loading a saved one.",
          );
        }
      });

      const saved = await loadSaved(id);
      if (!saved) {
        throw new NotFoundError(id);
      }

      const agent = deepFreeze(saved.spec);
      await lock.withLock(() => {
        if (state !== "gathering" && state !== "confirming") {
          throw new InvalidStateError(
            "loadSavedAgent",
            state,
            "Let's finish with the current agent before loading a saved one.",
          );
        }
        store.restore(saved.requirements);
        spec = agent;
        savedAgentId = id;
        transition("demo_ready", "saved_agent_loaded");
      });

      await speakCurrent(readyAnnouncement(agent));
      return agent;
    },

    async startDemo(): Promise<void> {
      await beginDemo(false);
    },

    async tryDemoAgain(): Promise<void> {
      await beginDemo(true);
    },

    async handoffBackToCreator(): Promise<void> {
      const agent = await lock.withLock(() => {
        if (state !== "demo_active" || handoffInFlight || !spec) {
          throw new InvalidStateError(
            "handoffBackToCreator",
            state,
            "You're already talking with me.",
          );
        }
        handoffInFlight = true;
        return spec;
      });

      try {
        await performHandoff("to_creator", agent);
      } finally {
        handoffInFlight = false;
      }
    },

    async closeSession(rating?: number): Promise<void> {
      const run = await lock.withLock(() => {
        if (state === "completed") {
          throw new InvalidStateError("closeSession", state, "Our session has already ended.");
        }
        transition("completed", "session_closed");
        const inFlight = synthesis;
        synthesis = null;
        return inFlight;
      });

      if (run) {
        run.cancel();
        await run.outcome;
      }

      if (analytics) {
        try {
          await analytics.endCall(contextId, "completed", rating);
        } catch (error) {
          logger.warn(
            new AnalyticsError("Failed to end call", {
              operation: "endCall",
              cause: toError(error),
            }).toJSON(),
          );
        }
      }

      emit("closed", rating === undefined ? {} : { rating });
    },

    async dispose(): Promise<void> {
      synthesis?.cancel();
      synthesis = null;
      const handle = currentHandle;
      currentHandle = null;
      if (handle) {
        await sessions.stop(handle);
      }
    },

    getState(): ConversationState {
      return state;
    },

    getSpec(): AgentSpec | null {
      return spec;
    },

    getRequirements(): RequirementsSnapshot {
      return store.snapshot();
    },

    getSummary(): string {
      return store.summary();
    },

    getMissingRequirements(): { required: string[]; recommended: string[] } {
      return { required: store.missingRequired(), recommended: store.missingRecommended() };
    },

    getSavedAgentId(): string | null {
      return savedAgentId;
    },

    isDemoCompleted(): boolean {
      return demoCompleted;
    },

    canStartDemo(retry: boolean): boolean {
      return demoAvailable(retry);
    },

    hasLiveSession(): boolean {
      return currentHandle !== null && !sessions.isStopped(currentHandle);
    },

    getHistory(): StateTransition[] {
      return [...history];
    },

    async whenIdle(): Promise<void> {
      while (pending.size > 0) {
        await Promise.all([...pending]);
      }
    },

    on<K extends OrchestratorEventName>(event: K, handler: OrchestratorEventHandler<K>): void {
      const handlers: Set<OrchestratorEventHandler<K>> = listeners[event];
      handlers.add(handler);
    },

    off<K extends OrchestratorEventName>(event: K, handler: OrchestratorEventHandler<K>): void {
      const handlers: Set<OrchestratorEventHandler<K>> = listeners[event];
      handlers.delete(handler);
    },
  };

  return orchestrator;
}
