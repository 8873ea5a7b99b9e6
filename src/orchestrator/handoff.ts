/**
 * Handoff protocol
 *
 * Moves a conversation from one live persona to another. The same five steps
 * run in both directions:
 *
 * 1. farewell on the current session, grace delay, stop and release it
 * 2. construct the destination persona
 * 3. start it on the session port
 * 4. settle delay, then the introduction
 * 5. hand the new session back to the caller to commit
 *
 * Failures in steps 2 and 3 surface as HandoffFailedError; recovery is the
 * caller's job since only it knows which session should be restored.
 */

import type { Logger, ILogObj } from "tslog";
import type { TimingsConfig } from "../config/schema.js";
import type { SessionController } from "../session/controller.js";
import type { Persona, SessionHandle } from "../session/types.js";
import { sleep } from "../utils/async.js";
import { HandoffFailedError, toError, type HandoffDirection } from "../utils/errors.js";

export interface HandoffTarget {
  direction: HandoffDirection;
  /** Spoken by the outgoing persona */
  farewell: string;
  buildPersona: () => Persona;
  /** Spoken by the incoming persona once it has settled */
  introduction: (persona: Persona) => string;
}

export interface HandoffContext {
  contextId: string;
  sessions: SessionController;
  current: SessionHandle | null;
  /** Called once the outgoing session has stopped */
  release: () => void;
  timings: Pick<TimingsConfig, "farewellGraceMs" | "settleMs">;
  logger: Logger<ILogObj>;
}

/**
 * Run steps 1-4 and return the started session for the caller to commit
 */
export async function runHandoff(
  context: HandoffContext,
  target: HandoffTarget,
): Promise<SessionHandle> {
  const { sessions, logger, timings } = context;

  if (context.current) {
    await sessions.speak(context.current, target.farewell);
    await sleep(timings.farewellGraceMs);
    await sessions.stop(context.current);
    context.release();
  }

  let persona: Persona;
  let handle: SessionHandle;
  try {
    persona = target.buildPersona();
    handle = await sessions.start(persona);
  } catch (error) {
    const cause = toError(error);
    logger.error({ event: "handoff:start_failed", direction: target.direction, error: cause });
    throw new HandoffFailedError(`Handoff ${target.direction} failed: ${cause.message}`, {
      direction: target.direction,
      contextId: context.contextId,
      cause,
    });
  }

  await sleep(timings.settleMs);
  await sessions.speak(handle, target.introduction(persona));

  logger.debug({ event: "handoff:started", direction: target.direction, handle: handle.id });
  return handle;
}
