/**
 * Session Controller
 *
 * Wraps a SessionPort with the guarantees the orchestrator relies on:
 * speaking never throws, and stopping a handle runs the port's teardown
 * exactly once no matter how often it is requested.
 */

import type { Logger, ILogObj } from "tslog";
import type { Persona, SessionHandle, SessionPort } from "./types.js";

export class SessionController {
  private readonly stopped = new WeakSet<SessionHandle>();
  private readonly stopping = new WeakMap<SessionHandle, Promise<void>>();

  constructor(
    private readonly port: SessionPort,
    private readonly logger: Logger<ILogObj>,
  ) {}

  /**
   * Start a persona. Failures propagate to the caller.
   */
  async start(persona: Persona): Promise<SessionHandle> {
    this.logger.info(`Starting session for '${persona.name}' with voice ${persona.voice}`);
    const handle = await this.port.start(persona);
    this.logger.debug({ event: "session:started", handle: handle.id, persona: persona.name });
    return handle;
  }

  /**
   * Ask a live session to say something.
   *
   * @returns false when the handle is already stopped or the port failed
   */
  async speak(handle: SessionHandle, text: string): Promise<boolean> {
    if (this.isStopped(handle)) {
      this.logger.debug(`Skipping utterance on stopped session ${handle.id}`);
      return false;
    }
    try {
      await this.port.speak(handle, text);
      return true;
    } catch (error) {
      this.logger.warn({ event: "session:speak_failed", handle: handle.id, error });
      return false;
    }
  }

  /**
   * Stop a session. Idempotent: concurrent and repeated calls share the first
   * teardown, and port failures are logged rather than thrown.
   */
  stop(handle: SessionHandle): Promise<void> {
    const inFlight = this.stopping.get(handle);
    if (inFlight) return inFlight;

    const teardown = this.port.stop(handle).then(
      () => {
        this.logger.debug({ event: "session:stopped", handle: handle.id });
      },
      (error: unknown) => {
        this.logger.warn({ event: "session:stop_failed", handle: handle.id, error });
      },
    );
    this.stopped.add(handle);
    this.stopping.set(handle, teardown);
    return teardown;
  }

  isStopped(handle: SessionHandle): boolean {
    return this.stopped.has(handle);
  }
}
