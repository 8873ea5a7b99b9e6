/**
 * Session port types
 *
 * The live voice transport is external. The orchestrator only needs to start
 * a persona, make it speak, and stop it.
 */

/**
 * A named instruction set plus voice driving one side of a live session
 */
export interface Persona {
  readonly name: string;
  readonly instructions: string;
  readonly voice: string;
}

/**
 * Opaque reference to a live session
 */
export interface SessionHandle {
  readonly id: string;
  readonly persona: string;
}

/**
 * External live-session transport
 */
export interface SessionPort {
  start(persona: Persona): Promise<SessionHandle>;
  speak(handle: SessionHandle, text: string): Promise<void>;
  stop(handle: SessionHandle): Promise<void>;
}
