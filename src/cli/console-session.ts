/**
 * Console session transport
 *
 * Prints persona lifecycle and utterances instead of streaming audio, so a
 * whole conversation can be followed in a terminal.
 */

import chalk from "chalk";
import type { Persona, SessionHandle, SessionPort } from "../session/types.js";

export type LineWriter = (line: string) => void;

export class ConsoleSessionPort implements SessionPort {
  private nextId = 1;
  private readonly live = new Set<string>();

  constructor(private readonly write: LineWriter = (line) => console.log(line)) {}

  async start(persona: Persona): Promise<SessionHandle> {
    const handle: SessionHandle = { id: `console-${this.nextId++}`, persona: persona.name };
    this.live.add(handle.id);
    this.write(chalk.dim(`● ${persona.name} joined (voice: ${persona.voice})`));
    return handle;
  }

  async speak(handle: SessionHandle, text: string): Promise<void> {
    this.write(`${chalk.cyan.bold(handle.persona)}: ${text}`);
  }

  async stop(handle: SessionHandle): Promise<void> {
    this.live.delete(handle.id);
    this.write(chalk.dim(`○ ${handle.persona} left`));
  }

  get liveCount(): number {
    return this.live.size;
  }
}
