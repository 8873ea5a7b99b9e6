/**
 * Tests for the console session transport
 */

import { describe, it, expect } from "vitest";
import chalk from "chalk";
import { ConsoleSessionPort } from "./console-session.js";

describe("ConsoleSessionPort", () => {
  it("should print the persona lifecycle", async () => {
    const lines: string[] = [];
    const port = new ConsoleSessionPort((line) => lines.push(line));
    const persona = { name: "Voxa", instructions: "Help", voice: "marin" };

    const handle = await port.start(persona);
    await port.speak(handle, "Hello!");
    expect(port.liveCount).toBe(1);
    await port.stop(handle);

    expect(handle).toEqual({ id: "console-1", persona: "Voxa" });
    expect(lines).toEqual([
      chalk.dim("● Voxa joined (voice: marin)"),
      `${chalk.cyan.bold("Voxa")}: Hello!`,
      chalk.dim("○ Voxa left"),
    ]);
    expect(port.liveCount).toBe(0);
  });
});
