/**
 * Tests for simulate command
 */

import { describe, it, expect } from "vitest";
import chalk from "chalk";
import { runSimulation, FAST_TIMINGS } from "./simulate.js";
import { createDefaultConfig } from "../../config/schema.js";
import { greeting } from "../../orchestrator/personas.js";

describe("runSimulation", () => {
  it("should run a whole conversation through to completion", async () => {
    const lines: string[] = [];

    const result = await runSimulation(
      {
        name: "Tony's Pizza",
        type: "pizza restaurant",
        function: ["take orders", "answer menu questions"],
        tone: "playful",
        rating: 4,
        fast: true,
      },
      createDefaultConfig(),
      (line) => lines.push(line),
    );

    expect(result.finalState).toBe("completed");
    expect(result.spec?.agentType).toBe("Tony's Pizza Pizza Assistant");
    expect(result.spec?.businessContext.functions).toEqual(["take orders", "answer menu questions"]);
    expect(result.savedAgentId).toMatch(/^agent_/);
    expect(result.toolCalls.map((c) => c.tool)).toEqual([
      "store_user_requirement",
      "store_user_requirement",
      "store_user_requirement",
      "store_user_requirement",
      "check_requirements_status",
      "confirm_requirements",
      "finalize_requirements",
      "start_demo",
      "handoff_to_creator",
      "close_session",
    ]);
    expect(result.toolCalls.every((c) => c.success)).toBe(true);
    expect(result.call).toMatchObject({ status: "completed", rating: 4, initialPersona: "Voxa" });
    expect(result.call?.transitions.map((t) => t.to)).toEqual([
      "confirming",
      "processing",
      "demo_ready",
      "demo_active",
      "gathering",
      "completed",
    ]);

    expect(lines[0]).toBe(chalk.dim("● Voxa joined (voice: marin)"));
    expect(lines[1]).toBe(`${chalk.cyan.bold("Voxa")}: ${greeting("Voxa")}`);
    expect(lines).toContain(chalk.dim("● Tony's Pizza Pizza Assistant joined (voice: echo)"));
  });

  it("should stop short of a demo when the requirements are unusable", async () => {
    const result = await runSimulation(
      { name: "um", type: "pizza restaurant", fast: true },
      createDefaultConfig(),
      () => undefined,
    );

    expect(result.spec).toBeNull();
    expect(result.finalState).toBe("completed");
    expect(result.toolCalls.find((c) => c.tool === "confirm_requirements")?.success).toBe(false);
    expect(result.toolCalls.find((c) => c.tool === "start_demo")?.success).toBe(false);
  });

  it("should only collapse the protocol delays", () => {
    expect(FAST_TIMINGS).not.toHaveProperty("synthesisTimeoutMs");
    expect(FAST_TIMINGS.farewellGraceMs).toBe(0);
  });
});
