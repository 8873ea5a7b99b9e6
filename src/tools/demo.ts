/**
 * Demo persona tools
 */

import { z } from "zod";
import { defineTool, type PersonaTool } from "./registry.js";
import type { PersonaToolContext } from "./types.js";
import { InvalidStateError } from "../utils/errors.js";

export function createDemoTools(context: PersonaToolContext): PersonaTool[] {
  const { orchestrator, tasks, creatorName } = context;

  const handoffToCreator = defineTool({
    name: "handoff_to_creator",
    description: `Hand the user back to ${creatorName} for feedback, changes or to finish`,
    audience: "demo",
    parameters: z.object({}),
    async execute() {
      const state = orchestrator.getState();
      if (state !== "demo_active") {
        throw new InvalidStateError(
          "handoff_to_creator",
          state,
          `I'm already on my way back to ${creatorName}.`,
        );
      }
      tasks.run("handoff_to_creator", () => orchestrator.handoffBackToCreator());
      return `Of course! Connecting you back to ${creatorName} now.`;
    },
  });

  return [handoffToCreator];
}
