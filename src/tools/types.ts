/**
 * What persona tools act on
 */

import type { Orchestrator } from "../orchestrator/types.js";
import type { BackgroundTasks } from "./background.js";

export interface PersonaToolContext {
  orchestrator: Orchestrator;
  /** Owner of handoffs started from a tool call */
  tasks: BackgroundTasks;
  creatorName: string;
}
