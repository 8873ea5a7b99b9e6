/**
 * Tool exports for persona-relay
 */

import type { Logger, ILogObj } from "tslog";
import { createCreatorTools } from "./creator.js";
import { createDemoTools } from "./demo.js";
import { ToolRegistry } from "./registry.js";
import type { PersonaToolContext } from "./types.js";

export {
  ToolRegistry,
  defineTool,
  zodToJsonSchema,
  TOOL_FAILURE_REPLY,
  INVALID_PARAMS_REPLY,
  WRONG_PERSONA_REPLY,
  type ToolDefinition,
  type ToolAudience,
  type ToolResult,
  type PersonaTool,
  type ExecuteOptions,
} from "./registry.js";
export { BackgroundTasks } from "./background.js";
export { createCreatorTools } from "./creator.js";
export { createDemoTools } from "./demo.js";
export type { PersonaToolContext } from "./types.js";

/**
 * Registry holding both personas' tools for one conversation
 */
export function createPersonaToolRegistry(
  context: PersonaToolContext,
  logger?: Logger<ILogObj>,
): ToolRegistry {
  const registry = new ToolRegistry(logger);
  registry.registerAll(createCreatorTools(context));
  registry.registerAll(createDemoTools(context));
  return registry;
}
