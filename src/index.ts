/**
 * persona-relay: builds a custom voice agent in conversation and hands the
 * caller over to a live demo of it, then back again.
 *
 * Public API exports
 */

export { VERSION } from "./version.js";

// Runtime
export {
  createRelay,
  createPersistence,
  type Relay,
  type RelayOptions,
  type Conversation,
} from "./relay.js";

// Orchestrator
export { createOrchestrator } from "./orchestrator/orchestrator.js";
export { ContextRegistry, type ContextRegistryOptions } from "./orchestrator/registry.js";
export {
  createCatalogSynthesizer,
  type Synthesizer,
  type SynthesisOutcome,
} from "./orchestrator/synthesis.js";
export type {
  ConversationState,
  Orchestrator,
  OrchestratorOptions,
  OrchestratorEventMap,
  OrchestratorEventName,
  OrchestratorEventHandler,
  StateTransition,
} from "./orchestrator/types.js";

// Requirements
export { RequirementsStore } from "./requirements/store.js";
export type {
  RequirementField,
  RequirementsSnapshot,
  StoredRequirement,
} from "./requirements/types.js";

// Catalog
export { buildAgentSpec } from "./catalog/builder.js";
export {
  DEFAULT_CATEGORIES_PATH,
  loadCategoryTable,
  parseCategoryTable,
  classifyBusinessType,
  getDefaultCategory,
} from "./catalog/table.js";
export {
  CategorySchema,
  CategoryTableSchema,
  type Category,
  type CategoryTable,
} from "./catalog/schema.js";
export type { AgentFunction, AgentSpec, BusinessContext } from "./catalog/types.js";

// Configuration
export { loadConfig, resolveConfig, configExists, type LoadConfigOptions } from "./config/loader.js";
export {
  RelayConfigSchema,
  createDefaultConfig,
  validateConfig,
  type RelayConfig,
  type RelayConfigLayer,
  type TimingsConfig,
} from "./config/schema.js";
export { CONFIG_PATHS } from "./config/paths.js";

// Ports
export type { Persona, SessionHandle, SessionPort } from "./session/types.js";
export { SessionController } from "./session/controller.js";
export {
  InMemoryAgentStore,
  FileAgentStore,
  type PersistencePort,
  type SavedAgent,
  type SaveMeta,
  type AgentListFilter,
} from "./ports/persistence.js";
export {
  InMemoryCallRecorder,
  type AnalyticsPort,
  type CallRecord,
  type CallStatus,
} from "./ports/analytics.js";

// Tools
export {
  ToolRegistry,
  BackgroundTasks,
  createPersonaToolRegistry,
  createCreatorTools,
  createDemoTools,
  defineTool,
  TOOL_FAILURE_REPLY,
  INVALID_PARAMS_REPLY,
  WRONG_PERSONA_REPLY,
  type PersonaTool,
  type PersonaToolContext,
  type ToolAudience,
  type ToolResult,
} from "./tools/index.js";

// Utilities
export * from "./utils/index.js";
