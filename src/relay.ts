/**
 * Relay runtime
 *
 * Wires configuration, the category table, the ports and the context
 * registry into one object a transport can drive: `connect` returns the
 * conversation for a context id together with the tools its personas call.
 */

import path from "node:path";
import type { Logger, ILogObj } from "tslog";
import { loadCategoryTable } from "./catalog/table.js";
import type { CategoryTable } from "./catalog/schema.js";
import type { RelayConfig } from "./config/schema.js";
import { createOrchestrator } from "./orchestrator/orchestrator.js";
import { ContextRegistry } from "./orchestrator/registry.js";
import { createCatalogSynthesizer, type Synthesizer } from "./orchestrator/synthesis.js";
import type { Orchestrator } from "./orchestrator/types.js";
import { InMemoryCallRecorder, type AnalyticsPort } from "./ports/analytics.js";
import { FileAgentStore, InMemoryAgentStore, type PersistencePort } from "./ports/persistence.js";
import type { SessionPort } from "./session/types.js";
import { BackgroundTasks } from "./tools/background.js";
import { createPersonaToolRegistry } from "./tools/index.js";
import type { ToolRegistry } from "./tools/registry.js";
import { CONFIG_PATHS } from "./config/paths.js";
import {
  createChildLogger,
  createContextLogger,
  createLogger,
  logEvent,
  logTiming,
} from "./utils/logger.js";

export interface RelayOptions {
  config: RelayConfig;
  session: SessionPort;
  logger?: Logger<ILogObj>;
  /** Defaults to the catalog synthesizer over the configured category table */
  synthesizer?: Synthesizer;
  persistence?: PersistencePort;
  analytics?: AnalyticsPort;
  /** Base for a relative persistence directory */
  cwd?: string;
}

/**
 * One live conversation and the tools its personas call
 */
export interface Conversation {
  readonly orchestrator: Orchestrator;
  readonly tools: ToolRegistry;
  readonly tasks: BackgroundTasks;
  /** Resolves once background handoffs and orchestrator work have settled */
  whenIdle(): Promise<void>;
}

export interface Relay {
  readonly config: RelayConfig;
  readonly table: CategoryTable;
  readonly contexts: ContextRegistry;
  readonly persistence: PersistencePort;
  readonly analytics: AnalyticsPort;
  connect(contextId: string): Promise<Conversation>;
  shutdown(): Promise<void>;
}

export function createPersistence(
  config: RelayConfig["persistence"],
  cwd: string = process.cwd(),
): PersistencePort {
  if (config.driver === "file") {
    return new FileAgentStore(path.resolve(cwd, config.directory));
  }
  return new InMemoryAgentStore();
}

export async function createRelay(options: RelayOptions): Promise<Relay> {
  const { config, session } = options;
  const logger =
    options.logger ??
    createLogger({
      level: config.logging.level,
      prettyPrint: config.logging.prettyPrint,
      logToFile: config.logging.logToFile,
      logDir: CONFIG_PATHS.logs,
    });

  const table = await logTiming(logger, "catalog:load", () =>
    loadCategoryTable(config.catalog.categoriesPath),
  );
  const synthesizer = options.synthesizer ?? createCatalogSynthesizer(table);
  const persistence = options.persistence ?? createPersistence(config.persistence, options.cwd);
  const analytics = options.analytics ?? new InMemoryCallRecorder();

  const contexts = new ContextRegistry({
    teardownGraceMs: config.timings.teardownGraceMs,
    logger: createChildLogger(logger, "contexts"),
    create: (contextId) =>
      createOrchestrator({
        contextId,
        session,
        synthesizer,
        persistence,
        analytics,
        config,
        logger: createContextLogger(logger, contextId),
      }),
  });

  const conversations = new WeakMap<Orchestrator, Conversation>();

  async function connect(contextId: string): Promise<Conversation> {
    const orchestrator = await contexts.getOrCreate(contextId);
    const existing = conversations.get(orchestrator);
    if (existing) return existing;

    const toolLogger = createChildLogger(logger, `tools:${contextId}`);
    const tasks = new BackgroundTasks(toolLogger);
    const conversation: Conversation = {
      orchestrator,
      tasks,
      tools: createPersonaToolRegistry(
        { orchestrator, tasks, creatorName: config.creator.name },
        toolLogger,
      ),
      async whenIdle() {
        await tasks.whenIdle();
        await orchestrator.whenIdle();
      },
    };
    conversations.set(orchestrator, conversation);
    logEvent(logger, "context:connected", { contextId });
    return conversation;
  }

  return {
    config,
    table,
    contexts,
    persistence,
    analytics,
    connect,
    shutdown: () => contexts.shutdown(),
  };
}
