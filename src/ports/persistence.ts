/**
 * Persistence port
 *
 * Durable storage for synthesized agent configurations. The orchestrator only
 * ever talks to the interface; failures are logged there and never block the
 * conversation.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { RequirementsSnapshot } from "../requirements/types.js";
import type { AgentSpec } from "../catalog/types.js";
import { PersistenceError, toError } from "../utils/errors.js";
import { createIdGenerator } from "../utils/validation.js";

/**
 * Extra information stored alongside an agent
 */
export interface SaveMeta {
  contextId: string;
}

/**
 * A previously saved agent configuration
 */
export interface SavedAgent {
  id: string;
  contextId: string;
  savedAt: string;
  requirements: RequirementsSnapshot;
  spec: AgentSpec;
}

export interface AgentListFilter {
  contextId?: string;
  category?: string;
}

export interface PersistencePort {
  save(requirements: RequirementsSnapshot, spec: AgentSpec, meta: SaveMeta): Promise<string>;
  load(id: string): Promise<SavedAgent | null>;
  list(filter?: AgentListFilter): Promise<SavedAgent[]>;
}

const AgentFunctionSchema = z.object({
  name: z.string(),
  description: z.string(),
  parameters: z.array(z.string()),
});

const RequirementsSnapshotSchema = z.object({
  businessName: z.string().optional(),
  businessType: z.string().optional(),
  targetAudience: z.string().optional(),
  tone: z.string().optional(),
  mainFunctions: z.array(z.string()),
  specialRequirements: z.array(z.string()),
  contactInfo: z.record(z.string()),
});

const AgentSpecSchema = z.object({
  agentType: z.string(),
  instructions: z.string(),
  voice: z.string(),
  functions: z.array(AgentFunctionSchema),
  sampleResponses: z.array(z.string()),
  businessContext: z.object({
    category: z.string(),
    businessName: z.string().optional(),
    businessType: z.string().optional(),
    tone: z.string(),
    functions: z.array(z.string()),
    targetAudience: z.string().optional(),
    contact: z.record(z.string()),
  }),
});

export const SavedAgentSchema = z.object({
  id: z.string().min(1),
  contextId: z.string(),
  savedAt: z.string(),
  requirements: RequirementsSnapshotSchema,
  spec: AgentSpecSchema,
});

const ID_PATTERN = /^[A-Za-z0-9_-]+$/;

function matches(agent: SavedAgent, filter: AgentListFilter | undefined): boolean {
  if (filter?.contextId !== undefined && agent.contextId !== filter.contextId) return false;
  if (filter?.category !== undefined && agent.spec.businessContext.category !== filter.category) {
    return false;
  }
  return true;
}

/**
 * Process-local store, used by default and in tests
 */
export class InMemoryAgentStore implements PersistencePort {
  private readonly agents = new Map<string, SavedAgent>();
  private readonly nextId = createIdGenerator("agent");

  async save(requirements: RequirementsSnapshot, spec: AgentSpec, meta: SaveMeta): Promise<string> {
    const id = this.nextId();
    this.agents.set(id, {
      id,
      contextId: meta.contextId,
      savedAt: new Date().toISOString(),
      requirements,
      spec,
    });
    return id;
  }

  async load(id: string): Promise<SavedAgent | null> {
    return this.agents.get(id) ?? null;
  }

  async list(filter?: AgentListFilter): Promise<SavedAgent[]> {
    return [...this.agents.values()].filter((agent) => matches(agent, filter));
  }

  get size(): number {
    return this.agents.size;
  }
}

/**
 * One JSON file per agent under a directory
 */
export class FileAgentStore implements PersistencePort {
  private readonly nextId = createIdGenerator("agent");

  constructor(private readonly directory: string) {}

  async save(requirements: RequirementsSnapshot, spec: AgentSpec, meta: SaveMeta): Promise<string> {
    const id = this.nextId();
    const record: SavedAgent = {
      id,
      contextId: meta.contextId,
      savedAt: new Date().toISOString(),
      requirements,
      spec,
    };

    try {
      await fs.mkdir(this.directory, { recursive: true });
      const target = this.fileFor(id);
      // Write to a temp file first so a crash never leaves a half-written agent
      const tmp = `${target}.tmp`;
      await fs.writeFile(tmp, JSON.stringify(record, null, 2), "utf-8");
      await fs.rename(tmp, target);
    } catch (error) {
      throw new PersistenceError(`Failed to save agent ${id}`, {
        operation: "save",
        cause: toError(error),
      });
    }
    return id;
  }

  async load(id: string): Promise<SavedAgent | null> {
    if (!ID_PATTERN.test(id)) {
      return null;
    }

    let content: string;
    try {
      content = await fs.readFile(this.fileFor(id), "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new PersistenceError(`Failed to load agent ${id}`, {
        operation: "load",
        cause: toError(error),
      });
    }

    return this.parse(content, id);
  }

  async list(filter?: AgentListFilter): Promise<SavedAgent[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new PersistenceError("Failed to list agents", {
        operation: "list",
        cause: toError(error),
      });
    }

    const agents: SavedAgent[] = [];
    for (const entry of entries.filter((e) => e.endsWith(".json")).sort()) {
      const agent = await this.load(entry.slice(0, -".json".length));
      if (agent && matches(agent, filter)) {
        agents.push(agent);
      }
    }
    return agents;
  }

  private fileFor(id: string): string {
    return path.join(this.directory, `${id}.json`);
  }

  private parse(content: string, id: string): SavedAgent {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new PersistenceError(`Agent ${id} is not valid JSON`, {
        operation: "load",
        cause: toError(error),
      });
    }
    const result = SavedAgentSchema.safeParse(raw);
    if (!result.success) {
      throw new PersistenceError(`Agent ${id} has an invalid shape`, {
        operation: "load",
        cause: result.error,
      });
    }
    return result.data;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
