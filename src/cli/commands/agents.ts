/**
 * Agents command - List agents saved by earlier conversations
 */

import { Command } from "commander";
import chalk from "chalk";
import { loadConfig } from "../../config/loader.js";
import type { PersistencePort, SavedAgent } from "../../ports/persistence.js";
import { createPersistence } from "../../relay.js";
import { withErrorHandling } from "../../utils/errors.js";

export interface AgentsOptions {
  config?: string;
  category?: string;
  context?: string;
  json?: boolean;
}

export interface AgentRow {
  id: string;
  agentType: string;
  category: string;
  voice: string;
  contextId: string;
  savedAt: string;
}

export function toAgentRow(agent: SavedAgent): AgentRow {
  return {
    id: agent.id,
    agentType: agent.spec.agentType,
    category: agent.spec.businessContext.category,
    voice: agent.spec.voice,
    contextId: agent.contextId,
    savedAt: agent.savedAt,
  };
}

export function formatAgents(rows: readonly AgentRow[]): string {
  if (rows.length === 0) {
    return chalk.dim("No saved agents");
  }
  return rows
    .map((row) =>
      [
        `${chalk.bold(row.id)} ${row.agentType}`,
        `  category: ${row.category} (voice: ${row.voice})`,
        `  saved:    ${row.savedAt} by ${row.contextId}`,
      ].join("\n"),
    )
    .join("\n\n");
}

export async function listAgents(
  persistence: PersistencePort,
  options: Pick<AgentsOptions, "category" | "context"> = {},
): Promise<AgentRow[]> {
  const agents = await persistence.list({ category: options.category, contextId: options.context });
  return agents.map(toAgentRow);
}

export async function runAgents(options: AgentsOptions = {}): Promise<string> {
  const config = await loadConfig({ configPath: options.config });
  const rows = await listAgents(createPersistence(config.persistence), options);
  return options.json ? JSON.stringify(rows, null, 2) : formatAgents(rows);
}

export function registerAgentsCommand(program: Command): void {
  program
    .command("agents")
    .description("List agents saved by earlier conversations")
    .option("--category <name>", "Only agents of this category")
    .option("--context <id>", "Only agents saved by this context")
    .option("-c, --config <path>", "Project config file")
    .option("--json", "Output as JSON")
    .action(async (options: AgentsOptions) => {
      console.log(await withErrorHandling(() => runAgents(options), { operation: "agents" }));
    });
}
