/**
 * Simulate command - Run a scripted conversation against the console transport
 *
 * Plays the user's side of a full build: requirements, confirmation,
 * synthesis, the demo and the handback, then closes with a rating. Every
 * persona utterance and tool reply is printed as it happens.
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import type { AgentSpec } from "../../catalog/types.js";
import { loadConfig } from "../../config/loader.js";
import type { RelayConfig, TimingsConfig } from "../../config/schema.js";
import type { ConversationState } from "../../orchestrator/types.js";
import { InMemoryCallRecorder, type CallRecord } from "../../ports/analytics.js";
import { createRelay, type Conversation } from "../../relay.js";
import type { ToolAudience } from "../../tools/registry.js";
import { withErrorHandling } from "../../utils/errors.js";
import { createLogger } from "../../utils/logger.js";
import { ConsoleSessionPort, type LineWriter } from "../console-session.js";

export interface SimulateOptions {
  name: string;
  type: string;
  function?: string[];
  tone?: string;
  rating?: number;
  /** Collapse protocol delays so the run finishes in a moment */
  fast?: boolean;
  verbose?: boolean;
  config?: string;
}

export interface ToolCall {
  tool: string;
  success: boolean;
  output: string;
}

export interface SimulationResult {
  contextId: string;
  finalState: ConversationState;
  spec: AgentSpec | null;
  savedAgentId: string | null;
  toolCalls: ToolCall[];
  call?: CallRecord;
}

export const FAST_TIMINGS: Omit<TimingsConfig, "synthesisTimeoutMs"> = {
  engagementIntervalMs: 50,
  farewellGraceMs: 0,
  settleMs: 0,
  restoreSettleMs: 0,
  teardownGraceMs: 0,
};

const CONTEXT_ID = "simulation";

export async function runSimulation(
  options: SimulateOptions,
  config: RelayConfig,
  write: LineWriter = (line) => console.log(line),
): Promise<SimulationResult> {
  const effective: RelayConfig = options.fast
    ? { ...config, timings: { ...config.timings, ...FAST_TIMINGS } }
    : config;
  const analytics = new InMemoryCallRecorder();
  const relay = await createRelay({
    config: effective,
    session: new ConsoleSessionPort(write),
    analytics,
    logger: createLogger({
      level: options.verbose ? effective.logging.level : "warn",
      prettyPrint: effective.logging.prettyPrint,
    }),
  });

  const toolCalls: ToolCall[] = [];
  const conversation = await relay.connect(CONTEXT_ID);

  const user = (line: string): void => write(`${chalk.magenta.bold("User")}: ${line}`);
  const call = async (tool: string, params: unknown = {}, audience: ToolAudience = "creator") => {
    const result = await conversation.tools.execute(tool, params, { audience });
    toolCalls.push({ tool, success: result.success, output: result.output });
    const marker = result.success ? chalk.yellow(`[${tool}]`) : chalk.red(`[${tool}]`);
    write(`  ${marker} ${chalk.dim(result.output)}`);
  };

  try {
    await conversation.orchestrator.open();
    await gatherRequirements(options, user, call);

    user("That all sounds right, go ahead.");
    await call("confirm_requirements");
    await call("finalize_requirements");
    await conversation.whenIdle();

    user("Yes, let me try it!");
    await call("start_demo");
    await conversation.whenIdle();

    user(`I'd like to talk to ${effective.creator.name} again.`);
    await call("handoff_to_creator", {}, "demo");
    await conversation.whenIdle();

    const rating = options.rating ?? 5;
    user(`I'm happy with it. I'd rate this a ${rating}.`);
    await call("close_session", { rating });

    return summarize(conversation, toolCalls, analytics);
  } finally {
    await relay.shutdown();
  }
}

async function gatherRequirements(
  options: SimulateOptions,
  user: (line: string) => void,
  call: (tool: string, params: unknown) => Promise<void>,
): Promise<void> {
  user(`My business is called ${options.name}.`);
  await call("store_user_requirement", { field: "business_name", value: options.name });

  user(`We're a ${options.type}.`);
  await call("store_user_requirement", { field: "business_type", value: options.type });

  const functions = options.function ?? [];
  if (functions.length > 0) {
    user(`It should handle ${functions.join(", ")}.`);
    await call("store_user_requirement", { field: "main_functions", value: functions.join(", ") });
  }

  if (options.tone) {
    user(`Make it sound ${options.tone}.`);
    await call("store_user_requirement", { field: "tone", value: options.tone });
  }

  await call("check_requirements_status", {});
}

function summarize(
  conversation: Conversation,
  toolCalls: ToolCall[],
  analytics: InMemoryCallRecorder,
): SimulationResult {
  const { orchestrator } = conversation;
  return {
    contextId: orchestrator.contextId,
    finalState: orchestrator.getState(),
    spec: orchestrator.getSpec(),
    savedAgentId: orchestrator.getSavedAgentId(),
    toolCalls,
    call: analytics.getRecord(orchestrator.contextId),
  };
}

function parseRating(value: string): number {
  const rating = Number.parseInt(value, 10);
  if (!Number.isInteger(rating) || rating < 1 || rating > 5) {
    throw new Error(`Rating must be an integer from 1 to 5, got '${value}'`);
  }
  return rating;
}

export function registerSimulateCommand(program: Command): void {
  program
    .command("simulate")
    .description("Run a scripted build-and-demo conversation in the terminal")
    .requiredOption("-n, --name <name>", "Business name")
    .requiredOption("-t, --type <type>", "Business type, e.g. 'pizza restaurant'")
    .option("-f, --function <functions...>", "Functions the agent should handle")
    .option("--tone <tone>", "Preferred tone")
    .option("-r, --rating <rating>", "Rating given when closing (1-5)", parseRating)
    .option("--fast", "Skip protocol delays")
    .option("--verbose", "Show relay logs")
    .option("-c, --config <path>", "Project config file")
    .action(async (options: SimulateOptions) => {
      p.intro(chalk.bgCyan.black(" relay simulate "));
      const config = await loadConfig({ configPath: options.config });
      const result = await withErrorHandling(() => runSimulation(options, config), {
        operation: "simulate",
      });

      if (result.spec) {
        p.log.success(`Built ${result.spec.agentType} (voice: ${result.spec.voice})`);
      } else {
        p.log.warning("No agent was built");
      }
      if (result.savedAgentId) {
        p.log.info(`Saved as ${result.savedAgentId}`);
      }
      p.outro(`Conversation ended in state '${result.finalState}'`);
    });
}
