#!/usr/bin/env node

/**
 * persona-relay CLI Entry Point
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerAgentsCommand } from "./commands/agents.js";
import { registerCategoriesCommand } from "./commands/categories.js";
import { registerClassifyCommand } from "./commands/classify.js";
import { registerSimulateCommand } from "./commands/simulate.js";
import { formatError } from "../utils/errors.js";

const program = new Command();

program
  .name("relay")
  .description("Build a voice agent from a conversation and hand the caller over to it")
  .version(VERSION, "-v, --version", "Output the current version");

registerAgentsCommand(program);
registerCategoriesCommand(program);
registerClassifyCommand(program);
registerSimulateCommand(program);

async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
