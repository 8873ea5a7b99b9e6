/**
 * Classify command - Show which category a business type resolves to
 */

import { Command } from "commander";
import chalk from "chalk";
import { classifyBusinessType, loadCategoryTable } from "../../catalog/table.js";
import type { CategoryTable } from "../../catalog/schema.js";
import { loadConfig } from "../../config/loader.js";
import { withErrorHandling } from "../../utils/errors.js";

export interface ClassifyResult {
  businessType: string;
  category: string;
  voice: string;
  tone: string;
  functions: string[];
}

export interface ClassifyOptions {
  config?: string;
  json?: boolean;
}

export function classify(businessType: string, table: CategoryTable): ClassifyResult {
  const category = classifyBusinessType(businessType, table);
  return {
    businessType,
    category: category.name,
    voice: category.voice,
    tone: category.tone,
    functions: [...new Set([...category.functions, ...table.sharedFunctions])],
  };
}

export function formatClassification(result: ClassifyResult): string {
  return [
    `${chalk.bold(result.businessType)} → ${chalk.green(result.category)}`,
    `  voice:     ${result.voice}`,
    `  tone:      ${result.tone}`,
    `  functions: ${result.functions.join(", ")}`,
  ].join("\n");
}

export async function runClassify(businessType: string, options: ClassifyOptions = {}): Promise<string> {
  const config = await loadConfig({ configPath: options.config });
  const result = classify(businessType, await loadCategoryTable(config.catalog.categoriesPath));
  return options.json ? JSON.stringify(result, null, 2) : formatClassification(result);
}

export function registerClassifyCommand(program: Command): void {
  program
    .command("classify <businessType>")
    .description("Show the category, voice and functions a business type resolves to")
    .option("-c, --config <path>", "Project config file")
    .option("--json", "Output as JSON")
    .action(async (businessType: string, options: ClassifyOptions) => {
      const output = await withErrorHandling(() => runClassify(businessType, options), {
        operation: "classify",
      });
      console.log(output);
    });
}
