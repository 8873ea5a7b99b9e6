/**
 * Categories command - Print the category table
 */

import { Command } from "commander";
import chalk from "chalk";
import { loadCategoryTable } from "../../catalog/table.js";
import type { CategoryTable } from "../../catalog/schema.js";
import { loadConfig } from "../../config/loader.js";
import { withErrorHandling } from "../../utils/errors.js";

export interface CategoryRow {
  name: string;
  voice: string;
  tone: string;
  keywords: string[];
  functions: string[];
  isDefault: boolean;
}

export interface CategoriesOptions {
  config?: string;
  json?: boolean;
}

/**
 * Rows in table order, functions including the shared ones every agent gets
 */
export function listCategories(table: CategoryTable): CategoryRow[] {
  return table.categories.map((category) => ({
    name: category.name,
    voice: category.voice,
    tone: category.tone,
    keywords: [...category.keywords],
    functions: [...new Set([...category.functions, ...table.sharedFunctions])],
    isDefault: category.name === table.defaultCategory,
  }));
}

export function formatCategories(rows: readonly CategoryRow[]): string {
  return rows
    .map((row) => {
      const title = row.isDefault
        ? `${chalk.bold(row.name)} ${chalk.dim("(default)")}`
        : chalk.bold(row.name);
      const keywords = row.keywords.length > 0 ? row.keywords.join(", ") : chalk.dim("none");
      return [
        title,
        `  voice:     ${row.voice}`,
        `  tone:      ${row.tone}`,
        `  keywords:  ${keywords}`,
        `  functions: ${row.functions.join(", ")}`,
      ].join("\n");
    })
    .join("\n\n");
}

export async function runCategories(options: CategoriesOptions = {}): Promise<string> {
  const config = await loadConfig({ configPath: options.config });
  const rows = listCategories(await loadCategoryTable(config.catalog.categoriesPath));
  return options.json ? JSON.stringify(rows, null, 2) : formatCategories(rows);
}

export function registerCategoriesCommand(program: Command): void {
  program
    .command("categories")
    .description("Print the business categories agents are synthesized from")
    .option("-c, --config <path>", "Project config file")
    .option("--json", "Output as JSON")
    .action(async (options: CategoriesOptions) => {
      console.log(await withErrorHandling(() => runCategories(options), { operation: "categories" }));
    });
}
