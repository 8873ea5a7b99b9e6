/**
 * Category table loading and business-type classification
 */

import fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import JSON5 from "json5";
import { CategoryTableSchema, type Category, type CategoryTable } from "./schema.js";
import { ConfigError } from "../utils/errors.js";

/**
 * Bundled category table (data/categories.json at the package root)
 */
export const DEFAULT_CATEGORIES_PATH = fileURLToPath(
  new URL("../../data/categories.json", import.meta.url),
);

/**
 * Validate a raw category table
 */
export function parseCategoryTable(raw: unknown, source?: string): CategoryTable {
  const result = CategoryTableSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("Invalid category table", {
      configPath: source,
      issues: result.error.issues.map((i) => ({
        path: i.path.join("."),
        message: i.message,
      })),
    });
  }
  return result.data;
}

/**
 * Load a category table from disk (JSON5 accepted)
 */
export async function loadCategoryTable(
  filePath: string = DEFAULT_CATEGORIES_PATH,
): Promise<CategoryTable> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read category table: ${filePath}`, {
      configPath: filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    throw new ConfigError(`Category table is not valid JSON: ${filePath}`, {
      configPath: filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  return parseCategoryTable(parsed, filePath);
}

/**
 * Resolve a free-text business type to a category.
 *
 * Rules are tried in table order with case-insensitive substring matching;
 * the first category with a matching keyword wins. Anything else, including a
 * missing type, resolves to the default category.
 */
export function classifyBusinessType(
  businessType: string | undefined,
  table: CategoryTable,
): Category {
  const normalized = businessType?.trim().toLowerCase() ?? "";

  if (normalized) {
    for (const category of table.categories) {
      if (category.keywords.some((keyword) => normalized.includes(keyword.toLowerCase()))) {
        return category;
      }
    }
  }

  return getDefaultCategory(table);
}

/**
 * The fallback category of a table
 */
export function getDefaultCategory(table: CategoryTable): Category {
  const fallback = table.categories.find((c) => c.name === table.defaultCategory);
  if (!fallback) {
    throw new ConfigError(`Default category '${table.defaultCategory}' is not defined`);
  }
  return fallback;
}
