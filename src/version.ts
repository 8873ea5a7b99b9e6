/**
 * persona-relay version - read dynamically from package.json
 */
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const PACKAGE_NAME = "persona-relay";

export function findPackageJson(start: string = dirname(fileURLToPath(import.meta.url))): {
  version: string;
} {
  let dir = start;
  for (let i = 0; i < 10; i++) {
    try {
      const content = readFileSync(join(dir, "package.json"), "utf-8");
      const pkg: unknown = JSON.parse(content);
      if (isPackageJson(pkg) && pkg.name === PACKAGE_NAME) return pkg;
    } catch {
      // Not found at this level, go up
    }
    dir = dirname(dir);
  }
  return { version: "0.0.0" };
}

function isPackageJson(value: unknown): value is { name?: unknown; version: string } {
  return (
    typeof value === "object" &&
    value !== null &&
    "version" in value &&
    typeof value.version === "string"
  );
}

export const VERSION: string = findPackageJson().version;
