/**
 * String utilities for persona-relay
 */

/**
 * Capitalize the first letter of every word
 */
export function titleCase(str: string): string {
  return str
    .split(/(\s+)/)
    .map((word) => (word.trim() ? word.charAt(0).toUpperCase() + word.slice(1).toLowerCase() : word))
    .join("");
}

/**
 * Replace `{key}` placeholders with values; unknown keys are left untouched
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

/**
 * Render a bulleted list
 */
export function bulletList(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}
