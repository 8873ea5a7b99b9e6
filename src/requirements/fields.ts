/**
 * Requirement key classification
 *
 * Persona tool calls name fields loosely ("business_name", "agent tone",
 * "contact_phone", "opening hours"...). Keys are normalized and matched
 * against an ordered alias table; the first rule with an alias contained in
 * the key wins.
 */

import type { RequirementField } from "./types.js";

export interface FieldRule {
  field: Exclude<RequirementField, "generic">;
  aliases: readonly string[];
}

/**
 * Ordered alias table. Contact comes first so "contact_name" is not taken
 * for the business name.
 */
export const FIELD_RULES: readonly FieldRule[] = [
  { field: "contact_info", aliases: ["contact", "phone", "email", "website"] },
  { field: "business_name", aliases: ["business_name", "name"] },
  { field: "business_type", aliases: ["business_type", "industry", "type"] },
  { field: "cuisine", aliases: ["cuisine"] },
  { field: "main_functions", aliases: ["function", "feature", "capabilit"] },
  { field: "tone", aliases: ["tone", "personality"] },
  { field: "target_audience", aliases: ["audience", "target"] },
  { field: "operating_hours", aliases: ["hours", "operating"] },
  { field: "special_requirements", aliases: ["special", "requirement"] },
];

/**
 * Phrases that mean the user did not actually answer
 */
export const FILLER_PHRASES: ReadonlySet<string> = new Set([
  "um",
  "uh",
  "hmm",
  "erm",
  "not sure",
  "i'm not sure",
  "i don't know",
  "dunno",
  "idk",
  "no idea",
]);

/**
 * Normalize a tool-supplied key: lowercase, separators collapsed to "_"
 */
export function normalizeKey(key: string): string {
  return key
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, "_");
}

/**
 * Resolve a loosely named key to a requirement slot
 */
export function classifyField(key: string): RequirementField {
  const normalized = normalizeKey(key);
  for (const rule of FIELD_RULES) {
    if (rule.aliases.some((alias) => normalized.includes(alias))) {
      return rule.field;
    }
  }
  return "generic";
}

/**
 * Key under which a contact value is stored ("contact_phone" -> "phone")
 */
export function contactKey(key: string): string {
  const normalized = normalizeKey(key).replace(/^contact_/, "");
  return normalized || "contact";
}

/**
 * True when a value carries an actual answer: at least two characters after
 * trimming and not a filler phrase
 */
export function isMeaningful(value: string | undefined): value is string {
  if (value === undefined) return false;
  const trimmed = value.trim();
  if (trimmed.length < 2) return false;
  return !FILLER_PHRASES.has(trimmed.toLowerCase());
}
