/**
 * Spec Builder
 *
 * Pure, deterministic derivation of an AgentSpec from a requirements snapshot
 * and a category table. No I/O; the same inputs always yield an equal,
 * deep-frozen spec.
 */

import type { RequirementsSnapshot } from "../requirements/types.js";
import type { Category, CategoryTable } from "./schema.js";
import type { AgentFunction, AgentSpec, BusinessContext } from "./types.js";
import { classifyBusinessType } from "./table.js";
import { bulletList, renderTemplate, titleCase } from "../utils/strings.js";

const FALLBACK_NAME = "our business";

/**
 * Build the agent specification for a requirements snapshot
 */
export function buildAgentSpec(
  requirements: RequirementsSnapshot,
  table: CategoryTable,
): AgentSpec {
  const category = classifyBusinessType(requirements.businessType, table);
  const functions = resolveFunctions(category, table);

  const businessContext: BusinessContext = {
    category: category.name,
    businessName: requirements.businessName,
    businessType: requirements.businessType,
    tone: requirements.tone ?? category.tone,
    functions: [...requirements.mainFunctions],
    targetAudience: requirements.targetAudience,
    contact: { ...requirements.contactInfo },
  };

  return deepFreeze({
    agentType: `${requirements.businessName ?? "Custom"} ${titleCase(category.name)} Assistant`,
    instructions: buildInstructions(requirements, category, functions),
    voice: category.voice,
    functions,
    sampleResponses: category.responseTemplates.map((template) =>
      renderTemplate(template, { business_name: requirements.businessName ?? FALLBACK_NAME }),
    ),
    businessContext,
  });
}

/**
 * Category functions followed by the shared ones, without duplicates
 */
function resolveFunctions(category: Category, table: CategoryTable): AgentFunction[] {
  const names = [...new Set([...category.functions, ...table.sharedFunctions])];
  const resolved: AgentFunction[] = [];
  for (const name of names) {
    const entry = table.functionCatalog[name];
    if (entry) {
      resolved.push({ name, description: entry.description, parameters: [...entry.parameters] });
    }
  }
  return resolved;
}

/**
 * Instruction skeleton from the category, with the user's own preferences
 * appended as separate sections
 */
function buildInstructions(
  req: RequirementsSnapshot,
  category: Category,
  functions: readonly AgentFunction[],
): string {
  const businessName = req.businessName ?? "the business";

  const sections: string[] = [
    `You are a ${category.tone} AI assistant for ${businessName}.`,
    [
      "Your primary responsibilities:",
      bulletList([
        "Assist customers with their needs",
        "Provide helpful information about our services",
        `Maintain a ${category.tone} demeanor at all times`,
      ]),
    ].join("\n"),
  ];

  if (functions.length > 0) {
    const lines = functions.map((f) => `${f.name}: ${f.description}`);
    sections.push(["Functions available to you:", bulletList(lines)].join("\n"));
  }

  if (functions.some((f) => f.name === "search_knowledge_base")) {
    sections.push(
      "Search the knowledge base before giving a generic answer about products, policies or anything you are not sure of.",
    );
  }

  if (req.tone) {
    sections.push(`Preferred tone: ${req.tone}`);
  }

  if (req.targetAudience) {
    sections.push(`Target audience: ${req.targetAudience}`);
  }

  if (req.mainFunctions.length > 0) {
    sections.push(["Key functions you can help with:", bulletList(req.mainFunctions)].join("\n"));
  }

  const contacts = Object.entries(req.contactInfo);
  if (contacts.length > 0) {
    const lines = contacts.map(([key, value]) => `${key}: ${value}`);
    sections.push(["Contact details:", bulletList(lines)].join("\n"));
  }

  if (req.specialRequirements.length > 0) {
    sections.push(["Special requirements:", bulletList(req.specialRequirements)].join("\n"));
  }

  return sections.join("\n\n");
}

/**
 * Freeze an object graph in place
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
