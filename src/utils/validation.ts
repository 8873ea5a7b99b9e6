/**
 * Validation utilities for persona-relay
 */

import { z } from "zod";
import type { ValidationIssue } from "./errors.js";

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Safe validate (returns result instead of throwing)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
): { success: true; data: T } | { success: false; issues: ValidationIssue[] } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, issues: toIssues(result.error) };
}

/**
 * Create a prefixed ID generator
 */
export function createIdGenerator(prefix: string): () => string {
  return () => {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).slice(2, 9);
    return `${prefix}_${timestamp}_${random}`;
  };
}
