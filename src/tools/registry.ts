/**
 * Tool registry for persona-relay
 *
 * Live personas act on the conversation through named tools. Every call is
 * validated with zod and always produces a line the persona can say:
 * advisory rejections become their advice, anything else is logged and
 * replaced by a neutral apology.
 */

import { z } from "zod";
import type { Logger, ILogObj } from "tslog";
import {
  isAdvisoryError,
  isRelayError,
  toError,
  type RelayErrorCode,
} from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { safeValidate } from "../utils/validation.js";

/**
 * Which persona may call a tool
 */
export type ToolAudience = "creator" | "demo";

/**
 * Tool definition
 */
export interface ToolDefinition<TInput> {
  name: string;
  description: string;
  audience: ToolAudience;
  parameters: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  /** Resolves to the line the persona should say */
  execute: (params: TInput) => Promise<string>;
}

/**
 * A definition with its input type erased behind a validating runner
 */
export interface PersonaTool {
  readonly name: string;
  readonly description: string;
  readonly audience: ToolAudience;
  readonly inputSchema: Record<string, unknown>;
  run(params: unknown): Promise<ToolRunResult>;
}

export type ToolRunResult =
  | { valid: true; output: string }
  | { valid: false; issues: string[] };

/**
 * Tool execution result
 */
export interface ToolResult {
  success: boolean;
  /** What the persona should say */
  output: string;
  code?: RelayErrorCode;
  duration: number;
}

export interface ExecuteOptions {
  /** Reject tools meant for the other persona */
  audience?: ToolAudience;
}

export const TOOL_FAILURE_REPLY =
  "Sorry, something went wrong on my side. Could you say that again?";

export const INVALID_PARAMS_REPLY =
  "Sorry, I didn't catch all of the details for that. Could you repeat them?";

export const WRONG_PERSONA_REPLY = "That isn't something I can do from here.";

/**
 * Helper to create a tool with type-safe parameters
 */
export function defineTool<TInput>(definition: ToolDefinition<TInput>): PersonaTool {
  return {
    name: definition.name,
    description: definition.description,
    audience: definition.audience,
    inputSchema: zodToJsonSchema(definition.parameters),
    async run(params: unknown): Promise<ToolRunResult> {
      const parsed = safeValidate(definition.parameters, params);
      if (!parsed.success) {
        return {
          valid: false,
          issues: parsed.issues.map((issue) => `${issue.path}: ${issue.message}`),
        };
      }
      return { valid: true, output: await definition.execute(parsed.data) };
    },
  };
}

/**
 * Tool registry
 */
export class ToolRegistry {
  private tools: Map<string, PersonaTool> = new Map();
  private logger: Logger<ILogObj>;

  constructor(logger?: Logger<ILogObj>) {
    this.logger = logger ?? getLogger();
  }

  /**
   * Register a tool
   */
  register(tool: PersonaTool): void {
    if (this.tools.has(tool.name)) {
      this.logger.warn(`Tool '${tool.name}' already registered, overwriting`);
    }
    this.tools.set(tool.name, tool);
    this.logger.debug(`Registered tool: ${tool.name}`);
  }

  registerAll(tools: readonly PersonaTool[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  get(name: string): PersonaTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getAll(): PersonaTool[] {
    return Array.from(this.tools.values());
  }

  getByAudience(audience: ToolAudience): PersonaTool[] {
    return this.getAll().filter((tool) => tool.audience === audience);
  }

  /**
   * Execute a tool on behalf of a persona
   */
  async execute(name: string, params: unknown, options: ExecuteOptions = {}): Promise<ToolResult> {
    const startTime = performance.now();
    const elapsed = (): number => performance.now() - startTime;
    const tool = this.tools.get(name);

    if (!tool) {
      this.logger.warn(`Unknown tool requested: ${name}`);
      return {
        success: false,
        output: WRONG_PERSONA_REPLY,
        code: "VALIDATION_ERROR",
        duration: elapsed(),
      };
    }

    if (options.audience && options.audience !== tool.audience) {
      this.logger.warn(`Tool '${name}' is not available to the ${options.audience} persona`);
      return {
        success: false,
        output: WRONG_PERSONA_REPLY,
        code: "VALIDATION_ERROR",
        duration: elapsed(),
      };
    }

    try {
      this.logger.debug(`Executing tool: ${name}`, { params });
      const result = await tool.run(params);

      if (!result.valid) {
        this.logger.warn(`Tool '${name}' received invalid parameters`, { issues: result.issues });
        return {
          success: false,
          output: INVALID_PARAMS_REPLY,
          code: "VALIDATION_ERROR",
          duration: elapsed(),
        };
      }

      const duration = elapsed();
      this.logger.debug(`Tool '${name}' completed`, { duration: `${duration.toFixed(2)}ms` });
      return { success: true, output: result.output, duration };
    } catch (error) {
      if (isAdvisoryError(error)) {
        this.logger.info({ event: "tool:advisory", tool: name, code: error.code });
        return { success: false, output: error.advice, code: error.code, duration: elapsed() };
      }

      const cause = toError(error);
      this.logger.error(`Tool '${name}' failed`, { error: cause.message });
      return {
        success: false,
        output: TOOL_FAILURE_REPLY,
        code: isRelayError(error) ? error.code : "UNEXPECTED_ERROR",
        duration: elapsed(),
      };
    }
  }

  /**
   * Tool definitions in the shape realtime voice APIs expect
   */
  getToolDefinitions(audience?: ToolAudience): Array<{
    name: string;
    description: string;
    input_schema: Record<string, unknown>;
  }> {
    const tools = audience ? this.getByAudience(audience) : this.getAll();
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.inputSchema,
    }));
  }
}

/**
 * Convert a Zod object schema to JSON schema (simplified)
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  if (!(schema instanceof z.ZodObject)) {
    return { type: "object" };
  }

  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const [key, field] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    properties[key] = zodFieldToJsonSchema(field);
    if (!field.isOptional()) {
      required.push(key);
    }
  }

  return {
    type: "object",
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}

function zodFieldToJsonSchema(field: z.ZodTypeAny): Record<string, unknown> {
  const described = field.description ? { description: field.description } : {};

  if (field instanceof z.ZodString) return { type: "string", ...described };
  if (field instanceof z.ZodNumber) {
    return { type: field.isInt ? "integer" : "number", ...bounds(field), ...described };
  }
  if (field instanceof z.ZodBoolean) return { type: "boolean", ...described };
  if (field instanceof z.ZodArray) {
    return { type: "array", items: zodFieldToJsonSchema(field.element), ...described };
  }
  if (field instanceof z.ZodOptional) {
    return { ...zodFieldToJsonSchema(field.unwrap()), ...described };
  }
  if (field instanceof z.ZodDefault) {
    return { ...zodFieldToJsonSchema(field.removeDefault()), ...described };
  }
  if (field instanceof z.ZodEnum) {
    return { type: "string", enum: field.options, ...described };
  }
  return described;
}

function bounds(field: z.ZodNumber): Record<string, number> {
  const result: Record<string, number> = {};
  if (field.minValue !== null) result.minimum = field.minValue;
  if (field.maxValue !== null) result.maximum = field.maxValue;
  return result;
}
