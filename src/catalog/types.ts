/**
 * Agent specification types
 */

/**
 * A callable function exposed to the synthesized agent
 */
export interface AgentFunction {
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly string[];
}

/**
 * Display fields derived from the requirements
 */
export interface BusinessContext {
  readonly category: string;
  readonly businessName?: string;
  readonly businessType?: string;
  readonly tone: string;
  readonly functions: readonly string[];
  readonly targetAudience?: string;
  readonly contact: Readonly<Record<string, string>>;
}

/**
 * Everything needed to start the synthesized task persona.
 * Immutable; a re-synthesis produces a new object.
 */
export interface AgentSpec {
  readonly agentType: string;
  readonly instructions: string;
  readonly voice: string;
  readonly functions: readonly AgentFunction[];
  readonly sampleResponses: readonly string[];
  readonly businessContext: BusinessContext;
}
