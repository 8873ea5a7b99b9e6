/**
 * Requirement types
 */

/**
 * Canonical requirement slots a tool key can resolve to
 */
export type RequirementField =
  | "business_name"
  | "business_type"
  | "cuisine"
  | "main_functions"
  | "tone"
  | "target_audience"
  | "operating_hours"
  | "contact_info"
  | "special_requirements"
  | "generic";

/**
 * Immutable copy of everything gathered for one context
 */
export interface RequirementsSnapshot {
  readonly businessName?: string;
  readonly businessType?: string;
  readonly targetAudience?: string;
  readonly mainFunctions: readonly string[];
  readonly tone?: string;
  readonly specialRequirements: readonly string[];
  readonly contactInfo: Readonly<Record<string, string>>;
}

/**
 * What a single store call changed
 */
export interface StoredRequirement {
  field: RequirementField;
  /** Key under which the value landed (contact key, generic label, ...) */
  key: string;
  value: string;
}
