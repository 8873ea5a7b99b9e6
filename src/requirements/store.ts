/**
 * Requirements Store
 *
 * Incremental accumulation of everything the user tells the creator persona
 * about their business. Owned by exactly one orchestrator; the locking rule
 * (no writes while processing) is enforced by the orchestrator, not here.
 */

import { InvalidValueError } from "../utils/errors.js";
import { classifyField, contactKey, isMeaningful } from "./fields.js";
import type { RequirementsSnapshot, StoredRequirement } from "./types.js";

export class RequirementsStore {
  private businessName?: string;
  private businessType?: string;
  private targetAudience?: string;
  private tone?: string;
  private readonly mainFunctions: string[] = [];
  private readonly specialRequirements: string[] = [];
  private contactInfo: Record<string, string> = {};

  /**
   * Store a value under a loosely named key.
   *
   * @throws InvalidValueError when the value is too short or a filler phrase
   */
  record(key: string, rawValue: string): StoredRequirement {
    if (!isMeaningful(rawValue)) {
      throw new InvalidValueError(key, rawValue);
    }

    const value = rawValue.trim();
    const field = classifyField(key);

    switch (field) {
      case "business_name":
        this.businessName = value;
        return { field, key: "business_name", value };

      case "business_type":
        this.businessType = value;
        return { field, key: "business_type", value };

      case "cuisine": {
        const type = `${value} Restaurant`;
        this.businessType = type;
        return { field, key: "business_type", value: type };
      }

      case "main_functions": {
        const functions = value
          .split(",")
          .map((f) => f.trim())
          .filter((f) => f.length > 0);
        this.mainFunctions.push(...functions);
        return { field, key: "main_functions", value: functions.join(", ") };
      }

      case "tone":
        this.tone = value;
        return { field, key: "tone", value };

      case "target_audience":
        this.targetAudience = value;
        return { field, key: "target_audience", value };

      case "operating_hours": {
        const entry = `Operating hours: ${value}`;
        this.specialRequirements.push(entry);
        return { field, key: "special_requirements", value: entry };
      }

      case "contact_info": {
        const ck = contactKey(key);
        this.contactInfo[ck] = value;
        return { field, key: ck, value };
      }

      case "special_requirements":
        this.specialRequirements.push(value);
        return { field, key: "special_requirements", value };

      case "generic": {
        const entry = `${key.trim()}: ${value}`;
        this.specialRequirements.push(entry);
        return { field, key: "special_requirements", value: entry };
      }
    }
  }

  /**
   * Required fields that are still missing or unusable
   */
  missingRequired(): string[] {
    const missing: string[] = [];
    if (!isMeaningful(this.businessName)) missing.push("business name");
    if (!isMeaningful(this.businessType)) missing.push("business type");
    return missing;
  }

  /**
   * Optional fields that would improve the agent
   */
  missingRecommended(): string[] {
    const missing: string[] = [];
    if (this.mainFunctions.length === 0) missing.push("main functions");
    if (!this.tone) missing.push("preferred tone");
    if (!this.targetAudience) missing.push("target audience");
    return missing;
  }

  isValidForProcessing(): boolean {
    return this.missingRequired().length === 0;
  }

  /**
   * Human-readable summary for the confirmation step
   */
  summary(): string {
    const lines = [
      `Business: ${this.businessName ?? "not provided"}`,
      `Type: ${this.businessType ?? "not provided"}`,
    ];
    if (this.mainFunctions.length > 0) lines.push(`Functions: ${this.mainFunctions.join(", ")}`);
    if (this.tone) lines.push(`Tone: ${this.tone}`);
    if (this.targetAudience) lines.push(`Target Audience: ${this.targetAudience}`);
    if (this.specialRequirements.length > 0) {
      lines.push(`Special Requirements: ${this.specialRequirements.join(", ")}`);
    }
    const contacts = Object.entries(this.contactInfo);
    if (contacts.length > 0) {
      lines.push(`Contact: ${contacts.map(([k, v]) => `${k} ${v}`).join(", ")}`);
    }
    return lines.join("\n");
  }

  /**
   * Frozen deep copy of the current contents
   */
  snapshot(): RequirementsSnapshot {
    return Object.freeze({
      businessName: this.businessName,
      businessType: this.businessType,
      targetAudience: this.targetAudience,
      tone: this.tone,
      mainFunctions: Object.freeze([...this.mainFunctions]),
      specialRequirements: Object.freeze([...this.specialRequirements]),
      contactInfo: Object.freeze({ ...this.contactInfo }),
    });
  }

  /**
   * Replace the contents with a previously taken snapshot
   */
  restore(snapshot: RequirementsSnapshot): void {
    this.businessName = snapshot.businessName;
    this.businessType = snapshot.businessType;
    this.targetAudience = snapshot.targetAudience;
    this.tone = snapshot.tone;
    this.mainFunctions.splice(0, this.mainFunctions.length, ...snapshot.mainFunctions);
    this.specialRequirements.splice(
      0,
      this.specialRequirements.length,
      ...snapshot.specialRequirements,
    );
    this.contactInfo = { ...snapshot.contactInfo };
  }
}
