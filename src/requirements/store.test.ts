/**
 * Tests for the requirements store and key classification
 */

import { describe, it, expect, beforeEach } from "vitest";
import { RequirementsStore } from "./store.js";
import { classifyField, contactKey, isMeaningful, normalizeKey } from "./fields.js";
import { InvalidValueError } from "../utils/errors.js";

describe("classifyField", () => {
  it.each([
    ["business_name", "business_name"],
    ["Business Name", "business_name"],
    ["business_type", "business_type"],
    ["industry", "business_type"],
    ["cuisine", "cuisine"],
    ["main_functions", "main_functions"],
    ["agent_function", "main_functions"],
    ["agent_tone", "tone"],
    ["personality", "tone"],
    ["target_audience", "target_audience"],
    ["opening-hours", "operating_hours"],
    ["contact_phone", "contact_info"],
    ["contact_name", "contact_info"],
    ["special_requirements", "special_requirements"],
    ["parking", "generic"],
  ])("should classify %s as %s", (key, expected) => {
    expect(classifyField(key)).toBe(expected);
  });
});

describe("normalizeKey / contactKey", () => {
  it("should collapse separators and lowercase", () => {
    expect(normalizeKey("  Opening Hours-Weekend ")).toBe("opening_hours_weekend");
  });

  it("should strip the contact prefix", () => {
    expect(contactKey("contact_phone")).toBe("phone");
    expect(contactKey("Email")).toBe("email");
    expect(contactKey("contact")).toBe("contact");
  });
});

describe("isMeaningful", () => {
  it.each(["", " ", "a", " b ", "um", "Not Sure", "I don't know"])(
    "should reject %j",
    (value) => {
      expect(isMeaningful(value)).toBe(false);
    },
  );

  it("should accept real answers", () => {
    expect(isMeaningful("Jo")).toBe(true);
    expect(isMeaningful("  Tony's Pizza ")).toBe(true);
    expect(isMeaningful(undefined)).toBe(false);
  });
});

describe("RequirementsStore", () => {
  let store: RequirementsStore;

  beforeEach(() => {
    store = new RequirementsStore();
  });

  it("should start empty", () => {
    expect(store.snapshot()).toEqual({
      mainFunctions: [],
      specialRequirements: [],
      contactInfo: {},
    });
    expect(store.missingRequired()).toEqual(["business name", "business type"]);
  });

  it("should overwrite single-valued fields", () => {
    store.record("business_name", "Old Name");
    store.record("business_name", "  Tony's Pizza ");

    expect(store.snapshot().businessName).toBe("Tony's Pizza");
  });

  it("should append comma-separated functions in order", () => {
    store.record("main_functions", "take orders, answer menu questions");
    const result = store.record("function", "reservations");

    expect(result).toEqual({ field: "main_functions", key: "main_functions", value: "reservations" });
    expect(store.snapshot().mainFunctions).toEqual([
      "take orders",
      "answer menu questions",
      "reservations",
    ]);
  });

  it("should turn a cuisine into a restaurant type", () => {
    const result = store.record("cuisine", "Thai");

    expect(result).toEqual({ field: "cuisine", key: "business_type", value: "Thai Restaurant" });
    expect(store.snapshot().businessType).toBe("Thai Restaurant");
  });

  it("should file hours, special and unknown keys under special requirements", () => {
    store.record("operating_hours", "9am to 5pm");
    store.record("special_requirements", "Speak Spanish too");
    store.record("Parking", "Free lot behind the shop");

    expect(store.snapshot().specialRequirements).toEqual([
      "Operating hours: 9am to 5pm",
      "Speak Spanish too",
      "Parking: Free lot behind the shop",
    ]);
  });

  it("should key contact info without the prefix", () => {
    store.record("contact_phone", "555-0100");
    store.record("email", "hello@example.com");

    expect(store.snapshot().contactInfo).toEqual({
      phone: "555-0100",
      email: "hello@example.com",
    });
  });

  it("should reject filler values", () => {
    expect(() => store.record("business_name", "um")).toThrow(InvalidValueError);
    expect(() => store.record("business_type", " x ")).toThrow(InvalidValueError);
    expect(store.snapshot().businessName).toBeUndefined();
  });

  it("should report missing recommended fields", () => {
    store.record("tone", "cheerful");

    expect(store.missingRecommended()).toEqual(["main functions", "target audience"]);
  });

  it("should build a readable summary", () => {
    store.record("business_name", "Tony's Pizza");
    store.record("business_type", "pizza restaurant");
    store.record("functions", "take orders");
    store.record("tone", "casual");

    expect(store.summary()).toBe(
      "Business: Tony's Pizza\nType: pizza restaurant\nFunctions: take orders\nTone: casual",
    );
  });

  it("should hand out frozen snapshots unaffected by later writes", () => {
    store.record("functions", "take orders");
    const snapshot = store.snapshot();
    store.record("functions", "delivery");

    expect(snapshot.mainFunctions).toEqual(["take orders"]);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.mainFunctions)).toBe(true);
  });

  it("should restore a snapshot", () => {
    const other = new RequirementsStore();
    other.record("business_name", "Bright Smiles");
    other.record("business_type", "dental clinic");
    other.record("functions", "book cleanings");
    store.record("tone", "formal");

    store.restore(other.snapshot());

    expect(store.snapshot()).toEqual(other.snapshot());
    expect(store.isValidForProcessing()).toBe(true);
  });
});
