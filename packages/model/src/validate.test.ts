import { describe, it, expect } from "vitest";
import { parseRuleTable, RuleTableValidationError, RULE_TABLE_SCHEMA_OBJECT } from "./validate.js";
import { CATEGORIES, PRIORITY_ORDER } from "./types.js";
import type { RuleTable } from "./types.js";

// ---------------------------------------------------------------------------
// Minimal valid rule table
// ---------------------------------------------------------------------------

const VALID_TABLE: RuleTable = [
  {
    category: "API",
    priority: "Critical",
    patterns: ["app/api/**/route.ts"],
  },
  {
    category: "UIComponent",
    priority: "Medium",
    patterns: ["components/**/*.tsx"],
    exclude: ["**/tier*/**"],
  },
];

// ---------------------------------------------------------------------------
// parseRuleTable — happy path
// ---------------------------------------------------------------------------

describe("parseRuleTable", () => {
  it("accepts a valid table and keeps rule order", () => {
    const table = parseRuleTable(structuredClone(VALID_TABLE));
    expect(table.map((r) => r.category)).toEqual(["API", "UIComponent"]);
    expect(table[1]?.exclude).toEqual(["**/tier*/**"]);
  });

  it("rejects an unknown category", () => {
    const bad = [{ category: "Frontend", priority: "High", patterns: ["src/**"] }];
    expect(() => parseRuleTable(bad)).toThrow(RuleTableValidationError);
  });

  it("rejects an empty patterns list", () => {
    const bad = [{ category: "API", priority: "High", patterns: [] }];
    try {
      parseRuleTable(bad);
      expect.unreachable("should have thrown");
    } catch (err) {
      if (!(err instanceof RuleTableValidationError)) throw err;
      expect(err.issues).toEqual([
        {
          path: "/0/patterns",
          message: "must NOT have fewer than 1 items",
          keyword: "minItems",
        },
      ]);
    }
  });

  it("rejects unknown properties", () => {
    const bad = [
      { category: "API", priority: "High", patterns: ["a"], weight: 3 },
    ];
    expect(() => parseRuleTable(bad)).toThrow(/additional properties/);
  });

  it("rejects an empty table", () => {
    expect(() => parseRuleTable([])).toThrow(RuleTableValidationError);
  });

  it("names the source in the message", () => {
    expect(() => parseRuleTable({}, "rules.yml")).toThrow(
      "Invalid rule table in rules.yml: (root): must be array",
    );
  });

  it("reports the fatal error code", () => {
    const err = new RuleTableValidationError([]);
    expect(err.code).toBe("INVALID_RULE_TABLE");
    expect(err.fatal).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Schema stays in sync with the exported enums
// ---------------------------------------------------------------------------

describe("RULE_TABLE_SCHEMA_OBJECT", () => {
  it("lists every category and priority", () => {
    expect(RULE_TABLE_SCHEMA_OBJECT).toMatchObject({
      items: {
        properties: {
          category: { enum: [...CATEGORIES] },
          priority: { enum: [...PRIORITY_ORDER] },
        },
      },
    });
  });
});
