import { describe, it, expect } from "vitest";
import type { FileChange, RuleTable } from "@diffscribe/model";
import { classifyChanges, classifyPath, findRule } from "../classifier.js";
import { DEFAULT_RULES } from "../rules.js";

function change(path: string, overrides: Partial<FileChange> = {}): FileChange {
  return { path, status: "Modified", patch: "", ...overrides };
}

describe("classifyPath — default rule table", () => {
  it.each([
    ["app/api/packages/[id]/archive/route.ts", "API", "Critical"],
    ["src/app/api/approvals/route.ts", "API", "Critical"],
    ["pages/api/legacy/export.ts", "API", "Critical"],
    ["prisma/schema.prisma", "Database", "Critical"],
    ["prisma/migrations/20240501_add_fitara/migration.sql", "Database", "Critical"],
    ["lib/auth/session.ts", "Auth", "Critical"],
    ["middleware.ts", "Auth", "Critical"],
    ["components/AuthGuard.tsx", "Auth", "Critical"],
    ["lib/workflow/palt.ts", "BusinessLogic", "High"],
    ["types/package.ts", "Types", "Medium"],
    ["components/ui/Button.tsx", "UIComponent", "Medium"],
    ["components/forms/tier2/FundingSection.tsx", "TierForm", "High"],
    ["app/packages/[id]/Tier3Review.tsx", "TierForm", "High"],
    ["styles/globals.css", "Styling", "Low"],
    ["tailwind.config.ts", "Styling", "Low"],
    ["package.json", "Config", "Medium"],
    [".env.example", "Config", "Medium"],
    ["README.md", "DocsTests", "Low"],
    ["lib/workflow/palt.test.ts", "DocsTests", "Low"],
    ["scripts/seed.py", "Other", "Low"],
  ])("%s → %s/%s", (path, category, priority) => {
    expect(classifyPath(path)).toEqual({ category, priority });
  });

  it("resolves a path matching two rules to the earlier one", () => {
    // Matches both API (rule 0) and Auth (**/auth/**, rule 2)
    const path = "app/api/auth/[...nextauth]/route.ts";
    expect(findRule(path)).toBe(0);
    expect(classifyPath(path).category).toBe("API");
  });

  it("matches case-insensitively", () => {
    expect(classifyPath("Components/Forms/TIER1/Intake.tsx").category).toBe("TierForm");
  });

  it("honours exclude patterns", () => {
    // lib/** would match, but tests are excluded from BusinessLogic
    expect(findRule("lib/__tests__/rules.ts")).toBe(
      DEFAULT_RULES.findIndex((r) => r.category === "DocsTests"),
    );
  });
});

describe("classifyPath — custom rule table", () => {
  const rules: RuleTable = [
    { category: "Styling", priority: "Low", patterns: ["**/*.tsx"] },
    { category: "UIComponent", priority: "High", patterns: ["components/**"] },
  ];

  it("uses the caller's order", () => {
    expect(classifyPath("components/Header.tsx", rules)).toEqual({
      category: "Styling",
      priority: "Low",
    });
    expect(classifyPath("components/header.css", rules)).toEqual({
      category: "UIComponent",
      priority: "High",
    });
  });

  it("falls back to Other/Low", () => {
    expect(classifyPath("app/api/x/route.ts", rules)).toEqual({
      category: "Other",
      priority: "Low",
    });
  });
});

describe("classifyChanges", () => {
  const changes: FileChange[] = [
    change("app/api/packages/[id]/archive/route.ts", { status: "Added" }),
    change("components/PackageCard.tsx", {
      status: "Renamed",
      oldPath: "components/Card.tsx",
    }),
    change("docs/workflow.md", { status: "Deleted" }),
  ];

  it("produces one record per change, in input order", () => {
    const records = classifyChanges(changes);
    expect(records).toEqual([
      {
        path: "app/api/packages/[id]/archive/route.ts",
        status: "Added",
        category: "API",
        priority: "Critical",
      },
      {
        path: "components/PackageCard.tsx",
        oldPath: "components/Card.tsx",
        status: "Renamed",
        category: "UIComponent",
        priority: "Medium",
      },
      {
        path: "docs/workflow.md",
        status: "Deleted",
        category: "DocsTests",
        priority: "Low",
      },
    ]);
  });

  it("is deterministic and idempotent", () => {
    const first = classifyChanges(changes);
    const second = classifyChanges(changes);
    expect(second).toEqual(first);
    const again = classifyChanges(
      first.map((r) => change(r.path, { status: r.status, oldPath: r.oldPath })),
    );
    expect(again).toEqual(first);
  });

  it("freezes records", () => {
    const [record] = classifyChanges(changes);
    expect(Object.isFrozen(record)).toBe(true);
  });
});
