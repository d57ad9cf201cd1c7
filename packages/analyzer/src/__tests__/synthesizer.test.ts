import { describe, it, expect } from "vitest";
import type { ChangeRecord, EndpointDelta, Priority } from "@diffscribe/model";
import { numberTestCases, synthesizeTestCases } from "../synthesizer.js";
import type { TestCaseDraft } from "../synthesizer.js";
import { triggeredInvariants } from "../invariants.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function draft(priority: Priority, title: string = priority): TestCaseDraft {
  return { priority, title, preconditions: "", steps: [], expectedResult: "", edgeCases: [] };
}

function record(path: string): ChangeRecord {
  return { path, status: "Modified", category: "Other", priority: "Low" };
}

function makeDelta(overrides: Partial<EndpointDelta> = {}): EndpointDelta {
  return {
    file: "app/api/packages/[id]/route.ts",
    method: "PATCH",
    path: "/api/packages/[id]",
    changeType: "Modified",
    requestFieldDiffs: [],
    responseFieldDiffs: [],
    breaking: false,
    breakingReasons: [],
    ...overrides,
  };
}

const nameField = { name: "name", type: "string", required: true, hasDefault: false };
const titleField = { name: "title", type: "string", required: true, hasDefault: false };

// ---------------------------------------------------------------------------
// Numbering
// ---------------------------------------------------------------------------

describe("numberTestCases", () => {
  it("numbers Critical from 001, High from 010, then continues", () => {
    const cases = numberTestCases([
      draft("High", "h1"),
      draft("Critical", "c1"),
      draft("Medium", "m1"),
      draft("High", "h2"),
      draft("Critical", "c2"),
      draft("Low", "l1"),
    ]);
    expect(cases.map((c) => [c.id, c.title])).toEqual([
      ["TC-001", "c1"],
      ["TC-002", "c2"],
      ["TC-010", "h1"],
      ["TC-011", "h2"],
      ["TC-012", "m1"],
      ["TC-013", "l1"],
    ]);
  });

  it("starts High right after the last Critical when there are many", () => {
    const drafts = [...Array.from({ length: 12 }, () => draft("Critical")), draft("High")];
    expect(numberTestCases(drafts).map((c) => c.id).slice(-2)).toEqual(["TC-012", "TC-013"]);
  });

  it("starts at TC-010 for High-only and TC-001 for Medium-only input", () => {
    expect(numberTestCases([draft("High")]).map((c) => c.id)).toEqual(["TC-010"]);
    expect(numberTestCases([draft("Medium")]).map((c) => c.id)).toEqual(["TC-001"]);
  });

  it("produces unique ids", () => {
    const ids = numberTestCases(
      (["Low", "Critical", "High", "Medium", "Critical", "High"] as const).map((p) => draft(p)),
    ).map((c) => c.id);
    expect(new Set(ids).size).toBe(ids.length);
  });
});

// ---------------------------------------------------------------------------
// Endpoint cases
// ---------------------------------------------------------------------------

describe("synthesizeTestCases", () => {
  const breaking = makeDelta({
    requestFieldDiffs: [
      { field: "title", before: titleField, after: null },
      { field: "name", before: null, after: nameField },
    ],
    breaking: true,
    breakingReasons: [
      "required request field `title` removed",
      "required request field `name` added without a default",
    ],
  });

  it("adds a prior-contract case for a breaking delta", () => {
    const cases = synthesizeTestCases([breaking], [], { invariants: false });
    expect(cases).toEqual([
      {
        id: "TC-001",
        priority: "Critical",
        title: "PATCH /api/packages/[id] still serves a valid request",
        endpoint: "PATCH /api/packages/[id]",
        preconditions: "Head build running with seeded data",
        steps: [
          "Send PATCH /api/packages/[id] with a valid request body",
          "Include `name` (string)",
          "Check the response status is 2xx",
        ],
        expectedResult: "Request succeeds and the response matches the documented shape",
        edgeCases: ["Omit `name` → 400", "Unknown `id` → 404"],
      },
      {
        id: "TC-002",
        priority: "Critical",
        title: "PATCH /api/packages/[id] rejects the prior contract predictably",
        endpoint: "PATCH /api/packages/[id]",
        preconditions: "Head build running; a request captured from the base build",
        steps: [
          "Replay the base-build request against the head build",
          "Exercise: required request field `title` removed",
          "Exercise: required request field `name` added without a default",
        ],
        expectedResult: "Responds 4xx naming the changed field, never 5xx",
        edgeCases: [
          "required request field `title` removed",
          "required request field `name` added without a default",
        ],
      },
    ]);
  });

  it("gives a non-breaking delta one High case", () => {
    const cases = synthesizeTestCases(
      [makeDelta({ method: "GET", path: "/api/packages", authChange: "added auth()" })],
      [],
      { invariants: false },
    );
    expect(cases).toHaveLength(1);
    expect(cases[0]).toMatchObject({
      id: "TC-010",
      priority: "High",
      title: "GET /api/packages still serves a valid request",
      preconditions: "Head build running with seeded data; signed in as a user the route's guards allow",
      edgeCases: ["Unauthenticated request → 401"],
    });
  });

  it("adds a manual check for an ambiguous delta", () => {
    const cases = synthesizeTestCases(
      [makeDelta({ breaking: "unknown", breakingReasons: ["response: response spreads `pkg`"] })],
      [],
      { invariants: false },
    );
    expect(cases.map((c) => [c.id, c.priority, c.title])).toEqual([
      ["TC-001", "Critical", "PATCH /api/packages/[id] contract needs manual verification"],
      ["TC-010", "High", "PATCH /api/packages/[id] still serves a valid request"],
    ]);
  });

  it("emits a single case for a deleted endpoint", () => {
    const cases = synthesizeTestCases(
      [makeDelta({ changeType: "Deleted", breaking: true, breakingReasons: ["PATCH removed from /api/packages/[id]"] })],
      [],
      { invariants: false },
    );
    expect(cases.map((c) => [c.id, c.title])).toEqual([
      ["TC-001", "PATCH /api/packages/[id] is no longer served"],
    ]);
  });

  it("appends triggered invariants and sorts them into the buckets", () => {
    const cases = synthesizeTestCases([makeDelta()], [record("lib/auth/session.ts")]);
    expect(cases.map((c) => [c.id, c.title])).toEqual([
      ["TC-001", "Idle sessions expire after the configured timeout"],
      ["TC-002", "Repeated failed sign-ins lock the account"],
      ["TC-010", "PATCH /api/packages/[id] still serves a valid request"],
    ]);
  });
});

// ---------------------------------------------------------------------------
// Invariant catalog
// ---------------------------------------------------------------------------

describe("triggeredInvariants", () => {
  it("fires each matching check once, in catalog order", () => {
    const fired = triggeredInvariants([
      record("styles/globals.css"),
      record("app/api/packages/[id]/route.ts"),
      record("app/api/packages/route.ts"),
    ]);
    expect(fired.map((c) => c.id)).toEqual(["autosave-debounce", "section-508-contrast"]);
  });

  it("covers migrations, tier forms and FITARA paths", () => {
    const fired = triggeredInvariants([
      record("prisma/migrations/20240501_add_fitara/migration.sql"),
      record("components/tiers/TierTwoForm.tsx"),
    ]);
    expect(fired.map((c) => c.id)).toEqual([
      "fitara-approval",
      "tier-navigation",
      "migration-production-copy",
    ]);
  });

  it("fires nothing for unrelated paths", () => {
    expect(triggeredInvariants([record("README.md")])).toEqual([]);
  });
});
