import { priorityRank } from "@diffscribe/model";
import type { ChangeRecord, EndpointDelta, FieldSpec, TestCase } from "@diffscribe/model";
import { endpointLabel } from "./api/route-path.js";
import { INVARIANT_CATALOG, triggeredInvariants } from "./invariants.js";
import type { InvariantCheck } from "./invariants.js";

export type TestCaseDraft = Omit<TestCase, "id">;

export interface SynthesizeOptions {
  /** Include the domain invariant catalog (default: true) */
  invariants?: boolean | undefined;
  catalog?: readonly InvariantCheck[] | undefined;
}

/** First number used for High cases when there are few Critical ones. */
export const HIGH_PRIORITY_START = 10;

function describeField(f: FieldSpec): string {
  return f.type === "unknown" ? `\`${f.name}\`` : `\`${f.name}\` (${f.type})`;
}

function dynamicSegments(path: string): string[] {
  return [...path.matchAll(/\[(?:\.\.\.)?([^\]]+)\]/g)].flatMap((m) => (m[1] ? [m[1]] : []));
}

function edgeCasesFor(delta: EndpointDelta): string[] {
  const edges: string[] = [];
  for (const diff of delta.requestFieldDiffs) {
    if (diff.after?.required) edges.push(`Omit \`${diff.field}\` → 400`);
  }
  for (const segment of dynamicSegments(delta.path)) {
    edges.push(`Unknown \`${segment}\` → 404`);
  }
  if (delta.authChange !== undefined) {
    edges.push(
      delta.authChange.startsWith("removed")
        ? "Unauthenticated request is now accepted; confirm this is intended"
        : "Unauthenticated request → 401",
    );
  }
  return edges;
}

function happyPath(delta: EndpointDelta): TestCaseDraft {
  const label = endpointLabel(delta.method, delta.path);
  const steps = [`Send ${label} with a valid request body`];
  for (const diff of delta.requestFieldDiffs) {
    if (diff.after) steps.push(`Include ${describeField(diff.after)}`);
  }
  steps.push("Check the response status is 2xx");
  for (const diff of delta.responseFieldDiffs) {
    if (diff.after) steps.push(`Check the response contains \`${diff.field}\``);
    else steps.push(`Check no caller still reads \`${diff.field}\``);
  }

  return {
    priority: delta.breaking === true ? "Critical" : "High",
    title:
      delta.changeType === "New"
        ? `${label} accepts a valid request`
        : `${label} still serves a valid request`,
    endpoint: label,
    preconditions:
      delta.authChange !== undefined && !delta.authChange.startsWith("removed")
        ? "Head build running with seeded data; signed in as a user the route's guards allow"
        : "Head build running with seeded data",
    steps,
    expectedResult: "Request succeeds and the response matches the documented shape",
    edgeCases: edgeCasesFor(delta),
  };
}

function endpointCases(delta: EndpointDelta): TestCaseDraft[] {
  const label = endpointLabel(delta.method, delta.path);

  if (delta.changeType === "Deleted") {
    return [
      {
        priority: "Critical",
        title: `${label} is no longer served`,
        endpoint: label,
        preconditions: "Head build running",
        steps: [`Send ${label}`, "Search client code for remaining calls to the route"],
        expectedResult: "Responds 404 or 405 and no client still calls it",
        edgeCases: [],
      },
    ];
  }

  const cases = [happyPath(delta)];
  if (delta.breaking === true) {
    cases.push({
      priority: "Critical",
      title: `${label} rejects the prior contract predictably`,
      endpoint: label,
      preconditions: "Head build running; a request captured from the base build",
      steps: [
        "Replay the base-build request against the head build",
        ...delta.breakingReasons.map((r) => `Exercise: ${r}`),
      ],
      expectedResult: "Responds 4xx naming the changed field, never 5xx",
      edgeCases: delta.breakingReasons,
    });
  } else if (delta.breaking === "unknown") {
    cases.push({
      priority: "Critical",
      title: `${label} contract needs manual verification`,
      endpoint: label,
      preconditions: "Base and head builds running side by side",
      steps: [
        "Send the same request to both builds",
        "Compare request validation and response payloads",
      ],
      expectedResult: "Any difference is documented or fixed before release",
      edgeCases: delta.breakingReasons,
    });
  }
  return cases;
}

function invariantCase(check: InvariantCheck): TestCaseDraft {
  return {
    priority: check.priority,
    title: check.title,
    preconditions: check.preconditions,
    steps: check.steps,
    expectedResult: check.expectedResult,
    edgeCases: check.edgeCases,
  };
}

function formatId(n: number): string {
  return `TC-${String(n).padStart(3, "0")}`;
}

/**
 * Stable-sort drafts by priority and number them: Critical from TC-001,
 * High from TC-010 (or right after the last Critical), Medium and Low
 * continuing the sequence.
 */
export function numberTestCases(drafts: readonly TestCaseDraft[]): TestCase[] {
  const sorted = drafts
    .map((draft, index) => ({ draft, index }))
    .sort(
      (a, b) =>
        priorityRank(a.draft.priority) - priorityRank(b.draft.priority) || a.index - b.index,
    );

  let next = 1;
  let highStarted = false;
  return sorted.map(({ draft }) => {
    if (draft.priority !== "Critical" && !highStarted) {
      highStarted = true;
      if (draft.priority === "High") next = Math.max(next, HIGH_PRIORITY_START);
    }
    return { id: formatId(next++), ...draft };
  });
}

/** Endpoint cases in delta order, then triggered invariant checks, numbered. */
export function synthesizeTestCases(
  endpoints: readonly EndpointDelta[],
  changes: readonly ChangeRecord[],
  options: SynthesizeOptions = {},
): TestCase[] {
  const drafts = endpoints.flatMap(endpointCases);
  if (options.invariants !== false) {
    drafts.push(...triggeredInvariants(changes, options.catalog ?? INVARIANT_CATALOG).map(invariantCase));
  }
  return numberTestCases(drafts);
}
