// packages/report/src/qa-changelog.ts — QA changelog rendering

import { CATEGORY_LABELS, PRIORITY_ORDER, highestPriority } from "@diffscribe/model";
import type {
  AnalysisReport,
  EndpointChangeType,
  EndpointDelta,
  FieldDiff,
  ManualReviewItem,
  RefInfo,
} from "@diffscribe/model";
import { cell, listCell, numberedListCell, renderTable } from "./markdown.js";
import {
  endpointName,
  formatBreaking,
  formatFieldSpec,
  formatRelation,
  formatReversible,
} from "./format.js";

// ---------------------------------------------------------------------------
// Headings. The parser locates tables by these
// ---------------------------------------------------------------------------

export const QA_HEADINGS = {
  summary: "## Summary",
  risk: "## Risk Assessment",
  files: "## Files Changed",
  api: "## API Changes",
  newEndpoints: "### New Endpoints",
  modifiedEndpoints: "### Modified Endpoints",
  deletedEndpoints: "### Deleted Endpoints",
  fieldChanges: "### Field Changes",
  database: "## Database Changes",
  tables: "### Tables",
  columns: "### Column Changes",
  manualReview: "## Manual Review Required",
  testCases: "## Test Cases",
  deployment: "## Deployment Notes",
} as const;

export const ENDPOINT_SECTIONS: ReadonlyArray<[EndpointChangeType, string]> = [
  ["New", QA_HEADINGS.newEndpoints],
  ["Modified", QA_HEADINGS.modifiedEndpoints],
  ["Deleted", QA_HEADINGS.deletedEndpoints],
];

export const FILE_HEADERS = ["File", "Previous Path", "Status", "Category", "Priority"];
export const ENDPOINT_HEADERS = ["Method", "Path", "File", "Breaking", "Reasons", "Auth Change"];
export const FIELD_HEADERS = ["Endpoint", "File", "Location", "Field", "Before", "After"];
export const TEST_CASE_HEADERS = [
  "ID",
  "Priority",
  "Title",
  "Endpoint",
  "Preconditions",
  "Steps",
  "Expected Result",
  "Edge Cases",
];

export const REVIEW_KIND_LABELS: Record<ManualReviewItem["kind"], string> = {
  unparseable: "Unparseable",
  ambiguous: "Ambiguous",
};

export function formatRef(ref: RefInfo): string {
  return ref.sha ? `\`${ref.ref}\` (${ref.sha.slice(0, 7)})` : `\`${ref.ref}\``;
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

function summarySection(report: AnalysisReport): string[] {
  const lines = [QA_HEADINGS.summary, ""];
  if (report.empty) {
    lines.push(`No changes detected between ${formatRef(report.base)} and ${formatRef(report.head)}.`);
    return lines;
  }

  const breaking = report.endpoints.filter((e) => e.breaking === true).length;
  const unknown = report.endpoints.filter((e) => e.breaking === "unknown").length;
  const critical = report.testCases.filter((t) => t.priority === "Critical").length;

  lines.push(`- **Files changed:** ${report.changes.length}`);
  lines.push(
    `- **Endpoint changes:** ${report.endpoints.length} (${breaking} breaking, ${unknown} unknown)`,
  );
  lines.push(`- **Table changes:** ${report.schemas.length}`);
  lines.push(`- **Dependency changes:** ${report.dependencies.length}`);
  lines.push(`- **Test cases:** ${report.testCases.length} (${critical} Critical)`);
  lines.push(`- **Manual review items:** ${report.manualReview.length}`);
  return lines;
}

function riskSection(report: AnalysisReport): string[] {
  const overall =
    report.changes.length === 0
      ? "None"
      : highestPriority(report.changes.map((c) => c.priority));

  const rows: string[][] = [];
  for (const priority of PRIORITY_ORDER) {
    const matching = report.changes.filter((c) => c.priority === priority);
    if (matching.length === 0) continue;
    const areas = [...new Set(matching.map((c) => CATEGORY_LABELS[c.category]))];
    rows.push([priority, String(matching.length), listCell(areas)]);
  }

  return [
    QA_HEADINGS.risk,
    "",
    `**Overall risk:** ${overall}`,
    "",
    ...renderTable(["Priority", "Files", "Areas"], rows),
  ];
}

function filesSection(report: AnalysisReport): string[] {
  const rows = report.changes.map((c) => [
    cell(c.path),
    cell(c.oldPath),
    c.status,
    CATEGORY_LABELS[c.category],
    c.priority,
  ]);
  return [QA_HEADINGS.files, "", ...renderTable(FILE_HEADERS, rows)];
}

function endpointRow(delta: EndpointDelta): string[] {
  return [
    delta.method,
    cell(delta.path),
    cell(delta.file),
    formatBreaking(delta.breaking),
    listCell(delta.breakingReasons),
    cell(delta.authChange),
  ];
}

function fieldRows(delta: EndpointDelta, location: string, diffs: FieldDiff[]): string[][] {
  return diffs.map((d) => [
    cell(endpointName(delta)),
    cell(delta.file),
    location,
    cell(d.field),
    cell(d.before ? formatFieldSpec(d.before) : undefined),
    cell(d.after ? formatFieldSpec(d.after) : undefined),
  ]);
}

function apiSection(report: AnalysisReport): string[] {
  const lines: string[] = [QA_HEADINGS.api];

  for (const [changeType, heading] of ENDPOINT_SECTIONS) {
    const rows = report.endpoints.filter((e) => e.changeType === changeType).map(endpointRow);
    lines.push("", heading, "", ...renderTable(ENDPOINT_HEADERS, rows));
  }

  const fields = report.endpoints.flatMap((e) => [
    ...fieldRows(e, "Request", e.requestFieldDiffs),
    ...fieldRows(e, "Response", e.responseFieldDiffs),
  ]);
  lines.push("", QA_HEADINGS.fieldChanges, "", ...renderTable(FIELD_HEADERS, fields));
  return lines;
}

function databaseSection(report: AnalysisReport): string[] {
  const tables = report.schemas.map((s) => [
    cell(s.table),
    s.changeType,
    cell(s.migrationName),
    formatReversible(s.reversible),
    cell(s.dataImpact),
    listCell(s.relations.map(formatRelation)),
  ]);
  const columns = report.schemas.flatMap((s) =>
    s.columns.map((c) => [cell(s.table), cell(c.name), c.changeType, cell(c.typeBefore), cell(c.typeAfter)]),
  );

  return [
    QA_HEADINGS.database,
    "",
    QA_HEADINGS.tables,
    "",
    ...renderTable(["Table", "Change", "Migration", "Reversible", "Data Impact", "Relations"], tables),
    "",
    QA_HEADINGS.columns,
    "",
    ...renderTable(["Table", "Column", "Change", "Type Before", "Type After"], columns),
  ];
}

function manualReviewSection(report: AnalysisReport): string[] {
  const rows = report.manualReview.map((m) => [
    cell(m.path),
    REVIEW_KIND_LABELS[m.kind],
    cell(m.reason),
  ]);
  return [QA_HEADINGS.manualReview, "", ...renderTable(["File", "Kind", "Reason"], rows)];
}

function testCaseSection(report: AnalysisReport): string[] {
  const rows = report.testCases.map((t) => [
    t.id,
    t.priority,
    cell(t.title),
    cell(t.endpoint),
    cell(t.preconditions),
    numberedListCell(t.steps),
    cell(t.expectedResult),
    listCell(t.edgeCases),
  ]);
  return [QA_HEADINGS.testCases, "", ...renderTable(TEST_CASE_HEADERS, rows)];
}

function deploymentSection(report: AnalysisReport): string[] {
  const items: string[] = [];

  const migrations = [...new Set(report.schemas.flatMap((s) => (s.migrationName ? [s.migrationName] : [])))];
  for (const name of migrations) items.push(`Apply migration \`${name}\``);
  for (const s of report.schemas) {
    if (s.dataImpact !== "None") items.push(`Review data impact on \`${s.table}\`: ${s.dataImpact}`);
    if (s.reversible !== true) items.push(`Agree a rollback plan for \`${s.table}\` (no down migration found)`);
  }
  for (const e of report.endpoints) {
    if (e.breaking === true) items.push(`Notify API consumers that \`${endpointName(e)}\` changed incompatibly`);
  }
  if (report.dependencies.length > 0) {
    items.push(`Reinstall dependencies (${report.dependencies.length} changed)`);
  }
  for (const c of report.changes) {
    if (c.category === "Config" && !/(^|\/)package\.json$/.test(c.path)) {
      items.push(`Check configuration change in \`${c.path}\``);
    }
  }
  if (report.manualReview.length > 0) {
    items.push(`Resolve ${report.manualReview.length} manual review item(s) before release`);
  }
  if (report.testCases.some((t) => t.priority === "Critical")) {
    items.push("Pass every Critical test case before release");
  }
  if (items.length === 0) items.push("No special deployment steps");

  return [QA_HEADINGS.deployment, "", ...items.map((item) => `- [ ] ${item}`)];
}

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

/** Render the QA changelog. Output depends only on the report. */
export function renderQaChangelog(report: AnalysisReport): string {
  const sections = [
    [`# ${report.title}`, "", `**Base:** ${formatRef(report.base)} → **Head:** ${formatRef(report.head)}`],
    summarySection(report),
    riskSection(report),
    filesSection(report),
    apiSection(report),
    databaseSection(report),
    manualReviewSection(report),
    testCaseSection(report),
    deploymentSection(report),
  ];
  return sections.map((s) => s.join("\n")).join("\n\n") + "\n";
}
