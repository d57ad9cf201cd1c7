// packages/report/src/dev-readme.ts — developer-facing README for the change set

import { CATEGORIES, CATEGORY_LABELS } from "@diffscribe/model";
import type { AnalysisReport, EndpointDelta, FieldDiff } from "@diffscribe/model";
import { cell, listCell, renderTable } from "./markdown.js";
import { endpointName, formatBreaking } from "./format.js";
import { formatRef } from "./qa-changelog.js";

function overview(report: AnalysisReport): string[] {
  const lines = ["## Overview", "", `Changes from ${formatRef(report.base)} to ${formatRef(report.head)}.`];
  if (report.empty) {
    lines.push("", "No changes detected.");
    return lines;
  }

  const areas = CATEGORIES.filter((c) => report.changes.some((r) => r.category === c)).map(
    (c) => CATEGORY_LABELS[c],
  );
  lines.push(
    "",
    `${report.changes.length} file(s) changed across ${areas.join(", ")}. ` +
      `${report.endpoints.length} endpoint change(s), ${report.schemas.length} table change(s) ` +
      `and ${report.dependencies.length} dependency change(s).`,
  );
  return lines;
}

function filesChanged(report: AnalysisReport): string[] {
  const rows = CATEGORIES.flatMap((category) => {
    const paths = report.changes.filter((c) => c.category === category).map((c) => c.path);
    return paths.length > 0 ? [[CATEGORY_LABELS[category], listCell(paths)]] : [];
  });
  return ["## Files Changed", "", ...renderTable(["Area", "Files"], rows)];
}

function howToTest(report: AnalysisReport): string[] {
  const steps = [`Check out ${formatRef(report.head)}.`];
  if (report.dependencies.length > 0) steps.push("Install dependencies: `npm install`.");

  const migrations = [
    ...new Set(report.schemas.flatMap((s) => (s.migrationName ? [s.migrationName] : []))),
  ];
  if (migrations.length > 0) {
    steps.push(`Apply migrations against a local database: ${migrations.map((m) => `\`${m}\``).join(", ")}.`);
  } else if (report.schemas.length > 0) {
    steps.push("Push the schema change to a local database.");
  }

  steps.push("Start the app: `npm run dev`.");
  if (report.testCases.length > 0) {
    const first = report.testCases[0]?.id ?? "";
    const last = report.testCases[report.testCases.length - 1]?.id ?? "";
    steps.push(
      first === last
        ? `Run test case ${first} from the QA changelog.`
        : `Run test cases ${first} to ${last} from the QA changelog, Critical first.`,
    );
  }

  return ["## How to Test Locally", "", ...steps.map((s, i) => `${i + 1}. ${s}`)];
}

function fieldRows(location: string, diffs: FieldDiff[]): string[][] {
  return diffs.map((d) => {
    const spec = d.after ?? d.before;
    return [
      location,
      cell(d.field),
      cell(spec?.type),
      spec?.required ? "Yes" : "No",
      spec?.hasDefault ? "Yes" : "No",
      d.after ? (d.before ? "Changed" : "Added") : "Removed",
    ];
  });
}

function endpointDoc(delta: EndpointDelta): string[] {
  const rows = [
    ...fieldRows("Request", delta.requestFieldDiffs),
    ...fieldRows("Response", delta.responseFieldDiffs),
  ];
  const lines = [
    `### ${endpointName(delta)}`,
    "",
    `- **File:** \`${delta.file}\``,
    `- **Change:** ${delta.changeType}`,
    `- **Breaking:** ${formatBreaking(delta.breaking)}`,
  ];
  if (delta.authChange) lines.push(`- **Auth:** ${delta.authChange}`);
  lines.push("", ...renderTable(["Location", "Field", "Type", "Required", "Default", "Change"], rows));
  return lines;
}

function apiDocumentation(report: AnalysisReport): string[] {
  const index = report.endpoints.map((e) => [
    cell(endpointName(e)),
    e.changeType,
    formatBreaking(e.breaking),
  ]);
  const lines = ["## API Documentation", "", ...renderTable(["Endpoint", "Change", "Breaking"], index)];
  for (const delta of report.endpoints) lines.push("", ...endpointDoc(delta));
  return lines;
}

function knownLimitations(report: AnalysisReport): string[] {
  const items = report.manualReview.map((m) => `\`${m.path}\`: ${m.reason}`);
  for (const s of report.schemas) {
    if (s.reversible === "unknown") {
      items.push(`Reversibility of \`${s.table}\` is unknown: no migration names this table`);
    }
  }
  if (items.length === 0) items.push("None identified.");
  return ["## Known Limitations", "", ...items.map((i) => `- ${i}`)];
}

function dependencies(report: AnalysisReport): string[] {
  const rows = report.dependencies.map((d) => [
    cell(d.name),
    cell(d.manifest),
    d.section,
    cell(d.before),
    cell(d.after),
    d.bump,
  ]);
  return [
    "## Dependencies",
    "",
    ...renderTable(["Package", "Manifest", "Section", "Before", "After", "Change"], rows),
  ];
}

export function renderDevReadme(report: AnalysisReport): string {
  const sections = [
    [`# ${report.title}`],
    overview(report),
    filesChanged(report),
    howToTest(report),
    apiDocumentation(report),
    knownLimitations(report),
    dependencies(report),
  ];
  return sections.map((s) => s.join("\n")).join("\n\n") + "\n";
}
