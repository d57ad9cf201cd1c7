// apps/cli/src/output/summary.ts — terminal summary after an analysis
import pc from "picocolors";
import { CATEGORIES, CATEGORY_LABELS, highestPriority } from "@diffscribe/model";
import type { AnalysisReport, BreakingVerdict, Priority } from "@diffscribe/model";

type Colors = ReturnType<typeof pc.createColors>;

function priorityColor(colors: Colors, priority: Priority): (text: string) => string {
  switch (priority) {
    case "Critical":
      return colors.red;
    case "High":
      return colors.yellow;
    case "Medium":
      return colors.cyan;
    case "Low":
      return colors.dim;
  }
}

function breakingMark(colors: Colors, verdict: BreakingVerdict): string {
  if (verdict === "unknown") return colors.yellow("?");
  return verdict ? colors.red("✗") : colors.green("✓");
}

function pad(str: string, len: number): string {
  return str.length >= len ? str : str + " ".repeat(len - str.length);
}

export function formatSummary(report: AnalysisReport, color: boolean): string[] {
  const colors = pc.createColors(color);
  const lines: string[] = [""];
  const range = `${report.base.ref}..${report.head.ref}`;

  if (report.empty) {
    lines.push(colors.bold(`  diffscribe — no changes detected in ${range}`));
    return lines;
  }

  lines.push(colors.bold(`  diffscribe — ${report.changes.length} files changed in ${range}`));

  lines.push("");
  for (const category of CATEGORIES) {
    const records = report.changes.filter((c) => c.category === category);
    if (records.length === 0) continue;
    const priority = highestPriority(records.map((r) => r.priority));
    const paint = priorityColor(colors, priority);
    lines.push(`    ${pad(CATEGORY_LABELS[category], 18)} ${paint(pad(priority, 8))} ${records.length}`);
  }

  if (report.endpoints.length > 0) {
    lines.push("", colors.bold(`  Endpoints (${report.endpoints.length})`));
    for (const e of report.endpoints) {
      lines.push(`    ${breakingMark(colors, e.breaking)} ${pad(e.changeType, 8)} ${pad(e.method, 6)} ${e.path}`);
    }
  }

  if (report.schemas.length > 0) {
    lines.push("", colors.bold(`  Tables (${report.schemas.length})`));
    for (const s of report.schemas) {
      const impact = s.dataImpact === "None" ? colors.dim(s.dataImpact) : colors.yellow(s.dataImpact);
      lines.push(`    ${pad(s.changeType, 8)} ${pad(s.table, 24)} ${impact}`);
    }
  }

  if (report.manualReview.length > 0) {
    lines.push("", colors.yellow(`  ⚠  ${report.manualReview.length} item(s) need manual review`));
  }

  lines.push(
    "",
    colors.dim(
      `  ${report.testCases.length} test cases, ${report.dependencies.length} dependency changes`,
    ),
  );
  return lines;
}

export function printSummary(report: AnalysisReport, color: boolean): void {
  for (const line of formatSummary(report, color)) console.log(line);
}
