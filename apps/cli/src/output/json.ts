// apps/cli/src/output/json.ts — report model as JSON
import { REPORT_MODEL_VERSION } from "@diffscribe/model";
import type { AnalysisReport } from "@diffscribe/model";

export function formatJson(report: AnalysisReport): string {
  return JSON.stringify({ version: REPORT_MODEL_VERSION, ...report }, null, 2) + "\n";
}
