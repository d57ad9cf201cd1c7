import type { BreakingVerdict, FieldSpec } from "@diffscribe/model";
import type { EndpointSignature, FieldShape } from "../types.js";

export interface BreakingAssessment {
  breaking: BreakingVerdict;
  /** Conditions that held, or the ambiguity reasons when undecidable */
  reasons: string[];
}

function byName(fields: FieldSpec[]): Map<string, FieldSpec> {
  return new Map(fields.map((f) => [f.name, f]));
}

function requestReasons(before: FieldSpec[], after: FieldSpec[]): string[] {
  const reasons: string[] = [];
  const prev = byName(before);
  const next = byName(after);

  for (const field of before) {
    if (field.required && !next.has(field.name)) {
      reasons.push(`required request field \`${field.name}\` removed`);
    }
  }
  for (const field of after) {
    if (!field.required) continue;
    const old = prev.get(field.name);
    if (!old) {
      reasons.push(`required request field \`${field.name}\` added without a default`);
    } else if (!old.required) {
      reasons.push(`request field \`${field.name}\` is now required`);
    }
  }
  return reasons;
}

function responseReasons(before: FieldSpec[], after: FieldSpec[]): string[] {
  const next = byName(after);
  return before
    .filter((f) => !next.has(f.name))
    .map((f) => `response field \`${f.name}\` removed`);
}

function ambiguity(label: string, ...shapes: FieldShape[]): string[] {
  return shapes.flatMap((s) => (s.kind === "unknown" ? [`${label}: ${s.reason}`] : []));
}

/**
 * Apply the breaking-change rule to one endpoint's before and after
 * signatures. Only a decided condition makes a change breaking; an
 * unreadable shape yields "unknown" when nothing else already decided it.
 */
export function assessBreaking(
  before: EndpointSignature | undefined,
  after: EndpointSignature | undefined,
): BreakingAssessment {
  if (!before) return { breaking: false, reasons: [] };
  if (!after) {
    return {
      breaking: true,
      reasons: [`${before.method} removed from ${before.path}`],
    };
  }

  const reasons: string[] = [];
  if (before.path !== after.path) {
    reasons.push(`route moved from ${before.path} to ${after.path}`);
  }
  if (before.request.kind === "known" && after.request.kind === "known") {
    reasons.push(...requestReasons(before.request.fields, after.request.fields));
  }
  if (before.response.kind === "known" && after.response.kind === "known") {
    reasons.push(...responseReasons(before.response.fields, after.response.fields));
  }
  if (reasons.length > 0) return { breaking: true, reasons };

  const unknown = [
    ...new Set([
      ...ambiguity("request", before.request, after.request),
      ...ambiguity("response", before.response, after.response),
    ]),
  ];
  if (unknown.length > 0) return { breaking: "unknown", reasons: unknown };
  return { breaking: false, reasons: [] };
}
