import type { EndpointDelta, FieldDiff, FieldSpec } from "@diffscribe/model";
import type { EndpointSignature, FieldShape } from "../types.js";
import { assessBreaking } from "./breaking.js";

function sameField(a: FieldSpec, b: FieldSpec): boolean {
  return (
    a.type === b.type && a.required === b.required && a.hasDefault === b.hasDefault
  );
}

/**
 * Field-level differences, before-order first then fields only present
 * after. Unchanged fields are omitted; an unreadable side yields nothing.
 */
export function diffFields(
  before: FieldShape | undefined,
  after: FieldShape | undefined,
): FieldDiff[] {
  if (before?.kind === "unknown" || after?.kind === "unknown") return [];
  const prev = before?.fields ?? [];
  const next = after?.fields ?? [];
  const nextByName = new Map(next.map((f) => [f.name, f]));
  const prevNames = new Set(prev.map((f) => f.name));

  const diffs: FieldDiff[] = [];
  for (const field of prev) {
    const match = nextByName.get(field.name);
    if (!match) diffs.push({ field: field.name, before: field, after: null });
    else if (!sameField(field, match)) {
      diffs.push({ field: field.name, before: field, after: match });
    }
  }
  for (const field of next) {
    if (!prevNames.has(field.name)) {
      diffs.push({ field: field.name, before: null, after: field });
    }
  }
  return diffs;
}

export function describeAuthChange(
  before: string[],
  after: string[],
): string | undefined {
  if (before.join("\n") === after.join("\n")) return undefined;
  if (before.length === 0) return `added ${after.join(", ")}`;
  if (after.length === 0) return `removed ${before.join(", ")}`;
  return `${before.join(", ")} → ${after.join(", ")}`;
}

/**
 * Pair one route file's handlers by method and derive a delta for each.
 * Pass `undefined` for the side where the file does not exist.
 */
export function diffEndpoints(
  file: string,
  before: EndpointSignature[] | undefined,
  after: EndpointSignature[] | undefined,
): EndpointDelta[] {
  const prev = new Map((before ?? []).map((s) => [s.method, s]));
  const next = new Map((after ?? []).map((s) => [s.method, s]));
  const methods = [...next.keys(), ...[...prev.keys()].filter((m) => !next.has(m))];

  return methods.map((method): EndpointDelta => {
    const b = prev.get(method);
    const a = next.get(method);
    const { breaking, reasons } = assessBreaking(b, a);
    const changeType = !b ? "New" : !a ? "Deleted" : "Modified";
    const delta: EndpointDelta = {
      file,
      method,
      path: a?.path ?? b?.path ?? "/",
      changeType,
      requestFieldDiffs: diffFields(b?.request, a?.request),
      responseFieldDiffs: diffFields(b?.response, a?.response),
      breaking,
      breakingReasons: reasons,
    };
    if (a) {
      const authChange = describeAuthChange(b?.authGuards ?? [], a.authGuards);
      if (authChange) delta.authChange = authChange;
    }
    return delta;
  });
}
