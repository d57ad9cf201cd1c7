import type {
  BreakingVerdict,
  EndpointDelta,
  FieldSpec,
  RelationDescriptor,
  Reversibility,
} from "@diffscribe/model";

// ---------------------------------------------------------------------------
// Cell formats shared by rendering and re-parsing
// ---------------------------------------------------------------------------

export function endpointName(delta: Pick<EndpointDelta, "method" | "path">): string {
  return `${delta.method} ${delta.path}`;
}

/** `string, required` / `number, optional, default` */
export function formatFieldSpec(spec: FieldSpec): string {
  const parts = [spec.type, spec.required ? "required" : "optional"];
  if (spec.hasDefault) parts.push("default");
  return parts.join(", ");
}

export function parseFieldSpec(name: string, text: string): FieldSpec {
  const [type = "unknown", ...flags] = text.split(", ");
  return {
    name,
    type,
    required: flags.includes("required"),
    hasDefault: flags.includes("default"),
  };
}

const BREAKING_CELLS = {
  yes: "Yes",
  no: "No",
  unknown: "Unknown (manual review)",
} as const;

export function formatBreaking(verdict: BreakingVerdict): string {
  if (verdict === "unknown") return BREAKING_CELLS.unknown;
  return verdict ? BREAKING_CELLS.yes : BREAKING_CELLS.no;
}

export function parseBreaking(text: string): BreakingVerdict {
  if (text === BREAKING_CELLS.yes) return true;
  if (text === BREAKING_CELLS.no) return false;
  return "unknown";
}

export function formatReversible(value: Reversibility): string {
  if (value === "unknown") return "Unknown";
  return value ? "Yes" : "No";
}

export function formatRelation(rel: RelationDescriptor): string {
  return `${rel.columns.join(", ")} → ${rel.referencedTable}(${rel.referencedColumns.join(", ")})`;
}
