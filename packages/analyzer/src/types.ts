import type { FieldSpec, HttpMethod } from "@diffscribe/model";

// ---------------------------------------------------------------------------
// Endpoint signatures — what the extractor reads from one side of a route file
// ---------------------------------------------------------------------------

/** Fields in declaration order, or the reason the shape is not knowable. */
export type FieldShape =
  | { kind: "known"; fields: FieldSpec[] }
  | { kind: "unknown"; reason: string };

export interface EndpointSignature {
  method: HttpMethod;
  /** Route pattern, e.g. "/api/packages/[id]" */
  path: string;
  request: FieldShape;
  response: FieldShape;
  /** Guard calls as written, e.g. `requireRole("approver")` */
  authGuards: string[];
}

export interface ExtractOptions {
  /** Callee names treated as authentication or authorization guards */
  authGuards?: readonly string[] | undefined;
}

// ---------------------------------------------------------------------------
// Table definitions — what the schema parsers read from one side
// ---------------------------------------------------------------------------

export interface ColumnDef {
  name: string;
  /** Type as written, e.g. "String?" or "varchar(255)" */
  type: string;
  nullable: boolean;
  hasDefault: boolean;
}

export interface RelationDef {
  columns: string[];
  referencedTable: string;
  referencedColumns: string[];
}

export interface TableDef {
  name: string;
  columns: ColumnDef[];
  relations: RelationDef[];
}

export interface MigrationRef {
  name: string;
  /** The migration's SQL file */
  file: string;
  /** Contents at head, when readable */
  sql?: string | undefined;
  hasDown: boolean;
}

// ---------------------------------------------------------------------------
// Analyzer configuration
// ---------------------------------------------------------------------------

export type AnalyzerOptions = ExtractOptions;
