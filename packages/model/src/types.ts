export const REPORT_MODEL_VERSION = "1.0" as const;

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

export type Priority = "Critical" | "High" | "Medium" | "Low";

/** Highest first. */
export const PRIORITY_ORDER: readonly Priority[] = [
  "Critical",
  "High",
  "Medium",
  "Low",
];

export type Category =
  | "API"
  | "Database"
  | "Auth"
  | "BusinessLogic"
  | "Types"
  | "UIComponent"
  | "TierForm"
  | "Styling"
  | "Config"
  | "DocsTests"
  | "Other";

export const CATEGORIES: readonly Category[] = [
  "API",
  "Database",
  "Auth",
  "BusinessLogic",
  "Types",
  "UIComponent",
  "TierForm",
  "Styling",
  "Config",
  "DocsTests",
  "Other",
];

export const CATEGORY_LABELS: Record<Category, string> = {
  API: "API Routes",
  Database: "Database",
  Auth: "Auth/Security",
  BusinessLogic: "Business Logic",
  Types: "Type Definitions",
  UIComponent: "UI Components",
  TierForm: "Tier Forms",
  Styling: "Styling",
  Config: "Configuration",
  DocsTests: "Docs/Tests",
  Other: "Other",
};

export type FileStatus = "Added" | "Modified" | "Deleted" | "Renamed";

export type HttpMethod =
  | "GET"
  | "POST"
  | "PUT"
  | "PATCH"
  | "DELETE"
  | "HEAD"
  | "OPTIONS"
  | "ANY";

/** `"unknown"` when the request or response shape could not be determined. */
export type BreakingVerdict = boolean | "unknown";

export type Reversibility = boolean | "unknown";

// ---------------------------------------------------------------------------
// Collection: what the Diff Collector hands to the classifier
// ---------------------------------------------------------------------------

export type Side = "base" | "head";

export interface RefInfo {
  /** The reference as the caller wrote it, e.g. "main" or "HEAD~3" */
  ref: string;
  /** Resolved commit, when the source has one */
  sha?: string | undefined;
}

export interface FileChange {
  /** Path at head (at base for deletions) */
  path: string;
  /** Previous path for renames */
  oldPath?: string | undefined;
  status: FileStatus;
  /** This file's section of the full diff */
  patch: string;
}

/**
 * Read-only access to file contents on either side of the diff.
 * Resolves `undefined` when the file does not exist on that side or its
 * contents are not available to the source.
 */
export interface SourceReader {
  read(side: Side, path: string): Promise<string | undefined>;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export interface ChangeRecord {
  readonly path: string;
  readonly oldPath?: string | undefined;
  readonly status: FileStatus;
  readonly category: Category;
  readonly priority: Priority;
}

export interface ClassificationRule {
  category: Category;
  priority: Priority;
  /** minimatch globs, any of which selects the rule */
  patterns: string[];
  /** minimatch globs that veto a match */
  exclude?: string[] | undefined;
}

export type RuleTable = ClassificationRule[];

// ---------------------------------------------------------------------------
// API deltas
// ---------------------------------------------------------------------------

export interface FieldSpec {
  name: string;
  /** Declared type, e.g. "string" or "enum"; "unknown" when not inferable */
  type: string;
  /** Client must send it: not optional and no server-side default */
  required: boolean;
  hasDefault: boolean;
}

export interface FieldDiff {
  field: string;
  before: FieldSpec | null;
  after: FieldSpec | null;
}

export type EndpointChangeType = "New" | "Modified" | "Deleted";

export interface EndpointDelta {
  /** Route handler file the delta was derived from */
  file: string;
  method: HttpMethod;
  path: string;
  changeType: EndpointChangeType;
  requestFieldDiffs: FieldDiff[];
  responseFieldDiffs: FieldDiff[];
  authChange?: string | undefined;
  breaking: BreakingVerdict;
  /** One entry per breaking condition that held, or the ambiguity reason */
  breakingReasons: string[];
}

// ---------------------------------------------------------------------------
// Schema deltas
// ---------------------------------------------------------------------------

export type TableChangeType = "New" | "Modified" | "Deleted";
export type ColumnChangeType = "Added" | "Removed" | "Modified";

export interface ColumnDelta {
  name: string;
  changeType: ColumnChangeType;
  typeBefore?: string | undefined;
  typeAfter?: string | undefined;
}

export interface RelationDescriptor {
  columns: string[];
  referencedTable: string;
  referencedColumns: string[];
}

export interface SchemaDelta {
  table: string;
  changeType: TableChangeType;
  columns: ColumnDelta[];
  relations: RelationDescriptor[];
  migrationName?: string | undefined;
  reversible: Reversibility;
  dataImpact: string;
}

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export type DependencySection =
  | "dependencies"
  | "devDependencies"
  | "peerDependencies"
  | "optionalDependencies";

export type DependencyBump =
  | "major"
  | "minor"
  | "patch"
  | "added"
  | "removed"
  | "other";

export interface DependencyChange {
  /** Manifest the change was found in */
  manifest: string;
  name: string;
  section: DependencySection;
  before?: string | undefined;
  after?: string | undefined;
  bump: DependencyBump;
}

// ---------------------------------------------------------------------------
// Test cases
// ---------------------------------------------------------------------------

export interface TestCase {
  /** e.g. "TC-001" */
  id: string;
  priority: Priority;
  title: string;
  /** "METHOD /path" when the case targets an endpoint */
  endpoint?: string | undefined;
  preconditions: string;
  steps: string[];
  expectedResult: string;
  edgeCases: string[];
}

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export interface ManualReviewItem {
  path: string;
  kind: "unparseable" | "ambiguous";
  reason: string;
}

export interface AnalysisReport {
  title: string;
  base: RefInfo;
  head: RefInfo;
  /** True when the collector found no changes */
  empty: boolean;
  changes: ChangeRecord[];
  endpoints: EndpointDelta[];
  schemas: SchemaDelta[];
  dependencies: DependencyChange[];
  testCases: TestCase[];
  manualReview: ManualReviewItem[];
}

export interface RuleTableIssue {
  /** JSON pointer to the failing value, e.g. "/0/category" */
  path: string;
  message: string;
  keyword: string;
}
