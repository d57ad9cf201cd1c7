// @diffscribe/model — shared report model, error taxonomy, rule-table schema

export {
  REPORT_MODEL_VERSION,
  PRIORITY_ORDER,
  CATEGORIES,
  CATEGORY_LABELS,
} from "./types.js";
export type {
  Priority,
  Category,
  FileStatus,
  HttpMethod,
  BreakingVerdict,
  Reversibility,
  Side,
  RefInfo,
  FileChange,
  SourceReader,
  ChangeRecord,
  ClassificationRule,
  RuleTable,
  FieldSpec,
  FieldDiff,
  EndpointChangeType,
  EndpointDelta,
  TableChangeType,
  ColumnChangeType,
  ColumnDelta,
  RelationDescriptor,
  SchemaDelta,
  DependencySection,
  DependencyBump,
  DependencyChange,
  TestCase,
  ManualReviewItem,
  AnalysisReport,
  RuleTableIssue,
} from "./types.js";

export {
  DiffscribeError,
  RefNotFoundError,
  EmptyDiffError,
  CollectTimeoutError,
  UnparseableFileError,
  AmbiguousBreakingChangeError,
  isDiffscribeError,
} from "./errors.js";
export type { DiffscribeErrorCode } from "./errors.js";

export { parseRuleTable, RuleTableValidationError, RULE_TABLE_SCHEMA_OBJECT } from "./validate.js";

export { priorityRank, comparePriority, highestPriority } from "./priority.js";
