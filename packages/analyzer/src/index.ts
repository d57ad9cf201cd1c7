export type {
  FieldShape,
  EndpointSignature,
  ExtractOptions,
  ColumnDef,
  RelationDef,
  TableDef,
  MigrationRef,
  AnalyzerOptions,
} from "./types.js";

export { routeFromFile, endpointLabel } from "./api/route-path.js";
export type { RouteLocation, RouterKind } from "./api/route-path.js";
export { extractEndpoints, DEFAULT_AUTH_GUARDS } from "./api/extract.js";
export { assessBreaking } from "./api/breaking.js";
export type { BreakingAssessment } from "./api/breaking.js";
export { diffEndpoints, diffFields, describeAuthChange } from "./api/differ.js";

export { parsePrismaSchema, PrismaSyntaxError } from "./schema/prisma.js";
export { parseSqlMigration } from "./schema/sql.js";
export { diffTables, toSchemaDelta, describeImpact } from "./schema/differ.js";
export type { TableChange } from "./schema/differ.js";
export { locateMigrations, migrationFor, migrationLayout } from "./schema/migrations.js";

export { diffDependencies, classifyBump } from "./dependencies.js";
export { INVARIANT_CATALOG, triggeredInvariants } from "./invariants.js";
export type { InvariantCheck } from "./invariants.js";
export {
  synthesizeTestCases,
  numberTestCases,
  HIGH_PRIORITY_START,
} from "./synthesizer.js";
export type { TestCaseDraft, SynthesizeOptions } from "./synthesizer.js";

export { analyzeChanges } from "./analyze.js";
export type { AnalysisResult } from "./analyze.js";
