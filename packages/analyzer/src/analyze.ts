import {
  AmbiguousBreakingChangeError,
  UnparseableFileError,
} from "@diffscribe/model";
import type {
  ChangeRecord,
  DependencyChange,
  EndpointDelta,
  ManualReviewItem,
  SchemaDelta,
  SourceReader,
} from "@diffscribe/model";
import type { AnalyzerOptions, EndpointSignature, TableDef } from "./types.js";
import { extractEndpoints } from "./api/extract.js";
import { diffEndpoints } from "./api/differ.js";
import { endpointLabel } from "./api/route-path.js";
import { parsePrismaSchema, PrismaSyntaxError } from "./schema/prisma.js";
import { parseSqlMigration } from "./schema/sql.js";
import { diffTables, toSchemaDelta } from "./schema/differ.js";
import type { TableChange } from "./schema/differ.js";
import { isDownMigration, locateMigrations, migrationFor } from "./schema/migrations.js";
import { diffDependencies } from "./dependencies.js";

export interface AnalysisResult {
  endpoints: EndpointDelta[];
  schemas: SchemaDelta[];
  dependencies: DependencyChange[];
  manualReview: ManualReviewItem[];
}

type FileOutcome<T> = { ok: true; value: T } | { ok: false; review: ManualReviewItem };

/** Per-file errors become manual-review items; anything else propagates. */
async function recover<T>(path: string, work: () => Promise<T>): Promise<FileOutcome<T>> {
  try {
    return { ok: true, value: await work() };
  } catch (err) {
    if (err instanceof UnparseableFileError) {
      return { ok: false, review: { path, kind: "unparseable", reason: err.reason } };
    }
    throw err;
  }
}

async function readSide(
  reader: SourceReader,
  change: ChangeRecord,
  side: "base" | "head",
): Promise<string | undefined> {
  if (side === "base" && change.status === "Added") return undefined;
  if (side === "head" && change.status === "Deleted") return undefined;
  const path = side === "base" ? (change.oldPath ?? change.path) : change.path;
  const text = await reader.read(side, path);
  if (text === undefined) {
    throw new UnparseableFileError(change.path, `contents at ${side} are not available`);
  }
  return text;
}

// ---------------------------------------------------------------------------
// API
// ---------------------------------------------------------------------------

async function analyzeRoute(
  change: ChangeRecord,
  reader: SourceReader,
  options: AnalyzerOptions,
): Promise<EndpointDelta[]> {
  const [beforeText, afterText] = await Promise.all([
    readSide(reader, change, "base"),
    readSide(reader, change, "head"),
  ]);
  const extract = (file: string, text: string | undefined): EndpointSignature[] | undefined =>
    text === undefined ? undefined : extractEndpoints(file, text, options);

  return diffEndpoints(
    change.path,
    extract(change.oldPath ?? change.path, beforeText),
    extract(change.path, afterText),
  );
}

// ---------------------------------------------------------------------------
// Database
// ---------------------------------------------------------------------------

function parsePrisma(path: string, text: string | undefined): TableDef[] {
  if (text === undefined) return [];
  try {
    return parsePrismaSchema(text);
  } catch (err) {
    if (err instanceof PrismaSyntaxError) throw new UnparseableFileError(path, err.message);
    throw err;
  }
}

interface DatabaseFileResult {
  /** Table names the schema file declares on either side */
  covered: string[];
  changes: TableChange[];
  fromSchemaFile: boolean;
}

async function analyzeDatabaseFile(
  change: ChangeRecord,
  reader: SourceReader,
): Promise<DatabaseFileResult> {
  if (/\.prisma$/i.test(change.path)) {
    const [beforeText, afterText] = await Promise.all([
      readSide(reader, change, "base"),
      readSide(reader, change, "head"),
    ]);
    const before = parsePrisma(change.oldPath ?? change.path, beforeText);
    const after = parsePrisma(change.path, afterText);
    return {
      covered: [...before, ...after].map((t) => t.name),
      changes: diffTables(before, after),
      fromSchemaFile: true,
    };
  }

  const none: DatabaseFileResult = { covered: [], changes: [], fromSchemaFile: false };
  if (/\.sql$/i.test(change.path)) {
    if (change.status === "Deleted" || isDownMigration(change.path)) return none;
    const sql = await readSide(reader, change, "head");
    return { ...none, changes: parseSqlMigration(sql ?? "") };
  }
  if (!change.path.split("/").includes("migrations")) {
    throw new UnparseableFileError(change.path, "schema format is not supported");
  }
  return none;
}

/** Fold migration-script changes to one entry per table, in first-seen order. */
function mergeTableChanges(changes: TableChange[]): TableChange[] {
  const merged = new Map<string, TableChange>();
  for (const change of changes) {
    const existing = merged.get(change.table);
    if (!existing) {
      merged.set(change.table, {
        ...change,
        columns: [...change.columns],
        relations: [...change.relations],
        impacts: [...change.impacts],
      });
      continue;
    }
    if (change.changeType !== "Modified") existing.changeType = change.changeType;
    existing.columns.push(...change.columns);
    existing.relations.push(...change.relations);
    existing.impacts.push(...change.impacts);
  }
  return [...merged.values()];
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

const isManifest = (path: string): boolean => /(^|\/)package\.json$/.test(path);

const CHANGE_TYPE_ORDER: Record<EndpointDelta["changeType"], number> = {
  New: 0,
  Modified: 1,
  Deleted: 2,
};

/**
 * Derive endpoint, schema and dependency deltas from classified changes.
 * Only API and Database records (and package.json manifests) are read;
 * files that cannot be parsed are listed for manual review instead.
 */
export async function analyzeChanges(
  changes: readonly ChangeRecord[],
  reader: SourceReader,
  options: AnalyzerOptions = {},
): Promise<AnalysisResult> {
  const manualReview: ManualReviewItem[] = [];
  const collect = <T>(outcome: FileOutcome<T>, fallback: T): T => {
    if (outcome.ok) return outcome.value;
    manualReview.push(outcome.review);
    return fallback;
  };

  const routeFiles = changes.filter((c) => c.category === "API");
  const databaseFiles = changes.filter((c) => c.category === "Database");
  const manifests = changes.filter((c) => isManifest(c.path));

  const [routeOutcomes, databaseOutcomes, manifestOutcomes, migrations] = await Promise.all([
    Promise.all(routeFiles.map((c) => recover(c.path, () => analyzeRoute(c, reader, options)))),
    Promise.all(databaseFiles.map((c) => recover(c.path, () => analyzeDatabaseFile(c, reader)))),
    Promise.all(
      manifests.map((c) =>
        recover(c.path, async () => {
          const [before, after] = await Promise.all([
            readSide(reader, c, "base"),
            readSide(reader, c, "head"),
          ]);
          return diffDependencies(c.path, before, after);
        }),
      ),
    ),
    locateMigrations(databaseFiles, reader),
  ]);

  // Grouped the way the changelog lists them; sort is stable within a group.
  const endpoints = routeOutcomes
    .flatMap((o) => collect(o, []))
    .sort((a, b) => CHANGE_TYPE_ORDER[a.changeType] - CHANGE_TYPE_ORDER[b.changeType]);
  for (const delta of endpoints) {
    if (delta.breaking !== "unknown") continue;
    const label = endpointLabel(delta.method, delta.path);
    const err = new AmbiguousBreakingChangeError(label, delta.breakingReasons.join("; "));
    manualReview.push({ path: delta.file, kind: "ambiguous", reason: err.message });
  }

  const databaseResults = databaseOutcomes.flatMap((o) => {
    const value = collect<DatabaseFileResult | undefined>(o, undefined);
    return value ? [value] : [];
  });
  const covered = new Set(databaseResults.flatMap((r) => r.covered));
  const schemaChanges = databaseResults.filter((r) => r.fromSchemaFile).flatMap((r) => r.changes);
  const migrationChanges = mergeTableChanges(
    databaseResults
      .filter((r) => !r.fromSchemaFile)
      .flatMap((r) => r.changes)
      .filter((c) => !covered.has(c.table)),
  );
  const schemas = [...schemaChanges, ...migrationChanges].map((c) =>
    toSchemaDelta(c, migrationFor(c.table, migrations)),
  );

  const dependencies = manifestOutcomes.flatMap((o) => collect(o, []));

  return { endpoints, schemas, dependencies, manualReview };
}
