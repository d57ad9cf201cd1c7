import type { ChangeRecord, SourceReader } from "@diffscribe/model";
import type { MigrationRef } from "../types.js";

interface MigrationLayout {
  name: string;
  downPath: string;
}

/**
 * Recognize a migration script by path:
 * - `…/migrations/<name>/migration.sql` (down script: `down.sql` beside it)
 * - `…/migrations/<name>.sql` or `<name>.up.sql` (down script: `<name>.down.sql`)
 * Down scripts themselves are not migrations.
 */
export function migrationLayout(path: string): MigrationLayout | undefined {
  const segments = path.split("/");
  const idx = segments.lastIndexOf("migrations");
  if (idx === -1) return undefined;
  const rest = segments.slice(idx + 1);
  const dir = segments.slice(0, idx + 1).join("/");

  if (rest.length === 2 && rest[1] === "migration.sql" && rest[0]) {
    return { name: rest[0], downPath: `${dir}/${rest[0]}/down.sql` };
  }
  if (rest.length === 1 && rest[0]) {
    const file = rest[0];
    if (/\.down\.sql$/i.test(file) || !/\.sql$/i.test(file)) return undefined;
    const name = file.replace(/(\.up)?\.sql$/i, "");
    return { name, downPath: `${dir}/${name}.down.sql` };
  }
  return undefined;
}

export function isDownMigration(path: string): boolean {
  return /(^|\/)down\.sql$|\.down\.sql$/i.test(path);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Whether the SQL mentions the table as a whole identifier. */
export function namesTable(sql: string, table: string): boolean {
  return new RegExp(`(^|[^\\w$])${escapeRegExp(table)}([^\\w$]|$)`, "i").test(sql);
}

/**
 * Changed migrations in change-set order, with their head SQL and whether a
 * down script exists (in the change set or at head).
 */
export async function locateMigrations(
  changes: readonly ChangeRecord[],
  reader: SourceReader,
): Promise<MigrationRef[]> {
  const changed = new Set(changes.filter((c) => c.status !== "Deleted").map((c) => c.path));
  const refs: MigrationRef[] = [];

  for (const change of changes) {
    if (change.status === "Deleted") continue;
    const layout = migrationLayout(change.path);
    if (!layout) continue;
    const [sql, down] = await Promise.all([
      reader.read("head", change.path),
      changed.has(layout.downPath) ? Promise.resolve("") : reader.read("head", layout.downPath),
    ]);
    refs.push({
      name: layout.name,
      file: change.path,
      sql,
      hasDown: down !== undefined,
    });
  }
  return refs;
}

/** The first changed migration whose SQL names the table. */
export function migrationFor(
  table: string,
  migrations: readonly MigrationRef[],
): MigrationRef | undefined {
  return migrations.find((m) => m.sql !== undefined && namesTable(m.sql, table));
}
