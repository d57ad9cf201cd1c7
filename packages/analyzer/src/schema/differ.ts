import type {
  ColumnDelta,
  RelationDescriptor,
  SchemaDelta,
  TableChangeType,
} from "@diffscribe/model";
import type { ColumnDef, MigrationRef, TableDef } from "../types.js";

/** A table's structural change before migration lookup. */
export interface TableChange {
  table: string;
  changeType: TableChangeType;
  columns: ColumnDelta[];
  relations: RelationDescriptor[];
  /** Data-impact notes, in column order */
  impacts: string[];
}

export const describeImpact = {
  droppedTable: (table: string) => `Data loss: table \`${table}\` is dropped`,
  droppedColumn: (column: string) => `Data loss: column \`${column}\` is dropped`,
  backfill: (column: string) =>
    `Backfill required: \`${column}\` is NOT NULL without a default`,
  conversion: (column: string, from: string | undefined, to: string) =>
    from
      ? `Type conversion: \`${column}\` changes from ${from} to ${to}`
      : `Type conversion: \`${column}\` changes to ${to}`,
  notNull: (column: string) => `Existing NULLs: \`${column}\` becomes NOT NULL`,
};

const baseType = (c: ColumnDef): string => c.type.replace(/\?$/, "");

const relationKey = (r: RelationDescriptor): string =>
  `${r.columns.join(",")}->${r.referencedTable}(${r.referencedColumns.join(",")})`;

function diffColumns(before: ColumnDef[], after: ColumnDef[]): Pick<TableChange, "columns" | "impacts"> {
  const columns: ColumnDelta[] = [];
  const impacts: string[] = [];
  const next = new Map(after.map((c) => [c.name, c]));
  const prevNames = new Set(before.map((c) => c.name));

  for (const col of before) {
    const match = next.get(col.name);
    if (!match) {
      columns.push({ name: col.name, changeType: "Removed", typeBefore: col.type });
      impacts.push(describeImpact.droppedColumn(col.name));
      continue;
    }
    if (col.type === match.type && col.hasDefault === match.hasDefault) continue;
    columns.push({
      name: col.name,
      changeType: "Modified",
      typeBefore: col.type,
      typeAfter: match.type,
    });
    if (baseType(col) !== baseType(match)) {
      impacts.push(describeImpact.conversion(col.name, baseType(col), baseType(match)));
    }
    if (col.nullable && !match.nullable) {
      impacts.push(describeImpact.notNull(col.name));
    }
  }

  for (const col of after) {
    if (prevNames.has(col.name)) continue;
    columns.push({ name: col.name, changeType: "Added", typeAfter: col.type });
    if (!col.nullable && !col.hasDefault && !col.type.endsWith("[]")) {
      impacts.push(describeImpact.backfill(col.name));
    }
  }

  return { columns, impacts };
}

/**
 * Structural differences between two parsed schemas. Tables appear in
 * head order, then tables only present at base.
 */
export function diffTables(before: TableDef[], after: TableDef[]): TableChange[] {
  const prev = new Map(before.map((t) => [t.name, t]));
  const nextNames = new Set(after.map((t) => t.name));
  const changes: TableChange[] = [];

  for (const table of after) {
    const old = prev.get(table.name);
    if (!old) {
      changes.push({
        table: table.name,
        changeType: "New",
        columns: table.columns.map((c) => ({
          name: c.name,
          changeType: "Added",
          typeAfter: c.type,
        })),
        relations: table.relations,
        impacts: [],
      });
      continue;
    }
    const { columns, impacts } = diffColumns(old.columns, table.columns);
    const known = new Set(old.relations.map(relationKey));
    const relations = table.relations.filter((r) => !known.has(relationKey(r)));
    if (columns.length > 0 || relations.length > 0) {
      changes.push({ table: table.name, changeType: "Modified", columns, relations, impacts });
    }
  }

  for (const table of before) {
    if (nextNames.has(table.name)) continue;
    changes.push({
      table: table.name,
      changeType: "Deleted",
      columns: table.columns.map((c) => ({
        name: c.name,
        changeType: "Removed",
        typeBefore: c.type,
      })),
      relations: [],
      impacts: [describeImpact.droppedTable(table.name)],
    });
  }

  return changes;
}

/**
 * Attach migration information and summarize data impact. Reversible only
 * when the migration ships a down script; "unknown" when no migration was
 * found for the table.
 */
export function toSchemaDelta(change: TableChange, migration: MigrationRef | undefined): SchemaDelta {
  const delta: SchemaDelta = {
    table: change.table,
    changeType: change.changeType,
    columns: change.columns,
    relations: change.relations,
    reversible: migration ? migration.hasDown : "unknown",
    dataImpact: change.impacts.length > 0 ? change.impacts.join("; ") : "None",
  };
  if (migration) delta.migrationName = migration.name;
  return delta;
}
