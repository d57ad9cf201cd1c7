import type { ColumnDelta, RelationDescriptor } from "@diffscribe/model";
import type { TableChange } from "./differ.js";
import { describeImpact } from "./differ.js";

// ---------------------------------------------------------------------------
// DDL reader for migration files. Understands the statements migration tools
// emit for table and column changes; everything else is skipped.
// ---------------------------------------------------------------------------

const COLUMN_KEYWORDS = new Set([
  "NOT",
  "NULL",
  "DEFAULT",
  "PRIMARY",
  "REFERENCES",
  "UNIQUE",
  "CHECK",
  "CONSTRAINT",
  "GENERATED",
  "COLLATE",
  "AUTO_INCREMENT",
  "AUTOINCREMENT",
  "IDENTITY",
]);

const TABLE_CONSTRAINT = /^(CONSTRAINT|PRIMARY|UNIQUE|FOREIGN|CHECK|INDEX|KEY|EXCLUDE)\b/i;

function stripComments(sql: string): string {
  return sql.replace(/\/\*[\s\S]*?\*\//g, " ").replace(/--[^\n]*/g, " ");
}

/** Split on `sep` outside parentheses and quotes. */
function splitTopLevel(text: string, sep: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | undefined;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === "'" || ch === '"' || ch === "`") quote = ch;
    else if (ch === "(") depth++;
    else if (ch === ")") depth--;
    else if (ch === sep && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

/** `"public"."packages"` → `packages` */
export function unquoteIdentifier(raw: string): string {
  const last = raw.split(".").pop() ?? raw;
  return last.replace(/^["`[]|["`\]]$/g, "");
}

function identList(raw: string): string[] {
  return raw.split(",").map((s) => unquoteIdentifier(s.trim()));
}

const IDENT = String.raw`(?:"[^"]+"|\`[^\`]+\`|\[[^\]]+\]|[\w$]+)(?:\.(?:"[^"]+"|\`[^\`]+\`|\[[^\]]+\]|[\w$]+))?`;

const DROP_COLUMN = new RegExp(`^DROP\\s+(?:COLUMN\\s+)?(?:IF\\s+EXISTS\\s+)?(${IDENT})`, "i");
const ALTER_COLUMN = new RegExp(`^(?:ALTER|MODIFY)\\s+(?:COLUMN\\s+)?(${IDENT})\\s+(.*)$`, "is");

interface ColumnDefinition {
  name: string;
  type: string;
  notNull: boolean;
  hasDefault: boolean;
  reference?: RelationDescriptor | undefined;
}

function parseColumnDefinition(def: string): ColumnDefinition | undefined {
  const m = new RegExp(`^(${IDENT})\\s+(.*)$`, "s").exec(def.trim());
  if (!m?.[1] || m[2] === undefined) return undefined;
  const name = unquoteIdentifier(m[1]);
  const rest = m[2];

  const tokens = rest.split(/\s+/);
  const typeTokens: string[] = [];
  for (const token of tokens) {
    if (COLUMN_KEYWORDS.has(token.toUpperCase())) break;
    typeTokens.push(token);
  }

  const upper = rest.toUpperCase();
  const ref = new RegExp(`REFERENCES\\s+(${IDENT})\\s*\\(([^)]*)\\)`, "i").exec(rest);
  const column: ColumnDefinition = {
    name,
    type: typeTokens.join(" "),
    notNull: /\bNOT\s+NULL\b/.test(upper) || /\bPRIMARY\s+KEY\b/.test(upper),
    hasDefault:
      /\bDEFAULT\b/.test(upper) ||
      /\b(?:SERIAL|BIGSERIAL|SMALLSERIAL)\b/.test(upper) ||
      /\b(?:AUTO_INCREMENT|AUTOINCREMENT|IDENTITY)\b/.test(upper),
  };
  if (ref?.[1] && ref[2] !== undefined) {
    column.reference = {
      columns: [name],
      referencedTable: unquoteIdentifier(ref[1]),
      referencedColumns: identList(ref[2]),
    };
  }
  return column;
}

function parseForeignKey(def: string): RelationDescriptor | undefined {
  const m = new RegExp(
    `FOREIGN\\s+KEY\\s*\\(([^)]*)\\)\\s*REFERENCES\\s+(${IDENT})\\s*\\(([^)]*)\\)`,
    "i",
  ).exec(def);
  if (!m?.[1] || !m[2] || m[3] === undefined) return undefined;
  return {
    columns: identList(m[1]),
    referencedTable: unquoteIdentifier(m[2]),
    referencedColumns: identList(m[3]),
  };
}

class ChangeSet {
  private readonly tables = new Map<string, TableChange>();

  table(name: string, changeType: TableChange["changeType"] = "Modified"): TableChange {
    let change = this.tables.get(name);
    if (!change) {
      change = { table: name, changeType, columns: [], relations: [], impacts: [] };
      this.tables.set(name, change);
    } else if (changeType !== "Modified") {
      change.changeType = changeType;
    }
    return change;
  }

  list(): TableChange[] {
    return [...this.tables.values()];
  }
}

function createTable(changes: ChangeSet, table: string, body: string): void {
  const change = changes.table(table, "New");
  for (const item of splitTopLevel(body, ",")) {
    if (TABLE_CONSTRAINT.test(item)) {
      const fk = parseForeignKey(item);
      if (fk) change.relations.push(fk);
      continue;
    }
    const column = parseColumnDefinition(item);
    if (!column) continue;
    change.columns.push({ name: column.name, changeType: "Added", typeAfter: column.type });
    if (column.reference) change.relations.push(column.reference);
  }
}

function pushColumn(change: TableChange, delta: ColumnDelta, impact?: string): void {
  change.columns.push(delta);
  if (impact) change.impacts.push(impact);
}

function alterTable(changes: ChangeSet, table: string, actions: string): void {
  const change = changes.table(table);
  for (const action of splitTopLevel(actions, ",")) {
    let m: RegExpExecArray | null;

    if (/^ADD\s+(?:CONSTRAINT\s+\S+\s+)?FOREIGN\s+KEY\b/i.test(action)) {
      const fk = parseForeignKey(action);
      if (fk) change.relations.push(fk);
    } else if (/^ADD\s+(?:CONSTRAINT|PRIMARY|UNIQUE|CHECK|INDEX|KEY)\b/i.test(action)) {
      continue;
    } else if ((m = /^ADD\s+(?:COLUMN\s+)?(?:IF\s+NOT\s+EXISTS\s+)?(.*)$/is.exec(action))) {
      const column = parseColumnDefinition(m[1] ?? "");
      if (!column) continue;
      const backfill = column.notNull && !column.hasDefault;
      pushColumn(
        change,
        { name: column.name, changeType: "Added", typeAfter: column.type },
        backfill ? describeImpact.backfill(column.name) : undefined,
      );
      if (column.reference) change.relations.push(column.reference);
    } else if ((m = DROP_COLUMN.exec(action))) {
      if (/^DROP\s+(CONSTRAINT|INDEX|PRIMARY|FOREIGN)\b/i.test(action)) continue;
      const name = unquoteIdentifier(m[1] ?? "");
      pushColumn(change, { name, changeType: "Removed" }, describeImpact.droppedColumn(name));
    } else if ((m = ALTER_COLUMN.exec(action))) {
      const name = unquoteIdentifier(m[1] ?? "");
      const rest = (m[2] ?? "").trim();
      const type = /^(?:SET\s+DATA\s+)?TYPE\s+(.+?)(?:\s+USING\b.*)?$/is.exec(rest);
      if (type?.[1]) {
        pushColumn(
          change,
          { name, changeType: "Modified", typeAfter: type[1].trim() },
          describeImpact.conversion(name, undefined, type[1].trim()),
        );
      } else if (/^SET\s+NOT\s+NULL$/i.test(rest)) {
        pushColumn(change, { name, changeType: "Modified" }, describeImpact.notNull(name));
      } else {
        pushColumn(change, { name, changeType: "Modified" });
      }
    }
  }
}

/**
 * Read table-level changes out of a migration script, one entry per table
 * in order of first mention.
 */
export function parseSqlMigration(sql: string): TableChange[] {
  const changes = new ChangeSet();

  for (const raw of splitTopLevel(stripComments(sql), ";")) {
    const stmt = raw.replace(/\s+/g, " ").trim();
    let m: RegExpExecArray | null;

    if (
      (m = new RegExp(
        `^CREATE\\s+(?:TEMP(?:ORARY)?\\s+|UNLOGGED\\s+)?TABLE\\s+(?:IF\\s+NOT\\s+EXISTS\\s+)?(${IDENT})\\s*\\((.*)\\)[^)]*$`,
        "is",
      ).exec(stmt))
    ) {
      createTable(changes, unquoteIdentifier(m[1] ?? ""), m[2] ?? "");
    } else if (
      (m = new RegExp(
        `^ALTER\\s+TABLE\\s+(?:IF\\s+EXISTS\\s+)?(?:ONLY\\s+)?(${IDENT})\\s+(.*)$`,
        "is",
      ).exec(stmt))
    ) {
      alterTable(changes, unquoteIdentifier(m[1] ?? ""), m[2] ?? "");
    } else if ((m = /^DROP\s+TABLE\s+(?:IF\s+EXISTS\s+)?(.+?)(?:\s+(?:CASCADE|RESTRICT))?$/is.exec(stmt))) {
      for (const name of identList(m[1] ?? "")) {
        const change = changes.table(name, "Deleted");
        change.impacts.push(describeImpact.droppedTable(name));
      }
    }
  }

  return changes.list();
}
