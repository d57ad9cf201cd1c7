import type { ColumnDef, RelationDef, TableDef } from "../types.js";

// ---------------------------------------------------------------------------
// Prisma schema reader: models only; datasource/generator/enum blocks are
// skipped. Relation-object fields (`author User @relation(...)`) are not
// columns; their `fields`/`references` become relations.
// ---------------------------------------------------------------------------

export class PrismaSyntaxError extends Error {
  constructor(readonly line: number, message: string) {
    super(`line ${line}: ${message}`);
    this.name = "PrismaSyntaxError";
  }
}

interface RawField {
  name: string;
  type: string;
  baseType: string;
  nullable: boolean;
  attributes: string;
}

interface RawModel {
  name: string;
  mappedName?: string;
  fields: RawField[];
}

const BLOCK_START = /^(model|enum|datasource|generator|type|view)\s+(\w+)\s*\{\s*$/;
const FIELD = /^(\w+)\s+(\w+)(\[\])?(\?)?\s*(.*)$/;

function stripComment(line: string): string {
  const idx = line.indexOf("//");
  return (idx === -1 ? line : line.slice(0, idx)).trim();
}

function mapArg(attributes: string, attr: "@map" | "@@map"): string | undefined {
  const re =
    attr === "@map"
      ? /(?:^|\s)@map\(\s*(?:name:\s*)?"([^"]+)"/
      : /@@map\(\s*(?:name:\s*)?"([^"]+)"/;
  return re.exec(attributes)?.[1];
}

function listArg(attributes: string, key: "fields" | "references"): string[] {
  const m = new RegExp(`${key}:\\s*\\[([^\\]]*)\\]`).exec(attributes);
  if (!m?.[1]) return [];
  return m[1]
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function readModels(source: string): RawModel[] {
  const models: RawModel[] = [];
  let current: RawModel | undefined;
  let skipping = false;

  const lines = source.split(/\r?\n/);
  for (const [i, raw] of lines.entries()) {
    const line = stripComment(raw);
    const lineNo = i + 1;
    if (line.length === 0) continue;

    if (!current && !skipping) {
      const start = BLOCK_START.exec(line);
      if (!start) throw new PrismaSyntaxError(lineNo, `unexpected \`${line}\``);
      if (start[1] === "model" && start[2]) {
        current = { name: start[2], fields: [] };
      } else {
        skipping = true;
      }
      continue;
    }

    if (line === "}") {
      if (current) models.push(current);
      current = undefined;
      skipping = false;
      continue;
    }
    if (skipping || !current) continue;

    if (line.startsWith("@@")) {
      const mapped = mapArg(line, "@@map");
      if (mapped) current.mappedName = mapped;
      continue;
    }

    const field = FIELD.exec(line);
    if (!field?.[1] || !field[2]) {
      throw new PrismaSyntaxError(lineNo, `cannot read field \`${line}\``);
    }
    const list = field[3] ?? "";
    const optional = field[4] ?? "";
    current.fields.push({
      name: field[1],
      type: `${field[2]}${list}${optional}`,
      baseType: field[2],
      nullable: optional === "?",
      attributes: field[5] ?? "",
    });
  }

  if (current || skipping) {
    throw new PrismaSyntaxError(lines.length, "unterminated block");
  }
  return models;
}

/** Parse a schema.prisma file into table definitions, in declaration order. */
export function parsePrismaSchema(source: string): TableDef[] {
  const models = readModels(source);
  const tableOf = new Map(models.map((m) => [m.name, m.mappedName ?? m.name]));
  const columnsOf = new Map(
    models.map((m) => [
      m.name,
      new Map(m.fields.map((f) => [f.name, mapArg(f.attributes, "@map") ?? f.name])),
    ]),
  );

  return models.map((model): TableDef => {
    const columnOf = columnsOf.get(model.name) ?? new Map<string, string>();
    const columns: ColumnDef[] = [];
    const relations: RelationDef[] = [];

    for (const field of model.fields) {
      const target = tableOf.get(field.baseType);
      if (target !== undefined) {
        const fields = listArg(field.attributes, "fields");
        if (fields.length > 0) {
          relations.push({
            columns: fields.map((f) => columnOf.get(f) ?? f),
            referencedTable: target,
            referencedColumns: listArg(field.attributes, "references").map(
              (f) => columnsOf.get(field.baseType)?.get(f) ?? f,
            ),
          });
        }
        continue;
      }
      columns.push({
        name: columnOf.get(field.name) ?? field.name,
        type: field.type,
        nullable: field.nullable,
        hasDefault: /@default\(|@updatedAt\b/.test(field.attributes),
      });
    }

    return { name: tableOf.get(model.name) ?? model.name, columns, relations };
  });
}
