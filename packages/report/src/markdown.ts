// ---------------------------------------------------------------------------
// Markdown table primitives shared by the renderers and the parser
// ---------------------------------------------------------------------------

/** Cell shown for absent values and in the placeholder row of empty tables. */
export const PLACEHOLDER = "—";

const LIST_SEPARATOR = "<br>";

/** Escape `\` and `|` so the cell survives a table row. */
export function escapeCell(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export function cell(value: string | undefined): string {
  return value === undefined || value === "" ? PLACEHOLDER : escapeCell(value);
}

export function listCell(items: readonly string[]): string {
  return items.length === 0 ? PLACEHOLDER : items.map(escapeCell).join(LIST_SEPARATOR);
}

export function numberedListCell(items: readonly string[]): string {
  return listCell(items.map((item, i) => `${i + 1}. ${item}`));
}

export function renderTable(headers: readonly string[], rows: readonly string[][]): string[] {
  const line = (cells: readonly string[]) => `| ${cells.join(" | ")} |`;
  const body = rows.length > 0 ? rows : [headers.map(() => PLACEHOLDER)];
  return [line(headers), `|${headers.map(() => "---").join("|")}|`, ...body.map(line)];
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Split a table row into unescaped, trimmed cells. Returns undefined for
 * lines that are not table rows.
 */
export function splitRow(line: string): string[] | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith("|")) return undefined;

  const cells: string[] = [];
  let current = "";
  for (let i = 1; i < trimmed.length; i++) {
    const ch = trimmed[i];
    if (ch === "\\" && i + 1 < trimmed.length) {
      current += trimmed[i + 1];
      i++;
    } else if (ch === "|") {
      cells.push(current.trim());
      current = "";
    } else {
      current += ch;
    }
  }
  if (current.trim().length > 0) cells.push(current.trim());
  return cells;
}

export interface ParsedTable {
  headers: string[];
  /** Data rows, placeholder row excluded */
  rows: string[][];
}

const isSeparator = (cells: string[]) => cells.every((c) => /^:?-{3,}:?$/.test(c));
const isPlaceholderRow = (cells: string[]) => cells.every((c) => c === PLACEHOLDER);

/** Read the first table at or after `start`, stopping at the next heading. */
export function readTable(lines: readonly string[], start: number): ParsedTable | undefined {
  let i = start;
  while (i < lines.length && splitRow(lines[i] ?? "") === undefined) {
    if (i > start && /^#{1,6}\s/.test(lines[i] ?? "")) return undefined;
    i++;
  }
  const headers = splitRow(lines[i] ?? "");
  const separator = splitRow(lines[i + 1] ?? "");
  if (!headers || !separator || !isSeparator(separator)) return undefined;

  const rows: string[][] = [];
  for (let j = i + 2; j < lines.length; j++) {
    const cells = splitRow(lines[j] ?? "");
    if (!cells) break;
    if (!isPlaceholderRow(cells)) rows.push(cells);
  }
  return { headers, rows };
}

/** Index of the heading line with exactly this text, or -1. */
export function findHeading(lines: readonly string[], heading: string, from = 0): number {
  for (let i = from; i < lines.length; i++) {
    if (lines[i] === heading) return i;
  }
  return -1;
}

export function optionalValue(text: string): string | undefined {
  return text === PLACEHOLDER ? undefined : text;
}

export function stringValue(text: string): string {
  return text === PLACEHOLDER ? "" : text;
}

export function listValue(text: string): string[] {
  return text === PLACEHOLDER ? [] : text.split(LIST_SEPARATOR);
}

export function numberedListValue(text: string): string[] {
  return listValue(text).map((item) => item.replace(/^\d+\. /, ""));
}
