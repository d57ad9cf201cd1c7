import { CATEGORIES, CATEGORY_LABELS, PRIORITY_ORDER } from "@diffscribe/model";
import type {
  Category,
  ChangeRecord,
  EndpointDelta,
  FieldDiff,
  FileStatus,
  HttpMethod,
  Priority,
  TestCase,
} from "@diffscribe/model";
import {
  findHeading,
  listValue,
  numberedListValue,
  optionalValue,
  readTable,
  stringValue,
} from "./markdown.js";
import type { ParsedTable } from "./markdown.js";
import { ENDPOINT_SECTIONS, QA_HEADINGS } from "./qa-changelog.js";
import { endpointName, parseBreaking, parseFieldSpec } from "./format.js";

export interface ParsedQaChangelog {
  changes: ChangeRecord[];
  endpoints: EndpointDelta[];
  testCases: TestCase[];
}

export class ChangelogParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChangelogParseError";
  }
}

// ---------------------------------------------------------------------------
// Value decoding
// ---------------------------------------------------------------------------

const FILE_STATUSES: readonly FileStatus[] = ["Added", "Modified", "Deleted", "Renamed"];
const HTTP_METHODS: readonly HttpMethod[] = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
  "OPTIONS",
  "ANY",
];

function oneOf<T extends string>(values: readonly T[], text: string, what: string): T {
  const found = values.find((v) => v === text);
  if (found === undefined) throw new ChangelogParseError(`Unknown ${what}: ${text}`);
  return found;
}

function categoryFromLabel(label: string): Category {
  const found = CATEGORIES.find((c) => CATEGORY_LABELS[c] === label);
  if (found === undefined) throw new ChangelogParseError(`Unknown category: ${label}`);
  return found;
}

function sectionTable(lines: readonly string[], heading: string): ParsedTable {
  const at = findHeading(lines, heading);
  const table = at === -1 ? undefined : readTable(lines, at + 1);
  if (!table) throw new ChangelogParseError(`Missing table under "${heading}"`);
  return table;
}

/** Cells of a row keyed by header. */
function rowReader(table: ParsedTable, row: string[]): (header: string) => string {
  return (header) => {
    const index = table.headers.indexOf(header);
    const value = index === -1 ? undefined : row[index];
    if (value === undefined) throw new ChangelogParseError(`Row is missing the "${header}" column`);
    return value;
  };
}

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

function parseChanges(lines: readonly string[]): ChangeRecord[] {
  const table = sectionTable(lines, QA_HEADINGS.files);
  return table.rows.map((row) => {
    const get = rowReader(table, row);
    const oldPath = optionalValue(get("Previous Path"));
    return {
      path: get("File"),
      ...(oldPath !== undefined ? { oldPath } : {}),
      status: oneOf(FILE_STATUSES, get("Status"), "status"),
      category: categoryFromLabel(get("Category")),
      priority: oneOf<Priority>(PRIORITY_ORDER, get("Priority"), "priority"),
    };
  });
}

function parseEndpoints(lines: readonly string[]): EndpointDelta[] {
  const endpoints: EndpointDelta[] = [];
  for (const [changeType, heading] of ENDPOINT_SECTIONS) {
    const table = sectionTable(lines, heading);
    for (const row of table.rows) {
      const get = rowReader(table, row);
      const authChange = optionalValue(get("Auth Change"));
      endpoints.push({
        file: get("File"),
        method: oneOf(HTTP_METHODS, get("Method"), "method"),
        path: get("Path"),
        changeType,
        requestFieldDiffs: [],
        responseFieldDiffs: [],
        ...(authChange !== undefined ? { authChange } : {}),
        breaking: parseBreaking(get("Breaking")),
        breakingReasons: listValue(get("Reasons")),
      });
    }
  }

  const fields = sectionTable(lines, QA_HEADINGS.fieldChanges);
  for (const row of fields.rows) {
    const get = rowReader(fields, row);
    const name = get("Endpoint");
    const file = get("File");
    const target = endpoints.find((e) => endpointName(e) === name && e.file === file);
    if (!target) throw new ChangelogParseError(`Field change for unlisted endpoint ${name}`);

    const field = get("Field");
    const before = optionalValue(get("Before"));
    const after = optionalValue(get("After"));
    const diff: FieldDiff = {
      field,
      before: before === undefined ? null : parseFieldSpec(field, before),
      after: after === undefined ? null : parseFieldSpec(field, after),
    };
    const location = get("Location");
    if (location === "Request") target.requestFieldDiffs.push(diff);
    else if (location === "Response") target.responseFieldDiffs.push(diff);
    else throw new ChangelogParseError(`Unknown field location: ${location}`);
  }
  return endpoints;
}

function parseTestCases(lines: readonly string[]): TestCase[] {
  const table = sectionTable(lines, QA_HEADINGS.testCases);
  return table.rows.map((row) => {
    const get = rowReader(table, row);
    const endpoint = optionalValue(get("Endpoint"));
    return {
      id: get("ID"),
      priority: oneOf<Priority>(PRIORITY_ORDER, get("Priority"), "priority"),
      title: get("Title"),
      ...(endpoint !== undefined ? { endpoint } : {}),
      preconditions: stringValue(get("Preconditions")),
      steps: numberedListValue(get("Steps")),
      expectedResult: stringValue(get("Expected Result")),
      edgeCases: listValue(get("Edge Cases")),
    };
  });
}

/**
 * Recover change records, endpoint deltas and test cases from a rendered
 * QA changelog.
 */
export function parseQaChangelog(markdown: string): ParsedQaChangelog {
  const lines = markdown.split(/\r?\n/);
  return {
    changes: parseChanges(lines),
    endpoints: parseEndpoints(lines),
    testCases: parseTestCases(lines),
  };
}
