// ajv@8 is CJS with a `export default` d.ts. Under NodeNext the default import
// is the whole `module.exports`, which also carries `.default` at runtime.
import _ajvImport from "ajv";
import type { ErrorObject } from "ajv";
import { DiffscribeError } from "./errors.js";
import { CATEGORIES, PRIORITY_ORDER } from "./types.js";
import type { RuleTable, RuleTableIssue } from "./types.js";

const Ajv = _ajvImport.default;

// ---------------------------------------------------------------------------
// Schema: a caller-supplied classification table is an ordered array of
// rules. Order is significant, so the schema never sorts or dedupes.
// ---------------------------------------------------------------------------

const RULE_TABLE_SCHEMA = {
  $schema: "http://json-schema.org/draft-07/schema#",
  title: "diffscribe classification rule table",
  type: "array",
  minItems: 1,
  maxItems: 500,
  items: {
    type: "object",
    required: ["category", "priority", "patterns"],
    additionalProperties: false,
    properties: {
      category: { type: "string", enum: [...CATEGORIES] },
      priority: { type: "string", enum: [...PRIORITY_ORDER] },
      patterns: {
        type: "array",
        minItems: 1,
        maxItems: 200,
        items: { type: "string", minLength: 1, maxLength: 1024 },
      },
      exclude: {
        type: "array",
        maxItems: 200,
        items: { type: "string", minLength: 1, maxLength: 1024 },
      },
    },
  },
} as const;

// Exported for tests that assert the schema stays in sync with the types.
export const RULE_TABLE_SCHEMA_OBJECT: unknown = RULE_TABLE_SCHEMA;

const ajv = new Ajv({ allErrors: true });
const _validate = ajv.compile<RuleTable>(RULE_TABLE_SCHEMA);

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

function toIssue(e: ErrorObject): RuleTableIssue {
  return {
    path: e.instancePath || "(root)",
    message: e.message ?? "unknown error",
    keyword: e.keyword,
  };
}

export class RuleTableValidationError extends DiffscribeError {
  readonly code = "INVALID_RULE_TABLE";
  readonly fatal = true;
  readonly issues: RuleTableIssue[];

  constructor(rawErrors: ErrorObject[], source?: string) {
    const MAX_INLINE = 5;
    const shown = rawErrors.slice(0, MAX_INLINE);
    const rest = rawErrors.length - shown.length;
    const summary = shown
      .map((e) => `${e.instancePath || "(root)"}: ${e.message ?? "unknown error"}`)
      .join("; ");
    const suffix = rest > 0 ? `; ... and ${rest} more error(s)` : "";
    const where = source ? ` in ${source}` : "";
    super(`Invalid rule table${where}: ${summary}${suffix}`);
    this.name = "RuleTableValidationError";
    this.issues = rawErrors.map(toIssue);
  }
}

/**
 * Validate a classification rule table and return it typed.
 * Throws {@link RuleTableValidationError} listing every issue.
 */
export function parseRuleTable(input: unknown, source?: string): RuleTable {
  if (!_validate(input)) {
    throw new RuleTableValidationError(_validate.errors ?? [], source);
  }
  return input;
}
