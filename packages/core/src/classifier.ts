import { minimatch } from "minimatch";
import type {
  Category,
  ChangeRecord,
  ClassificationRule,
  FileChange,
  Priority,
  RuleTable,
} from "@diffscribe/model";
import { DEFAULT_RULES } from "./rules.js";

const MATCH_OPTIONS = { dot: true, nocase: true } as const;

export const FALLBACK_CATEGORY: Category = "Other";
export const FALLBACK_PRIORITY: Priority = "Low";

function matchesAny(path: string, patterns: readonly string[]): boolean {
  return patterns.some((p) => minimatch(path, p, MATCH_OPTIONS));
}

function ruleMatches(path: string, rule: ClassificationRule): boolean {
  if (!matchesAny(path, rule.patterns)) return false;
  return !(rule.exclude && matchesAny(path, rule.exclude));
}

/**
 * Index of the first rule that selects `path`, or -1. Rules are tried in
 * table order.
 */
export function findRule(path: string, rules: RuleTable = DEFAULT_RULES): number {
  return rules.findIndex((rule) => ruleMatches(path, rule));
}

export function classifyPath(
  path: string,
  rules: RuleTable = DEFAULT_RULES,
): { category: Category; priority: Priority } {
  const rule = rules[findRule(path, rules)];
  if (!rule) {
    return { category: FALLBACK_CATEGORY, priority: FALLBACK_PRIORITY };
  }
  return { category: rule.category, priority: rule.priority };
}

/**
 * Assign every changed file exactly one category. Output order follows the
 * input; records are frozen.
 */
export function classifyChanges(
  changes: readonly FileChange[],
  rules: RuleTable = DEFAULT_RULES,
): ChangeRecord[] {
  return changes.map((change) => {
    const { category, priority } = classifyPath(change.path, rules);
    const record: ChangeRecord = {
      path: change.path,
      status: change.status,
      category,
      priority,
      ...(change.oldPath !== undefined ? { oldPath: change.oldPath } : {}),
    };
    return Object.freeze(record);
  });
}
