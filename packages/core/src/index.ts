// @diffscribe/core — change sources, diff collection and path classification

export { collectChanges } from "./collector.js";
export type { CollectOptions, Collection } from "./collector.js";

export { withDeadline } from "./deadline.js";

export type { ChangeSource, ChangeEntry } from "./source.js";
export { matchesPrefix } from "./source.js";

export { GitSource, parseNameStatus } from "./sources/git.js";
export type { GitClient, GitClientFactory, GitSourceOptions } from "./sources/git.js";

export { PatchSource } from "./sources/patch.js";
export type { PatchSourceOptions } from "./sources/patch.js";

export { parseUnifiedDiff, reconstructFromHunks } from "./unified-diff.js";
export type { ParsedFileDiff } from "./unified-diff.js";

export { classifyChanges, classifyPath, findRule } from "./classifier.js";
export { DEFAULT_RULES } from "./rules.js";

export {
  loadConfig,
  loadIgnore,
  loadRuleTable,
  CONFIG_FILE,
  IGNORE_FILE,
  DEFAULT_TIMEOUT_MS,
} from "./config.js";
export type { DiffscribeConfig, Ignore } from "./config.js";
