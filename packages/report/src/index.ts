// @diffscribe/report — QA changelog and developer README

export { renderQaChangelog, QA_HEADINGS } from "./qa-changelog.js";
export { renderDevReadme } from "./dev-readme.js";
export { parseQaChangelog, ChangelogParseError } from "./parse.js";
export type { ParsedQaChangelog } from "./parse.js";
export { PLACEHOLDER, escapeCell, splitRow } from "./markdown.js";
