// apps/cli/src/commands/analyze.ts — `diffscribe analyze` command handler
import { Command } from "commander";
import { resolve, sep, isAbsolute, join } from "node:path";
import { readFile, writeFile } from "node:fs/promises";
import { isDiffscribeError } from "@diffscribe/model";
import type { RuleTable } from "@diffscribe/model";
import { GitSource, PatchSource, loadConfig, loadIgnore, loadRuleTable } from "@diffscribe/core";
import type { ChangeSource } from "@diffscribe/core";
import { runAnalysis } from "../pipeline.js";
import type { PipelineStage } from "../pipeline.js";
import { createSpinner } from "../ui/spinner.js";
import { printSummary } from "../output/summary.js";
import { formatJson } from "../output/json.js";

interface AnalyzeCommandOpts {
  repo: string;
  patch?: string;
  beforeDir?: string;
  afterDir?: string;
  rules?: string;
  config?: string;
  path?: string[];
  qaOut?: string;
  readmeOut?: string;
  stdout?: boolean;
  json?: boolean;
  timeout?: string;
  verbose?: boolean;
  quiet?: boolean;
  color: boolean;
}

export const DEFAULT_QA_OUT = "QA_CHANGELOG.md";
export const DEFAULT_README_OUT = "DEV_README.md";

const STAGE_TEXT: Record<PipelineStage, string> = {
  collect: "Collecting changes…",
  classify: "Classifying files…",
  analyze: "Diffing endpoints and schemas…",
  render: "Rendering reports…",
};

class UsageError extends Error {}

function withinCwd(path: string): string {
  const resolved = resolve(path);
  const base = resolve(process.cwd());
  if (!resolved.startsWith(base + sep) && resolved !== base) {
    throw new UsageError(`Output path must be within the current working directory: ${path}`);
  }
  return resolved;
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new UsageError(`--timeout must be a positive integer (ms), got "${value}"`);
  }
  return ms;
}

async function buildSource(opts: AnalyzeCommandOpts, root: string): Promise<ChangeSource> {
  if (opts.patch === undefined) {
    if (opts.beforeDir !== undefined || opts.afterDir !== undefined) {
      throw new UsageError("--before-dir and --after-dir require --patch");
    }
    return new GitSource({ root });
  }
  const patchText = await readFile(resolve(opts.patch), "utf-8");
  return new PatchSource(patchText, {
    baseDir: opts.beforeDir !== undefined ? resolve(opts.beforeDir) : undefined,
    headDir: opts.afterDir !== undefined ? resolve(opts.afterDir) : undefined,
  });
}

export const analyzeCommand = new Command("analyze")
  .description("Compare two refs and write a QA changelog and a developer README.")
  .argument("[base]", "Base ref", "main")
  .argument("[head]", "Head ref", "HEAD")
  .option("--repo <dir>", "Repository to analyze", ".")
  .option("--patch <file>", "Read the change set from a unified diff instead of git")
  .option("--before-dir <dir>", "Snapshot of files at base (with --patch)")
  .option("--after-dir <dir>", "Snapshot of files at head (with --patch)")
  .option("--rules <file>", "Classification rule table (JSON or YAML)")
  .option("--config <file>", "Path to .diffscribe.yml")
  .option("--path <prefixes...>", "Path prefixes for the scoped diff")
  .option("--qa-out <file>", `QA changelog output (default: ${DEFAULT_QA_OUT})`)
  .option("--readme-out <file>", `Developer README output (default: ${DEFAULT_README_OUT})`)
  .option("--stdout", "Print both documents to stdout instead of writing files")
  .option("--json", "Print the report model as JSON to stdout")
  .option("--timeout <ms>", "Deadline for collecting changes")
  .option("--verbose", "Print manual-review details and the scoped diff size")
  .option("--quiet", "Suppress progress and summary output")
  .option("--no-color", "Disable colored output")
  .action(async (base: string, head: string, opts: AnalyzeCommandOpts) => {
    const quiet = opts.quiet ?? false;
    const toStdout = (opts.stdout ?? false) || (opts.json ?? false);
    const s = createSpinner({ enabled: !quiet && !toStdout, color: opts.color });

    let timeoutMs: number | undefined;
    let source: ChangeSource;
    const root = resolve(opts.repo);
    try {
      timeoutMs = parseTimeout(opts.timeout);
      source = await buildSource(opts, root);
    } catch (err) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = err instanceof UsageError ? 2 : 1;
      return;
    }

    s.start(STAGE_TEXT.collect);
    try {
      const config = await loadConfig(root, opts.config);
      const rulesFile =
        opts.rules ??
        (config.rules_file !== undefined && !isAbsolute(config.rules_file)
          ? join(root, config.rules_file)
          : config.rules_file);
      const rules: RuleTable | undefined =
        rulesFile !== undefined ? await loadRuleTable(rulesFile) : undefined;
      const ignore = await loadIgnore(root, config.ignore);

      const result = await runAnalysis({
        source,
        base,
        head,
        config,
        rules,
        ignore,
        pathPrefixes: opts.path,
        timeoutMs,
        onStage: (stage) => s.update(STAGE_TEXT[stage]),
      });
      const { report } = result;

      if (report.empty) s.warn(`No changes detected between ${base} and ${head}`);
      else s.succeed(`Analyzed ${report.changes.length} changed files`);

      if (opts.verbose) {
        for (const item of report.manualReview) {
          console.error(`   ${item.path}: ${item.reason}`);
        }
        const scopedLines = result.scopedDiff.length === 0 ? 0 : result.scopedDiff.split("\n").length;
        console.error(`   scoped diff: ${scopedLines} lines`);
      }

      if (opts.json) {
        process.stdout.write(formatJson(report));
      } else if (opts.stdout) {
        process.stdout.write(`${result.qaChangelog}\n${result.devReadme}`);
      } else {
        const qaPath = withinCwd(opts.qaOut ?? config.output?.qa ?? DEFAULT_QA_OUT);
        const readmePath = withinCwd(opts.readmeOut ?? config.output?.readme ?? DEFAULT_README_OUT);
        await Promise.all([
          writeFile(qaPath, result.qaChangelog, "utf8"),
          writeFile(readmePath, result.devReadme, "utf8"),
        ]);
        if (!quiet) {
          printSummary(report, opts.color);
          console.log(`\n✓ QA changelog written to ${qaPath}`);
          console.log(`✓ Developer README written to ${readmePath}`);
        }
      }
      process.exitCode = 0;
    } catch (err) {
      s.fail("Analysis failed");
      // Errors go to stderr regardless of --quiet
      const prefix = isDiffscribeError(err) ? err.name : "Error";
      console.error(`\n${prefix}: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = err instanceof UsageError ? 2 : 1;
    }
  });
