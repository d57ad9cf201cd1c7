// apps/cli/src/pipeline.ts — collect → classify → analyze → synthesize → render
import { EmptyDiffError } from "@diffscribe/model";
import type { AnalysisReport, RefInfo, RuleTable } from "@diffscribe/model";
import { classifyChanges, collectChanges, DEFAULT_RULES } from "@diffscribe/core";
import type { ChangeSource, DiffscribeConfig, Ignore } from "@diffscribe/core";
import { analyzeChanges, synthesizeTestCases } from "@diffscribe/analyzer";
import { renderDevReadme, renderQaChangelog } from "@diffscribe/report";

export type PipelineStage = "collect" | "classify" | "analyze" | "render";

export interface PipelineOptions {
  source: ChangeSource;
  base: string;
  head: string;
  config?: DiffscribeConfig | undefined;
  rules?: RuleTable | undefined;
  ignore?: Ignore | undefined;
  /** Overrides `config.paths` */
  pathPrefixes?: string[] | undefined;
  /** Overrides `config.timeout_ms` */
  timeoutMs?: number | undefined;
  onStage?: ((stage: PipelineStage) => void) | undefined;
}

export interface PipelineResult {
  report: AnalysisReport;
  qaChangelog: string;
  devReadme: string;
  /** Diff restricted to the path prefixes; empty for an empty change set */
  scopedDiff: string;
}

export const DEFAULT_TITLE = "QA Changelog";

function emptyReport(title: string, base: RefInfo, head: RefInfo): AnalysisReport {
  return {
    title,
    base,
    head,
    empty: true,
    changes: [],
    endpoints: [],
    schemas: [],
    dependencies: [],
    testCases: [],
    manualReview: [],
  };
}

function render(report: AnalysisReport, scopedDiff: string): PipelineResult {
  return {
    report,
    qaChangelog: renderQaChangelog(report),
    devReadme: renderDevReadme(report),
    scopedDiff,
  };
}

/**
 * Run one analysis between two refs. Collection errors other than an empty
 * diff propagate; everything after collection degrades per file.
 */
export async function runAnalysis(options: PipelineOptions): Promise<PipelineResult> {
  const { source, base, head, config = {}, onStage } = options;
  const title = config.title ?? DEFAULT_TITLE;

  onStage?.("collect");
  const collection = await collectChanges(source, {
    base,
    head,
    pathPrefixes: options.pathPrefixes ?? config.paths,
    timeoutMs: options.timeoutMs ?? config.timeout_ms,
    ignore: options.ignore,
  }).catch((err: unknown) => {
    if (err instanceof EmptyDiffError) return undefined;
    throw err;
  });
  if (!collection) {
    onStage?.("render");
    return render(emptyReport(title, { ref: base }, { ref: head }), "");
  }

  onStage?.("classify");
  const changes = classifyChanges(collection.changes, options.rules ?? DEFAULT_RULES);

  onStage?.("analyze");
  const analysis = await analyzeChanges(changes, collection.reader, {
    authGuards: config.auth_guards,
  });
  const testCases = synthesizeTestCases(analysis.endpoints, changes, {
    invariants: config.invariants,
  });

  onStage?.("render");
  return render(
    {
      title,
      base: collection.base,
      head: collection.head,
      empty: false,
      changes,
      endpoints: analysis.endpoints,
      schemas: analysis.schemas,
      dependencies: analysis.dependencies,
      testCases,
      manualReview: analysis.manualReview,
    },
    collection.scopedDiff,
  );
}
