import { EmptyDiffError } from "@diffscribe/model";
import type { FileChange, RefInfo, SourceReader } from "@diffscribe/model";
import type { ChangeSource } from "./source.js";
import { parseUnifiedDiff } from "./unified-diff.js";
import { withDeadline } from "./deadline.js";
import { DEFAULT_TIMEOUT_MS } from "./config.js";
import type { Ignore } from "./config.js";

// ---------------------------------------------------------------------------
// CollectOptions / Collection
// ---------------------------------------------------------------------------

export interface CollectOptions {
  base: string;
  head: string;
  /** Restrict `scopedDiff` to these path prefixes */
  pathPrefixes?: string[] | undefined;
  /** Deadline for the whole collection step (default: 60s) */
  timeoutMs?: number | undefined;
  /** Paths this matcher ignores are dropped from the change set */
  ignore?: Ignore | undefined;
}

export interface Collection {
  base: RefInfo;
  head: RefInfo;
  /** One entry per changed path, in name-status order */
  changes: FileChange[];
  /** Full diff between the refs */
  rawDiff: string;
  /** Diff restricted to the requested path prefixes (full diff when none) */
  scopedDiff: string;
  reader: SourceReader;
}

/**
 * Query the source for everything that changed between two refs.
 *
 * Throws RefNotFoundError when a ref does not resolve, EmptyDiffError when
 * nothing changed, and CollectTimeoutError when the deadline passes. A
 * timeout never yields a partial collection.
 */
export async function collectChanges(
  source: ChangeSource,
  options: CollectOptions,
): Promise<Collection> {
  const {
    base: baseRef,
    head: headRef,
    pathPrefixes = [],
    timeoutMs = DEFAULT_TIMEOUT_MS,
    ignore,
  } = options;

  return withDeadline(timeoutMs, async (signal) => {
    const [base, head] = await Promise.all([
      source.resolveRef(baseRef, signal),
      source.resolveRef(headRef, signal),
    ]);

    if (base.sha !== undefined && base.sha === head.sha) {
      throw new EmptyDiffError(baseRef, headRef);
    }

    // The three queries touch disjoint output and are joined before use
    const [entries, rawDiff, scopedDiff] = await Promise.all([
      source.listChanges(base, head, signal),
      source.diff(base, head, [], signal),
      pathPrefixes.length > 0
        ? source.diff(base, head, pathPrefixes, signal)
        : Promise.resolve<string | undefined>(undefined),
    ]);

    const kept = entries.filter(
      (e) =>
        !ignore ||
        !(ignore.ignores(e.path) || (e.oldPath !== undefined && ignore.ignores(e.oldPath))),
    );
    if (kept.length === 0) {
      throw new EmptyDiffError(baseRef, headRef);
    }

    const patches = new Map(parseUnifiedDiff(rawDiff).map((f) => [f.path, f.patch]));
    const changes: FileChange[] = kept.map((e) => ({
      ...e,
      patch: patches.get(e.path) ?? "",
    }));

    return {
      base,
      head,
      changes,
      rawDiff,
      scopedDiff: scopedDiff ?? rawDiff,
      reader: source.reader(base, head),
    };
  });
}
