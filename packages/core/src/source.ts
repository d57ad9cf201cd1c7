import type { FileStatus, RefInfo, SourceReader } from "@diffscribe/model";

// ---------------------------------------------------------------------------
// ChangeSource — the contract every input mode implements. The collector
// drives it; sources never decide what counts as "no changes".
// ---------------------------------------------------------------------------

export interface ChangeEntry {
  path: string;
  oldPath?: string | undefined;
  status: FileStatus;
}

export interface ChangeSource {
  /** e.g. "git" or "patch" — shown in logs */
  readonly kind: string;
  /** Throws RefNotFoundError when the reference cannot be resolved */
  resolveRef(ref: string, signal?: AbortSignal): Promise<RefInfo>;
  /** Name-status listing with rename detection */
  listChanges(base: RefInfo, head: RefInfo, signal?: AbortSignal): Promise<ChangeEntry[]>;
  /** Full textual diff, restricted to `pathPrefixes` when any are given */
  diff(
    base: RefInfo,
    head: RefInfo,
    pathPrefixes: readonly string[],
    signal?: AbortSignal,
  ): Promise<string>;
  /** File contents bound to the resolved refs */
  reader(base: RefInfo, head: RefInfo): SourceReader;
}

export function matchesPrefix(path: string, prefixes: readonly string[]): boolean {
  if (prefixes.length === 0) return true;
  return prefixes.some((prefix) => {
    const p = prefix.replace(/^\.\//, "").replace(/\/+$/, "");
    return p === "" || path === p || path.startsWith(p + "/");
  });
}
