import { simpleGit } from "simple-git";
import type { SimpleGitOptions } from "simple-git";
import { RefNotFoundError } from "@diffscribe/model";
import type { FileStatus, RefInfo, Side, SourceReader } from "@diffscribe/model";
import type { ChangeEntry, ChangeSource } from "../source.js";

// ---------------------------------------------------------------------------
// GitClient — the slice of simple-git the source needs. Tests pass a stub.
// ---------------------------------------------------------------------------

export interface GitClient {
  revparse(options: string[]): Promise<string>;
  diff(options: string[]): Promise<string>;
  show(options: string[]): Promise<string>;
}

export type GitClientFactory = (signal?: AbortSignal) => GitClient;

export interface GitSourceOptions {
  /** Repository working directory */
  root: string;
  /** Kill a git process that produces no output for this long */
  blockTimeoutMs?: number | undefined;
  /** Replaces simple-git, e.g. with an in-memory stub */
  client?: GitClientFactory | undefined;
}

const STATUS_BY_LETTER: Record<string, FileStatus> = {
  A: "Added",
  M: "Modified",
  D: "Deleted",
  R: "Renamed",
  // Copies and type changes have no status of their own
  C: "Added",
  T: "Modified",
};

// Ignore color.diff and diff.external from the user's git config
const PLAIN_DIFF = ["--no-color", "--no-ext-diff"];

function unquote(path: string): string {
  if (path.startsWith('"') && path.endsWith('"')) {
    return path.slice(1, -1).replace(/\\(["\\])/g, "$1");
  }
  return path;
}

/**
 * Parse `git diff --name-status -M` output. Unknown status letters
 * (e.g. "U" for unmerged) are reported as Modified.
 */
export function parseNameStatus(output: string): ChangeEntry[] {
  const entries: ChangeEntry[] = [];
  for (const line of output.split(/\r?\n/)) {
    if (line.trim().length === 0) continue;
    const [code = "", first = "", second] = line.split("\t");
    const status = STATUS_BY_LETTER[code.charAt(0)] ?? "Modified";

    if (second !== undefined) {
      // R100\told\tnew, C075\tsrc\tcopy
      entries.push(
        status === "Renamed"
          ? { path: unquote(second), oldPath: unquote(first), status }
          : { path: unquote(second), status },
      );
    } else {
      entries.push({ path: unquote(first), status });
    }
  }
  return entries;
}

function refOf(info: RefInfo): string {
  return info.sha ?? info.ref;
}

export class GitSource implements ChangeSource {
  readonly kind = "git";
  private readonly factory: GitClientFactory;

  constructor(options: GitSourceOptions) {
    const { root, blockTimeoutMs } = options;
    this.factory =
      options.client ??
      ((signal) => {
        const gitOptions: Partial<SimpleGitOptions> = { baseDir: root };
        if (signal) gitOptions.abort = signal;
        if (blockTimeoutMs !== undefined) {
          gitOptions.timeout = { block: blockTimeoutMs };
        }
        return simpleGit(gitOptions);
      });
  }

  async resolveRef(ref: string, signal?: AbortSignal): Promise<RefInfo> {
    try {
      const sha = await this.factory(signal).revparse([
        "--verify",
        "--quiet",
        `${ref}^{commit}`,
      ]);
      const trimmed = sha.trim();
      if (trimmed.length === 0) throw new Error("empty revparse output");
      return { ref, sha: trimmed };
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new RefNotFoundError(ref, err);
    }
  }

  async listChanges(
    base: RefInfo,
    head: RefInfo,
    signal?: AbortSignal,
  ): Promise<ChangeEntry[]> {
    const output = await this.factory(signal).diff([
      ...PLAIN_DIFF,
      "--name-status",
      "-M",
      refOf(base),
      refOf(head),
    ]);
    return parseNameStatus(output);
  }

  async diff(
    base: RefInfo,
    head: RefInfo,
    pathPrefixes: readonly string[],
    signal?: AbortSignal,
  ): Promise<string> {
    const args = [...PLAIN_DIFF, "-M", refOf(base), refOf(head)];
    if (pathPrefixes.length > 0) args.push("--", ...pathPrefixes);
    return this.factory(signal).diff(args);
  }

  reader(base: RefInfo, head: RefInfo): SourceReader {
    const client = this.factory();
    return {
      async read(side: Side, path: string): Promise<string | undefined> {
        const ref = refOf(side === "base" ? base : head);
        try {
          return await client.show([`${ref}:${path}`]);
        } catch {
          // Path does not exist at that revision
          return undefined;
        }
      },
    };
  }
}
