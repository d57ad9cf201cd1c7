import { readFile } from "node:fs/promises";
import { resolve, sep } from "node:path";
import type { RefInfo, Side, SourceReader } from "@diffscribe/model";
import type { ChangeEntry, ChangeSource } from "../source.js";
import { matchesPrefix } from "../source.js";
import { isMissingFile } from "../config.js";
import { parseUnifiedDiff, reconstructFromHunks } from "../unified-diff.js";
import type { ParsedFileDiff } from "../unified-diff.js";

// ---------------------------------------------------------------------------
// PatchSource — fallback when no repository is available. The change set
// comes from a literal unified diff; contents come from optional snapshot
// directories, or from the hunks of added and deleted files.
// ---------------------------------------------------------------------------

export interface PatchSourceOptions {
  /** Directory holding the files as they were at base */
  baseDir?: string | undefined;
  /** Directory holding the files as they are at head */
  headDir?: string | undefined;
  /** Literal contents by path, consulted before the directories */
  baseFiles?: Record<string, string> | undefined;
  headFiles?: Record<string, string> | undefined;
}

async function readWithin(dir: string, path: string): Promise<string | undefined> {
  const root = resolve(dir);
  const file = resolve(root, path);
  if (!file.startsWith(root + sep)) return undefined;
  try {
    return await readFile(file, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
}

export class PatchSource implements ChangeSource {
  readonly kind = "patch";
  private readonly files: ParsedFileDiff[];

  constructor(
    patchText: string,
    private readonly options: PatchSourceOptions = {},
  ) {
    this.files = parseUnifiedDiff(patchText);
  }

  async resolveRef(ref: string): Promise<RefInfo> {
    // A patch has no history to resolve against
    return { ref };
  }

  async listChanges(): Promise<ChangeEntry[]> {
    return this.files.map((f) =>
      f.oldPath !== undefined
        ? { path: f.path, oldPath: f.oldPath, status: f.status }
        : { path: f.path, status: f.status },
    );
  }

  async diff(
    _base: RefInfo,
    _head: RefInfo,
    pathPrefixes: readonly string[],
  ): Promise<string> {
    const sections = this.files
      .filter(
        (f) =>
          matchesPrefix(f.path, pathPrefixes) ||
          (f.oldPath !== undefined && matchesPrefix(f.oldPath, pathPrefixes)),
      )
      .map((f) => f.patch);
    return sections.length > 0 ? sections.join("\n") + "\n" : "";
  }

  reader(): SourceReader {
    const { baseDir, headDir, baseFiles, headFiles } = this.options;
    const files = this.files;

    return {
      async read(side: Side, path: string): Promise<string | undefined> {
        const literal = side === "base" ? baseFiles : headFiles;
        const inline = literal?.[path];
        if (inline !== undefined) return inline;

        const dir = side === "base" ? baseDir : headDir;
        if (dir !== undefined) {
          const fromDir = await readWithin(dir, path);
          if (fromDir !== undefined) return fromDir;
        }

        const entry = files.find((f) =>
          side === "base" ? (f.oldPath ?? f.path) === path : f.path === path,
        );
        return entry ? reconstructFromHunks(entry, side) : undefined;
      },
    };
  }
}
