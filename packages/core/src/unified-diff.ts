import type { FileStatus } from "@diffscribe/model";

// ---------------------------------------------------------------------------
// Unified (git-style) diff parsing
// ---------------------------------------------------------------------------

export interface ParsedFileDiff {
  path: string;
  oldPath?: string | undefined;
  status: FileStatus;
  /** Raw text of this file's section, header included */
  patch: string;
  /** Hunk body lines with their +/-/space prefix */
  hunkLines: string[];
  /** Whether a "\ No newline at end of file" marker was seen */
  noTrailingNewline: boolean;
  binary: boolean;
}

const FILE_HEADER = /^diff --git /;

function unquote(path: string): string {
  const trimmed = path.trim();
  if (trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/\\(["\\])/g, "$1");
  }
  return trimmed;
}

function stripPrefix(path: string, prefix: "a/" | "b/"): string {
  const p = unquote(path);
  return p.startsWith(prefix) ? p.slice(prefix.length) : p;
}

/** Paths from `diff --git a/X b/Y`, assuming no rename information. */
function pathsFromHeader(header: string): { a: string; b: string } {
  const rest = header.replace(FILE_HEADER, "");
  // Symmetric header: "a/X b/X"
  if ((rest.length - 1) % 2 === 0) {
    const half = (rest.length - 1) / 2;
    const left = rest.slice(0, half);
    const right = rest.slice(half + 1);
    if (left.slice(2) === right.slice(2)) {
      return { a: stripPrefix(left, "a/"), b: stripPrefix(right, "b/") };
    }
  }
  const idx = rest.lastIndexOf(" b/");
  if (idx === -1) return { a: stripPrefix(rest, "a/"), b: stripPrefix(rest, "a/") };
  return {
    a: stripPrefix(rest.slice(0, idx), "a/"),
    b: stripPrefix(rest.slice(idx + 1), "b/"),
  };
}

function parseSection(lines: string[]): ParsedFileDiff {
  const header = lines[0] ?? "";
  let { a: oldPath, b: newPath } = pathsFromHeader(header);
  let status: FileStatus = "Modified";
  let renamed = false;
  let binary = false;
  let noTrailingNewline = false;
  let inHunk = false;
  const hunkLines: string[] = [];

  for (const line of lines.slice(1)) {
    if (inHunk) {
      if (line.startsWith("@@")) continue;
      if (line.startsWith("\\")) {
        noTrailingNewline = true;
        continue;
      }
      if (/^[+\- ]/.test(line)) {
        hunkLines.push(line);
      }
      continue;
    }

    if (line.startsWith("@@")) {
      inHunk = true;
    } else if (line.startsWith("new file mode")) {
      status = "Added";
    } else if (line.startsWith("deleted file mode")) {
      status = "Deleted";
    } else if (line.startsWith("rename from ")) {
      oldPath = unquote(line.slice("rename from ".length));
      renamed = true;
    } else if (line.startsWith("rename to ")) {
      newPath = unquote(line.slice("rename to ".length));
      renamed = true;
    } else if (line.startsWith("--- ") && !line.startsWith("--- /dev/null")) {
      oldPath = stripPrefix(line.slice(4), "a/");
    } else if (line.startsWith("+++ ") && !line.startsWith("+++ /dev/null")) {
      newPath = stripPrefix(line.slice(4), "b/");
    } else if (line.startsWith("Binary files ")) {
      binary = true;
    }
  }

  if (renamed && status === "Modified") status = "Renamed";

  const patch = lines.join("\n");
  if (status === "Deleted") {
    return { path: oldPath, status, patch, hunkLines, noTrailingNewline, binary };
  }
  return {
    path: newPath,
    ...(status === "Renamed" ? { oldPath } : {}),
    status,
    patch,
    hunkLines,
    noTrailingNewline,
    binary,
  };
}

/**
 * Split a multi-file unified diff into one entry per file, in diff order.
 * Text before the first `diff --git` line is ignored.
 */
export function parseUnifiedDiff(rawDiff: string): ParsedFileDiff[] {
  const sections: string[][] = [];
  let current: string[] | undefined;

  for (const line of rawDiff.split(/\r?\n/)) {
    if (FILE_HEADER.test(line)) {
      current = [line];
      sections.push(current);
    } else if (current) {
      current.push(line);
    }
  }

  // A trailing newline leaves one empty line at the end of the last section
  const last = sections[sections.length - 1];
  if (last && last[last.length - 1] === "") last.pop();

  return sections.map(parseSection);
}

/**
 * Rebuild a file's full content from its hunks. Only exact for files that
 * were added (head side) or deleted (base side), where the hunks hold every line.
 */
export function reconstructFromHunks(
  diff: ParsedFileDiff,
  side: "base" | "head",
): string | undefined {
  if (diff.binary) return undefined;
  if (side === "head" && diff.status !== "Added") return undefined;
  if (side === "base" && diff.status !== "Deleted") return undefined;

  const marker = side === "head" ? "+" : "-";
  const body = diff.hunkLines
    .filter((l) => l.startsWith(marker))
    .map((l) => l.slice(1));
  if (body.length === 0) return "";
  return body.join("\n") + (diff.noTrailingNewline ? "" : "\n");
}
