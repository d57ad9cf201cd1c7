import semver from "semver";
import { UnparseableFileError } from "@diffscribe/model";
import type { DependencyBump, DependencyChange, DependencySection } from "@diffscribe/model";

const SECTIONS: readonly DependencySection[] = [
  "dependencies",
  "devDependencies",
  "peerDependencies",
  "optionalDependencies",
];

// Maps, so names like `constructor` or `__proto__` stay ordinary keys
type Manifest = Partial<Record<DependencySection, Map<string, string>>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readManifest(path: string, text: string | undefined): Manifest {
  if (text === undefined) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new UnparseableFileError(path, err instanceof Error ? err.message : String(err));
  }
  if (!isRecord(parsed)) throw new UnparseableFileError(path, "manifest is not a JSON object");

  const manifest: Manifest = {};
  for (const section of SECTIONS) {
    const deps = parsed[section];
    if (!isRecord(deps)) continue;
    const entries = new Map<string, string>();
    for (const [name, range] of Object.entries(deps)) {
      if (typeof range === "string") entries.set(name, range);
    }
    manifest[section] = entries;
  }
  return manifest;
}

/** Classify a range change by the lowest version each range admits. */
export function classifyBump(before: string, after: string): DependencyBump {
  if (!semver.validRange(before) || !semver.validRange(after)) return "other";
  const from = semver.minVersion(before);
  const to = semver.minVersion(after);
  if (!from || !to) return "other";
  switch (semver.diff(from, to)) {
    case "major":
    case "premajor":
      return "major";
    case "minor":
    case "preminor":
      return "minor";
    case "patch":
    case "prepatch":
    case "prerelease":
      return "patch";
    default:
      return "other";
  }
}

/**
 * Compare one package.json at base and head, section by section, names
 * sorted within each section.
 */
export function diffDependencies(
  manifest: string,
  beforeText: string | undefined,
  afterText: string | undefined,
): DependencyChange[] {
  const before = readManifest(manifest, beforeText);
  const after = readManifest(manifest, afterText);
  const changes: DependencyChange[] = [];

  for (const section of SECTIONS) {
    const prev = before[section] ?? new Map<string, string>();
    const next = after[section] ?? new Map<string, string>();
    const names = [...new Set([...prev.keys(), ...next.keys()])].sort();

    for (const name of names) {
      const from = prev.get(name);
      const to = next.get(name);
      if (from === to) continue;
      if (from === undefined && to !== undefined) {
        changes.push({ manifest, name, section, after: to, bump: "added" });
      } else if (to === undefined && from !== undefined) {
        changes.push({ manifest, name, section, before: from, bump: "removed" });
      } else if (from !== undefined && to !== undefined) {
        changes.push({ manifest, name, section, before: from, after: to, bump: classifyBump(from, to) });
      }
    }
  }
  return changes;
}
