import { readFile } from "node:fs/promises";
import { resolve, join, sep, extname } from "node:path";
import * as yaml from "js-yaml";
// ignore@5 is CJS (`module.exports = factory`) with a `export default` d.ts.
// Under NodeNext, tsc sees the namespace rather than the callable; vitest/vite
// may double-wrap it. This two-step cast handles both build and runtime.
import _ignoreImport from "ignore";
type Ignore = import("ignore").Ignore;
// At runtime the import may be the factory itself or `{ default: factory }`
const _raw = _ignoreImport as unknown;
const ignore: () => Ignore =
  typeof _raw === "function"
    ? (_raw as () => Ignore)
    : ((_raw as { default: () => Ignore }).default);
import { z } from "zod";
import { parseRuleTable } from "@diffscribe/model";
import type { RuleTable } from "@diffscribe/model";

export const CONFIG_FILE = ".diffscribe.yml";
export const IGNORE_FILE = ".diffscribeignore";

// ---------------------------------------------------------------------------
// Schema — Zod validation for .diffscribe.yml. The file is read with the
// failsafe YAML schema, so every scalar arrives as a string.
// ---------------------------------------------------------------------------

const ConfigSchema = z.object({
  version: z.string().optional(),
  title: z.string().min(1).optional(),
  rules_file: z.string().optional(),
  auth_guards: z.array(z.string().min(1)).optional(),
  paths: z.array(z.string()).optional(),
  ignore: z.array(z.string()).optional(),
  timeout_ms: z.coerce.number().int().positive().optional(),
  invariants: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .optional(),
  output: z
    .object({
      qa: z.string().optional(),
      readme: z.string().optional(),
    })
    .optional(),
});

export type DiffscribeConfig = z.infer<typeof ConfigSchema>;

// ---------------------------------------------------------------------------
// Default config values
// ---------------------------------------------------------------------------

export const DEFAULT_TIMEOUT_MS = 60_000;

const DEFAULT_CONFIG: Required<
  Pick<DiffscribeConfig, "timeout_ms" | "invariants">
> = {
  timeout_ms: DEFAULT_TIMEOUT_MS,
  invariants: true,
};

/** ENOENT and friends: the file is simply not there. */
export function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR" || err.code === "EISDIR")
  );
}

function assertWithinRoot(root: string, filePath: string, what: string): void {
  const rootResolved = resolve(root);
  const fileResolved = resolve(filePath);
  if (
    !fileResolved.startsWith(rootResolved + sep) &&
    fileResolved !== rootResolved
  ) {
    throw new Error(
      `${what} must be within the repository root: ${filePath} is outside ${root}`,
    );
  }
}

// ---------------------------------------------------------------------------
// loadConfig — reads and validates .diffscribe.yml
// ---------------------------------------------------------------------------

export async function loadConfig(
  root: string,
  configPath?: string,
): Promise<DiffscribeConfig> {
  const filePath = configPath ? resolve(configPath) : join(root, CONFIG_FILE);

  // Prevent path traversal: config must be within the repository root
  assertWithinRoot(root, filePath, "Config path");

  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (!isMissingFile(err)) throw err;
    return { ...DEFAULT_CONFIG };
  }

  const parsed = yaml.load(raw, { schema: yaml.FAILSAFE_SCHEMA });
  if (parsed == null || typeof parsed !== "object") {
    return { ...DEFAULT_CONFIG };
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid ${CONFIG_FILE}: ${detail}`);
  }
  return { ...DEFAULT_CONFIG, ...result.data };
}

// ---------------------------------------------------------------------------
// loadRuleTable — reads a JSON or YAML classification table
// ---------------------------------------------------------------------------

export async function loadRuleTable(filePath: string): Promise<RuleTable> {
  const raw = await readFile(filePath, "utf-8");
  const ext = extname(filePath).toLowerCase();
  const parsed: unknown =
    ext === ".json"
      ? JSON.parse(raw)
      : yaml.load(raw, { schema: yaml.FAILSAFE_SCHEMA });
  return parseRuleTable(parsed, filePath);
}

// ---------------------------------------------------------------------------
// loadIgnore — reads .diffscribeignore (gitignore syntax)
// ---------------------------------------------------------------------------

export async function loadIgnore(
  root: string | undefined,
  extra: readonly string[] = [],
): Promise<Ignore> {
  const ig = ignore();

  // Always ignore these
  ig.add(["node_modules", "dist", ".next", "coverage"]);

  if (root !== undefined) {
    try {
      const raw = await readFile(join(root, IGNORE_FILE), "utf-8");
      const patterns = raw
        .split(/\r?\n/)
        .map((l) => l.trim())
        .filter((l) => l.length > 0 && !l.startsWith("#"));
      if (patterns.length > 0) {
        ig.add(patterns);
      }
    } catch (err) {
      if (!isMissingFile(err)) throw err;
    }
  }

  if (extra.length > 0) {
    ig.add([...extra]);
  }

  return ig;
}

export type { Ignore };
