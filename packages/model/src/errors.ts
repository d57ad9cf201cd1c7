// ---------------------------------------------------------------------------
// Error taxonomy. Collection errors are fatal; per-file errors are recovered
// by the pipeline and surface as "Manual Review Required" rows.
// ---------------------------------------------------------------------------

export type DiffscribeErrorCode =
  | "REF_NOT_FOUND"
  | "EMPTY_DIFF"
  | "COLLECT_TIMEOUT"
  | "UNPARSEABLE_FILE"
  | "AMBIGUOUS_BREAKING_CHANGE"
  | "INVALID_RULE_TABLE";

export abstract class DiffscribeError extends Error {
  abstract readonly code: DiffscribeErrorCode;
  /** Whether the analysis has to stop */
  abstract readonly fatal: boolean;
}

export class RefNotFoundError extends DiffscribeError {
  readonly code = "REF_NOT_FOUND";
  readonly fatal = true;

  constructor(readonly ref: string, cause?: unknown) {
    super(`Git reference not found: ${ref}`, { cause });
    this.name = "RefNotFoundError";
  }
}

export class EmptyDiffError extends DiffscribeError {
  readonly code = "EMPTY_DIFF";
  readonly fatal = false;

  constructor(readonly base: string, readonly head: string) {
    super(`No changes between ${base} and ${head}`);
    this.name = "EmptyDiffError";
  }
}

export class CollectTimeoutError extends DiffscribeError {
  readonly code = "COLLECT_TIMEOUT";
  readonly fatal = true;

  constructor(readonly timeoutMs: number) {
    super(`Change collection did not finish within ${timeoutMs}ms`);
    this.name = "CollectTimeoutError";
  }
}

export class UnparseableFileError extends DiffscribeError {
  readonly code = "UNPARSEABLE_FILE";
  readonly fatal = false;

  constructor(readonly path: string, readonly reason: string) {
    super(`Cannot parse ${path}: ${reason}`);
    this.name = "UnparseableFileError";
  }
}

export class AmbiguousBreakingChangeError extends DiffscribeError {
  readonly code = "AMBIGUOUS_BREAKING_CHANGE";
  readonly fatal = false;

  constructor(readonly endpoint: string, readonly reason: string) {
    super(`Cannot decide whether ${endpoint} breaks clients: ${reason}`);
    this.name = "AmbiguousBreakingChangeError";
  }
}

export function isDiffscribeError(err: unknown): err is DiffscribeError {
  return err instanceof DiffscribeError;
}
