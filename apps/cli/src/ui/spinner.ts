// apps/cli/src/ui/spinner.ts — stage progress on stderr via ora
import ora from "ora";
import type { Ora } from "ora";

export interface Spinner {
  start(text: string): void;
  /** Replace the text of the running spinner */
  update(text: string): void;
  succeed(text: string): void;
  warn(text: string): void;
  fail(text: string): void;
}

export interface SpinnerOptions {
  /** A disabled spinner prints nothing (--quiet, --stdout) */
  enabled: boolean;
  color: boolean;
}

export function createSpinner(options: SpinnerOptions): Spinner {
  let instance: Ora | undefined;
  const ensure = (text: string): Ora | undefined => {
    if (!options.enabled) return undefined;
    instance ??= ora({ text, stream: process.stderr, color: options.color ? "cyan" : "white" });
    return instance;
  };

  return {
    start(text) {
      ensure(text)?.start(text);
    },
    update(text) {
      if (instance) instance.text = text;
    },
    succeed(text) {
      ensure(text)?.succeed(text);
    },
    warn(text) {
      ensure(text)?.warn(text);
    },
    fail(text) {
      ensure(text)?.fail(text);
    },
  };
}
