/**
 * Spinner wrapper that respects quiet/JSON mode.
 * Progress lines go to stderr so stdout stays free for command results.
 */

import ora from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";
import { formatBytes } from "./format.js";

export interface Spinner {
  start(text?: string): Spinner;
  /** Show the byte count of a running transfer */
  progress(bytesTotal: number): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  warn(text?: string): Spinner;
  readonly isSpinning: boolean;
}

/**
 * No-op spinner for quiet/JSON mode.
 */
function createSilentSpinner(): Spinner {
  const spinner: Spinner = {
    start: () => spinner,
    progress: () => spinner,
    stop: () => spinner,
    succeed: () => spinner,
    fail: () => spinner,
    warn: () => spinner,
    isSpinning: false,
  };
  return spinner;
}

/**
 * Create a spinner that respects quiet mode.
 * `label` prefixes every progress line, e.g. the target file name.
 */
export function createSpinner(label: string): Spinner {
  if (isQuietMode() || isJsonMode()) {
    return createSilentSpinner();
  }

  const inner = ora({ text: label, stream: process.stderr });
  const spinner: Spinner = {
    start(text) {
      inner.start(text ?? label);
      return spinner;
    },
    progress(bytesTotal) {
      inner.text = `${label} ${formatBytes(bytesTotal)}`;
      return spinner;
    },
    stop() {
      inner.stop();
      return spinner;
    },
    succeed(text) {
      inner.succeed(text);
      return spinner;
    },
    fail(text) {
      inner.fail(text);
      return spinner;
    },
    warn(text) {
      inner.warn(text);
      return spinner;
    },
    get isSpinning() {
      return inner.isSpinning;
    },
  };
  return spinner;
}
