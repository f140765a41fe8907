import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";
import { isTransferError } from "../transfer/failure.js";
import { isJsonMode } from "../cli-context.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

const MAX_WIDTH = 80;
const INDENT = "  ";

/**
 * Greedy word wrap; words longer than `width` get a line of their own.
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = "";
  for (const word of text.split(" ")) {
    if (line && line.length + 1 + word.length > width) {
      lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines;
}

function toCLIError(error: unknown): CLIError {
  return isCLIError(error) ? error : unknownError(error);
}

// ---------------------------------------------------------------------------
// Static rendering
// ---------------------------------------------------------------------------

/**
 * Lines of the human-readable rendering, without trailing newline.
 */
export function formatErrorLines(error: CLIError, columns = MAX_WIDTH): string[] {
  const width = Math.min(columns, MAX_WIDTH) - INDENT.length * 2;
  const out: string[] = [""];

  const [headline, ...rest] = wrapText(error.message, width);
  out.push(`${chalk.red("✗")} ${chalk.red.bold(headline)}`);
  out.push(...rest.map((line) => `${INDENT}${chalk.red(line)}`));

  if (isTransferError(error)) {
    out.push(`${INDENT}${chalk.dim(`${error.kind} (${error.code})`)}`);
  }

  if (error.details) {
    out.push("", ...wrapText(error.details, width).map((line) => `${INDENT}${chalk.dim(line)}`));
  }

  if (error.suggestion) {
    const [first, ...more] = wrapText(error.suggestion, width);
    out.push("", `${INDENT}${chalk.yellow("→")} ${first}`);
    out.push(...more.map((line) => `${INDENT}  ${line}`));
  }

  const examples = error.examples ?? (error.example ? [error.example] : []);
  if (examples.length === 1) {
    out.push("", `${INDENT}${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`);
  } else if (examples.length > 1) {
    out.push("", `${INDENT}${chalk.dim("Examples:")}`);
    out.push(...examples.slice(0, 3).map((ex) => `${INDENT}  ${chalk.cyan(`$ ${ex}`)}`));
  }

  out.push("");
  return out;
}

// ---------------------------------------------------------------------------
// JSON rendering
// ---------------------------------------------------------------------------

export function formatErrorJson(error: CLIError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    error: true,
    code: error.code,
    kind: isTransferError(error) ? error.kind : undefined,
    message: error.message,
    suggestion: error.suggestion,
    example: error.example,
    examples: error.examples,
    details: error.details,
  };
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

function currentMode(): OutputMode {
  return isJsonMode() ? "json" : getOutputMode();
}

/**
 * Write an error to stderr in the given (or detected) output mode.
 */
export function renderError(error: CLIError, mode: OutputMode = currentMode()): void {
  if (mode === "json") {
    console.error(JSON.stringify(formatErrorJson(error), null, 2));
    return;
  }
  for (const line of formatErrorLines(error, process.stderr.columns || MAX_WIDTH)) {
    console.error(line);
  }
}

export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  renderError(toCLIError(error), mode);
}
