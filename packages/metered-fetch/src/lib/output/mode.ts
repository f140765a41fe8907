/**
 * Output mode detection for determining how to render CLI output.
 */

export type OutputMode = "tui" | "static" | "json";

/**
 * Detect the appropriate output mode based on environment and flags.
 *
 * - `tui`: Interactive terminal with a live spinner
 * - `static`: Plain text output (for CI, pipes, non-interactive)
 * - `json`: Structured JSON output for scripting
 */
export function getOutputMode(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = Boolean(process.stderr.isTTY)
): OutputMode {
  if (argv.includes("--json") || env.METERED_JSON === "1" || env.METERED_JSON === "true") {
    return "json";
  }

  if (env.CI || env.TERM === "dumb") {
    return "static";
  }

  // Progress is drawn on stderr, so that is the stream that must be a terminal
  if (!isTTY) {
    return "static";
  }

  return "tui";
}
