/**
 * Process-wide options shared by every command: output mode, verbosity and
 * the response deadline for network sources. Read from argv before commander
 * parses it, so helpers such as the spinner and the error renderer can ask
 * without threading options through each call.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Log transfer steps at debug level regardless of the configured level */
  verbose: boolean;
  /** Deadline for a response to start, in milliseconds */
  timeout: number;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

const defaults = (): CLIContext => ({
  json: false,
  quiet: false,
  verbose: false,
  timeout: DEFAULT_TIMEOUT_MS,
});

let current: CLIContext = defaults();

function isEnabled(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

function positiveInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function flagValue(argv: string[], flag: string): string | undefined {
  const inline = argv.find((arg) => arg.startsWith(`${flag}=`));
  if (inline) return inline.slice(flag.length + 1);
  const index = argv.indexOf(flag);
  return index === -1 ? undefined : argv[index + 1];
}

/**
 * Build the context from flags and `METERED_*` variables. Variables win
 * over flags; `--json` implies `--quiet`.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  const json = argv.includes("--json") || isEnabled(env.METERED_JSON);
  const quiet = json || argv.includes("--quiet") || argv.includes("-q") || isEnabled(env.METERED_QUIET);
  const verbose = argv.includes("--verbose") || argv.includes("-v") || isEnabled(env.METERED_VERBOSE);

  current = {
    json,
    quiet,
    verbose,
    timeout:
      positiveInt(env.METERED_TIMEOUT) ??
      positiveInt(flagValue(argv, "--timeout")) ??
      DEFAULT_TIMEOUT_MS,
  };
  return current;
}

export function getContext(): Readonly<CLIContext> {
  return current;
}

export function isJsonMode(): boolean {
  return current.json;
}

export function isQuietMode(): boolean {
  return current.quiet;
}

export function isVerbose(): boolean {
  return current.verbose;
}

export function getTimeout(): number {
  return current.timeout;
}

/** Back to defaults between tests */
export function resetContext(): void {
  current = defaults();
}
