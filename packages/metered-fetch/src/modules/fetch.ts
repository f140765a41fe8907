import { Command } from "commander";
import chalk from "chalk";
import { readFile } from "fs/promises";
import { basename, isAbsolute, relative, resolve, sep } from "path";
import type { Clock } from "../lib/ports/clock.js";
import type { SignalHandler } from "../lib/ports/signal-handler.js";
import type { TransferSink } from "../lib/ports/transfer-sink.js";
import type {
  ClientCertificate,
  TransferSource,
  TransportHooks,
} from "../lib/ports/transfer-source.js";
import type { UsageRecordStore } from "../lib/ports/usage-record.js";
import {
  createHttpSource,
  createProcessSignalHandler,
  createUsageFileStore,
  openFileSink,
  recordGrowth,
  systemClock,
  USAGE_RECORD_NAME,
  type HttpSourceOptions,
} from "../lib/adapters/index.js";
import { createTransfer, createUsageLedger, type TransferOutcome } from "../lib/transfer/index.js";
import { loadConfig, type ResolvedConfig } from "../lib/config.js";
import { getTimeout, isJsonMode, isVerbose } from "../lib/cli-context.js";
import { configInvalid, invalidOption, pathEscapesArea, reservedPath } from "../lib/errors/catalog.js";
import { errorMessage } from "../lib/errors/types.js";
import { renderError, renderUnknownError } from "../lib/errors/renderer.js";
import { formatBytes, parseByteSize } from "../lib/format.js";
import { outputFailure, outputSuccess, type FetchResultJson } from "../lib/json-output.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { createSpinner } from "../lib/spinner.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FetchOptions {
  area: string;
  offset?: string;
  quota?: string;
  bufferSize?: string;
  auth?: string;
  /** PEM files offered when the server asks for a client certificate */
  cert?: string;
  key?: string;
  /** False only when --no-follow-redirects was given */
  followRedirects?: boolean;
  config?: string;
}

/** Collaborators of the fetch command, replaced by fakes in tests */
export interface FetchDeps {
  createSource: (options: HttpSourceOptions) => TransferSource;
  openSink: (path: string) => TransferSink;
  usageStore: UsageRecordStore;
  recordGrowth: (area: string, bytes: number) => Promise<unknown>;
  signals: SignalHandler;
  clock: Clock;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const MIN_BUFFER_SIZE = 1024;
const MAX_BUFFER_SIZE = 16 * 1024 * 1024;

export function createDefaultFetchDeps(): FetchDeps {
  return {
    createSource: createHttpSource,
    openSink: openFileSink,
    usageStore: createUsageFileStore(),
    recordGrowth: (area, bytes) => recordGrowth(area, bytes, systemClock),
    signals: createProcessSignalHandler(),
    clock: systemClock,
  };
}

// ---------------------------------------------------------------------------
// Option Parsing
// ---------------------------------------------------------------------------

/**
 * Resolve `file` against the area root. Paths leaving the area and the
 * usage record itself are refused.
 */
export function resolveTarget(area: string, file: string): string {
  const root = resolve(area);
  const target = resolve(root, file);
  const rel = relative(root, target);

  if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw pathEscapesArea(file, root);
  }
  if (!rel.includes(sep) && rel.startsWith(USAGE_RECORD_NAME)) {
    throw reservedPath(file);
  }
  return target;
}

export function parseUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw invalidOption("<url>", value, "an absolute http:// or https:// URL");
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw invalidOption("<url>", value, "an absolute http:// or https:// URL");
  }
  return url.toString();
}

export function parseOffset(value: string | undefined): number {
  if (value === undefined) return 0;
  const offset = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(offset)) {
    throw invalidOption("--offset", value, "a byte position of 0 or more");
  }
  return offset;
}

export function parseQuota(value: string | undefined): number | null | undefined {
  if (value === undefined) return undefined;
  if (value.trim().toLowerCase() === "unlimited") return null;
  const bytes = parseByteSize(value);
  if (bytes === undefined) {
    throw invalidOption("--quota", value, "a byte size such as 500M, or 'unlimited'");
  }
  return bytes;
}

export function parseBufferSize(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const bytes = parseByteSize(value);
  if (bytes === undefined || bytes < MIN_BUFFER_SIZE || bytes > MAX_BUFFER_SIZE) {
    throw invalidOption("--buffer-size", value, "a size between 1K and 16M");
  }
  return bytes;
}

/**
 * Turn `user:password` into a Basic authorization header value.
 */
export function basicAuthorization(credentials: string): string {
  if (!credentials.includes(":")) {
    // Never echo credentials
    throw invalidOption("--auth", "<hidden>", "user:password");
  }
  return `Basic ${Buffer.from(credentials, "utf-8").toString("base64")}`;
}

/**
 * Loader for the `--cert`/`--key` pair, or undefined when neither was given.
 * The files are read only if a server asks for them.
 */
export function clientCertificateLoader(
  cert: string | undefined,
  key: string | undefined
): (() => Promise<ClientCertificate>) | undefined {
  if (cert === undefined) {
    if (key === undefined) return undefined;
    throw invalidOption("--key", key, "a --cert file to go with the key");
  }
  if (key === undefined) {
    throw invalidOption("--cert", cert, "a --key file to go with the certificate");
  }
  return async () => ({ cert: await readFile(cert), key: await readFile(key) });
}

function resolveFetchConfig(options: FetchOptions): ResolvedConfig {
  const overrides: Partial<ResolvedConfig> = {
    quotaBytes: parseQuota(options.quota),
    bufferSize: parseBufferSize(options.bufferSize),
    followRedirects: options.followRedirects === false ? false : undefined,
  };
  try {
    return loadConfig(options.config, overrides).config;
  } catch (error) {
    throw configInvalid(errorMessage(error));
  }
}

// ---------------------------------------------------------------------------
// Transport Policy
// ---------------------------------------------------------------------------

/**
 * Redirect policy from the transport settings: follow up to `maxRedirects`
 * hops, or none when redirects are off.
 */
export function createRedirectPolicy(
  settings: Pick<ResolvedConfig, "followRedirects" | "maxRedirects">,
  logger: Logger
): TransportHooks["onRedirect"] {
  let followed = 0;
  return async (info) => {
    if (!settings.followRedirects) {
      logger.warn("Redirect refused", { to: info.to, status: info.status });
      return "cancel";
    }
    if (followed >= settings.maxRedirects) {
      logger.warn("Too many redirects", { to: info.to, limit: settings.maxRedirects });
      return "cancel";
    }
    followed++;
    return "follow";
  };
}

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

/**
 * Download `url` into `file` inside the area, starting at `--offset`.
 * Growth of the file is added to the area's usage record whatever the outcome.
 */
export async function fetchToArea(
  rawUrl: string,
  file: string,
  options: FetchOptions,
  deps: FetchDeps
): Promise<FetchResultJson> {
  const url = parseUrl(rawUrl);
  const area = resolve(options.area);
  const target = resolveTarget(area, file);
  const offset = parseOffset(options.offset);
  const authorization = options.auth ? basicAuthorization(options.auth) : undefined;
  const loadCertificate = clientCertificateLoader(options.cert, options.key);
  const config = resolveFetchConfig(options);
  const logger =
    deps.logger ??
    createLogger({ level: isVerbose() ? "debug" : config.logLevel, json: config.logJson });

  const spinner = createSpinner(basename(target));
  const transfer = createTransfer({
    area,
    offset,
    source: deps.createSource({ url, timeoutMs: getTimeout(), logger }),
    sink: deps.openSink(target),
    ledger: createUsageLedger({ store: deps.usageStore, quotaBytes: config.quotaBytes, logger }),
    bufferSize: config.bufferSize,
    progressIntervalMs: config.progressIntervalMs,
    clock: deps.clock,
    logger,
    hooks: {
      onRedirect: createRedirectPolicy(config, logger),
      onAuthRequired: async () => authorization,
      onCertificateError: (problem) => {
        logger.error("Certificate rejected", { url: problem.url, code: problem.code });
      },
      onCertificateRequested: async (request) => {
        if (!loadCertificate) {
          logger.warn("Server asked for a client certificate; pass --cert and --key", {
            host: request.host,
          });
          return undefined;
        }
        return loadCertificate();
      },
    },
    callbacks: {
      onProgress: (event) => {
        spinner.progress(event.bytesTotal);
      },
    },
  });

  async function settle(outcome: TransferOutcome): Promise<boolean> {
    if (outcome.fileGrowth === 0) return true;
    try {
      await deps.recordGrowth(area, outcome.fileGrowth);
      return true;
    } catch (error) {
      logger.error("Failed to record area usage", {
        area,
        fileGrowth: outcome.fileGrowth,
        error: errorMessage(error),
      });
      return false;
    }
  }

  function report(outcome: TransferOutcome, recorded: boolean): FetchResultJson {
    const result: FetchResultJson = {
      url,
      file: target,
      area,
      offset,
      status: outcome.status,
      bytesWritten: outcome.bytesWritten,
      fileGrowth: outcome.fileGrowth,
      ...(outcome.status === "failed" && {
        error: { kind: outcome.error.kind, code: outcome.error.code, message: outcome.error.message },
      }),
    };

    const written = formatBytes(outcome.bytesWritten);
    switch (outcome.status) {
      case "completed":
        spinner.succeed(`Saved ${written} to ${file}`);
        break;
      case "cancelled":
        spinner.warn(`Cancelled after ${written}`);
        process.exitCode = 1;
        break;
      case "failed":
        spinner.fail(`Transfer failed after ${written}`);
        renderError(outcome.error);
        process.exitCode = 1;
        break;
    }

    if (!recorded) {
      if (!isJsonMode()) {
        console.error(
          chalk.yellow(`Usage record not updated; run 'metered-fetch usage rebuild ${area}'`)
        );
      }
      process.exitCode = 1;
    }

    if (isJsonMode()) {
      if (outcome.status === "completed" && recorded) outputSuccess(result);
      else outputFailure(result);
    }
    return result;
  }

  spinner.start(`Fetching ${url}`);
  // Output is part of the chain so a signal exit waits for it
  const finished = (async () => {
    const outcome = await transfer.run();
    const recorded = await settle(outcome);
    return report(outcome, recorded);
  })();

  deps.signals.onShutdown(async (signal) => {
    logger.warn("Interrupted, cancelling transfer", { signal });
    transfer.cancel();
    await finished;
  });

  return finished.finally(() => deps.signals.removeAll());
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerFetchCommands(
  program: Command,
  deps: FetchDeps = createDefaultFetchDeps()
): void {
  program
    .command("fetch")
    .description("Download a URL into a file inside a quota-metered storage area")
    .argument("<url>", "HTTP(S) URL to download")
    .argument("<file>", "Target file, relative to the area")
    .requiredOption("-a, --area <dir>", "Storage area directory holding the usage record")
    .option("-o, --offset <bytes>", "Byte position of the first write")
    .option("--quota <size>", "Bytes the area may hold, or 'unlimited'")
    .option("-b, --buffer-size <size>", "Bytes read per chunk")
    .option("--auth <user:password>", "Credentials offered when the server asks for them")
    .option("--cert <path>", "PEM client certificate offered when the server asks for one")
    .option("--key <path>", "PEM private key of the client certificate")
    .option("--no-follow-redirects", "Fail instead of following redirects")
    .option("-c, --config <path>", "Specific config file to use")
    .action(async (url: string, file: string, options: FetchOptions) => {
      try {
        await fetchToArea(url, file, options, deps);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
