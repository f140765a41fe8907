import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/metered-fetch/config.yaml";

/** User-level configuration path under ~/.config */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "metered-fetch",
  "config.yaml"
);

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  bufferSize: 32 * 1024,
  progressIntervalMs: 200,
  quotaBytes: 1024 * 1024 * 1024, // 1 GiB per area
  followRedirects: true,
  maxRedirects: 5,
  // info and debug are opt-in
  logLevel: "warn",
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const TransferSchema = z.object({
  bufferSize: z.number().int().min(1024).max(16 * 1024 * 1024).optional(),
  progressIntervalMs: z.number().int().min(0).max(60000).optional(),
});

const QuotaSchema = z.object({
  bytes: z.number().int().nonnegative().optional(),
  unlimited: z.boolean().optional(),
});

const TransportSchema = z.object({
  followRedirects: z.boolean().optional(),
  maxRedirects: z.number().int().min(0).max(20).optional(),
});

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  transfer: TransferSchema.optional(),
  quota: QuotaSchema.optional(),
  transport: TransportSchema.optional(),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  bufferSize: number;
  progressIntervalMs: number;
  /** Bytes an area may hold; null when unlimited */
  quotaBytes: number | null;
  followRedirects: boolean;
  maxRedirects: number;
  logLevel: "debug" | "info" | "warn" | "error";
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`).join("\n");
}

/**
 * Read and validate a YAML config file.
 * Returns undefined when the file does not exist; an empty file is `{}`.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) return undefined;

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw new Error(`Cannot read config file ${path}: ${(err as Error).message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Invalid YAML in ${path}: ${(err as Error).message}`);
  }
  if (parsed === null || parsed === undefined) return {};

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Config validation failed for ${path}:\n${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * The settings a config file sets, as a partial resolved config.
 * `quota.unlimited: true` wins over `quota.bytes` in the same file.
 */
export function configLayer(file: ConfigFile): Partial<ResolvedConfig> {
  const quotaBytes = file.quota?.unlimited === true ? null : file.quota?.bytes;
  return definedOnly({
    bufferSize: file.transfer?.bufferSize,
    progressIntervalMs: file.transfer?.progressIntervalMs,
    quotaBytes,
    followRedirects: file.transport?.followRedirects,
    maxRedirects: file.transport?.maxRedirects,
    logLevel: file.logging?.level,
    logJson: file.logging?.json,
  });
}

function definedOnly<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Merge layers over the defaults, later layers winning:
 * system file, then user file, then command-line flags.
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig?: ConfigFile,
  systemConfig?: ConfigFile
): ResolvedConfig {
  const defaults: ResolvedConfig = { ...CONFIG_DEFAULTS, logJson: false };
  return {
    ...defaults,
    ...(systemConfig && configLayer(systemConfig)),
    ...(userConfig && configLayer(userConfig)),
    ...definedOnly(cliOptions),
  };
}

/**
 * Load configuration from all sources. An explicit path replaces both
 * the user and the system file.
 *
 * @returns The resolved config and the files it was read from
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const candidates: Array<{ role: "user" | "system"; path: string }> = explicitPath
    ? [{ role: "user", path: explicitPath }]
    : [
        { role: "system", path: SYSTEM_CONFIG_PATH },
        { role: "user", path: USER_CONFIG_PATH },
      ];

  const sources: string[] = [];
  const files: Partial<Record<"user" | "system", ConfigFile>> = {};
  for (const { role, path } of candidates) {
    const file = loadConfigFile(path);
    if (!file) continue;
    files[role] = file;
    sources.push(path);
  }

  return { config: resolveConfig(cliOptions, files.user, files.system), sources };
}
