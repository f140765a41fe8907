import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
  type ResolvedConfig,
} from "../lib/config.js";
import { errorMessage } from "../lib/errors/types.js";
import { configInvalid } from "../lib/errors/catalog.js";
import { renderError } from "../lib/errors/renderer.js";
import { isJsonMode } from "../lib/cli-context.js";
import {
  maybeOutputJson,
  outputFailure,
  outputSuccess,
  type ConfigCheckJson,
  type ConfigLocationJson,
} from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

const EXAMPLE_CONFIG = `# metered-fetch configuration
# Place at ~/.config/metered-fetch/config.yaml (user) or /etc/metered-fetch/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. User config (~/.config/metered-fetch/config.yaml)
# 3. System config (/etc/metered-fetch/config.yaml)
# 4. Built-in defaults

# Transfer settings
transfer:
  # Bytes read from the source per chunk (1024 - 16777216)
  bufferSize: 32768

  # Minimum gap between two progress updates (ms)
  progressIntervalMs: 200

# Storage quota, applied to every area
quota:
  # Total bytes an area may hold
  bytes: 1073741824

  # Set to true to disable the quota entirely
  unlimited: false

# HTTP transport
transport:
  # Follow redirects from the server
  followRedirects: true

  # Give up after this many redirects (0-20)
  maxRedirects: 5

# Logging configuration
logging:
  # Log level: debug, info, warn, error
  level: warn

  # Output JSON logs
  json: false
`;

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

/**
 * Check each config file. Missing files only count as errors when the user
 * named the file explicitly.
 */
export function checkConfigFiles(paths: string[]): ConfigCheckJson[] {
  return paths.map((path): ConfigCheckJson => {
    if (!existsSync(path)) return { path, status: "missing" };
    try {
      loadConfigFile(path);
      return { path, status: "valid" };
    } catch (error) {
      return { path, status: "invalid", error: errorMessage(error) };
    }
  });
}

export function configLocations(): ConfigLocationJson[] {
  return [
    { scope: "user", path: USER_CONFIG_PATH, exists: existsSync(USER_CONFIG_PATH) },
    { scope: "system", path: SYSTEM_CONFIG_PATH, exists: existsSync(SYSTEM_CONFIG_PATH) },
  ];
}

function printEffectiveConfig(config: ResolvedConfig, sources: string[]): void {
  const row = (key: string, value: unknown) => console.log(`  ${`${key}:`.padEnd(20)}${value}`);

  console.log(chalk.cyan("Effective Configuration:"));
  console.log(chalk.gray("─".repeat(40)));
  console.log(
    chalk.gray(sources.length > 0 ? `Sources: ${sources.join(", ")}` : "Sources: (defaults only)")
  );

  console.log();
  console.log(chalk.bold("Transfer:"));
  row("bufferSize", config.bufferSize);
  row("progressIntervalMs", config.progressIntervalMs);

  console.log();
  console.log(chalk.bold("Quota:"));
  row("bytes", config.quotaBytes === null ? "unlimited" : config.quotaBytes);

  console.log();
  console.log(chalk.bold("Transport:"));
  row("followRedirects", config.followRedirects);
  row("maxRedirects", config.maxRedirects);

  console.log();
  console.log(chalk.bold("Logging:"));
  row("level", config.logLevel);
  row("json", config.logJson);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage metered-fetch configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", `Create system-wide config at ${SYSTEM_CONFIG_PATH}`)
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(chalk.gray("Edit it, or delete it and run init again."));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${errorMessage(error)}`));
        if (options.global) console.error(chalk.gray("System config may require sudo."));
        process.exitCode = 1;
        return;
      }

      if (!maybeOutputJson({ path: targetPath })) {
        console.log(chalk.green(`Created config file: ${targetPath}`));
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const explicit = options.config !== undefined;
      const checks = checkConfigFiles(
        options.config ? [options.config] : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH]
      );
      const failed = checks.some(
        (check) => check.status === "invalid" || (explicit && check.status === "missing")
      );
      if (failed) process.exitCode = 1;

      if (isJsonMode()) {
        if (failed) outputFailure(checks);
        else outputSuccess(checks);
        return;
      }

      for (const check of checks) {
        switch (check.status) {
          case "valid":
            console.log(`${chalk.green("✓")} ${check.path}`);
            break;
          case "invalid":
            console.error(`${chalk.red("✗")} ${check.path}: ${check.error}`);
            break;
          case "missing":
            if (explicit) console.error(chalk.red(`File not found: ${check.path}`));
            break;
        }
      }

      if (checks.every((check) => check.status === "missing") && !explicit) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray("Run 'metered-fetch config init' to create one."));
      } else if (!failed) {
        console.log(chalk.green("All configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      let loaded: ReturnType<typeof loadConfig>;
      try {
        loaded = loadConfig(options.config);
      } catch (error) {
        if (isJsonMode()) {
          renderError(configInvalid(errorMessage(error)), "json");
        } else {
          console.error(chalk.red(`Failed to load config: ${errorMessage(error)}`));
        }
        process.exitCode = 1;
        return;
      }

      if (!maybeOutputJson({ effective: loaded.config, sources: loaded.sources })) {
        printEffectiveConfig(loaded.config, loaded.sources);
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      const locations = configLocations();
      if (maybeOutputJson(locations)) return;

      for (const location of locations) {
        const state = location.exists ? chalk.green("(exists)") : chalk.gray("(not found)");
        console.log(`${chalk.bold(`${location.scope} config:`.padEnd(15))}${location.path} ${state}`);
      }
    });
}
