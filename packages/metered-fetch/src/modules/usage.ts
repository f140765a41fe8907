import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { resolve } from "path";
import type { Clock } from "../lib/ports/clock.js";
import { readUsage, rebuildUsage, systemClock, type UsageRecord } from "../lib/adapters/index.js";
import { computeAllowedGrowth } from "../lib/transfer/index.js";
import { loadConfig } from "../lib/config.js";
import { configInvalid, usageRecordMissing } from "../lib/errors/catalog.js";
import { errorMessage, isCLIError } from "../lib/errors/types.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { formatBytes } from "../lib/format.js";
import { maybeOutputJson, type UsageRebuildJson, type UsageShowJson } from "../lib/json-output.js";

interface UsageOptions {
  config?: string;
}

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

export function summarizeUsage(
  area: string,
  record: UsageRecord,
  quotaBytes: number | null
): UsageShowJson {
  return {
    area,
    bytesConsumed: record.bytesConsumed,
    quotaBytes,
    headroom: quotaBytes === null ? null : computeAllowedGrowth(quotaBytes, record.bytesConsumed),
    ...(record.updatedAt !== undefined && { updatedAt: record.updatedAt }),
  };
}

function quotaFor(options: UsageOptions): number | null {
  try {
    return loadConfig(options.config).config.quotaBytes;
  } catch (error) {
    throw configInvalid(errorMessage(error));
  }
}

export async function showUsage(areaArg: string, options: UsageOptions): Promise<UsageShowJson> {
  const area = resolve(areaArg);
  const record = await readUsage(area);
  if (!record) throw usageRecordMissing(area);

  const summary = summarizeUsage(area, record, quotaFor(options));
  if (maybeOutputJson(summary)) return summary;

  const table = new CliTable3({
    head: [chalk.cyan("Area"), chalk.cyan("Used"), chalk.cyan("Quota"), chalk.cyan("Headroom")],
  });
  table.push([
    area,
    formatBytes(summary.bytesConsumed),
    summary.quotaBytes === null ? "unlimited" : formatBytes(summary.quotaBytes),
    summary.headroom === null ? "unlimited" : formatBytes(summary.headroom),
  ]);
  console.log(table.toString());
  if (summary.updatedAt) {
    console.log(chalk.gray(`Last updated ${summary.updatedAt}`));
  }
  return summary;
}

export async function rebuildAreaUsage(
  areaArg: string,
  clock: Clock = systemClock
): Promise<UsageRebuildJson> {
  const area = resolve(areaArg);

  let previous: UsageRecord | undefined;
  try {
    previous = await readUsage(area);
  } catch (error) {
    if (!isCLIError(error) || error.code !== "USAGE_RECORD_INVALID") throw error;
    previous = undefined;
  }

  const record = await rebuildUsage(area, clock);
  const result: UsageRebuildJson = {
    area,
    bytesConsumed: record.bytesConsumed,
    previousBytesConsumed: previous?.bytesConsumed ?? null,
  };
  if (maybeOutputJson(result)) return result;

  const before =
    result.previousBytesConsumed === null ? "no record" : formatBytes(result.previousBytesConsumed);
  console.log(chalk.green(`Usage of ${area}: ${formatBytes(record.bytesConsumed)}`));
  console.log(chalk.gray(`Previously: ${before}`));
  return result;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerUsageCommands(program: Command, clock: Clock = systemClock): void {
  const usage = program.command("usage").description("Inspect and repair storage area usage");

  usage
    .command("show")
    .description("Show an area's recorded usage, quota and headroom")
    .argument("<area>", "Storage area directory")
    .option("-c, --config <path>", "Specific config file to use")
    .action(async (area: string, options: UsageOptions) => {
      try {
        await showUsage(area, options);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });

  usage
    .command("rebuild")
    .description("Recompute an area's usage from the files it holds")
    .argument("<area>", "Storage area directory")
    .action(async (area: string) => {
      try {
        await rebuildAreaUsage(area, clock);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
