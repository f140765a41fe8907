#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerFetchCommands } from "./modules/fetch.js";
import { registerUsageCommands } from "./modules/usage.js";

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("metered-fetch")
    .description("Stream downloads into quota-metered storage areas")
    .version(readVersion())
    .option("--json", "Output machine-readable JSON")
    .option("-q, --quiet", "Suppress progress output")
    .option("-v, --verbose", "Log every transfer step")
    .option("--timeout <ms>", "Deadline for a response to start, in milliseconds");

  registerFetchCommands(program);
  registerUsageCommands(program);
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
