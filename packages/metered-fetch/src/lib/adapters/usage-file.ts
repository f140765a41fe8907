import { z } from "zod";
import { open, readFile, readdir, rename, stat, writeFile, type FileHandle } from "fs/promises";
import { join } from "path";
import type { Clock } from "../ports/clock.js";
import type { UsageRecordStore } from "../ports/usage-record.js";
import { areaNotFound, usageRecordInvalid, usageRecordMissing } from "../errors/catalog.js";
import { errorMessage } from "../errors/types.js";
import { systemClock } from "./system-clock.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Reserved file in the area root holding the area's usage */
export const USAGE_RECORD_NAME = ".metered-usage.json";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const UsageRecordSchema = z.object({
  version: z.literal(1),
  bytesConsumed: z.number().int().nonnegative(),
  updatedAt: z.string().optional(),
});

export type UsageRecord = z.infer<typeof UsageRecordSchema>;

export function usageRecordPath(area: string): string {
  return join(area, USAGE_RECORD_NAME);
}

/**
 * Parse and validate the contents of a usage record.
 */
export function parseUsageRecord(content: string, path: string): UsageRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw usageRecordInvalid(path, `Invalid JSON: ${errorMessage(err)}`);
  }

  const result = UsageRecordSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw usageRecordInvalid(path, issues);
  }
  return result.data;
}

function isMissing(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === "ENOENT";
}

// ---------------------------------------------------------------------------
// Read side, used by transfers
// ---------------------------------------------------------------------------

/**
 * Usage records kept as JSON files in each area's root.
 */
export function createUsageFileStore(): UsageRecordStore {
  return {
    async open(area) {
      const path = usageRecordPath(area);
      let handle: FileHandle;
      try {
        handle = await open(path, "r");
      } catch (error) {
        if (isMissing(error)) throw usageRecordMissing(area);
        throw error;
      }

      return {
        async stat() {
          const record = parseUsageRecord(await handle.readFile("utf-8"), path);
          return { bytesConsumed: record.bytesConsumed };
        },
        close: () => handle.close(),
      };
    },
  };
}

// ---------------------------------------------------------------------------
// Write side, owned by whoever enforces the quota
// ---------------------------------------------------------------------------

/**
 * Read an area's usage record; undefined when the area has none yet.
 */
export async function readUsage(area: string): Promise<UsageRecord | undefined> {
  const path = usageRecordPath(area);
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (isMissing(error)) return undefined;
    throw error;
  }
  return parseUsageRecord(content, path);
}

/**
 * Replace an area's usage record. The new record is written beside the old
 * one, then renamed over it.
 */
export async function writeUsage(
  area: string,
  bytesConsumed: number,
  clock: Clock = systemClock
): Promise<UsageRecord> {
  const record: UsageRecord = { version: 1, bytesConsumed, updatedAt: clock.isoNow() };
  const path = usageRecordPath(area);
  const tmpPath = `${path}.${process.pid}.tmp`;
  await writeFile(tmpPath, `${JSON.stringify(record, null, 2)}\n`, "utf-8");
  await rename(tmpPath, path);
  return record;
}

/**
 * Add `bytes` of growth to an area's recorded usage.
 */
export async function recordGrowth(
  area: string,
  bytes: number,
  clock: Clock = systemClock
): Promise<UsageRecord> {
  const current = await readUsage(area);
  if (!current) throw usageRecordMissing(area);
  return writeUsage(area, current.bytesConsumed + bytes, clock);
}

/**
 * Sum the sizes of every regular file under `area`, skipping the usage
 * record and its temporary copies.
 */
export async function measureArea(area: string): Promise<number> {
  let total = 0;

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const entryPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(entryPath);
      } else if (entry.isFile()) {
        if (dir === area && entry.name.startsWith(USAGE_RECORD_NAME)) continue;
        total += (await stat(entryPath)).size;
      }
    }
  }

  await walk(area);
  return total;
}

/**
 * Recompute an area's usage from the files it holds and store it.
 */
export async function rebuildUsage(area: string, clock: Clock = systemClock): Promise<UsageRecord> {
  try {
    const stats = await stat(area);
    if (!stats.isDirectory()) throw areaNotFound(area);
  } catch (error) {
    if (isMissing(error)) throw areaNotFound(area);
    throw error;
  }
  return writeUsage(area, await measureArea(area), clock);
}
