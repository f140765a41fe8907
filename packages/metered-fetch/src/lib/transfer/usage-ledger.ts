import type { UsageRecordHandle, UsageRecordStore } from "../ports/usage-record.js";
import type { Logger } from "../logger.js";
import { createNoopLogger } from "../logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Usage of a storage area as read once at the start of a transfer */
export interface UsageSnapshot {
  readonly area: string;
  readonly bytesConsumed: number;
  /** Growth this area may still take; Infinity when the area has no quota */
  readonly allowedGrowth: number;
}

/** Headroom left to a single transfer */
export interface QuotaBudget {
  readonly remaining: number;
  allows(bytes: number): boolean;
  consume(bytes: number): void;
}

export interface UsageLedger {
  prepare(area: string): Promise<UsageSnapshot>;
  budget(snapshot: UsageSnapshot, file: { fileSize: number; offset: number }): QuotaBudget;
  release(): Promise<void>;
}

export interface UsageLedgerOptions {
  store: UsageRecordStore;
  /** Total bytes the area may hold; null for no limit */
  quotaBytes: number | null;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function computeAllowedGrowth(quotaBytes: number | null, bytesConsumed: number): number {
  if (quotaBytes === null) return Number.POSITIVE_INFINITY;
  return Math.max(0, quotaBytes - bytesConsumed);
}

/**
 * Create the ledger a transfer consults before it lets the file grow.
 * The usage record is opened and read once; its handle stays open until
 * `release()`.
 */
export function createUsageLedger(options: UsageLedgerOptions): UsageLedger {
  const { store, quotaBytes } = options;
  const logger = options.logger ?? createNoopLogger();

  let handle: UsageRecordHandle | null = null;
  let released = false;
  let prepared = false;

  async function closeHandle(): Promise<void> {
    const current = handle;
    handle = null;
    if (current) await current.close();
  }

  async function prepare(area: string): Promise<UsageSnapshot> {
    if (prepared) {
      throw new Error("Usage ledger already prepared");
    }
    prepared = true;

    const opened = await store.open(area);
    handle = opened;
    if (released) {
      // Released while the record was opening
      await closeHandle();
      throw new Error("Usage ledger released before the usage record was read");
    }

    const { bytesConsumed } = await opened.stat();
    if (!Number.isSafeInteger(bytesConsumed) || bytesConsumed < 0) {
      throw new Error(`Usage record reports an invalid byte count: ${bytesConsumed}`);
    }

    const snapshot: UsageSnapshot = Object.freeze({
      area,
      bytesConsumed,
      allowedGrowth: computeAllowedGrowth(quotaBytes, bytesConsumed),
    });
    logger.debug("Usage snapshot taken", {
      area,
      bytesConsumed,
      quotaBytes,
      allowedGrowth: Number.isFinite(snapshot.allowedGrowth) ? snapshot.allowedGrowth : "unlimited",
    });
    return snapshot;
  }

  function budget(
    snapshot: UsageSnapshot,
    file: { fileSize: number; offset: number }
  ): QuotaBudget {
    // Overwriting bytes the file already holds does not grow the area
    let remaining = snapshot.allowedGrowth + Math.max(0, file.fileSize - file.offset);

    return {
      get remaining() {
        return remaining;
      },
      allows: (bytes) => bytes <= remaining,
      consume(bytes) {
        if (bytes > remaining) {
          throw new Error(`Cannot consume ${bytes} bytes with ${remaining} left`);
        }
        remaining -= bytes;
      },
    };
  }

  async function release(): Promise<void> {
    if (released) return;
    released = true;
    await closeHandle();
  }

  return { prepare, budget, release };
}
