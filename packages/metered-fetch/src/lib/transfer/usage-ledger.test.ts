import { describe, it, expect, vi } from "vitest";
import { computeAllowedGrowth, createUsageLedger } from "./usage-ledger.js";
import type { UsageRecordHandle, UsageRecordStore } from "../ports/usage-record.js";

function storeWith(bytesConsumed: number) {
  const handle: UsageRecordHandle = {
    stat: vi.fn(async () => ({ bytesConsumed })),
    close: vi.fn(async () => {}),
  };
  const store: UsageRecordStore = { open: vi.fn(async () => handle) };
  return { store, handle };
}

describe("computeAllowedGrowth", () => {
  it("subtracts consumption from the quota", () => {
    expect(computeAllowedGrowth(1000, 400)).toBe(600);
  });

  it("clamps an over-committed area to zero", () => {
    expect(computeAllowedGrowth(1000, 1500)).toBe(0);
  });

  it("is unbounded without a quota", () => {
    expect(computeAllowedGrowth(null, 1500)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("createUsageLedger", () => {
  it("takes one snapshot of the area's usage", async () => {
    const { store, handle } = storeWith(400);
    const ledger = createUsageLedger({ store, quotaBytes: 1000 });

    const snapshot = await ledger.prepare("/areas/a");

    expect(snapshot).toEqual({ area: "/areas/a", bytesConsumed: 400, allowedGrowth: 600 });
    expect(store.open).toHaveBeenCalledWith("/areas/a");
    expect(handle.stat).toHaveBeenCalledTimes(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it("refuses a second prepare", async () => {
    const { store } = storeWith(0);
    const ledger = createUsageLedger({ store, quotaBytes: 1000 });

    await ledger.prepare("/areas/a");

    await expect(ledger.prepare("/areas/a")).rejects.toThrow("Usage ledger already prepared");
  });

  it("rejects a record with an invalid byte count", async () => {
    const { store } = storeWith(-5);
    const ledger = createUsageLedger({ store, quotaBytes: 1000 });

    await expect(ledger.prepare("/areas/a")).rejects.toThrow(
      "Usage record reports an invalid byte count: -5"
    );
  });

  it("closes the record handle once, however often it is released", async () => {
    const { store, handle } = storeWith(0);
    const ledger = createUsageLedger({ store, quotaBytes: null });

    await ledger.prepare("/areas/a");
    await ledger.release();
    await ledger.release();

    expect(handle.close).toHaveBeenCalledTimes(1);
  });

  it("closes a record that finishes opening after release", async () => {
    const handle: UsageRecordHandle = {
      stat: vi.fn(async () => ({ bytesConsumed: 0 })),
      close: vi.fn(async () => {}),
    };
    let finishOpen: (h: UsageRecordHandle) => void = () => {};
    const store: UsageRecordStore = {
      open: () =>
        new Promise((resolve) => {
          finishOpen = resolve;
        }),
    };
    const ledger = createUsageLedger({ store, quotaBytes: 1000 });

    const preparing = ledger.prepare("/areas/a");
    await ledger.release();
    finishOpen(handle);

    await expect(preparing).rejects.toThrow("Usage ledger released before the usage record was read");
    expect(handle.close).toHaveBeenCalledTimes(1);
    expect(handle.stat).not.toHaveBeenCalled();
  });

  describe("budget", () => {
    it("adds the bytes an overwrite replaces to the allowed growth", async () => {
      const { store } = storeWith(900);
      const ledger = createUsageLedger({ store, quotaBytes: 1000 });
      const snapshot = await ledger.prepare("/areas/a");

      const budget = ledger.budget(snapshot, { fileSize: 500, offset: 200 });

      expect(budget.remaining).toBe(400);
    });

    it("tracks consumption and refuses chunks past the headroom", async () => {
      const { store } = storeWith(0);
      const ledger = createUsageLedger({ store, quotaBytes: 6000 });
      const budget = ledger.budget(await ledger.prepare("/areas/a"), { fileSize: 0, offset: 0 });

      expect(budget.allows(4096)).toBe(true);
      budget.consume(4096);
      expect(budget.remaining).toBe(1904);
      expect(budget.allows(4096)).toBe(false);
      expect(budget.allows(1904)).toBe(true);
      expect(() => budget.consume(2000)).toThrow("Cannot consume 2000 bytes with 1904 left");
    });

    it("allows any chunk when the area has no quota", async () => {
      const { store } = storeWith(10);
      const ledger = createUsageLedger({ store, quotaBytes: null });
      const budget = ledger.budget(await ledger.prepare("/areas/a"), { fileSize: 0, offset: 0 });

      expect(budget.allows(Number.MAX_SAFE_INTEGER)).toBe(true);
    });
  });
});
