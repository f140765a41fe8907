import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { rebuildAreaUsage, registerUsageCommands, showUsage, summarizeUsage } from "./usage.js";
import { readUsage, writeUsage, USAGE_RECORD_NAME } from "../lib/adapters/usage-file.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import type { Clock } from "../lib/ports/clock.js";

const NO_CONFIG = "/nonexistent/metered-fetch/config.yaml";

const clock: Clock = {
  now: () => 0,
  isoNow: () => "2024-01-01T00:00:00.000Z",
};

describe("summarizeUsage", () => {
  it("reports the headroom left under the quota", () => {
    expect(summarizeUsage("/areas/a", { version: 1, bytesConsumed: 100 }, 1000)).toEqual({
      area: "/areas/a",
      bytesConsumed: 100,
      quotaBytes: 1000,
      headroom: 900,
    });
  });

  it("clamps the headroom of an over-committed area", () => {
    expect(summarizeUsage("/areas/a", { version: 1, bytesConsumed: 1500 }, 1000).headroom).toBe(0);
  });

  it("has no headroom figure without a quota", () => {
    const summary = summarizeUsage(
      "/areas/a",
      { version: 1, bytesConsumed: 10, updatedAt: "2024-01-01T00:00:00.000Z" },
      null
    );

    expect(summary).toEqual({
      area: "/areas/a",
      bytesConsumed: 10,
      quotaBytes: null,
      headroom: null,
      updatedAt: "2024-01-01T00:00:00.000Z",
    });
  });
});

describe("usage commands", () => {
  let area: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    area = await mkdtemp(join(tmpdir(), "metered-usage-"));
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
    await rm(area, { recursive: true, force: true });
  });

  describe("showUsage", () => {
    it("prints a table of usage, quota and headroom", async () => {
      await writeUsage(area, 1024, clock);

      await showUsage(area, { config: NO_CONFIG });

      const table = String(logSpy.mock.calls[0][0]);
      expect(table).toContain("1.0 KiB");
      expect(table).toContain("1.0 GiB");
      expect(logSpy).toHaveBeenCalledWith(
        expect.stringContaining("Last updated 2024-01-01T00:00:00.000Z")
      );
    });

    it("prints a JSON summary in JSON mode", async () => {
      initContext(["node", "metered-fetch", "--json"], {});
      await writeUsage(area, 1024, clock);

      const summary = await showUsage(area, { config: NO_CONFIG });

      expect(summary).toEqual({
        area,
        bytesConsumed: 1024,
        quotaBytes: 1073741824,
        headroom: 1073740800,
        updatedAt: "2024-01-01T00:00:00.000Z",
      });
      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({ success: true, data: summary });
    });

    it("refuses an area without a usage record", async () => {
      await expect(showUsage(area, { config: NO_CONFIG })).rejects.toMatchObject({
        code: "USAGE_RECORD_MISSING",
      });
    });
  });

  describe("rebuildAreaUsage", () => {
    it("replaces the record with the measured size", async () => {
      await writeFile(join(area, "a.bin"), "12345678");
      await writeUsage(area, 5, clock);

      const result = await rebuildAreaUsage(area, clock);

      expect(result).toEqual({ area, bytesConsumed: 8, previousBytesConsumed: 5 });
      expect(await readUsage(area)).toEqual({
        version: 1,
        bytesConsumed: 8,
        updatedAt: "2024-01-01T00:00:00.000Z",
      });
      expect(logSpy).toHaveBeenCalledWith(expect.stringContaining(`Usage of ${area}: 8 B`));
      expect(logSpy).toHaveBeenCalledWith(expect.stringContaining("Previously: 5 B"));
    });

    it("replaces an unreadable record", async () => {
      await writeFile(join(area, USAGE_RECORD_NAME), "not json");

      const result = await rebuildAreaUsage(area, clock);

      expect(result.previousBytesConsumed).toBeNull();
      expect(result.bytesConsumed).toBe(0);
      expect(logSpy).toHaveBeenCalledWith(expect.stringContaining("Previously: no record"));
    });
  });

  describe("registerUsageCommands", () => {
    it("sets the exit code when an area has no record", async () => {
      const program = new Command();
      program.exitOverride();
      registerUsageCommands(program, clock);

      await program.parseAsync(["node", "metered-fetch", "usage", "show", area, "-c", NO_CONFIG]);

      expect(process.exitCode).toBe(1);
    });

    it("rebuilds through the command line", async () => {
      await writeFile(join(area, "a.bin"), "123");
      const program = new Command();
      program.exitOverride();
      registerUsageCommands(program, clock);

      await program.parseAsync(["node", "metered-fetch", "usage", "rebuild", area]);

      expect((await readUsage(area))?.bytesConsumed).toBe(3);
      expect(process.exitCode).toBeUndefined();
    });
  });
});
