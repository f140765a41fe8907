import { randomUUID } from "crypto";
import type { Clock } from "../ports/clock.js";
import type { TransferSink } from "../ports/transfer-sink.js";
import type { TransferSource, TransportHooks } from "../ports/transfer-source.js";
import { systemClock } from "../adapters/system-clock.js";
import { errorMessage } from "../errors/types.js";
import { createNoopLogger, type Logger } from "../logger.js";
import {
  TransferError,
  classifyFailure,
  createTransferController,
  quotaExceeded,
  type Guarded,
  type TransferErrorKind,
  type TransferOutcome,
} from "./failure.js";
import { createProgressReporter, type ProgressEvent } from "./progress-reporter.js";
import type { UsageLedger } from "./usage-ledger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TransferState =
  | "uninitialized"
  | "preparing"
  | "reading"
  | "writing"
  | "completed"
  | "failed"
  | "cancelled";

/** Owner notifications. Exactly one of the last three fires per transfer. */
export interface TransferCallbacks {
  onProgress?(event: ProgressEvent): void;
  onError?(error: TransferError): void;
  onCompleted?(bytesTotal: number): void;
  onCancelled?(bytesTotal: number): void;
}

export interface TransferOptions {
  /** Storage area the target file belongs to */
  area: string;
  /** Byte position of the first write */
  offset: number;
  source: TransferSource;
  /** Taken over by the transfer, which closes it on every exit path */
  sink: TransferSink;
  ledger: UsageLedger;
  bufferSize?: number;
  progressIntervalMs?: number;
  clock?: Clock;
  logger?: Logger;
  /** Owner policy for redirects, auth challenges and certificates */
  hooks?: Partial<TransportHooks>;
  callbacks?: TransferCallbacks;
}

export interface TransferStats {
  bytesRead: number;
  bytesWritten: number;
  /** Position of the next write */
  position: number;
  pendingReads: number;
  pendingWrites: number;
}

export interface Transfer {
  readonly id: string;
  readonly state: TransferState;
  readonly stats: TransferStats;
  /** Start pumping; resolves with the outcome and never rejects */
  run(): Promise<TransferOutcome>;
  /** Stop early; in-flight operations are asked to abort and their results dropped */
  cancel(): void;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_BUFFER_SIZE = 32 * 1024;
export const DEFAULT_PROGRESS_INTERVAL_MS = 200;

const STATE_FAILURE_KINDS: Partial<Record<TransferState, TransferErrorKind>> = {
  uninitialized: "SetupFailure",
  preparing: "SetupFailure",
  reading: "SourceFailure",
  writing: "SinkFailure",
};

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a transfer that copies `source` into `sink` from `offset` on,
 * alternating one read and one write over a single reusable buffer.
 *
 * The usage ledger is read once before anything is written; a chunk that
 * would take the file past the area's headroom is rejected whole.
 */
export function createTransfer(options: TransferOptions): Transfer {
  const { area, offset, source, sink, ledger } = options;
  const bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
  const clock = options.clock ?? systemClock;
  const hooks = options.hooks ?? {};
  const callbacks = options.callbacks ?? {};
  const id = randomUUID();
  const logger = (options.logger ?? createNoopLogger()).child({ transferId: id, area });

  if (!Number.isSafeInteger(bufferSize) || bufferSize <= 0) {
    throw new RangeError(`Buffer size must be a positive integer, got ${bufferSize}`);
  }

  const buffer = new Uint8Array(bufferSize);

  let state: TransferState = "uninitialized";
  let bytesRead = 0;
  let bytesWritten = 0;
  let position = offset;
  let pendingReads = 0;
  let pendingWrites = 0;
  let initialSize: number | null = null;
  let finalSize: number | null = null;
  let lastWrite: Promise<number> | null = null;
  let sourceExhausted = false;
  let running: Promise<TransferOutcome> | null = null;

  const reporter = createProgressReporter({
    minIntervalMs: options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS,
    emit(event) {
      try {
        callbacks.onProgress?.(event);
      } catch (error) {
        logger.error("Progress callback threw", { error: errorMessage(error) });
      }
    },
  });

  const controller = createTransferController({
    logger,
    counters: () => ({
      bytesWritten,
      fileGrowth: initialSize === null ? 0 : Math.max(0, (finalSize ?? position) - initialSize),
    }),
    deliver(outcome) {
      state = outcome.status;
      switch (outcome.status) {
        case "completed":
          logger.info("Transfer completed", { bytesWritten, fileGrowth: outcome.fileGrowth });
          reporter.maybeReport(outcome.bytesWritten, clock.now(), true);
          callbacks.onCompleted?.(outcome.bytesWritten);
          break;
        case "failed":
          logger.error("Transfer failed", {
            kind: outcome.error.kind,
            error: outcome.error.message,
            bytesWritten,
          });
          callbacks.onError?.(outcome.error);
          break;
        case "cancelled":
          logger.info("Transfer cancelled", { bytesWritten });
          callbacks.onCancelled?.(outcome.bytesWritten);
          break;
      }
    },
  });

  controller.own("source", () => {
    if (!sourceExhausted) source.cancel();
  });
  controller.own("target file", async () => {
    try {
      if (initialSize !== null) finalSize = await measureFile();
    } finally {
      await sink.close();
    }
  });
  controller.own("usage record", () => ledger.release());

  const relayedHooks: TransportHooks = {
    async onRedirect(info) {
      if (controller.isSettled()) return "cancel";
      logger.info("Source redirected", { from: info.from, to: info.to, status: info.status });
      return hooks.onRedirect ? hooks.onRedirect(info) : "follow";
    },
    async onAuthRequired(challenge) {
      if (controller.isSettled()) return undefined;
      logger.info("Source requires authentication", { url: challenge.url });
      return hooks.onAuthRequired ? hooks.onAuthRequired(challenge) : undefined;
    },
    onCertificateError(problem) {
      logger.warn("Source certificate rejected", { url: problem.url, code: problem.code });
      hooks.onCertificateError?.(problem);
    },
    async onCertificateRequested(request) {
      if (controller.isSettled()) return undefined;
      logger.info("Source requests a client certificate", { url: request.url });
      return hooks.onCertificateRequested ? hooks.onCertificateRequested(request) : undefined;
    },
  };

  /**
   * Size of the target file once a write still in flight has landed. A write
   * dropped after cancel may still have grown the file.
   */
  async function measureFile(): Promise<number | null> {
    if (lastWrite) await Promise.allSettled([lastWrite]);
    try {
      return await sink.size();
    } catch (error) {
      logger.warn("Could not measure the target file", { error: errorMessage(error) });
      return null;
    }
  }

  function transition(next: TransferState): void {
    if (controller.isSettled()) return;
    logger.debug("Transfer state changed", { from: state, to: next });
    state = next;
  }

  /**
   * Issue one operation unless the transfer already settled. A failure is
   * classified as `kind`; a completion arriving after settling is dropped.
   */
  async function step<T>(
    kind: TransferErrorKind,
    stage: string,
    operation: () => Promise<T>
  ): Promise<Guarded<T>> {
    if (controller.isSettled()) return { live: false };
    try {
      return await controller.guard(operation());
    } catch (error) {
      throw classifyFailure(kind, stage, error);
    }
  }

  async function readChunk(): Promise<Guarded<number>> {
    pendingReads++;
    try {
      return await step("SourceFailure", "Reading from the source", () => source.read(buffer));
    } finally {
      pendingReads--;
    }
  }

  /** Write `length` buffered bytes, following short writes with the remainder */
  async function writeChunk(length: number): Promise<boolean> {
    let done = 0;
    while (done < length) {
      const chunk = buffer.subarray(done, length);
      pendingWrites++;
      let result: Guarded<number>;
      try {
        result = await step("SinkFailure", "Writing to the target file", () => {
          lastWrite = sink.write(chunk);
          return lastWrite;
        });
      } finally {
        pendingWrites--;
      }
      if (!result.live) return false;

      const accepted = result.value;
      if (!Number.isSafeInteger(accepted) || accepted <= 0 || accepted > chunk.length) {
        throw new TransferError(
          "SinkFailure",
          `Target file accepted ${accepted} of ${chunk.length} bytes`
        );
      }
      done += accepted;
      position += accepted;
      bytesWritten += accepted;
    }
    return true;
  }

  async function drive(): Promise<void> {
    transition("preparing");
    if (!Number.isSafeInteger(offset) || offset < 0) {
      throw new TransferError("SetupFailure", `Invalid write offset: ${offset}`);
    }

    const snapshot = await step("SetupFailure", "Reading the usage record", () =>
      ledger.prepare(area)
    );
    if (!snapshot.live) return;

    const size = await step("SetupFailure", "Inspecting the target file", () => sink.size());
    if (!size.live) return;
    if (offset > size.value) {
      throw new TransferError(
        "SetupFailure",
        `Offset ${offset} is past the end of the target file (${size.value} bytes)`
      );
    }
    initialSize = size.value;

    const seeked = await step("SetupFailure", "Seeking the target file", () => sink.seek(offset));
    if (!seeked.live) return;

    const budget = ledger.budget(snapshot.value, { fileSize: size.value, offset });

    const started = await step("SourceFailure", "Starting the source", () =>
      source.start(relayedHooks)
    );
    if (!started.live) return;

    while (!controller.isSettled()) {
      transition("reading");
      const read = await readChunk();
      if (!read.live) return;

      const count = read.value;
      if (count === 0) {
        sourceExhausted = true;
        await controller.settle("completed");
        return;
      }
      if (!Number.isSafeInteger(count) || count < 0 || count > buffer.length) {
        throw new TransferError("SourceFailure", `Source reported a read of ${count} bytes`);
      }
      bytesRead += count;

      transition("writing");
      if (!budget.allows(count)) {
        logger.warn("Chunk rejected by quota", { chunkBytes: count, remaining: budget.remaining });
        throw quotaExceeded(count, budget.remaining);
      }

      const committed = await writeChunk(count);
      if (!committed) return;
      budget.consume(count);
      reporter.maybeReport(bytesWritten, clock.now());
    }
  }

  return {
    id,

    get state() {
      return state;
    },

    get stats(): TransferStats {
      return { bytesRead, bytesWritten, position, pendingReads, pendingWrites };
    },

    run() {
      if (running) return running;
      running = controller.settled;
      if (!controller.isSettled()) {
        logger.debug("Transfer starting", { offset, bufferSize });
        void drive().catch((error: unknown) =>
          controller.fail(
            classifyFailure(STATE_FAILURE_KINDS[state] ?? "SinkFailure", "Transfer", error)
          )
        );
      }
      return running;
    },

    cancel() {
      if (controller.isSettled()) return;
      logger.info("Cancelling transfer", { state });
      void controller.settle("cancelled");
    },
  };
}
