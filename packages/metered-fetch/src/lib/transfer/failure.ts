import { CLIError, errorMessage, type ErrorCode } from "../errors/types.js";
import type { Logger } from "../logger.js";

// ---------------------------------------------------------------------------
// Taxonomy
// ---------------------------------------------------------------------------

export type TransferErrorKind =
  | "SetupFailure"
  | "SourceFailure"
  | "SinkFailure"
  | "QuotaExceeded";

const KIND_CODES: Record<TransferErrorKind, ErrorCode> = {
  SetupFailure: "TRANSFER_SETUP_FAILED",
  SourceFailure: "TRANSFER_SOURCE_FAILED",
  SinkFailure: "TRANSFER_SINK_FAILED",
  QuotaExceeded: "TRANSFER_QUOTA_EXCEEDED",
};

const KIND_SUGGESTIONS: Record<TransferErrorKind, string> = {
  SetupFailure: "Nothing was written. Check the target file and the area's usage record",
  SourceFailure: "The file keeps every chunk written before the source failed",
  SinkFailure: "The file keeps every chunk written before the disk error",
  QuotaExceeded: "Free space in the storage area or raise its quota",
};

/**
 * A fatal transfer failure. Carries the stage it came from and the
 * low-level error as `cause`.
 */
export class TransferError extends CLIError {
  readonly kind: TransferErrorKind;

  constructor(
    kind: TransferErrorKind,
    message: string,
    options: { cause?: unknown; details?: string } = {}
  ) {
    super(KIND_CODES[kind], message, {
      suggestion: KIND_SUGGESTIONS[kind],
      details: options.details,
      cause: options.cause,
    });
    this.name = "TransferError";
    this.kind = kind;
  }
}

export function isTransferError(error: unknown): error is TransferError {
  return error instanceof TransferError;
}

/**
 * Wrap a low-level failure met during `stage` into the taxonomy.
 * Errors that are already classified pass through untouched.
 */
export function classifyFailure(
  kind: TransferErrorKind,
  stage: string,
  error: unknown
): TransferError {
  if (isTransferError(error)) return error;
  return new TransferError(kind, `${stage} failed: ${errorMessage(error)}`, {
    cause: error,
    details: error instanceof CLIError ? error.suggestion : undefined,
  });
}

export function quotaExceeded(chunkBytes: number, remaining: number): TransferError {
  return new TransferError(
    "QuotaExceeded",
    `Chunk of ${chunkBytes} bytes exceeds the ${remaining} bytes of quota left`
  );
}

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

interface OutcomeCounters {
  /** Bytes committed to the sink by this transfer */
  bytesWritten: number;
  /** Bytes by which the file grew past its size at start */
  fileGrowth: number;
}

export type TransferOutcome =
  | ({ status: "completed" } & OutcomeCounters)
  | ({ status: "failed"; error: TransferError } & OutcomeCounters)
  | ({ status: "cancelled" } & OutcomeCounters);

type TerminalState =
  | { status: "completed" }
  | { status: "failed"; error: TransferError }
  | { status: "cancelled" };

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

/** Result of an operation that may complete after the transfer settled */
export type Guarded<T> = { live: true; value: T } | { live: false };

export interface TransferControllerOptions {
  logger: Logger;
  /** Produce the outcome counters; read once every resource is released */
  counters: () => OutcomeCounters;
  /** Hand the final outcome to the owner; called once, after every release */
  deliver: (outcome: TransferOutcome) => void;
}

export interface TransferController {
  /** Register a resource to release when the transfer settles */
  own(name: string, release: () => Promise<void> | void): void;
  /** Enter a terminal state; only the first call has any effect */
  settle(outcome: Exclude<TransferOutcome["status"], "failed">): Promise<TransferOutcome>;
  fail(error: TransferError): Promise<TransferOutcome>;
  /** Await an in-flight operation, discarding its result if the transfer settled meanwhile */
  guard<T>(operation: Promise<T>): Promise<Guarded<T>>;
  isSettled(): boolean;
  /** Resolves with the outcome once delivered */
  readonly settled: Promise<TransferOutcome>;
}

/**
 * Centralizes terminal-state handling for one transfer: releases every owned
 * resource exactly once, then delivers exactly one outcome.
 */
export function createTransferController(
  options: TransferControllerOptions
): TransferController {
  const { logger, counters, deliver } = options;
  const resources: Array<{ name: string; release: () => Promise<void> | void }> = [];

  let terminal = false;
  let resolveSettled: (outcome: TransferOutcome) => void = () => {};
  const settled = new Promise<TransferOutcome>((resolve) => {
    resolveSettled = resolve;
  });

  async function releaseAll(): Promise<Array<{ name: string; error: unknown }>> {
    const failures: Array<{ name: string; error: unknown }> = [];
    // Drained, so a resource is never released twice
    for (const resource of resources.splice(0, resources.length)) {
      try {
        await resource.release();
      } catch (error) {
        failures.push({ name: resource.name, error });
      }
    }
    return failures;
  }

  async function finish(end: TerminalState): Promise<TransferOutcome> {
    const failures = await releaseAll();
    let outcome: TransferOutcome = { ...end, ...counters() };

    for (const failure of failures) {
      logger.warn("Failed to release transfer resource", {
        resource: failure.name,
        error: errorMessage(failure.error),
      });
    }

    if (outcome.status === "completed" && failures.length > 0) {
      const first = failures[0];
      outcome = {
        status: "failed",
        error: classifyFailure("SinkFailure", `Releasing ${first.name}`, first.error),
        bytesWritten: outcome.bytesWritten,
        fileGrowth: outcome.fileGrowth,
      };
    }

    try {
      deliver(outcome);
    } catch (error) {
      logger.error("Transfer owner callback threw", { error: errorMessage(error) });
    }
    resolveSettled(outcome);
    return outcome;
  }

  function enter(end: TerminalState): Promise<TransferOutcome> {
    if (terminal) return settled;
    terminal = true;
    return finish(end);
  }

  return {
    own(name, release) {
      if (terminal) {
        throw new Error(`Cannot take ownership of ${name} after the transfer settled`);
      }
      resources.push({ name, release });
    },

    settle(status) {
      return enter({ status });
    },

    fail(error) {
      return enter({ status: "failed", error });
    },

    async guard<T>(operation: Promise<T>): Promise<Guarded<T>> {
      try {
        const value = await operation;
        return terminal ? { live: false } : { live: true, value };
      } catch (error) {
        if (terminal) {
          logger.debug("Discarded late failure after transfer settled", {
            error: errorMessage(error),
          });
          return { live: false };
        }
        throw error;
      }
    },

    isSettled: () => terminal,

    settled,
  };
}
