export interface ProgressEvent {
  /** Bytes committed to the file so far */
  bytesTotal: number;
  /** True only for the final event of a completed transfer */
  done: boolean;
}

export interface ProgressReporterOptions {
  /** Minimum gap between two non-terminal events */
  minIntervalMs: number;
  emit: (event: ProgressEvent) => void;
}

export interface ProgressReporter {
  /**
   * Emit a progress event unless one went out less than `minIntervalMs`
   * before `now`. Terminal events always go out.
   * Returns whether an event was emitted.
   */
  maybeReport(bytesTotal: number, now: number, done?: boolean): boolean;
}

/**
 * Rate-limit progress notifications so a fast local transfer does not
 * flood its owner with one event per chunk.
 */
export function createProgressReporter(options: ProgressReporterOptions): ProgressReporter {
  const { minIntervalMs, emit } = options;
  let lastEmittedAt: number | undefined;

  return {
    maybeReport(bytesTotal, now, done = false) {
      if (!done && lastEmittedAt !== undefined && now - lastEmittedAt < minIntervalMs) {
        return false;
      }
      lastEmittedAt = now;
      emit({ bytesTotal, done });
      return true;
    },
  };
}
