import type { SignalHandler } from "../ports/signal-handler.js";

/** Conventional exit status for a process stopped by a signal */
const SIGNAL_EXIT_BASE = 128;

const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = {
  SIGINT: 2,
  SIGTERM: 15,
};

/** Where signals come from; `process` unless a test supplies an emitter */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface ProcessSignalOptions {
  source?: SignalSource;
  exit?: (code: number) => void;
}

/**
 * Create a signal handler for interrupt signals.
 * The first signal runs every callback, then exits with 128 + signal number;
 * a second signal while callbacks are running exits at once.
 */
export function createProcessSignalHandler(options: ProcessSignalOptions = {}): SignalHandler {
  const source: SignalSource = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const handlers: Array<(signal: NodeJS.Signals) => Promise<void>> = [];
  let isHandling = false;

  const handleSignal = async (signal: NodeJS.Signals) => {
    const code = SIGNAL_EXIT_BASE + (SIGNAL_NUMBERS[signal] ?? 0);
    if (isHandling) {
      exit(code);
      return;
    }
    isHandling = true;
    await Promise.allSettled(handlers.map((h) => h(signal)));
    exit(code);
  };

  const listener = (signal: NodeJS.Signals) => {
    void handleSignal(signal);
  };

  return {
    onShutdown(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        source.on("SIGTERM", listener);
        source.on("SIGINT", listener);
      }
    },
    removeAll() {
      handlers.length = 0;
      source.off("SIGTERM", listener);
      source.off("SIGINT", listener);
    },
  };
}
