/**
 * Abstraction for process signal handling.
 * Lets a running transfer be cancelled without real process signals in tests.
 */
export interface SignalHandler {
  /** Register a callback for interrupt signals (SIGTERM, SIGINT) */
  onShutdown(callback: (signal: NodeJS.Signals) => Promise<void>): void;
  /** Remove all registered handlers */
  removeAll(): void;
}
