/**
 * Abstraction for timer operations.
 * Allows injecting fake timers for testing deadlines.
 */
export interface TimerService {
  setTimeout(fn: () => void, ms: number): NodeJS.Timeout;
  clearTimeout(id: NodeJS.Timeout): void;
}
