/**
 * Abstraction for time-related operations.
 * Allows injecting fake clocks for testing.
 */
export interface Clock {
  /** Current timestamp in milliseconds */
  now(): number;
  /** Current time as an ISO 8601 string */
  isoNow(): string;
}
