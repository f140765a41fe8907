/**
 * Abstraction for the usage record kept per storage area.
 * Read-only from the transfer's point of view.
 */
export interface UsageStat {
  bytesConsumed: number;
}

export interface UsageRecordHandle {
  stat(): Promise<UsageStat>;
  close(): Promise<void>;
}

export interface UsageRecordStore {
  open(area: string): Promise<UsageRecordHandle>;
}
