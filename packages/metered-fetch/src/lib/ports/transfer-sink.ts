/**
 * Abstraction for the file a transfer writes into.
 * The owner opens it; the transfer takes it over and closes it.
 */
export interface TransferSink {
  /** Current size of the underlying file in bytes */
  size(): Promise<number>;
  /** Position the next write at `offset` */
  seek(offset: number): Promise<void>;
  /**
   * Write at the current position and advance it; may accept fewer bytes
   * than offered. `chunk` is reused once the promise settles, so it must not
   * be retained.
   */
  write(chunk: Uint8Array): Promise<number>;
  /** Flush and release the file */
  close(): Promise<void>;
}
