import { open, type FileHandle } from "fs/promises";
import type { TransferSink } from "../ports/transfer-sink.js";

/**
 * Wrap an open file handle as a transfer sink.
 * Writes are positioned, so the handle must not be in append mode.
 */
export function createFileSink(handle: FileHandle): TransferSink {
  let position = 0;
  let closed = false;

  return {
    async size() {
      const stats = await handle.stat();
      return stats.size;
    },

    async seek(offset) {
      position = offset;
    },

    async write(chunk) {
      const { bytesWritten } = await handle.write(chunk, 0, chunk.length, position);
      position += bytesWritten;
      return bytesWritten;
    },

    async close() {
      if (closed) return;
      closed = true;
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    },
  };
}

async function openForWriting(path: string): Promise<FileHandle> {
  try {
    return await open(path, "r+");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") throw error;
    return open(path, "wx+");
  }
}

/**
 * Sink for the file at `path`, created when missing.
 *
 * Nothing touches the disk until the first call, so a transfer that fails
 * during setup (for instance on the usage record) leaves no file behind.
 */
export function openFileSink(path: string): TransferSink {
  let opening: Promise<TransferSink> | null = null;

  const sink = (): Promise<TransferSink> => {
    if (!opening) opening = openForWriting(path).then(createFileSink);
    return opening;
  };

  return {
    size: async () => (await sink()).size(),
    seek: async (offset) => (await sink()).seek(offset),
    write: async (chunk) => (await sink()).write(chunk),
    async close() {
      if (!opening) return;
      let inner: TransferSink;
      try {
        inner = await opening;
      } catch {
        // Never opened, so there is nothing to close
        return;
      }
      await inner.close();
    },
  };
}
