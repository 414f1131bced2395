import { open } from "node:fs/promises";
import { LocalIOError } from "../errors/catalog.js";

export const MIN_PART_SIZE = 5 * 1024 * 1024;
export const DEFAULT_PART_SIZE = MIN_PART_SIZE;

/**
 * Yield `partSize`-byte chunks of a file; only the last one may be shorter.
 * The file is opened lazily and closed when iteration ends.
 */
export async function* readFileParts(
  path: string,
  partSize: number,
): AsyncGenerator<Uint8Array> {
  if (!Number.isInteger(partSize) || partSize <= 0) {
    throw new RangeError(`Part size must be a positive integer, got ${partSize}`);
  }

  const handle = await open(path, "r").catch((err: unknown) => {
    throw new LocalIOError(`Cannot open ${path}`, path, err);
  });
  try {
    for (;;) {
      const buffer = new Uint8Array(partSize);
      let filled = 0;
      while (filled < partSize) {
        const { bytesRead } = await handle.read(buffer, filled, partSize - filled);
        if (bytesRead === 0) break;
        filled += bytesRead;
      }
      if (filled === 0) return;
      yield filled === partSize ? buffer : buffer.subarray(0, filled);
      if (filled < partSize) return;
    }
  } finally {
    await handle.close();
  }
}
