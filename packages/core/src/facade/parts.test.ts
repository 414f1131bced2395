import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { LocalIOError } from "../errors/catalog.js";
import { readFileParts } from "./parts.js";

async function collect(parts: AsyncIterable<Uint8Array>): Promise<number[][]> {
  const result: number[][] = [];
  for await (const part of parts) result.push([...part]);
  return result;
}

describe("readFileParts", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "parts-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("splits a file into full parts and a shorter tail", async () => {
    const path = join(dir, "data.bin");
    await writeFile(path, new Uint8Array([1, 2, 3, 4, 5, 6, 7]));

    expect(await collect(readFileParts(path, 3))).toEqual([
      [1, 2, 3],
      [4, 5, 6],
      [7],
    ]);
  });

  it("yields no extra empty part when the size divides evenly", async () => {
    const path = join(dir, "data.bin");
    await writeFile(path, new Uint8Array([1, 2, 3, 4]));

    expect(await collect(readFileParts(path, 2))).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("yields nothing for an empty file", async () => {
    const path = join(dir, "empty.bin");
    await writeFile(path, new Uint8Array(0));

    expect(await collect(readFileParts(path, 4))).toEqual([]);
  });

  it("fails with LocalIOError for a missing file", async () => {
    await expect(collect(readFileParts(join(dir, "missing.bin"), 4))).rejects.toBeInstanceOf(
      LocalIOError,
    );
  });

  it("rejects a non-positive part size", async () => {
    await expect(collect(readFileParts(join(dir, "x"), 0))).rejects.toBeInstanceOf(RangeError);
  });
});
