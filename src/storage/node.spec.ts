/**
 * @file Tests for Node.js FileIO adapter
 */
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join as joinPath } from "node:path";
import { createNodeFileIO } from "./node";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(joinPath(tmpdir(), "cowvec-io-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe("storage/node", () => {
  it("read/write/atomicWrite/del work on filesystem", () =>
    withTempDir(async (dir) => {
      const io = createNodeFileIO(dir);
      await io.write("a/b.bin", new Uint8Array([1, 2]));
      expect(Array.from(await io.read("a/b.bin"))).toEqual([1, 2]);
      await io.atomicWrite("a/b.bin", new Uint8Array([9]));
      expect(Array.from(await io.read("a/b.bin"))).toEqual([9]);
      expect(await readdir(joinPath(dir, "a"))).toEqual(["b.bin"]);
      await io.del?.("a/b.bin");
      await expect(io.read("a/b.bin")).rejects.toThrow();
    }));

  it("atomicWrite replaces an existing file", () =>
    withTempDir(async (dir) => {
      const io = createNodeFileIO(dir);
      await writeFile(joinPath(dir, "x.bin"), "existing");
      await io.atomicWrite("x.bin", new Uint8Array([1, 2, 3]));
      expect(Array.from(await io.read("x.bin"))).toEqual([1, 2, 3]);
    }));

  it("read returns bytes at offset 0 of their own buffer", () =>
    withTempDir(async (dir) => {
      const io = createNodeFileIO(dir);
      await io.write("y.bin", new Uint8Array([4, 5, 6]));
      const got = await io.read("y.bin");
      expect(got.byteOffset).toBe(0);
      expect(got.buffer.byteLength).toBe(3);
    }));

  it("absolute paths bypass the base directory", () =>
    withTempDir(async (dir) => {
      const io = createNodeFileIO(joinPath(dir, "base"));
      const abs = joinPath(dir, "abs.bin");
      await io.write(abs, new Uint8Array([7]));
      expect(await readdir(dir)).toEqual(["abs.bin"]);
    }));
});
