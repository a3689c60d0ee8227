/**
 * @file Node.js file system storage adapter for cowvec bundles
 */
import { readFile, rename, mkdir, rm, open } from "node:fs/promises";
import { dirname, isAbsolute, join as joinPath } from "node:path";
import type { FileIO } from "./types";
import { toUint8 } from "../util/bin";
import { hasErrorCode } from "../util/is-error";

function isRetryableError(error: unknown): boolean {
  if (!hasErrorCode(error)) {
    return false;
  }
  return error.code === "EBUSY" || error.code === "EMFILE" || error.code === "ENFILE";
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function retryOperation<T>(operation: () => Promise<T>, maxRetries = 3, baseDelay = 100): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= maxRetries || !isRetryableError(error)) {
        throw error;
      }
      // Exponential backoff with jitter
      await sleep(baseDelay * Math.pow(2, attempt) + Math.random() * 50);
    }
  }
}

async function writeSynced(path: string, data: ArrayBuffer | Uint8Array): Promise<void> {
  const fd = await open(path, "w");
  try {
    await fd.writeFile(toUint8(data));
    await fd.sync();
  } finally {
    await fd.close();
  }
}

/** Node FileIO rooted at `baseDir`; absolute paths pass through. */
export function createNodeFileIO(baseDir: string): FileIO {
  function resolve(p: string): string {
    return isAbsolute(p) ? p : joinPath(baseDir, p);
  }
  async function ensureDir(p: string) {
    await mkdir(dirname(p), { recursive: true });
  }
  return {
    async read(path: string) {
      const buf = await readFile(resolve(path));
      // copy out of Node's Buffer so the bytes start at offset 0 of their own ArrayBuffer
      const out = new Uint8Array(buf.byteLength);
      out.set(buf);
      return out;
    },
    async write(path: string, data) {
      const full = resolve(path);
      await ensureDir(full);
      await writeSynced(full, data);
    },
    async atomicWrite(path: string, data) {
      const full = resolve(path);
      await ensureDir(full);
      const tmp = `${full}.tmp`;
      try {
        await writeSynced(tmp, data);
        await retryOperation(() => rename(tmp, full));
      } catch (error) {
        await rm(tmp, { force: true });
        throw error;
      }
    },
    async del(path: string) {
      await rm(resolve(path), { force: true });
    },
  };
}
