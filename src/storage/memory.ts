/**
 * @file In-memory FileIO implementation
 */
import type { FileIO } from "./types";
import { toUint8 } from "../util/bin";

/** In-memory FileIO; reads and writes copy the bytes. */
export function createMemoryFileIO(initial?: Record<string, Uint8Array | ArrayBuffer>): FileIO {
  const files = new Map<string, Uint8Array>();
  if (initial) {
    for (const [k, v] of Object.entries(initial)) {
      files.set(k, toUint8(v).slice());
    }
  }

  return {
    async read(path: string): Promise<Uint8Array> {
      const v = files.get(path);
      if (!v) {
        throw new Error(`file not found: ${path}`);
      }
      return v.slice();
    },
    async write(path: string, data: Uint8Array | ArrayBuffer): Promise<void> {
      files.set(path, toUint8(data).slice());
    },
    async atomicWrite(path: string, data: Uint8Array | ArrayBuffer): Promise<void> {
      files.set(path, toUint8(data).slice());
    },
    async del(path: string): Promise<void> {
      files.delete(path);
    },
  };
}
