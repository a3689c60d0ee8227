/**
 * @file Binary I/O utilities for cowvec serialization
 *
 * Little-endian readers and writers used by the attachment protocol and the
 * bundle format. Two reader capabilities exist:
 *
 * - `BinReader`: copy-only. `readBytes` always hands back fresh storage.
 * - `DirectReader`: additionally exposes `readPointer`, which returns a view
 *   into the backing region without copying, together with the region's lease.
 *
 * Callers tell them apart with `hasDirectAccess`.
 */
import type { Lease } from "../types";
import { TruncatedInputError } from "../errors";
import type { Region } from "../region/region";

/** Convert ArrayBuffer to Uint8Array (no-copy when possible). */
export function toUint8(data: Uint8Array | ArrayBuffer): Uint8Array {
  return data instanceof Uint8Array ? data : new Uint8Array(data);
}

export type BinReader = {
  readU32(): number;
  readI32(): number;
  readU64(): bigint;
  /** Copy `n` bytes out of the input. */
  readBytes(n: number): Uint8Array;
  /** Skip forward to the next multiple of `n` bytes from the start. */
  align(n: number): void;
  offset(): number;
  remaining(): number;
};

export type BorrowedBytes = {
  bytes: Uint8Array;
  lease: Lease;
};

export type DirectReader = BinReader & {
  /** Borrow `n` bytes of backing storage and advance past them. */
  readPointer(n: number): BorrowedBytes;
};

/** Narrow a reader to one that can hand out direct views. */
export function hasDirectAccess(r: BinReader): r is DirectReader {
  return "readPointer" in r && typeof r.readPointer === "function";
}

type Cursor = {
  take(n: number): number;
  reader: BinReader;
};

function createCursor(src: Uint8Array): Cursor {
  const dv = new DataView(src.buffer, src.byteOffset, src.byteLength);
  // eslint-disable-next-line no-restricted-syntax -- off is used to track the current read position
  let off = 0;
  function take(n: number): number {
    if (!Number.isInteger(n) || n < 0) {
      throw new RangeError(`invalid read length ${n}`);
    }
    const left = src.byteLength - off;
    if (n > left) {
      throw new TruncatedInputError(n, left);
    }
    const at = off;
    off += n;
    return at;
  }
  const reader: BinReader = {
    readU32() {
      return dv.getUint32(take(4), true);
    },
    readI32() {
      return dv.getInt32(take(4), true);
    },
    readU64() {
      return dv.getBigUint64(take(8), true);
    },
    readBytes(n) {
      const at = take(n);
      return src.slice(at, at + n);
    },
    align(n) {
      const pad = (n - (off % n)) % n;
      take(pad);
    },
    offset() {
      return off;
    },
    remaining() {
      return src.byteLength - off;
    },
  };
  return { take, reader };
}

/** Copy-only reader over an in-memory buffer. */
export function createReader(buf: ArrayBufferLike | Uint8Array): BinReader {
  const src = buf instanceof Uint8Array ? buf : new Uint8Array(buf);
  return createCursor(src).reader;
}

/** Direct reader over a region; `readPointer` views are valid until the region closes. */
export function createRegionReader(region: Region): DirectReader {
  const src = region.bytes();
  const { take, reader } = createCursor(src);
  return {
    ...reader,
    readPointer(n) {
      const at = take(n);
      return { bytes: src.subarray(at, at + n), lease: region.lease };
    },
  };
}

export type BinWriter = {
  pushU32(v: number): void;
  pushI32(v: number): void;
  pushU64(v: bigint | number): void;
  pushBytes(u8: Uint8Array): void;
  /** Zero-pad to the next multiple of `n` bytes from the start. */
  align(n: number): void;
  length(): number;
  concat(): Uint8Array;
};

/**
 *
 */
export function createWriter(): BinWriter {
  const parts: Uint8Array[] = [];
  // eslint-disable-next-line no-restricted-syntax -- running total drives alignment padding
  let total = 0;
  function push(u8: Uint8Array): void {
    parts.push(u8);
    total += u8.byteLength;
  }
  function pushU32(v: number): void {
    const b = new Uint8Array(4);
    new DataView(b.buffer).setUint32(0, v >>> 0, true);
    push(b);
  }
  function pushI32(v: number): void {
    const b = new Uint8Array(4);
    new DataView(b.buffer).setInt32(0, v | 0, true);
    push(b);
  }
  function pushU64(v: bigint | number): void {
    const b = new Uint8Array(8);
    new DataView(b.buffer).setBigUint64(0, BigInt(v), true);
    push(b);
  }
  function pushBytes(u8: Uint8Array): void {
    push(u8);
  }
  function align(n: number): void {
    const pad = (n - (total % n)) % n;
    if (pad > 0) {
      push(new Uint8Array(pad));
    }
  }
  function length(): number {
    return total;
  }
  function concat(): Uint8Array {
    const out = new Uint8Array(total);
    // eslint-disable-next-line no-restricted-syntax -- Performance: tracking offset position requires mutable variable
    let off = 0;
    for (const p of parts) {
      out.set(p, off);
      off += p.length;
    }
    return out;
  }
  return { pushU32, pushI32, pushU64, pushBytes, align, length, concat };
}
