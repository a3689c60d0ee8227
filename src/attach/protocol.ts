/**
 * @file Attachment protocol for length-prefixed vector fields
 *
 * Wire shape: `u64 count` (little-endian) followed by `count * stride`
 * elements. On read, a reader that can lend direct views gets the vector
 * attached zero-copy; any other reader gets a sequential copy into owned
 * storage. Both paths advance the cursor by the same byte span.
 */
import type { Scalar, VectorMode } from "../types";
import type { BinReader, BinWriter } from "../util/bin";
import { hasDirectAccess } from "../util/bin";
import { isAligned } from "../element";
import { FormatCorruptionError } from "../errors";
import type { OwnedArray } from "../owned/array";
import type { CowVector } from "../cow/vector";

/** Counts at or above this are treated as corruption. */
export const MAX_COUNT = 1n << 40n;

/** Stride of fields whose logical elements are 4-byte groups. */
export const PACKED_STRIDE = 4;

export type ReadVectorOptions = {
  /** Elements per counted unit (default 1). */
  stride?: number;
  /** Allow zero-copy attachment when the reader supports it (default true). */
  zeroCopy?: boolean;
  /** Lower the corruption bound; never raises it above `MAX_COUNT`. */
  maxCount?: number | bigint;
};

export type WriteVectorOptions = {
  stride?: number;
};

function countLimit(maxCount: number | bigint | undefined): bigint {
  if (maxCount === undefined) {
    return MAX_COUNT;
  }
  const m = BigInt(maxCount);
  return m < MAX_COUNT ? m : MAX_COUNT;
}

function checkStride(stride: number): void {
  if (!Number.isInteger(stride) || stride < 1) {
    throw new RangeError(`stride must be a positive integer, got ${stride}`);
  }
}

/** Reject counts outside `[0, limit)`. */
export function checkCount(count: bigint, limit: bigint = MAX_COUNT): number {
  if (count < 0n || count >= limit) {
    throw new FormatCorruptionError(count, limit);
  }
  return Number(count);
}

/**
 * Read one length-prefixed field into `vec`.
 * Returns the mode the vector ends up in.
 */
export function readVector<T extends Scalar>(
  reader: BinReader,
  vec: CowVector<T>,
  opts: ReadVectorOptions = {},
): VectorMode {
  const stride = opts.stride ?? 1;
  checkStride(stride);
  const count = checkCount(reader.readU64(), countLimit(opts.maxCount));
  const length = count * stride;
  const span = length * vec.elem.bytes;

  if (hasDirectAccess(reader) && opts.zeroCopy !== false) {
    const { bytes, lease } = reader.readPointer(span);
    if (isAligned(vec.elem, bytes.byteOffset)) {
      vec.attach(vec.elem.view(bytes.buffer, bytes.byteOffset, length), lease);
      return vec.mode;
    }
    install(vec, bytes.slice());
    return vec.mode;
  }

  install(vec, reader.readBytes(span));
  return vec.mode;
}

/** Read a field whose count is in 4-element groups. */
export function readPackedVector<T extends Scalar>(
  reader: BinReader,
  vec: CowVector<T>,
  opts: Omit<ReadVectorOptions, "stride"> = {},
): VectorMode {
  return readVector(reader, vec, { ...opts, stride: PACKED_STRIDE });
}

// `copy` is freshly allocated at offset 0, so any element view over it is aligned.
function install<T extends Scalar>(vec: CowVector<T>, copy: Uint8Array): void {
  const length = copy.byteLength / vec.elem.bytes;
  const fresh: OwnedArray<T> = { elem: vec.elem, buf: vec.elem.view(copy.buffer, copy.byteOffset, length), length };
  vec.clear();
  vec.swap(fresh);
}

/** Write `vec` as `u64(size / stride)` followed by its raw bytes. */
export function writeVector<T extends Scalar>(
  writer: BinWriter,
  vec: CowVector<T>,
  opts: WriteVectorOptions = {},
): void {
  const stride = opts.stride ?? 1;
  checkStride(stride);
  if (vec.size % stride !== 0) {
    throw new Error(`vector length ${vec.size} is not a multiple of stride ${stride}`);
  }
  const d = vec.data();
  writer.pushU64(vec.size / stride);
  writer.pushBytes(new Uint8Array(d.buffer, d.byteOffset, d.byteLength));
}

/** Write a field whose count is in 4-element groups. */
export function writePackedVector<T extends Scalar>(writer: BinWriter, vec: CowVector<T>): void {
  writeVector(writer, vec, { stride: PACKED_STRIDE });
}
