/**
 * @file Core type definitions shared across cowvec
 *
 * Vectors hold numeric scalars backed by typed arrays. The structural types
 * below are satisfied by every built-in typed array, so the same code drives
 * `Float32Array`, `Uint8Array` or `BigInt64Array` storage.
 */

/** Scalar element value: `number` for 8..32-bit and float kinds, `bigint` for 64-bit integers. */
export type Scalar = number | bigint;

/** Names of the supported element kinds. */
export type ElementName = "u8" | "i8" | "u16" | "i16" | "u32" | "i32" | "f32" | "f64" | "i64" | "u64";

/** Mutable contiguous storage (any typed array). */
export type NumericArray<T extends Scalar> = {
  readonly length: number;
  readonly buffer: ArrayBufferLike;
  readonly byteOffset: number;
  readonly byteLength: number;
  [index: number]: T;
  subarray(begin?: number, end?: number): NumericArray<T>;
  set(array: ArrayLike<T>, offset?: number): void;
  fill(value: T, start?: number, end?: number): unknown;
};

/** Read-only view handed out by accessors that must not write. */
export type ReadonlyNumericArray<T extends Scalar> = {
  readonly length: number;
  readonly buffer: ArrayBufferLike;
  readonly byteOffset: number;
  readonly byteLength: number;
  readonly [index: number]: T;
};

/** Describes how to allocate and view storage for one element kind. */
export type ElementType<T extends Scalar> = {
  readonly name: ElementName;
  readonly bytes: number;
  readonly zero: T;
  alloc(length: number): NumericArray<T>;
  view(buffer: ArrayBufferLike, byteOffset: number, length: number): NumericArray<T>;
};

/** Storage state of a vector. */
export type VectorMode = "empty" | "borrowed" | "owned";

/** Liveness token for borrowed bytes; `alive` turns false when the owner closes. */
export type Lease = {
  readonly label: string;
  readonly alive: boolean;
};
