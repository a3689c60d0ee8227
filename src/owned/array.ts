/**
 * @file Growable, exclusively owned typed-array storage
 *
 * The owned half of a copy-on-write vector, and the type callers hand to
 * `CowVector.swap`. Capacity doubles on growth; the live region is
 * `buf[0, length)`.
 */
import type { ElementType, NumericArray, Scalar } from "../types";
import { ElementMismatchError } from "../errors";

export type OwnedArray<T extends Scalar> = {
  readonly elem: ElementType<T>;
  buf: NumericArray<T>;
  length: number;
};

/** Allocate an owned array of `length` elements set to `fill` (default zero). */
export function createOwned<T extends Scalar>(elem: ElementType<T>, length = 0, fill?: T): OwnedArray<T> {
  if (!Number.isInteger(length) || length < 0) {
    throw new Error(`length must be a non-negative integer, got ${length}`);
  }
  const buf = elem.alloc(length);
  if (fill !== undefined && fill !== elem.zero) {
    buf.fill(fill);
  }
  return { elem, buf, length };
}

/** Copy `values` into a new owned array whose capacity equals their count. */
export function ownedFrom<T extends Scalar>(elem: ElementType<T>, values: ArrayLike<T>): OwnedArray<T> {
  const buf = elem.alloc(values.length);
  buf.set(values);
  return { elem, buf, length: values.length };
}

export function ownedCapacity<T extends Scalar>(a: OwnedArray<T>): number {
  return a.buf.length;
}

/** Ensure room for `extra` more elements. Returns true if storage was reallocated. */
export function ownedReserve<T extends Scalar>(a: OwnedArray<T>, extra = 1): boolean {
  const need = a.length + extra;
  if (need <= a.buf.length) {
    return false;
  }
  // eslint-disable-next-line no-restricted-syntax -- growth loop needs a mutable capacity
  let cap = Math.max(1, a.buf.length);
  while (cap < need) {
    cap *= 2;
  }
  const next = a.elem.alloc(cap);
  next.set(a.buf.subarray(0, a.length));
  a.buf = next;
  return true;
}

export function ownedPush<T extends Scalar>(a: OwnedArray<T>, value: T): void {
  ownedReserve(a, 1);
  a.buf[a.length] = value;
  a.length++;
}

/** Remove and return the last element, or undefined when empty. */
export function ownedPop<T extends Scalar>(a: OwnedArray<T>): T | undefined {
  if (a.length === 0) {
    return undefined;
  }
  a.length--;
  return a.buf[a.length];
}

/** Shrink or grow to `n`; new slots take `fill`. */
export function ownedResize<T extends Scalar>(a: OwnedArray<T>, n: number, fill: T): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`length must be a non-negative integer, got ${n}`);
  }
  if (n > a.length) {
    ownedReserve(a, n - a.length);
    a.buf.fill(fill, a.length, n);
  }
  a.length = n;
}

/** Live elements as a view sharing storage. */
export function ownedData<T extends Scalar>(a: OwnedArray<T>): NumericArray<T> {
  return a.buf.subarray(0, a.length);
}

/** Drop all elements; capacity is kept. */
export function ownedClear<T extends Scalar>(a: OwnedArray<T>): void {
  a.length = 0;
}

/** Drop all elements and the storage behind them. */
export function ownedRelease<T extends Scalar>(a: OwnedArray<T>): void {
  a.buf = a.elem.alloc(0);
  a.length = 0;
}

/** Exchange contents of two owned arrays of the same element kind. */
export function ownedSwap<T extends Scalar>(a: OwnedArray<T>, b: OwnedArray<T>): void {
  if (a.elem.name !== b.elem.name) {
    throw new ElementMismatchError(a.elem.name, b.elem.name);
  }
  const buf = a.buf;
  const length = a.length;
  a.buf = b.buf;
  a.length = b.length;
  b.buf = buf;
  b.length = length;
}
