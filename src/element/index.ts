/**
 * @file Element type descriptors for numeric vectors
 *
 * One descriptor per scalar kind. Views are created in host byte order, which
 * is little-endian on every platform Node.js supports.
 */
import type { ElementName, ElementType, Scalar } from "../types";
import { hasOwn } from "../util/is-object";

export const u8: ElementType<number> = {
  name: "u8",
  bytes: 1,
  zero: 0,
  alloc: (n) => new Uint8Array(n),
  view: (b, off, n) => new Uint8Array(b, off, n),
};

export const i8: ElementType<number> = {
  name: "i8",
  bytes: 1,
  zero: 0,
  alloc: (n) => new Int8Array(n),
  view: (b, off, n) => new Int8Array(b, off, n),
};

export const u16: ElementType<number> = {
  name: "u16",
  bytes: 2,
  zero: 0,
  alloc: (n) => new Uint16Array(n),
  view: (b, off, n) => new Uint16Array(b, off, n),
};

export const i16: ElementType<number> = {
  name: "i16",
  bytes: 2,
  zero: 0,
  alloc: (n) => new Int16Array(n),
  view: (b, off, n) => new Int16Array(b, off, n),
};

export const u32: ElementType<number> = {
  name: "u32",
  bytes: 4,
  zero: 0,
  alloc: (n) => new Uint32Array(n),
  view: (b, off, n) => new Uint32Array(b, off, n),
};

export const i32: ElementType<number> = {
  name: "i32",
  bytes: 4,
  zero: 0,
  alloc: (n) => new Int32Array(n),
  view: (b, off, n) => new Int32Array(b, off, n),
};

export const f32: ElementType<number> = {
  name: "f32",
  bytes: 4,
  zero: 0,
  alloc: (n) => new Float32Array(n),
  view: (b, off, n) => new Float32Array(b, off, n),
};

export const f64: ElementType<number> = {
  name: "f64",
  bytes: 8,
  zero: 0,
  alloc: (n) => new Float64Array(n),
  view: (b, off, n) => new Float64Array(b, off, n),
};

export const i64: ElementType<bigint> = {
  name: "i64",
  bytes: 8,
  zero: 0n,
  alloc: (n) => new BigInt64Array(n),
  view: (b, off, n) => new BigInt64Array(b, off, n),
};

export const u64: ElementType<bigint> = {
  name: "u64",
  bytes: 8,
  zero: 0n,
  alloc: (n) => new BigUint64Array(n),
  view: (b, off, n) => new BigUint64Array(b, off, n),
};

/** All number-valued kinds keyed by name. */
export const NUMBER_ELEMENTS = { u8, i8, u16, i16, u32, i32, f32, f64 } as const;
/** All bigint-valued kinds keyed by name. */
export const BIGINT_ELEMENTS = { i64, u64 } as const;

export type NumberElementName = keyof typeof NUMBER_ELEMENTS;
export type BigIntElementName = keyof typeof BIGINT_ELEMENTS;

/** Narrow an element name to the bigint-valued kinds. */
export function isBigIntElementName(name: ElementName): name is BigIntElementName {
  return name === "i64" || name === "u64";
}

/** Look up a descriptor by name. */
export function elementByName(name: ElementName): ElementType<number> | ElementType<bigint> {
  if (isBigIntElementName(name)) {
    return BIGINT_ELEMENTS[name];
  }
  return NUMBER_ELEMENTS[name];
}

/** Narrow an arbitrary string to a supported element name. */
export function isElementName(x: string): x is ElementName {
  return hasOwn(NUMBER_ELEMENTS, x) || hasOwn(BIGINT_ELEMENTS, x);
}

/** Whether a byte offset can back a view of this element kind. */
export function isAligned<T extends Scalar>(elem: ElementType<T>, byteOffset: number): boolean {
  return byteOffset % elem.bytes === 0;
}
