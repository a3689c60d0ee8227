/**
 * @file Bundle binary format constants and codecs
 *
 * Layout (little-endian):
 * - Header (16 bytes): magic 'CWVB', version, field count, reserved
 * - Per field: u32 name length, UTF-8 name, u32 element code, u32 stride,
 *   zero padding to an 8-byte boundary, then a length-prefixed vector
 *   (u64 count + count * stride elements)
 *
 * The padding puts every payload on an 8-byte boundary, so any element kind
 * can be viewed in place.
 */
import type { ElementName } from "../types";
import { createEnumCodec } from "../util/enum_codec";

export const MAGIC = 0x43575642; // 'CWVB'
export const VERSION = 1;
export const HEADER_BYTES = 16;
export const FIELD_ALIGN = 8;

const elementCodec = createEnumCodec<ElementName>({
  u8: 0,
  i8: 1,
  u16: 2,
  i16: 3,
  u32: 4,
  i32: 5,
  f32: 6,
  f64: 7,
  i64: 8,
  u64: 9,
} as const satisfies Record<ElementName, number>);
export const ELEMENT_CODES = elementCodec.codes;

/** 0=u8 ... 9=u64 */
export function encodeElement(name: ElementName): number {
  return elementCodec.encode(name);
}

/** Whether `code` names a known element kind. */
export function isElementCode(code: number): boolean {
  return Object.values(ELEMENT_CODES).some((c) => c === code);
}

/**
 *
 */
export function decodeElement(code: number): ElementName {
  return elementCodec.decode(code);
}
