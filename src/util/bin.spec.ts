/**
 * @file Tests for binary reader/writer helpers
 */
import { createReader, createRegionReader, createWriter, hasDirectAccess, toUint8 } from "./bin";
import { createRegion } from "../region/region";
import { TruncatedInputError } from "../errors";

describe("util/bin", () => {
  it("writes and reads little-endian integers", () => {
    const w = createWriter();
    w.pushU32(0x01020304);
    w.pushI32(-2);
    w.pushU64(2n ** 40n);
    const out = w.concat();
    expect(Array.from(out.subarray(0, 4))).toEqual([4, 3, 2, 1]);
    const r = createReader(out);
    expect(r.readU32()).toBe(0x01020304);
    expect(r.readI32()).toBe(-2);
    expect(r.readU64()).toBe(2n ** 40n);
    expect(r.remaining()).toBe(0);
  });

  it("align pads the writer and skips on the reader", () => {
    const w = createWriter();
    w.pushBytes(new Uint8Array([7, 7, 7]));
    w.align(8);
    w.pushU32(5);
    expect(w.length()).toBe(12);
    const r = createReader(w.concat());
    r.readBytes(3);
    r.align(8);
    expect(r.offset()).toBe(8);
    expect(r.readU32()).toBe(5);
  });

  it("readBytes copies", () => {
    const src = new Uint8Array([1, 2, 3]);
    const r = createReader(src);
    const got = r.readBytes(2);
    src[0] = 9;
    expect(Array.from(got)).toEqual([1, 2]);
  });

  it("reads honour the byteOffset of a Uint8Array input", () => {
    const backing = new Uint8Array([0xff, 1, 0, 0, 0]);
    expect(createReader(backing.subarray(1)).readU32()).toBe(1);
  });

  it("throws TruncatedInputError past the end", () => {
    const r = createReader(new Uint8Array(3));
    expect(() => r.readU32()).toThrow(TruncatedInputError);
    expect(r.offset()).toBe(0);
  });

  it("region readers lend views without copying", () => {
    const region = createRegion(new Uint8Array([1, 2, 3, 4]), "r");
    const r = createRegionReader(region);
    expect(hasDirectAccess(r)).toBe(true);
    expect(hasDirectAccess(createReader(new Uint8Array(0)))).toBe(false);
    r.readBytes(1);
    const { bytes, lease } = r.readPointer(2);
    expect(bytes.buffer).toBe(region.bytes().buffer);
    expect(bytes.byteOffset).toBe(1);
    expect(Array.from(bytes)).toEqual([2, 3]);
    expect(lease).toBe(region.lease);
    expect(r.offset()).toBe(3);
  });

  it("toUint8 wraps ArrayBuffer and passes Uint8Array through", () => {
    const u8 = new Uint8Array(2);
    expect(toUint8(u8)).toBe(u8);
    expect(toUint8(new ArrayBuffer(3)).length).toBe(3);
  });
});
