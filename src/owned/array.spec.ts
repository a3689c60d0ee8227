/**
 * @file Tests for owned array storage
 */
import {
  createOwned,
  ownedCapacity,
  ownedClear,
  ownedData,
  ownedFrom,
  ownedPop,
  ownedPush,
  ownedRelease,
  ownedReserve,
  ownedResize,
  ownedSwap,
} from "./array";
import { f32, u16 } from "../element";
import { ElementMismatchError } from "../errors";

describe("owned/array", () => {
  it("createOwned allocates and optionally fills", () => {
    const a = createOwned(f32, 3, 1.5);
    expect(Array.from(ownedData(a))).toEqual([1.5, 1.5, 1.5]);
    expect(Array.from(ownedData(createOwned(f32, 2)))).toEqual([0, 0]);
    expect(() => createOwned(f32, -1)).toThrow(/non-negative integer/);
  });

  it("ownedFrom copies with capacity equal to length", () => {
    const src = new Uint16Array([1, 2, 3]);
    const a = ownedFrom(u16, src);
    src[0] = 99;
    expect(Array.from(ownedData(a))).toEqual([1, 2, 3]);
    expect(ownedCapacity(a)).toBe(3);
  });

  it("push doubles capacity", () => {
    const a = createOwned(u16);
    const caps: number[] = [];
    for (let i = 0; i < 5; i++) {
      ownedPush(a, i);
      caps.push(ownedCapacity(a));
    }
    expect(caps).toEqual([1, 2, 4, 4, 8]);
    expect(Array.from(ownedData(a))).toEqual([0, 1, 2, 3, 4]);
  });

  it("reserve reports reallocation", () => {
    const a = createOwned(u16, 2);
    expect(ownedReserve(a, 0)).toBe(false);
    expect(ownedReserve(a, 1)).toBe(true);
    expect(ownedCapacity(a)).toBe(4);
  });

  it("pop and resize", () => {
    const a = ownedFrom(u16, [5, 6, 7]);
    expect(ownedPop(a)).toBe(7);
    ownedResize(a, 4, 1);
    expect(Array.from(ownedData(a))).toEqual([5, 6, 1, 1]);
    ownedResize(a, 0, 0);
    expect(ownedPop(a)).toBeUndefined();
    expect(() => ownedResize(a, -2, 0)).toThrow(/non-negative integer/);
  });

  it("clear keeps capacity, release drops it", () => {
    const a = ownedFrom(u16, [1, 2]);
    ownedClear(a);
    expect(a.length).toBe(0);
    expect(ownedCapacity(a)).toBe(2);
    ownedRelease(a);
    expect(ownedCapacity(a)).toBe(0);
  });

  it("swap exchanges storage and checks element kinds", () => {
    const a = ownedFrom(u16, [1]);
    const b = ownedFrom(u16, [2, 3]);
    ownedSwap(a, b);
    expect(Array.from(ownedData(a))).toEqual([2, 3]);
    expect(Array.from(ownedData(b))).toEqual([1]);
    expect(() => ownedSwap(a, createOwned(f32))).toThrow(ElementMismatchError);
  });
});
