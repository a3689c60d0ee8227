/**
 * @file Tests for element descriptors
 */
import { elementByName, isAligned, isBigIntElementName, isElementName, f64, i16, u64 } from "./index";

describe("element", () => {
  it("looks up descriptors by name", () => {
    expect(elementByName("i16")).toBe(i16);
    expect(elementByName("u64")).toBe(u64);
    expect(elementByName("f64").bytes).toBe(8);
  });

  it("narrows names", () => {
    expect(isElementName("f32")).toBe(true);
    expect(isElementName("f16")).toBe(false);
    expect(isElementName("toString")).toBe(false);
    expect(isBigIntElementName("i64")).toBe(true);
    expect(isBigIntElementName("i32")).toBe(false);
  });

  it("allocates and views with the right widths", () => {
    const buf = new ArrayBuffer(16);
    const v = f64.view(buf, 8, 1);
    v[0] = 2.5;
    expect(new Float64Array(buf)[1]).toBe(2.5);
    expect(u64.alloc(2)[1]).toBe(0n);
  });

  it("checks alignment against element width", () => {
    expect(isAligned(f64, 16)).toBe(true);
    expect(isAligned(f64, 4)).toBe(false);
    expect(isAligned(i16, 6)).toBe(true);
  });
});
