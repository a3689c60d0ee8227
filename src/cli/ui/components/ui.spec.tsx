/**
 * @file Minimal happy-path specs for UI primitives
 */
import { Title, HLine, Hint, Cell } from "./ui";

describe("ui primitives", () => {
  test("exports are functions", () => {
    expect(typeof Title).toBe("function");
    expect(typeof HLine).toBe("function");
    expect(typeof Hint).toBe("function");
    expect(typeof Cell).toBe("function");
  });
});
