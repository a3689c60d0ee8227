/**
 * @file Minimal happy-path spec for the inspect screen
 */
import { InspectView } from "./InspectView";

describe("InspectView", () => {
  test("exports a function component", () => {
    expect(typeof InspectView).toBe("function");
  });
});
