/**
 * @file Specs: inspect row model
 */
import { inspectRows, previewValues, summarizeRows } from "./inspect_rows";
import { decodeBundle, encodeBundle } from "../../bundle";
import { cowFrom } from "../../cow/vector";
import { i64, u16 } from "../../element";
import { createRegion } from "../../region/region";
import { createRegionReader } from "../../util/bin";

describe("cli/ui/inspect_rows", () => {
  it("previews at most four values", () => {
    expect(previewValues([])).toBe("");
    expect(previewValues([1, 2, 3, 4])).toBe("1, 2, 3, 4");
    expect(previewValues([1, 2, 3, 4, 5])).toBe("1, 2, 3, 4, …");
    expect(previewValues([7n, 8n], 1)).toBe("7, …");
  });

  it("builds one row per field and summarizes modes", () => {
    const bytes = encodeBundle([
      { name: "ids", vector: cowFrom(i64, [5n, 6n, 7n]) },
      { name: "hist", vector: cowFrom(u16, [1, 2]) },
    ]);
    const bundle = decodeBundle(createRegionReader(createRegion(bytes)));
    const rows = inspectRows(bundle);
    expect(rows).toEqual([
      { name: "ids", kind: "i64", stride: 1, count: 3, mode: "borrowed", bytes: 24, preview: "5, 6, 7" },
      { name: "hist", kind: "u16", stride: 1, count: 2, mode: "borrowed", bytes: 4, preview: "1, 2" },
    ]);
    expect(summarizeRows(rows)).toBe("2 fields · 2 borrowed · 0 owned");
  });
});
