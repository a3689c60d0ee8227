/**
 * @file Row model for the inspect view
 */
import type { Bundle } from "../../bundle";
import type { VectorMode } from "../../types";

export type InspectRow = {
  name: string;
  kind: string;
  stride: number;
  count: number;
  mode: VectorMode;
  bytes: number;
  preview: string;
};

/** First `max` values joined with commas, with an ellipsis when more remain. */
export function previewValues(values: Iterable<number | bigint>, max = 4): string {
  const out: string[] = [];
  for (const v of values) {
    if (out.length === max) {
      return `${out.join(", ")}, …`;
    }
    out.push(String(v));
  }
  return out.join(", ");
}

/** One row per field, in file order. */
export function inspectRows(bundle: Bundle): InspectRow[] {
  return bundle.fields.map((f) => ({
    name: f.name,
    kind: f.vector.elem.name,
    stride: f.stride,
    count: f.vector.size / f.stride,
    mode: f.attached,
    bytes: f.vector.size * f.vector.elem.bytes,
    preview: previewValues(f.vector),
  }));
}

/** Footer line like `3 fields · 2 borrowed · 1 owned`. */
export function summarizeRows(rows: InspectRow[]): string {
  const borrowed = rows.filter((r) => r.mode === "borrowed").length;
  return `${rows.length} fields · ${borrowed} borrowed · ${rows.length - borrowed} owned`;
}
