/**
 * @file CLI tool: open a bundle and summarize its fields
 */
import path from "node:path";
import { openBundle } from "../../bundle";
import { loadAppConfig, toReadOptions } from "../../config";
import { createNodeFileIO } from "../../storage/node";
import { inspectRows, type InspectRow } from "../ui/inspect_rows";

export type Inspection = {
  file: string;
  bytes: number;
  rows: InspectRow[];
};

/** Open `file` zero-copy (as configured), collect rows, then close the region. */
export async function inspectFile(file: string, configPath?: string): Promise<Inspection> {
  const cfg = await loadAppConfig(configPath);
  const full = path.resolve(file);
  const io = createNodeFileIO(path.dirname(full));
  // read-only: fields stay as decoded, so nothing is promoted here
  const opened = await openBundle(io, path.basename(full), toReadOptions(cfg));
  try {
    if (cfg.debug) {
      for (const f of opened.fields) {
        console.debug(`[cowvec] ${f.name}: ${f.attached} (${f.vector.size} x ${f.vector.elem.name})`);
      }
    }
    return { file: full, bytes: opened.region.byteLength, rows: inspectRows(opened) };
  } finally {
    opened.close();
  }
}
