/**
 * @file Bundle inspection screen
 */
import React from "react";
import { Box } from "ink";
import { Cell, HLine, Hint, Title } from "./components/ui";
import { summarizeRows, type InspectRow } from "./inspect_rows";

const COLUMNS = [
  { key: "name", label: "field", width: 16 },
  { key: "kind", label: "kind", width: 6 },
  { key: "stride", label: "stride", width: 8 },
  { key: "count", label: "count", width: 10 },
  { key: "mode", label: "mode", width: 10 },
  { key: "bytes", label: "bytes", width: 10 },
  { key: "preview", label: "values", width: 28 },
] as const satisfies ReadonlyArray<{ key: keyof InspectRow; label: string; width: number }>;

const TABLE_WIDTH = COLUMNS.reduce((n, c) => n + c.width, 0);

export type InspectViewProps = {
  file: string;
  bytes: number;
  rows: InspectRow[];
};

/** Table of bundle fields with their storage mode. */
export function InspectView({ file, bytes, rows }: InspectViewProps) {
  return (
    <Box flexDirection="column">
      <Title label="cowvec inspect" subtitle={`${file} (${bytes} bytes)`} />
      <Box>
        {COLUMNS.map((c) => (
          <Cell key={c.key} width={c.width} color="gray">
            {c.label}
          </Cell>
        ))}
      </Box>
      <HLine width={TABLE_WIDTH} />
      {rows.map((r) => (
        <Box key={r.name}>
          {COLUMNS.map((c) => (
            <Cell key={c.key} width={c.width} color={c.key === "mode" && r.mode === "borrowed" ? "green" : undefined}>
              {String(r[c.key])}
            </Cell>
          ))}
        </Box>
      ))}
      <HLine width={TABLE_WIDTH} />
      <Hint>{summarizeRows(rows)}</Hint>
    </Box>
  );
}
