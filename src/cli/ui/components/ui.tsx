/**
 * @file Minimal UI primitives for consistent CLI styling
 */
import React from "react";
import { Box, Text } from "ink";

/** Render a cyan title with optional gray subtitles. */
export function Title({ label, subtitle }: { label: string; subtitle?: string | string[] }) {
  const subs = Array.isArray(subtitle) ? subtitle : subtitle ? [subtitle] : [];
  return (
    <Box flexDirection="column">
      <Text color="cyan">{label}</Text>
      {subs.map((s, i) => (
        <Text key={i} color="gray">
          {s}
        </Text>
      ))}
    </Box>
  );
}

/** Render a horizontal line fitting the terminal width (approx). */
export function HLine({ width, char = "─" }: { width?: number; char?: string }) {
  const cols = width ?? (process.stdout?.columns ? Math.max(8, process.stdout.columns - 4) : 60);
  return <Text color="gray">{char.repeat(cols)}</Text>;
}

/** Render a gray hint line. */
export function Hint({ children }: { children: string }) {
  return <Text color="gray">{children}</Text>;
}

/** Fixed-width cell; long values are cut with an ellipsis. */
export function Cell({ width, children, color }: { width: number; children: string; color?: string }) {
  const text = children.length > width - 1 ? `${children.slice(0, Math.max(0, width - 2))}…` : children;
  return (
    <Box width={width}>
      <Text color={color}>{text}</Text>
    </Box>
  );
}
