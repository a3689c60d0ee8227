/**
 * @file Executable config example (TS)
 * Copy to `cowvec.config.ts` (or .mjs/.cjs/.js) next to where the CLI runs.
 */
import { defineConfig } from "./src/config";

export default defineConfig({
  attach: {
    // Set to false to always copy fields into owned storage
    zeroCopy: true,
    // Length prefixes at or above this are rejected as corrupt (max 2^40)
    maxCount: 2 ** 32,
  },
  assertions: true,
  debug: false,
});
