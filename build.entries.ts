/**
 * @file Build entry catalog
 *
 * Single source of truth for the Vite library build: each entry maps an
 * output name under dist/ to its source file, plus any dependencies Rollup
 * should leave external.
 */

export type EntryConfig = {
  /**
   * Entry file path relative to project root
   */
  path: string;
  /**
   * Optional description of the entry
   */
  description?: string;
  /**
   * External dependencies for this entry (passed to Rollup)
   */
  external?: string[];
};

export type EntryCatalog = {
  [entryName: string]: EntryConfig;
};

/**
 * Catalog of all build entries
 */
export const entries: EntryCatalog = {
  // Main entry
  index: {
    path: "src/index.ts",
    description: "Main library entry point",
  },

  // CLI (Node.js)
  "cli/index": {
    path: "src/cli/main.tsx",
    description: "Command line interface",
    external: ["ink", "react"],
  },

  // Storage implementations
  "storage/node": {
    path: "src/storage/node.ts",
    description: "Node.js file system storage",
  },

  "storage/memory": {
    path: "src/storage/memory.ts",
    description: "In-memory storage (works everywhere)",
  },

  "storage/types": {
    path: "src/storage/types.ts",
    description: "Storage type definitions",
  },

  // Config public surface
  "config/index": {
    path: "src/config/index.ts",
    description: "Config API surface and helpers",
  },
};

/**
 * Get all external dependencies for all entries
 */
export function getAllExternals(): Array<string | RegExp> {
  const externals = new Set<string | RegExp>();

  // Add Node.js built-ins
  externals.add(/node:.+/);

  // Add entry-specific externals
  for (const config of Object.values(entries)) {
    if (config.external) {
      config.external.forEach((ext) => externals.add(ext));
    }
  }

  return Array.from(externals);
}

/**
 * Convert entries to Vite lib entry format
 */
export function getViteEntries(): Record<string, string> {
  const viteEntries: Record<string, string> = {};

  for (const [name, config] of Object.entries(entries)) {
    viteEntries[name] = config.path;
  }

  return viteEntries;
}
