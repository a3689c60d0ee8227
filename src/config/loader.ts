/**
 * @file Config module loader (CJS/ESM/TS)
 */
import path from "node:path";
import { pathToFileURL } from "node:url";
import { createRequire } from "node:module";
import { resolveConfigPath, CONFIG_EXTS, DEFAULT_CONFIG_STEM } from "./resolve";
import { hasOwn } from "../util/is-object";
import { hasErrorMessage } from "../util/is-error";

function pickDefault(mod: unknown): unknown {
  if (hasOwn(mod, "default") && mod.default !== undefined) {
    return mod.default;
  }
  return mod;
}

/** Load a config module and return its default export (or module itself). */
export async function loadConfigModule(configPath?: string): Promise<unknown> {
  const resolved = await resolveConfigPath(configPath);
  if (!resolved) {
    throw new Error(
      `Config not found. Looked for ${configPath ?? DEFAULT_CONFIG_STEM + ".*"} with extensions ${CONFIG_EXTS.join(", ")}`,
    );
  }
  const ext = path.extname(resolved).toLowerCase();
  if (ext === ".cjs") {
    const req = createRequire(import.meta.url);
    const mod: unknown = req(resolved);
    return pickDefault(mod);
  }
  const url = pathToFileURL(resolved).href;
  try {
    // eslint-disable-next-line no-restricted-syntax -- dynamic import is required to load user config modules
    const mod: unknown = await import(url);
    return pickDefault(mod);
  } catch (e) {
    if (ext === ".ts" || ext === ".mts") {
      const original = hasErrorMessage(e) ? String(e.message) : String(e);
      throw new Error(
        `Failed to load TypeScript config '${path.basename(resolved)}'. ` +
          `Run under a TS-aware loader (e.g. tsx) or pre-compile to .mjs/.js. Original: ${original}`,
      );
    }
    throw e;
  }
}
