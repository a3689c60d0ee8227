/**
 * @file Shared config API surface for the CLI and library callers.
 */
import { CONFIG_EXTS, DEFAULT_CONFIG_STEM, resolveConfigPath } from "./resolve";
import { loadConfigModule } from "./loader";
import { DEFAULT_CONFIG, normalizeConfig } from "./normalize";
import type { AppConfig } from "./types";
import type { BundleReadOptions } from "../bundle";

export { resolveConfigPath, CONFIG_EXTS, DEFAULT_CONFIG_STEM } from "./resolve";
export { loadConfigModule } from "./loader";
export {
  normalizeConfig,
  validateRawAppConfig,
  defineConfig,
  DEFAULT_CONFIG,
  MAX_COUNT_LIMIT,
  type RawAppConfig,
} from "./normalize";
export type { AppConfig, AttachConfig } from "./types";

/**
 * Load + normalize a config. An explicit path must resolve; without one the
 * default stem is tried and defaults are used when nothing is found.
 */
export async function loadAppConfig(configPath?: string): Promise<AppConfig> {
  if (!configPath && !(await resolveConfigPath())) {
    return DEFAULT_CONFIG;
  }
  return normalizeConfig(await loadConfigModule(configPath));
}

/** Map config onto bundle read options. */
export function toReadOptions(cfg: AppConfig): BundleReadOptions {
  return {
    zeroCopy: cfg.attach.zeroCopy,
    maxCount: cfg.attach.maxCount,
    assertions: cfg.assertions,
  };
}

/** A short label like `cowvec.config[mjs/mts/ts/cjs/js]` for UI/help. */
export function configPatternsLabel(): string {
  return `${DEFAULT_CONFIG_STEM}[${CONFIG_EXTS.map((e) => e.slice(1)).join("/")}]`;
}
