/**
 * @file CLI tool: validate cowvec.config* structure (via loader + normalization)
 */
import { loadConfigModule, normalizeConfig, type AppConfig } from "../../config";

export type ValidateResult = { ok: true; config: AppConfig } | { ok: false; message: string };

/** Load and normalize a config file, reporting the first problem found. */
export async function validateConfigFile(file?: string): Promise<ValidateResult> {
  try {
    const raw = await loadConfigModule(file);
    return { ok: true, config: normalizeConfig(raw) };
  } catch (e) {
    return { ok: false, message: e instanceof Error ? e.message : String(e) };
  }
}
