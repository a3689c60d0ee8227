/**
 * @file Config path resolution
 */
import path from "node:path";
import { stat } from "node:fs/promises";

/** Supported executable config extensions (resolution order). */
export const CONFIG_EXTS = [".mjs", ".mts", ".ts", ".cjs", ".js"] as const;
/** Default, extensionless config file stem used across the project. */
export const DEFAULT_CONFIG_STEM = "cowvec.config" as const;

async function kindOf(p: string): Promise<"file" | "dir" | null> {
  try {
    const st = await stat(p);
    return st.isDirectory() ? "dir" : "file";
  } catch {
    return null;
  }
}

async function firstWithExt(stem: string): Promise<string | null> {
  for (const ext of CONFIG_EXTS) {
    const cand = `${stem}${ext}`;
    if ((await kindOf(cand)) === "file") {
      return cand;
    }
  }
  return null;
}

/** Resolve a config path: allow directory, bare name, or explicit file. */
export async function resolveConfigPath(input?: string): Promise<string | null> {
  const base = input ? path.resolve(input) : path.resolve(DEFAULT_CONFIG_STEM);
  const kind = await kindOf(base);
  if (kind === "file") {
    return base;
  }
  if (kind === "dir") {
    return firstWithExt(path.join(base, DEFAULT_CONFIG_STEM));
  }
  const ext = path.extname(base);
  if (CONFIG_EXTS.some((e) => e === ext)) {
    return null;
  }
  return firstWithExt(base);
}
