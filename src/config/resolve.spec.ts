/**
 * @file Specs: resolveConfigPath behavior and constants
 */
import path from "node:path";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";

import { resolveConfigPath, CONFIG_EXTS, DEFAULT_CONFIG_STEM } from "./resolve";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const base = path.resolve(".tmp");
  await mkdir(base, { recursive: true });
  const dir = await mkdtemp(path.join(base, "spec-config-resolve-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe("config/resolve", () => {
  it("returns null when nothing exists", async () =>
    withTempDir(async (dir) => {
      const p = await resolveConfigPath(path.join(dir, DEFAULT_CONFIG_STEM));
      expect(p).toBeNull();
    }));

  it("returns null for a missing explicit file", async () =>
    withTempDir(async (dir) => {
      const p = await resolveConfigPath(path.join(dir, `${DEFAULT_CONFIG_STEM}.mjs`));
      expect(p).toBeNull();
    }));

  it("prefers explicit file when provided and exists", async () =>
    withTempDir(async (dir) => {
      const file = path.join(dir, `${DEFAULT_CONFIG_STEM}.mjs`);
      await writeFile(file, "export default {}\n", "utf8");
      expect(await resolveConfigPath(file)).toBe(file);
    }));

  it("scans extensions in order and finds the first match", async () =>
    withTempDir(async (dir) => {
      const first = path.join(dir, `${DEFAULT_CONFIG_STEM}${CONFIG_EXTS[0]}`);
      const later = path.join(dir, `${DEFAULT_CONFIG_STEM}${CONFIG_EXTS[CONFIG_EXTS.length - 1]}`);
      await writeFile(later, "export default {}\n", "utf8");
      await writeFile(first, "export default {}\n", "utf8");
      expect(await resolveConfigPath(path.join(dir, DEFAULT_CONFIG_STEM))).toBe(first);
    }));

  it("looks for the default stem inside a directory", async () =>
    withTempDir(async (dir) => {
      const sub = path.join(dir, "project");
      await mkdir(sub);
      const file = path.join(sub, `${DEFAULT_CONFIG_STEM}.cjs`);
      await writeFile(file, "module.exports = {}\n", "utf8");
      expect(await resolveConfigPath(sub)).toBe(file);
    }));
});
