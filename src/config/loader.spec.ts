/**
 * @file Specs: loadConfigModule (CJS/ESM handling)
 */
import path from "node:path";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";

import { loadConfigModule } from "./loader";
import { DEFAULT_CONFIG_STEM } from "./resolve";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const base = path.resolve(".tmp");
  await mkdir(base, { recursive: true });
  const dir = await mkdtemp(path.join(base, "spec-config-loader-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe("config/loader", () => {
  it("throws descriptive error when not found", async () =>
    withTempDir(async (dir) => {
      await expect(loadConfigModule(path.join(dir, DEFAULT_CONFIG_STEM))).rejects.toThrow(/Config not found/);
    }));

  it("loads default export from .mjs", async () =>
    withTempDir(async (dir) => {
      const file = path.join(dir, `${DEFAULT_CONFIG_STEM}.mjs`);
      const body = ["export default { attach: { zeroCopy: false }, debug: true };", ""].join(os.EOL);
      await writeFile(file, body, "utf8");
      const mod = await loadConfigModule(file);
      expect(mod).toEqual({ attach: { zeroCopy: false }, debug: true });
    }));

  it("loads CommonJS .cjs via createRequire", async () =>
    withTempDir(async (dir) => {
      const file = path.join(dir, `${DEFAULT_CONFIG_STEM}.cjs`);
      const body = ["module.exports = { assertions: true };", ""].join(os.EOL);
      await writeFile(file, body, "utf8");
      const mod = await loadConfigModule(file);
      expect(mod).toEqual({ assertions: true });
    }));
});
