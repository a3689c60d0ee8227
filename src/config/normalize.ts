/**
 * @file Config normalization + validation (raw -> AppConfig)
 */
import type { AppConfig } from "./types";
import { isObject } from "../util/is-object";

/** 2^40, the largest accepted element count bound. */
export const MAX_COUNT_LIMIT = 2 ** 40;

export type RawAppConfig = {
  attach?: Partial<AppConfig["attach"]>;
  assertions?: boolean;
  debug?: boolean;
};

export const DEFAULT_CONFIG: AppConfig = {
  attach: { zeroCopy: true, maxCount: MAX_COUNT_LIMIT },
  assertions: false,
  debug: false,
};

/** Authoring helper to get type inference in user configs. */
export function defineConfig(x: RawAppConfig): RawAppConfig {
  return x;
}

function optionalBoolean(obj: Record<string, unknown>, key: string, where: string): boolean | undefined {
  const v = obj[key];
  if (v === undefined) {
    return undefined;
  }
  if (typeof v !== "boolean") {
    throw new Error(`${where}.${key} must be a boolean`);
  }
  return v;
}

/** Validate raw config shape and property types. Throws with a descriptive message on invalid. */
export function validateRawAppConfig(raw: unknown): asserts raw is RawAppConfig {
  if (!isObject(raw)) {
    throw new Error("config must be an object (JS/TS module export)");
  }
  optionalBoolean(raw, "assertions", "config");
  optionalBoolean(raw, "debug", "config");
  const attach = raw.attach;
  if (attach === undefined) {
    return;
  }
  if (!isObject(attach)) {
    throw new Error("config.attach must be an object");
  }
  optionalBoolean(attach, "zeroCopy", "config.attach");
  const maxCount = attach.maxCount;
  if (maxCount === undefined) {
    return;
  }
  if (typeof maxCount !== "number" || !Number.isInteger(maxCount) || maxCount < 1 || maxCount > MAX_COUNT_LIMIT) {
    throw new Error(`config.attach.maxCount must be an integer in [1, 2^40]`);
  }
}

/** Normalize raw config into runtime AppConfig, filling defaults. */
export function normalizeConfig(raw: unknown): AppConfig {
  validateRawAppConfig(raw);
  return {
    attach: {
      zeroCopy: raw.attach?.zeroCopy ?? DEFAULT_CONFIG.attach.zeroCopy,
      maxCount: raw.attach?.maxCount ?? DEFAULT_CONFIG.attach.maxCount,
    },
    assertions: raw.assertions ?? DEFAULT_CONFIG.assertions,
    debug: raw.debug ?? DEFAULT_CONFIG.debug,
  } satisfies AppConfig;
}
