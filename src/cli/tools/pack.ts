/**
 * @file CLI tool: build a bundle from a JSON description
 *
 * Input shape:
 *   { "fields": [{ "name": "ids", "kind": "i64", "values": [1, "2"] },
 *                { "name": "codes", "kind": "u8", "stride": 4, "values": [1, 2, 3, 4] }] }
 * Values of 64-bit kinds may be integers or decimal strings. Every value must fit
 * its kind: integers in range for integer kinds, finite numbers for floats.
 */
import type { Scalar } from "../../types";
import type { CowVector } from "../../cow/vector";
import { cowFrom } from "../../cow/vector";
import {
  BIGINT_ELEMENTS,
  NUMBER_ELEMENTS,
  isBigIntElementName,
  isElementName,
  type BigIntElementName,
  type NumberElementName,
} from "../../element";
import { saveBundle, type BundleFieldInput } from "../../bundle";
import type { FileIO } from "../../storage/types";
import { isObject } from "../../util/is-object";

const INT_RANGES = {
  u8: [0, 0xff],
  i8: [-0x80, 0x7f],
  u16: [0, 0xffff],
  i16: [-0x8000, 0x7fff],
  u32: [0, 0xffffffff],
  i32: [-0x80000000, 0x7fffffff],
} as const;

const BIGINT_RANGES = {
  i64: [-(1n << 63n), (1n << 63n) - 1n],
  u64: [0n, (1n << 64n) - 1n],
} as const;

/** Largest finite float32. */
const F32_MAX = 3.4028234663852886e38;

function toBigInt(v: unknown, kind: BigIntElementName, where: string): bigint {
  const n =
    typeof v === "number" && Number.isSafeInteger(v)
      ? BigInt(v)
      : typeof v === "string" && /^-?\d+$/.test(v)
        ? BigInt(v)
        : undefined;
  if (n === undefined) {
    throw new Error(`${where}: expected an integer or decimal string, got ${JSON.stringify(v)}`);
  }
  const [lo, hi] = BIGINT_RANGES[kind];
  if (n < lo || n > hi) {
    throw new Error(`${where}: ${n} is out of range for ${kind}`);
  }
  return n;
}

function toNumber(v: unknown, kind: NumberElementName, where: string): number {
  if (typeof v !== "number") {
    throw new Error(`${where}: expected a number, got ${JSON.stringify(v)}`);
  }
  if (kind === "f32" || kind === "f64") {
    if (!Number.isFinite(v) || (kind === "f32" && Math.abs(v) > F32_MAX)) {
      throw new Error(`${where}: ${v} is not a finite ${kind}`);
    }
    return v;
  }
  const [lo, hi] = INT_RANGES[kind];
  if (!Number.isInteger(v) || v < lo || v > hi) {
    throw new Error(`${where}: ${v} is not an integer in [${lo}, ${hi}] for ${kind}`);
  }
  return v;
}

function parseStride(v: unknown, where: string): number {
  if (v === undefined) {
    return 1;
  }
  if (typeof v !== "number" || !Number.isInteger(v) || v < 1) {
    throw new Error(`${where}.stride must be a positive integer`);
  }
  return v;
}

function parseField(raw: unknown, i: number): BundleFieldInput {
  const where = `fields[${i}]`;
  if (!isObject(raw)) {
    throw new Error(`${where} must be an object`);
  }
  const { name, kind, stride, values } = raw;
  if (typeof name !== "string" || name.length === 0) {
    throw new Error(`${where}.name must be a non-empty string`);
  }
  if (typeof kind !== "string" || !isElementName(kind)) {
    throw new Error(`${where}.kind must be one of u8, i8, u16, i16, u32, i32, f32, f64, i64, u64`);
  }
  const s = parseStride(stride, where);
  if (!Array.isArray(values)) {
    throw new Error(`${where}.values must be an array`);
  }
  if (values.length % s !== 0) {
    throw new Error(`${where}: ${values.length} values do not divide into groups of ${s}`);
  }
  const vector: CowVector<Scalar> = isBigIntElementName(kind)
    ? cowFrom(
        BIGINT_ELEMENTS[kind],
        values.map((v, j) => toBigInt(v, kind, `${where}.values[${j}]`)),
      )
    : cowFrom(
        NUMBER_ELEMENTS[kind],
        values.map((v, j) => toNumber(v, kind, `${where}.values[${j}]`)),
      );
  return { name, vector, stride: s };
}

/** Validate a parsed JSON document and build bundle fields from it. */
export function parsePackInput(raw: unknown): BundleFieldInput[] {
  if (!isObject(raw) || !Array.isArray(raw.fields)) {
    throw new Error("input must be an object with a 'fields' array");
  }
  const fields = raw.fields.map((f: unknown, i: number) => parseField(f, i));
  const seen = new Set<string>();
  for (const f of fields) {
    if (seen.has(f.name)) {
      throw new Error(`duplicate field name '${f.name}'`);
    }
    seen.add(f.name);
  }
  return fields;
}

/** Read `input` (JSON) and write the bundle to `out`. Returns field count and bytes written. */
export async function runPack(io: FileIO, input: string, out: string): Promise<{ fields: number; bytes: number }> {
  const text = new TextDecoder().decode(await io.read(input));
  const fields = parsePackInput(JSON.parse(text));
  const bytes = await saveBundle(io, out, fields);
  return { fields: fields.length, bytes };
}
