/**
 * @file Bundle encoding and decoding
 *
 * A bundle is an ordered list of named vector fields. Decoding goes through
 * the attachment protocol, so a bundle read from a region leaves every
 * aligned field borrowed from that region until it is first mutated.
 */
import type { Scalar, VectorMode } from "../types";
import type { BinReader } from "../util/bin";
import { createReader, createRegionReader, createWriter } from "../util/bin";
import { elementByName } from "../element";
import { CowVector, type CowVectorOptions } from "../cow/vector";
import { readVector, writeVector, type ReadVectorOptions } from "../attach/protocol";
import { openRegion, type Region } from "../region/region";
import type { FileIO } from "../storage/types";
import { MAGIC, VERSION, HEADER_BYTES, FIELD_ALIGN, encodeElement, decodeElement, isElementCode } from "./format";
import {
  BundleBadMagicError,
  BundleCorruptFieldError,
  BundleTooShortError,
  BundleUnsupportedVersionError,
} from "./errors";

export type BundleFieldInput = {
  name: string;
  vector: CowVector<Scalar>;
  stride?: number;
};

export type BundleField = {
  name: string;
  stride: number;
  vector: CowVector<Scalar>;
  /** Mode right after decoding: `borrowed` when attached zero-copy. */
  attached: VectorMode;
};

export type Bundle = {
  fields: BundleField[];
};

export type BundleReadOptions = Omit<ReadVectorOptions, "stride"> & CowVectorOptions;

/** Bundle read from a region; `close()` ends every borrow taken from it. */
export type OpenedBundle = Bundle & {
  region: Region;
  close(): void;
};

/** Encode fields into a standalone bundle buffer. */
export function encodeBundle(fields: BundleFieldInput[]): Uint8Array {
  const w = createWriter();
  w.pushU32(MAGIC);
  w.pushU32(VERSION);
  w.pushU32(fields.length);
  w.pushU32(0);
  const enc = new TextEncoder();
  for (const f of fields) {
    const stride = f.stride ?? 1;
    const name = enc.encode(f.name);
    w.pushU32(name.byteLength);
    w.pushBytes(name);
    w.pushU32(encodeElement(f.vector.elem.name));
    w.pushU32(stride);
    w.align(FIELD_ALIGN);
    writeVector(w, f.vector, { stride });
  }
  return w.concat();
}

/** Decode a bundle from any reader; direct readers yield borrowed fields. */
export function decodeBundle(reader: BinReader, opts: BundleReadOptions = {}): Bundle {
  const got = reader.remaining();
  if (got < HEADER_BYTES) {
    throw new BundleTooShortError(got);
  }
  if (reader.readU32() !== MAGIC) {
    throw new BundleBadMagicError();
  }
  const version = reader.readU32();
  if (version !== VERSION) {
    throw new BundleUnsupportedVersionError(version);
  }
  const count = reader.readU32();
  reader.readU32();

  const dec = new TextDecoder();
  const fields: BundleField[] = [];
  for (let i = 0; i < count; i++) {
    const nameLen = reader.readU32();
    const name = dec.decode(reader.readBytes(nameLen));
    const code = reader.readU32();
    if (!isElementCode(code)) {
      throw new BundleCorruptFieldError(name, `unknown element code ${code}`);
    }
    const elem = elementByName(decodeElement(code));
    const stride = reader.readU32();
    if (stride === 0) {
      throw new BundleCorruptFieldError(name, "stride is 0");
    }
    reader.align(FIELD_ALIGN);
    const vector = new CowVector<Scalar>(elem, { assertions: opts.assertions, onPromote: opts.onPromote });
    const attached = readVector(reader, vector, { stride, zeroCopy: opts.zeroCopy, maxCount: opts.maxCount });
    fields.push({ name, stride, vector, attached });
  }
  return { fields };
}

/** Decode from an in-memory buffer; every field ends up owned. */
export function decodeBundleBytes(bytes: Uint8Array, opts?: BundleReadOptions): Bundle {
  return decodeBundle(createReader(bytes), opts);
}

/** Open `path` as a region and decode it in place. */
export async function openBundle(io: FileIO, path: string, opts?: BundleReadOptions): Promise<OpenedBundle> {
  const region = await openRegion(io, path);
  const bundle = decodeBundle(createRegionReader(region), opts);
  return { ...bundle, region, close: () => region.close() };
}

/** Encode and atomically write a bundle. */
export async function saveBundle(io: FileIO, path: string, fields: BundleFieldInput[]): Promise<number> {
  const bytes = encodeBundle(fields);
  await io.atomicWrite(path, bytes);
  return bytes.byteLength;
}

/** Field lookup by name. */
export function getField(bundle: Bundle, name: string): BundleField | undefined {
  return bundle.fields.find((f) => f.name === name);
}
