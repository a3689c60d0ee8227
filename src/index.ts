/**
 * @file Public entrypoint (single canonical import)
 * @remarks
 * Aggregates the copy-on-write vector, the attachment protocol and the bundle
 * format. Node-only pieces (filesystem FileIO, config loading) are exposed
 * through their own entries as well.
 */

/**
 * Core types
 * @public
 */
export type {
  Scalar,
  ElementName,
  ElementType,
  NumericArray,
  ReadonlyNumericArray,
  VectorMode,
  Lease,
} from "./types";

/**
 * Copy-on-write vector
 * - CowVector: borrowed or owned contiguous storage, promoted on first write
 * - cowFrom: owned vector from plain values
 * @public
 */
export { CowVector, cowFrom } from "./cow/vector";
export type { CowVectorOptions, PromoteEvent } from "./cow/vector";

/**
 * Element descriptors
 * @public
 */
export {
  u8,
  i8,
  u16,
  i16,
  u32,
  i32,
  f32,
  f64,
  i64,
  u64,
  NUMBER_ELEMENTS,
  BIGINT_ELEMENTS,
  elementByName,
  isElementName,
  isBigIntElementName,
} from "./element";

/**
 * Growable owned storage
 * @public
 */
export {
  createOwned,
  ownedFrom,
  ownedCapacity,
  ownedReserve,
  ownedPush,
  ownedPop,
  ownedResize,
  ownedData,
  ownedClear,
  ownedRelease,
  ownedSwap,
} from "./owned/array";
export type { OwnedArray } from "./owned/array";

/**
 * Attachment protocol and binary cursors
 * @public
 */
export {
  readVector,
  readPackedVector,
  writeVector,
  writePackedVector,
  checkCount,
  MAX_COUNT,
  PACKED_STRIDE,
} from "./attach/protocol";
export type { ReadVectorOptions, WriteVectorOptions } from "./attach/protocol";
export { createReader, createRegionReader, createWriter, hasDirectAccess } from "./util/bin";
export type { BinReader, BinWriter, DirectReader, BorrowedBytes } from "./util/bin";
export { createRegion, openRegion, REGION_ALIGN } from "./region/region";
export type { Region } from "./region/region";

/**
 * Bundle container
 * @public
 */
export {
  encodeBundle,
  decodeBundle,
  decodeBundleBytes,
  openBundle,
  saveBundle,
  getField,
  BundleTooShortError,
  BundleBadMagicError,
  BundleUnsupportedVersionError,
  BundleCorruptFieldError,
} from "./bundle";
export type { Bundle, BundleField, BundleFieldInput, BundleReadOptions, OpenedBundle } from "./bundle";

/**
 * Storage
 * @public
 */
export type { FileIO } from "./storage/types";
export { createMemoryFileIO } from "./storage/memory";

export {
  AttachToOwnedError,
  OutOfRangeError,
  FormatCorruptionError,
  TruncatedInputError,
  StaleBorrowError,
  ElementMismatchError,
} from "./errors";
