/**
 * @file Error types for vector attachment, access and decoding
 */
/* eslint-disable no-restricted-syntax -- Error classes are idiomatic for exceptions and enable instanceof checks */

/** Thrown when a foreign view is attached to a vector that already owns its storage. */
export class AttachToOwnedError extends Error {
  constructor() {
    super("cannot attach a foreign view: vector already owns its storage");
    this.name = "AttachToOwnedError";
  }
}

/** Thrown by checked accessors when the index is not below the current length. */
export class OutOfRangeError extends RangeError {
  readonly index: number;
  readonly size: number;
  constructor(index: number, size: number) {
    super(`index ${index} out of range for length ${size}`);
    this.name = "OutOfRangeError";
    this.index = index;
    this.size = size;
  }
}

/** Thrown when a decoded element count is outside the accepted range. */
export class FormatCorruptionError extends Error {
  readonly count: bigint;
  constructor(count: bigint, limit: bigint) {
    super(`corrupt length prefix: count ${count} is not below ${limit}`);
    this.name = "FormatCorruptionError";
    this.count = count;
  }
}

/** Thrown when a read asks for more bytes than remain in the input. */
export class TruncatedInputError extends Error {
  constructor(requested: number, remaining: number) {
    super(`truncated input: need ${requested} bytes, ${remaining} remaining`);
    this.name = "TruncatedInputError";
  }
}

/** Thrown when borrowed bytes are used after their region was closed. */
export class StaleBorrowError extends Error {
  constructor(label: string) {
    super(`region '${label}' is closed; borrowed view is no longer valid`);
    this.name = "StaleBorrowError";
  }
}

/** Thrown when two arrays with different element types are combined. */
export class ElementMismatchError extends Error {
  constructor(want: string, got: string) {
    super(`element type mismatch: want ${want}, got ${got}`);
    this.name = "ElementMismatchError";
  }
}
