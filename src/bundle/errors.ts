/**
 * @file Bundle specific error types for clearer diagnostics
 */
/* eslint-disable no-restricted-syntax -- Error classes are idiomatic for exceptions and enable instanceof checks */
/** Thrown when the input is shorter than the bundle header. */
export class BundleTooShortError extends Error {
  constructor(got: number) {
    super(`bundle too short: ${got} bytes`);
    this.name = "BundleTooShortError";
  }
}

/** Thrown when bundle magic does not match the expected constant. */
export class BundleBadMagicError extends Error {
  constructor() {
    super("bad bundle magic");
    this.name = "BundleBadMagicError";
  }
}

/** Thrown when bundle version is not supported by this decoder. */
export class BundleUnsupportedVersionError extends Error {
  constructor(version: number) {
    super(`unsupported bundle version ${version}`);
    this.name = "BundleUnsupportedVersionError";
  }
}

/** Thrown when a field descriptor carries an unknown element code or a zero stride. */
export class BundleCorruptFieldError extends Error {
  constructor(field: string, detail: string) {
    super(`corrupt bundle field '${field}': ${detail}`);
    this.name = "BundleCorruptFieldError";
  }
}
