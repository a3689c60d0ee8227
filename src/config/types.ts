/**
 * @file Config types for cowvec
 */

/** Options for the attachment protocol. */
export type AttachConfig = {
  /** Attach zero-copy when the reader allows it. */
  zeroCopy: boolean;
  /** Counts at or above this are rejected as corrupt (at most 2^40). */
  maxCount: number;
};

/** Normalized runtime config. */
export type AppConfig = {
  attach: AttachConfig;
  /** Bound-check unchecked element reads. */
  assertions: boolean;
  /** Log per-field attach results. */
  debug: boolean;
};
