/**
 * @file Byte regions that lend zero-copy views under a lease
 *
 * A region plays the part of a memory mapping: it owns a contiguous byte range
 * and lends views into it. Every view handed out carries the region's lease,
 * and closing the region ends the lease, so later access through a borrowed
 * vector fails with `StaleBorrowError` instead of reading released data.
 */
import type { Lease } from "../types";
import type { FileIO } from "../storage/types";
import { StaleBorrowError } from "../errors";

/** Views of 8-byte elements need the region to start on an 8-byte boundary. */
export const REGION_ALIGN = 8;

export type Region = {
  readonly label: string;
  readonly byteLength: number;
  readonly lease: Lease;
  readonly closed: boolean;
  /** Backing bytes; throws once closed. */
  bytes(): Uint8Array;
  close(): void;
};

function rebase(bytes: Uint8Array): Uint8Array {
  if (bytes.byteOffset % REGION_ALIGN === 0) {
    return bytes;
  }
  return bytes.slice();
}

/** Wrap bytes in a region. The caller gives up write access to them. */
export function createRegion(bytes: Uint8Array, label = "region"): Region {
  // eslint-disable-next-line no-restricted-syntax -- released on close so the bytes can be collected
  let held: Uint8Array | null = rebase(bytes);
  const byteLength = bytes.byteLength;
  const lease: Lease = {
    label,
    get alive() {
      return held !== null;
    },
  };
  return {
    label,
    byteLength,
    lease,
    get closed() {
      return held === null;
    },
    bytes() {
      if (held === null) {
        throw new StaleBorrowError(label);
      }
      return held;
    },
    close() {
      held = null;
    },
  };
}

/** Load `path` through a FileIO backend into a region labelled with the path. */
export async function openRegion(io: FileIO, path: string): Promise<Region> {
  const bytes = await io.read(path);
  return createRegion(bytes, path);
}
