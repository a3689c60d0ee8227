/**
 * @file File I/O abstraction layer
 * Backends for loading and storing bundle bytes.
 */
export type FileIO = {
  read(path: string): Promise<Uint8Array>;
  write(path: string, data: Uint8Array | ArrayBuffer): Promise<void>;
  /** Write to a temporary name, then rename over `path`. */
  atomicWrite(path: string, data: Uint8Array | ArrayBuffer): Promise<void>;
  del?(path: string): Promise<void>;
};
