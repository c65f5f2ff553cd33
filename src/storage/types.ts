import type { Readable } from 'stream';

export type ResourceKind = 'file' | 'collection';

export interface ResourceInfo {
  kind: ResourceKind;
  size: number;
  lastModified: Date;
  /** Null when the filesystem does not record a birth time. */
  created: Date | null;
}

/**
 * Filesystem access used by the method handlers. Paths are absolute and have
 * already been validated by the security gate.
 */
export interface StorageLayer {
  stat(path: string): Promise<ResourceInfo | null>;
  /** Names of the direct children, in the filesystem's own order. */
  list(path: string): Promise<string[]>;
  /** Resolves symlinks. Rejects with ENOENT when the path does not exist. */
  realpath(path: string): Promise<string>;

  createDirectory(path: string): Promise<void>;
  remove(path: string): Promise<void>;
  copy(from: string, to: string): Promise<void>;
  /** Atomic rename on one volume, copy then delete across volumes. */
  move(from: string, to: string): Promise<void>;
  /** Moves a fully received upload over the destination, replacing any existing file. */
  commitUpload(temporaryPath: string, destination: string): Promise<void>;
  discard(temporaryPath: string): Promise<void>;

  createReadStream(path: string, range?: { start: number; end: number }): Readable;
}
