/**
 * In-memory representation of a FAR archive.
 */
import type { FarFile } from './far-file.js';
import type { FarFileEntry } from './far-file-entry.js';

export interface FarArchive {
  readonly version: number;
  /** Manifest order; also the order of the data region. */
  readonly entries: readonly FarFileEntry[];
  /** Parallel to `entries` once hydrated, empty on a freshly decoded archive. */
  readonly files: readonly FarFile[];
}

/**
 * An archive loaded from disk, with the source bytes kept for hydration.
 */
export interface FarArchiveFile {
  readonly filePath: string;
  readonly sha256: string;
  readonly totalSize: number;
  readonly buffer: Buffer;
  readonly archive: FarArchive;
}
