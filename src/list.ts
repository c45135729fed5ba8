/**
 * Lists archive entries from the manifest without loading file contents.
 */

import { FarBinary } from './far-binary.js';
import type { FarFileEntry } from './types/far-file-entry.js';

export interface EntrySummary {
  readonly name: string;
  readonly size: number;
  readonly offset: number;
  /** Present only when hashes were requested. */
  readonly sha256?: string;
}

export interface ArchiveListing {
  readonly filePath: string;
  readonly version: number;
  readonly sha256: string;
  readonly totalSize: number;
  readonly entries: readonly EntrySummary[];
}

/**
 * Read an archive's manifest.
 *
 * @param hashes - Also hash each entry's bytes, which requires slicing them out of the archive
 * @throws {FarBinaryError} If the archive cannot be decoded, or an entry lies outside it when hashing
 */
export async function listArchive({ inputFile, hashes = false }: { readonly inputFile: string; readonly hashes?: boolean }): Promise<ArchiveListing> {
  const loaded = await FarBinary.read({ filePath: inputFile });

  const entries: EntrySummary[] = loaded.archive.entries.map((entry: FarFileEntry): EntrySummary => {
    if (!hashes) {
      return { name: entry.name, size: entry.size, offset: entry.offset };
    }
    const file = FarBinary.extractEntry({ entry, buffer: loaded.buffer });
    return { name: entry.name, size: entry.size, offset: entry.offset, sha256: FarBinary.hashFileData({ data: file.data }) };
  });

  return {
    filePath: loaded.filePath,
    version: loaded.archive.version,
    sha256: loaded.sha256,
    totalSize: loaded.totalSize,
    entries,
  };
}
