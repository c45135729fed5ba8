/**
 * FAR binary helpers: header and archive encode/decode.
 */
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createHash } from 'node:crypto';
import type { FarArchive, FarArchiveFile } from './types/far-archive.js';
import type { FarFile } from './types/far-file.js';
import type { FarFileEntry } from './types/far-file-entry.js';
import { FarBinaryError, type FarWarning, type FarWarningHandler } from './types/far-error.js';
import { ManifestSerializer } from './utils/manifest-serializer.js';
import {
  FAR_DEFAULT_VERSION,
  FAR_HEADER_SIZE,
  FAR_MAGIC,
  FAR_MAGIC_SIZE,
  FAR_MANIFEST_OFFSET_FIELD,
  FAR_VERSION_OFFSET,
  UINT32_MAX,
} from './constants/far-format.js';

interface FarHeader {
  readonly version: number;
  readonly manifestOffset: number;
}

function logWarning(warning: FarWarning): void {
  console.warn(`⚠️  ${warning.message}`);
}

/**
 * Validates the magic signature and reads version and manifest offset.
 * @throws {FarBinaryError} TruncatedInput or InvalidMagic
 */
function readHeader(buffer: Buffer): FarHeader {
  if (buffer.length < FAR_MAGIC_SIZE) {
    throw new FarBinaryError('TruncatedInput', `Buffer too small to hold FAR magic: ${buffer.length} bytes`);
  }
  const magic: string = buffer.toString('latin1', 0, FAR_MAGIC_SIZE);
  if (magic !== FAR_MAGIC) {
    throw new FarBinaryError('InvalidMagic', 'Not a FAR archive: invalid magic');
  }
  if (buffer.length < FAR_HEADER_SIZE) {
    throw new FarBinaryError('TruncatedInput', `Buffer too small to hold FAR header: ${buffer.length} bytes`);
  }
  const version: number = buffer.readUInt32LE(FAR_VERSION_OFFSET);
  const manifestOffset: number = buffer.readUInt32LE(FAR_MANIFEST_OFFSET_FIELD);
  return { version, manifestOffset };
}

function writeHeader(buffer: Buffer, header: FarHeader): void {
  buffer.write(FAR_MAGIC, 0, FAR_MAGIC_SIZE, 'latin1');
  buffer.writeUInt32LE(header.version, FAR_VERSION_OFFSET);
  buffer.writeUInt32LE(header.manifestOffset, FAR_MANIFEST_OFFSET_FIELD);
}

/**
 * Lays files out back to back after the header.
 * @returns Entries carrying true absolute offsets, and the end of the data region
 */
function layoutEntries(files: readonly Pick<FarFile, 'name' | 'size'>[]): { entries: FarFileEntry[]; dataEnd: number } {
  const entries: FarFileEntry[] = [];
  let offset = FAR_HEADER_SIZE;
  for (const file of files) {
    entries.push({ name: file.name, size: file.size, offset });
    offset += file.size;
  }
  return { entries, dataEnd: offset };
}

function sliceEntry(entry: FarFileEntry, buffer: Buffer): FarFile {
  if (entry.offset + entry.size > buffer.length) {
    throw new FarBinaryError(
      'OffsetOutOfRange',
      `File data extends beyond buffer bounds: name=${entry.name}, offset=${entry.offset}, size=${entry.size}, bufferSize=${buffer.length}`
    );
  }
  const data: Buffer = Buffer.from(buffer.subarray(entry.offset, entry.offset + entry.size));
  return { name: entry.name, size: entry.size, data };
}

/**
 * FAR archive processing utilities.
 * Codec methods are synchronous and work on caller-supplied buffers; only `read` and `write` touch the disk.
 */
export class FarBinary {
  /** Error class for FAR-specific exceptions. */
  static readonly Error: typeof FarBinaryError = FarBinaryError;

  /**
   * Creates a file from caller-supplied bytes.
   *
   * @param size - Declared size, defaults to `data.length`
   * @throws {FarBinaryError} SizeMismatch if `size` differs from `data.length`
   */
  static createFile({ name, data, size = data.length }: { readonly name: string; readonly data: Buffer; readonly size?: number }): FarFile {
    if (size !== data.length) {
      throw new FarBinaryError('SizeMismatch', `Declared size ${size} of "${name}" does not match its ${data.length} bytes`);
    }
    if (size > UINT32_MAX) {
      throw new FarBinaryError('SizeOverflow', `File "${name}" is too large to store: ${size} bytes`);
    }
    return { name, size, data };
  }

  /**
   * Builds a version 1 archive from files, keeping their order.
   * Entry offsets are the absolute offsets the serialized archive will use.
   */
  static build({ files }: { readonly files: readonly FarFile[] }): FarArchive {
    const { entries } = layoutEntries(files);
    return { version: FAR_DEFAULT_VERSION, entries, files: [...files] };
  }

  /**
   * Decodes header and manifest. The returned archive carries no file contents; see {@link FarBinary.hydrate}.
   *
   * @param onWarning - Receives non-fatal manifest findings, logged with console.warn by default
   * @throws {FarBinaryError} InvalidMagic, TruncatedInput, TruncatedManifest or InvalidUtf8Name
   */
  static decode({ buffer, onWarning = logWarning }: { readonly buffer: Buffer; readonly onWarning?: FarWarningHandler }): FarArchive {
    const header: FarHeader = readHeader(buffer);
    if (header.manifestOffset > buffer.length) {
      throw new FarBinaryError(
        'TruncatedManifest',
        `Manifest offset ${header.manifestOffset} lies beyond buffer size ${buffer.length}`
      );
    }
    const entries: FarFileEntry[] = ManifestSerializer.deserialize(buffer, header.manifestOffset, onWarning);
    return { version: header.version, entries, files: [] };
  }

  /**
   * Copies every entry's bytes out of the buffer the archive was decoded from.
   *
   * @returns A new archive with `files` parallel to `entries`
   * @throws {FarBinaryError} OffsetOutOfRange if an entry lies outside the buffer
   */
  static hydrate({ archive, buffer }: { readonly archive: FarArchive; readonly buffer: Buffer }): FarArchive {
    const files: FarFile[] = archive.entries.map((entry: FarFileEntry) => sliceEntry(entry, buffer));
    return { version: archive.version, entries: archive.entries, files };
  }

  /**
   * Copies a single entry's bytes without hydrating the rest of the archive.
   * @throws {FarBinaryError} OffsetOutOfRange if the entry lies outside the buffer
   */
  static extractEntry({ entry, buffer }: { readonly entry: FarFileEntry; readonly buffer: Buffer }): FarFile {
    return sliceEntry(entry, buffer);
  }

  /**
   * Serializes a hydrated archive: header, data region, then manifest.
   * Offsets are recomputed from file order; whatever the entries carried is ignored.
   *
   * @throws {FarBinaryError} NotHydrated, SizeMismatch or SizeOverflow
   */
  static serialize({ archive }: { readonly archive: FarArchive }): Buffer {
    if (archive.files.length !== archive.entries.length) {
      throw new FarBinaryError(
        'NotHydrated',
        `Archive has ${archive.entries.length} entries but ${archive.files.length} loaded files`
      );
    }
    for (const file of archive.files) {
      if (file.data.length !== file.size) {
        throw new FarBinaryError('SizeMismatch', `Declared size ${file.size} of "${file.name}" does not match its ${file.data.length} bytes`);
      }
    }

    const { entries, dataEnd } = layoutEntries(archive.files);
    if (dataEnd > UINT32_MAX) {
      throw new FarBinaryError('SizeOverflow', `Data region ends at ${dataEnd}, beyond 32-bit offsets`);
    }
    const manifest: Buffer = ManifestSerializer.serialize(entries);

    const buffer: Buffer = Buffer.alloc(dataEnd + manifest.length);
    writeHeader(buffer, { version: archive.version, manifestOffset: dataEnd });
    archive.files.forEach((file: FarFile, index: number) => {
      file.data.copy(buffer, entries[index].offset);
    });
    manifest.copy(buffer, dataEnd);
    return buffer;
  }

  /**
   * Tests whether a buffer holds a decodable FAR archive.
   */
  static test({ buffer }: { readonly buffer: Buffer }): boolean {
    try {
      FarBinary.decode({ buffer, onWarning: () => undefined });
      return true;
    } catch (error) {
      if (error instanceof FarBinaryError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Returns a copy of a hydrated file's bytes by name.
   *
   * @returns File bytes, or null if no loaded file has that name
   */
  static extractFile({ archive, name }: { readonly archive: FarArchive; readonly name: string }): Buffer | null {
    const match: FarFile | undefined = archive.files.find((file: FarFile) => file.name === name);
    return match ? Buffer.from(match.data) : null;
  }

  /**
   * Computes the hex SHA256 of file data.
   */
  static hashFileData({ data }: { readonly data: Buffer }): string {
    return createHash('sha256').update(data).digest('hex');
  }

  /**
   * Reads a FAR archive from disk and decodes its manifest.
   *
   * @param filePath - Path to the .far file
   * @returns Decoded, not yet hydrated archive with the source bytes and their SHA256
   * @throws {FarBinaryError} If the file is not a valid FAR archive
   */
  static async read({ filePath, onWarning }: { readonly filePath: string; readonly onWarning?: FarWarningHandler }): Promise<FarArchiveFile> {
    const buffer: Buffer = await readFile(filePath);
    const archive: FarArchive = FarBinary.decode({ buffer, onWarning });
    const sha256: string = createHash('sha256').update(buffer).digest('hex');
    return { filePath, sha256, totalSize: buffer.length, buffer, archive };
  }

  /**
   * Serializes a hydrated archive and writes it to disk.
   *
   * @returns Number of bytes written
   */
  static async write({ archive, outputPath }: { readonly archive: FarArchive; readonly outputPath: string }): Promise<number> {
    const buffer: Buffer = FarBinary.serialize({ archive });
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, buffer);
    return buffer.length;
  }
}
