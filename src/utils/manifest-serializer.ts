/**
 * Binary serialization of the FAR manifest.
 * Each record stores the file size twice, as existing archives do.
 */

import type { FarFileEntry } from '../types/far-file-entry.js';
import { FarBinaryError, type FarWarningHandler } from '../types/far-error.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Binary serializer for the manifest that trails the data region.
 */
export class ManifestSerializer {
  private buffer: Buffer;
  private offset: number;

  constructor() {
    this.buffer = Buffer.alloc(256);
    this.offset = 0;
  }

  /**
   * Serializes entries in the given order; offsets are written as stored on each entry.
   */
  static serialize(entries: readonly FarFileEntry[]): Buffer {
    const serializer = new ManifestSerializer();
    serializer.writeManifest(entries);
    return serializer.getBuffer();
  }

  /**
   * Deserializes the manifest starting at `manifestOffset`.
   * A duplicated size that disagrees with the primary one is reported to `onWarning`
   * and the primary size is kept.
   */
  static deserialize(buffer: Buffer, manifestOffset: number, onWarning: FarWarningHandler): FarFileEntry[] {
    const deserializer = new ManifestDeserializer(buffer, manifestOffset, onWarning);
    return deserializer.readManifest();
  }

  private writeManifest(entries: readonly FarFileEntry[]): void {
    this.writeUint32(entries.length);
    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }

  private writeEntry(entry: FarFileEntry): void {
    this.writeUint32(entry.size);
    this.writeUint32(entry.size);
    this.writeUint32(entry.offset);
    this.writePascalString32(entry.name);
  }

  private writeUint32(value: number): void {
    this.ensureCapacity(4);
    this.buffer.writeUInt32LE(value, this.offset);
    this.offset += 4;
  }

  private writePascalString32(str: string): void {
    const strBuffer = Buffer.from(str, 'utf8');
    const length = strBuffer.length;

    this.writeUint32(length);
    this.ensureCapacity(length);
    strBuffer.copy(this.buffer, this.offset);
    this.offset += length;
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + additionalBytes;
    if (requiredSize > this.buffer.length) {
      const newSize = Math.max(requiredSize, this.buffer.length * 2);
      const newBuffer = Buffer.alloc(newSize);
      this.buffer.copy(newBuffer);
      this.buffer = newBuffer;
    }
  }

  private getBuffer(): Buffer {
    return this.buffer.subarray(0, this.offset);
  }
}

/**
 * Binary deserializer for the manifest.
 */
class ManifestDeserializer {
  private readonly buffer: Buffer;
  private offset: number;
  private readonly onWarning: FarWarningHandler;

  constructor(buffer: Buffer, manifestOffset: number, onWarning: FarWarningHandler) {
    this.buffer = buffer;
    this.offset = manifestOffset;
    this.onWarning = onWarning;
  }

  readManifest(): FarFileEntry[] {
    const fileCount = this.readUint32('file count');
    const entries: FarFileEntry[] = [];

    for (let i = 0; i < fileCount; i++) {
      entries.push(this.readEntry(i));
    }

    return entries;
  }

  private readEntry(index: number): FarFileEntry {
    const size = this.readUint32(`size for file ${index}`);
    const sizeDuplicate = this.readUint32(`duplicate size for file ${index}`);
    if (sizeDuplicate !== size) {
      this.onWarning({
        code: 'ManifestInconsistent',
        message: `Manifest entry ${index} stores size ${size} and duplicate size ${sizeDuplicate}`,
        entryIndex: index,
      });
    }
    const offset = this.readUint32(`offset for file ${index}`);
    const name = this.readPascalString32(index);
    return { name, size, offset };
  }

  private readUint32(field: string): number {
    this.ensureAvailable(4, field);
    const value = this.buffer.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  private readPascalString32(index: number): string {
    const length = this.readUint32(`name length for file ${index}`);
    this.ensureAvailable(length, `name for file ${index}`);
    const bytes = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    try {
      return utf8Decoder.decode(bytes);
    } catch (error) {
      throw new FarBinaryError('InvalidUtf8Name', `Name for file ${index} is not valid UTF-8`, error);
    }
  }

  private ensureAvailable(byteCount: number, field: string): void {
    if (this.offset + byteCount > this.buffer.length) {
      throw new FarBinaryError(
        'TruncatedManifest',
        `Manifest ends before ${field}: needs ${byteCount} bytes at offset ${this.offset}, buffer size ${this.buffer.length}`
      );
    }
  }
}
