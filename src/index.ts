/**
 * FAR Archive Tools - Main entry point
 *
 * Provides byte-exact encode/decode of FAR archives and file-level pack/list/extract helpers.
 */

// Re-export the codec
export { FarBinary } from './far-binary.js';
export { ManifestSerializer } from './utils/manifest-serializer.js';
export { FarBinaryError } from './types/far-error.js';
export type { FarErrorCode, FarWarning, FarWarningHandler } from './types/far-error.js';
export type { FarArchive, FarArchiveFile } from './types/far-archive.js';
export type { FarFile } from './types/far-file.js';
export type { FarFileEntry } from './types/far-file-entry.js';
export { FAR_MAGIC, FAR_HEADER_SIZE, FAR_DEFAULT_VERSION } from './constants/far-format.js';

// Re-export file-level operations
export { packFiles, PackError } from './pack.js';
export type { PackResult } from './pack.js';
export { listArchive } from './list.js';
export type { ArchiveListing, EntrySummary } from './list.js';
export { extractArchive, ExtractError } from './extract.js';
