/**
 * Manifest record for a single archived file, without its bytes.
 */
export interface FarFileEntry {
  readonly name: string;
  readonly size: number;
  /** Absolute byte offset of the file's data from the start of the archive. */
  readonly offset: number;
}
