/**
 * A file's name and bytes, either supplied by a caller or sliced out of an archive.
 */
export interface FarFile {
  readonly name: string;
  readonly size: number;
  readonly data: Buffer;
}
