/**
 * Failure and warning kinds reported by the FAR codec.
 */

export type FarErrorCode =
  | 'InvalidMagic'
  | 'TruncatedInput'
  | 'TruncatedManifest'
  | 'InvalidUtf8Name'
  | 'OffsetOutOfRange'
  | 'NotHydrated'
  | 'SizeMismatch'
  | 'SizeOverflow';

/**
 * Error thrown when an archive cannot be decoded, hydrated or serialized.
 */
export class FarBinaryError extends Error {
  constructor(public readonly code: FarErrorCode, message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'FarBinaryError';
  }
}

/**
 * Non-fatal integrity finding raised while decoding a manifest.
 */
export interface FarWarning {
  readonly code: 'ManifestInconsistent';
  readonly message: string;
  /** Manifest index of the offending entry. */
  readonly entryIndex: number;
}

export type FarWarningHandler = (warning: FarWarning) => void;
