/**
 * Layout constants of the FAR container.
 */

/** ASCII signature at the start of every archive. */
export const FAR_MAGIC = 'FAR!byAZ';

export const FAR_MAGIC_SIZE = 8;

export const FAR_VERSION_OFFSET = 8;

export const FAR_MANIFEST_OFFSET_FIELD = 12;

/** Header size; the data region starts right after it. */
export const FAR_HEADER_SIZE = 16;

/** Version written by newly built archives. */
export const FAR_DEFAULT_VERSION = 1;

export const UINT32_MAX = 0xffffffff;
