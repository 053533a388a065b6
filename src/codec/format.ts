export const TIMELINE_MAGIC = new Uint8Array([0x53, 0x4E, 0x54, 0x4C]); // "SNTL"
export const TIMELINE_VERSION_BYTE = 0x01;

// magic(4) + version(1) + outerCodec(1) + reserved(2) + snapshotCount(4)
export const TIMELINE_HEADER_SIZE = 12;

// crc32(4) + eos(1)
export const TIMELINE_FOOTER_SIZE = 5;
export const TIMELINE_EOS_MARKER = 0xFF;

export enum OuterCodecId {
    NONE = 0,
    ZSTD = 1,
}

/** Tag byte written before each entry payload. */
export enum ValueTag {
    INT = 1,    // length-prefixed decimal string
    UINT = 2,   // length-prefixed decimal string
    FLOAT = 3,  // float64 LE
    TEXT = 4,   // length-prefixed UTF-8
    OPAQUE = 5, // length-prefixed UTF-8 JSON
}

/** Upper bound for a decompressed body unless overridden. 64MB */
export const DEFAULT_MAX_DECOMPRESSED_BYTES = 64 * 1024 * 1024;
