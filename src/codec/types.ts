import type { SnaptrailLogger } from '../snaptrail-types.js';

/**
 * Reproducible compression presets.
 *
 * - `balanced`: zstd level 3 (default)
 * - `max_ratio`: zstd level 19, slower encode
 * - `raw`: no outer compression
 */
export type CompressionPreset = 'balanced' | 'max_ratio' | 'raw';

export const COMPRESSION_PRESETS: Record<CompressionPreset, { compression: 'zstd' | 'none'; compressionLevel: number }> = {
    balanced:  { compression: 'zstd', compressionLevel: 3 },
    max_ratio: { compression: 'zstd', compressionLevel: 19 },
    raw:       { compression: 'none', compressionLevel: 0 },
};

export type TimelineEncoderOptions = {
    /** Compression preset. Default: `balanced`. */
    preset?: CompressionPreset;
    /** Outer codec. Overrides the preset value if both are set. */
    compression?: 'zstd' | 'none';
    /** Zstd compression level (1-22). Overrides the preset value if both are set. */
    compressionLevel?: number;
};

export type TimelineDecoderOptions = {
    /**
     * Body checksum verification.
     * - 'strict' (default): throw IntegrityError on CRC mismatch
     * - 'warn': log through `logger.warn` and keep decoding
     */
    integrityMode?: 'strict' | 'warn';
    logger?: SnaptrailLogger | null;
    /** Reject bodies that decompress beyond this many bytes. Default 64MB. */
    maxDecompressedBytes?: number;
};
