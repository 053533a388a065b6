/**
 * Snaptrail Public API
 *
 * @module snaptrail
 */

import { TimelineEncoder } from './codec/encode.js';
import { TimelineDecoder } from './codec/decode.js';
import type { TimelineEncoderOptions, TimelineDecoderOptions } from './codec/types.js';
import type { Snapshot } from './snaptrail-types.js';
import { Metrics, type MetricsOptions } from './vars/metrics.js';
import { trim } from './vars/trim.js';
import { infer } from './vars/infer.js';
import { extractNumbers } from './vars/extract.js';
import { rate } from './vars/rate.js';

export type { Snapshot, Timeline, Sample, ExtractRow, SnaptrailLogger } from './snaptrail-types.js';
export { Duration, SNAPTRAIL_VERSION } from './snaptrail-types.js';
export * from './vars/index.js';
export { TimelineEncoder, TimelineDecoder } from './codec/index.js';
export type { TimelineEncoderOptions, TimelineDecoderOptions, CompressionPreset } from './codec/index.js';
export { COMPRESSION_PRESETS } from './codec/index.js';
export { Recorder } from './recorder/index.js';
export type { RecorderConfig } from './recorder/index.js';

// The Snaptrail Namespace Object
export const Snaptrail = {
    /**
     * Creates an empty metric store.
     */
    create: (options?: MetricsOptions): Metrics => new Metrics(options),

    trim,
    infer,
    extractNumbers,
    rate,

    /**
     * Packs a timeline into the binary timeline format.
     */
    pack: async (snapshots: readonly Snapshot[], options?: TimelineEncoderOptions): Promise<Uint8Array> => {
        const encoder = new TimelineEncoder(options);
        for (const s of snapshots) encoder.addSnapshot(s);
        return await encoder.finish();
    },

    /**
     * Unpacks a binary timeline into snapshots.
     */
    unpack: async (data: Uint8Array, options?: TimelineDecoderOptions): Promise<Snapshot[]> => {
        const decoder = new TimelineDecoder(data, options);
        return await decoder.getAllSnapshots();
    },
};

export default Snaptrail;
