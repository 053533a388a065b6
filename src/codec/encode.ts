import type { Snapshot } from '../snaptrail-types.js';
import { encodeVarint, concatBytes } from '../snaptrail-utils.js';
import type { Value } from '../vars/value.js';
import {
    TIMELINE_MAGIC, TIMELINE_VERSION_BYTE, TIMELINE_HEADER_SIZE, TIMELINE_EOS_MARKER,
    OuterCodecId, ValueTag
} from './format.js';
import { KeyDictionary } from './key-dict.js';
import { getOuterCodec } from './outer-codecs.js';
import { calculateCRC32 } from './integrity.js';
import { COMPRESSION_PRESETS, type TimelineEncoderOptions } from './types.js';

const MAX_SNAPSHOTS = 0xFFFFFFFF;

/**
 * Packs snapshots into the binary timeline format:
 *
 *     [header 12B][body (outer codec)][crc32 of raw body u32 LE][0xFF]
 *
 * The body holds the key dictionary followed by every snapshot as
 * `[when f64][entry count][key index, tag, payload]...`.
 */
export class TimelineEncoder {
    private readonly snapshots: Snapshot[] = [];
    private readonly outerCodecId: OuterCodecId;
    private readonly compressionLevel: number;
    private finished = false;

    constructor(options: TimelineEncoderOptions = {}) {
        const preset = COMPRESSION_PRESETS[options.preset ?? 'balanced'];
        const compression = options.compression ?? preset.compression;
        this.outerCodecId = compression === 'zstd' ? OuterCodecId.ZSTD : OuterCodecId.NONE;
        this.compressionLevel = options.compressionLevel ?? preset.compressionLevel;
    }

    addSnapshot(snapshot: Snapshot): void {
        if (this.finished) throw new Error('TimelineEncoder: finish() already called');
        if (this.snapshots.length >= MAX_SNAPSHOTS) {
            throw new RangeError(`TimelineEncoder: more than ${MAX_SNAPSHOTS} snapshots`);
        }
        this.snapshots.push(snapshot);
    }

    async finish(): Promise<Uint8Array> {
        if (this.finished) throw new Error('TimelineEncoder: finish() already called');
        this.finished = true;

        const body = this.encodeBody();
        const codec = getOuterCodec(this.outerCodecId);
        const payload = await codec.pack(body, this.compressionLevel);

        const header = new Uint8Array(TIMELINE_HEADER_SIZE);
        const headerView = new DataView(header.buffer);
        header.set(TIMELINE_MAGIC, 0);
        headerView.setUint8(4, TIMELINE_VERSION_BYTE);
        headerView.setUint8(5, this.outerCodecId);
        headerView.setUint16(6, 0, true);
        headerView.setUint32(8, this.snapshots.length, true);

        const footer = new Uint8Array(5);
        new DataView(footer.buffer).setUint32(0, calculateCRC32(body), true);
        footer[4] = TIMELINE_EOS_MARKER;

        return concatBytes([header, payload, footer]);
    }

    private encodeBody(): Uint8Array {
        const dict = KeyDictionary.build(this.snapshots.flatMap((s) => Array.from(s.values.keys())));
        const chunks: Uint8Array[] = [KeyDictionary.encode(dict)];
        const encoder = new TextEncoder();

        for (const snapshot of this.snapshots) {
            chunks.push(float64(snapshot.when));
            chunks.push(encodeVarint([snapshot.values.size]));
            for (const [key, value] of snapshot.values) {
                const index = dict.map.get(key);
                if (index === undefined) throw new Error(`TimelineEncoder: key "${key}" missing from dictionary`);
                chunks.push(encodeVarint([index]));
                chunks.push(...encodeValue(key, value, encoder));
            }
        }
        return concatBytes(chunks);
    }
}

function encodeValue(key: string, value: Value, encoder: TextEncoder): Uint8Array[] {
    switch (value.kind) {
        case 'int':
            return [Uint8Array.of(ValueTag.INT), ...lengthPrefixed(encoder.encode(value.value.toString()))];
        case 'uint':
            return [Uint8Array.of(ValueTag.UINT), ...lengthPrefixed(encoder.encode(value.value.toString()))];
        case 'float':
            return [Uint8Array.of(ValueTag.FLOAT), float64(value.value)];
        case 'text':
            return [Uint8Array.of(ValueTag.TEXT), ...lengthPrefixed(encoder.encode(value.value))];
        case 'opaque': {
            const json = JSON.stringify(value.value);
            if (json === undefined) {
                throw new TypeError(`TimelineEncoder: opaque value of "${key}" is not JSON-serializable`);
            }
            return [Uint8Array.of(ValueTag.OPAQUE), ...lengthPrefixed(encoder.encode(json))];
        }
    }
}

function lengthPrefixed(bytes: Uint8Array): Uint8Array[] {
    return [encodeVarint([bytes.length]), bytes];
}

function float64(n: number): Uint8Array {
    const out = new Uint8Array(8);
    new DataView(out.buffer).setFloat64(0, n, true);
    return out;
}
