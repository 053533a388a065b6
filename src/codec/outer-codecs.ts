/**
 * Outer compression applied to the whole timeline body.
 *
 * The body size limit is checked after inflating, so a small zstd frame
 * cannot expand past `maxBodyBytes`.
 */
import { ZstdCodec, type ZstdSimple } from 'zstd-codec';
import { OuterCodecId } from './format.js';
import { IntegrityError, LimitExceededError } from '../vars/errors.js';

export interface OuterCodec {
    pack(body: Uint8Array, level: number): Promise<Uint8Array>;
    unpack(payload: Uint8Array, maxBodyBytes: number): Promise<Uint8Array>;
}

function checkBodySize(body: Uint8Array, maxBodyBytes: number): Uint8Array {
    if (body.length > maxBodyBytes) {
        throw new LimitExceededError(`Timeline body of ${body.length} bytes exceeds limit of ${maxBodyBytes}`);
    }
    return body;
}

// The wasm module loads once per process; later callers share the promise.
let zstdLoading: Promise<ZstdSimple> | null = null;

function loadZstd(): Promise<ZstdSimple> {
    if (!zstdLoading) {
        zstdLoading = new Promise((resolve) => {
            ZstdCodec.run((zstd) => resolve(new zstd.Simple()));
        });
    }
    return zstdLoading;
}

const passthrough: OuterCodec = {
    pack: async (body) => body,
    unpack: async (payload, maxBodyBytes) => checkBodySize(payload, maxBodyBytes),
};

const zstd: OuterCodec = {
    async pack(body, level) {
        const packed = (await loadZstd()).compress(body, level);
        if (!packed) throw new IntegrityError(`zstd could not compress a ${body.length}-byte timeline body`);
        return packed;
    },
    async unpack(payload, maxBodyBytes) {
        const simple = await loadZstd();
        let body: Uint8Array | null;
        try {
            body = simple.decompress(payload);
        } catch (err) {
            throw new IntegrityError('zstd frame of the timeline body is corrupt', err);
        }
        if (!body) throw new IntegrityError('zstd frame of the timeline body is corrupt');
        return checkBodySize(body, maxBodyBytes);
    },
};

export function getOuterCodec(id: number): OuterCodec {
    switch (id) {
        case OuterCodecId.NONE:
            return passthrough;
        case OuterCodecId.ZSTD:
            return zstd;
        default:
            throw new IntegrityError(`Unknown OuterCodecId: ${id}`);
    }
}
