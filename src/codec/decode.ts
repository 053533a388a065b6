import type { Snapshot } from '../snaptrail-types.js';
import { decodeVarintAt } from '../snaptrail-utils.js';
import { IncompleteDataError, IntegrityError } from '../vars/errors.js';
import { Value } from '../vars/value.js';
import {
    TIMELINE_MAGIC, TIMELINE_VERSION_BYTE, TIMELINE_HEADER_SIZE, TIMELINE_FOOTER_SIZE,
    TIMELINE_EOS_MARKER, DEFAULT_MAX_DECOMPRESSED_BYTES, ValueTag
} from './format.js';
import { KeyDictionary } from './key-dict.js';
import { getOuterCodec } from './outer-codecs.js';
import { calculateCRC32 } from './integrity.js';
import type { TimelineDecoderOptions } from './types.js';

const ERR_DATA_TOO_SHORT = 'Data too short';

export class TimelineDecoder {
    private readonly data: Uint8Array;
    private readonly options: Required<TimelineDecoderOptions>;
    private body: Uint8Array = new Uint8Array(0);
    private pos: number = 0;
    private readonly textDecoder = new TextDecoder('utf-8', { fatal: true });

    constructor(data: Uint8Array, options: TimelineDecoderOptions = {}) {
        this.data = data;
        const defaults: Required<TimelineDecoderOptions> = {
            integrityMode: 'strict',
            logger: null,
            maxDecompressedBytes: DEFAULT_MAX_DECOMPRESSED_BYTES,
        };
        this.options = { ...defaults, ...options };
    }

    async getAllSnapshots(): Promise<Snapshot[]> {
        if (this.data.length < TIMELINE_MAGIC.length) {
            throw new IncompleteDataError(ERR_DATA_TOO_SHORT);
        }
        if (!this.verifyMagic()) {
            throw new IntegrityError('Timeline decoder: invalid magic bytes');
        }
        if (this.data.length < TIMELINE_HEADER_SIZE + TIMELINE_FOOTER_SIZE) {
            throw new IncompleteDataError(ERR_DATA_TOO_SHORT);
        }

        const view = new DataView(this.data.buffer, this.data.byteOffset, this.data.byteLength);
        const version = view.getUint8(4);
        if (version !== TIMELINE_VERSION_BYTE) {
            throw new IntegrityError(`Unsupported version: ${version}`);
        }
        if (this.data[this.data.length - 1] !== TIMELINE_EOS_MARKER) {
            throw new IncompleteDataError('Missing EOS marker (0xFF)');
        }
        const codec = getOuterCodec(view.getUint8(5));
        const snapshotCount = view.getUint32(8, true);
        const expectedCrc = view.getUint32(this.data.length - TIMELINE_FOOTER_SIZE, true);

        const payload = this.data.subarray(TIMELINE_HEADER_SIZE, this.data.length - TIMELINE_FOOTER_SIZE);
        this.body = await codec.unpack(payload, this.options.maxDecompressedBytes);

        const actualCrc = calculateCRC32(this.body);
        if (actualCrc !== expectedCrc) {
            const msg = `Body CRC mismatch (expected ${expectedCrc}, got ${actualCrc})`;
            if (this.options.integrityMode === 'strict') {
                throw new IntegrityError(msg);
            }
            this.options.logger?.warn?.(`[snaptrail] ${msg}; decoding anyway`);
        }

        this.pos = 0;
        const dict = KeyDictionary.decode(this.body, 0);
        this.pos = dict.nextPos;

        const snapshots: Snapshot[] = [];
        for (let i = 0; i < snapshotCount; i++) {
            snapshots.push(this.readSnapshot(dict.entries));
        }
        if (this.pos !== this.body.length) {
            throw new IntegrityError(`Trailing bytes after ${snapshotCount} snapshots (${this.body.length - this.pos})`);
        }
        return snapshots;
    }

    private verifyMagic(): boolean {
        for (let i = 0; i < TIMELINE_MAGIC.length; i++) {
            if (this.data[i] !== TIMELINE_MAGIC[i]) return false;
        }
        return true;
    }

    private readSnapshot(keys: string[]): Snapshot {
        const when = this.getFloat64();
        const count = this.getVarint();
        if (count < 0) throw new IntegrityError(`Invalid entry count: ${count}`);

        const values = new Map<string, Value>();
        for (let i = 0; i < count; i++) {
            const index = this.getVarint();
            const key = keys[index];
            if (key === undefined) {
                throw new IntegrityError(`Key index out of range: ${index}`);
            }
            values.set(key, this.readValue());
        }
        return { when, values };
    }

    private readValue(): Value {
        const tag = this.getUint8();
        switch (tag) {
            case ValueTag.INT:
                return Value.int(this.parseBigInt(this.getString()));
            case ValueTag.UINT: {
                const n = this.parseBigInt(this.getString());
                if (n < 0n) throw new IntegrityError(`Negative unsigned integer: ${n}`);
                return Value.uint(n);
            }
            case ValueTag.FLOAT:
                return Value.float(this.getFloat64());
            case ValueTag.TEXT:
                return Value.text(this.getString());
            case ValueTag.OPAQUE:
                return Value.opaque(this.parseJson(this.getString()));
            default:
                throw new IntegrityError(`Unknown value tag: ${tag}`);
        }
    }

    private parseBigInt(s: string): bigint {
        if (!/^-?\d+$/.test(s)) throw new IntegrityError(`Malformed integer: ${s}`);
        return BigInt(s);
    }

    private parseJson(s: string): unknown {
        try {
            return JSON.parse(s);
        } catch (err) {
            throw new IntegrityError(`Malformed opaque payload: ${err instanceof Error ? err.message : String(err)}`);
        }
    }

    private getUint8(): number {
        this.ensure(1);
        return this.body[this.pos++];
    }

    private getFloat64(): number {
        this.ensure(8);
        const val = new DataView(this.body.buffer, this.body.byteOffset + this.pos, 8).getFloat64(0, true);
        this.pos += 8;
        return val;
    }

    private getVarint(): number {
        const decoded = decodeVarintAt(this.body, this.pos);
        this.pos = decoded.nextPos;
        return decoded.value;
    }

    private getString(): string {
        const len = this.getVarint();
        if (len < 0) throw new IntegrityError(`Invalid string length: ${len}`);
        this.ensure(len);
        const bytes = this.body.subarray(this.pos, this.pos + len);
        this.pos += len;
        try {
            return this.textDecoder.decode(bytes);
        } catch (err) {
            throw new IntegrityError(`Invalid UTF-8: ${err instanceof Error ? err.message : String(err)}`);
        }
    }

    private ensure(n: number): void {
        if (this.pos + n > this.body.length) {
            throw new IncompleteDataError(`Unexpected end of body at ${this.pos} (need ${n} bytes)`);
        }
    }
}
