/**
 * Key dictionary for the timeline codec.
 *
 * Maps metric keys to compact indices. Serialization: sorted entries with
 * delta-encoded lengths + concatenated UTF-8 strings.
 */
import { encodeVarint, decodeVarintAt, decodeVarintN, concatBytes } from '../snaptrail-utils.js';
import { IncompleteDataError, IntegrityError } from '../vars/errors.js';

export interface KeyDictionaryData {
    /** key → index */
    map: Map<string, number>;
    /** index → key */
    entries: string[];
}

export class KeyDictionary {
    /**
     * Keys are sorted for deterministic encoding.
     */
    static build(keys: Iterable<string>): KeyDictionaryData {
        const entries = Array.from(new Set(keys)).sort();
        const map = new Map<string, number>();
        for (let i = 0; i < entries.length; i++) {
            map.set(entries[i], i);
        }
        return { map, entries };
    }

    /**
     * Format:
     *   [entryCount: varint]
     *   [lengths: varint[] (delta-encoded)]
     *   [concatenated UTF-8 strings]
     */
    static encode(dict: KeyDictionaryData): Uint8Array {
        if (dict.entries.length === 0) {
            return encodeVarint([0]);
        }

        const encoder = new TextEncoder();
        const encodedStrings = dict.entries.map((entry) => encoder.encode(entry));
        const deltaLengths: number[] = [encodedStrings[0].length];
        for (let i = 1; i < encodedStrings.length; i++) {
            deltaLengths.push(encodedStrings[i].length - encodedStrings[i - 1].length);
        }

        return concatBytes([
            encodeVarint([dict.entries.length]),
            encodeVarint(deltaLengths),
            ...encodedStrings,
        ]);
    }

    static decode(data: Uint8Array, start: number): { entries: string[], nextPos: number } {
        const countDecoded = decodeVarintAt(data, start);
        const count = countDecoded.value;
        let pos = countDecoded.nextPos;
        if (count < 0) throw new IncompleteDataError(`Invalid key count: ${count}`);
        if (count === 0) return { entries: [], nextPos: pos };

        const lengthsDecoded = decodeVarintN(data, pos, count);
        pos = lengthsDecoded.nextPos;

        const lengths: number[] = [lengthsDecoded.values[0]];
        for (let i = 1; i < count; i++) {
            lengths.push(lengths[i - 1] + lengthsDecoded.values[i]);
        }

        const decoder = new TextDecoder('utf-8', { fatal: true });
        const entries: string[] = [];
        for (const len of lengths) {
            if (len < 0 || pos + len > data.length) {
                throw new IncompleteDataError('Truncated key dictionary');
            }
            try {
                entries.push(decoder.decode(data.subarray(pos, pos + len)));
            } catch (err) {
                throw new IntegrityError(`Key ${entries.length} is not valid UTF-8`, err);
            }
            pos += len;
        }
        return { entries, nextPos: pos };
    }
}
