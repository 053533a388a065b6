/**
 * Snaptrail Utilities
 *
 * Zigzag + variable-length integer coding shared by the timeline codec.
 */
import { IncompleteDataError } from './vars/errors.js';

/**
 * Encode integers with zigzag + variable-length encoding
 * Small numbers = 1 byte, larger = 2-8 bytes
 */
export function encodeVarint(values: number[]): Uint8Array {
    const buffer: number[] = [];

    for (const val of values) {
        // Zigzag encode: map signed to unsigned (negative numbers close to 0)
        const zigzag = val >= 0 ? val * 2 : (Math.abs(val) * 2) - 1;

        let n = zigzag;
        while (n >= 0x80) {
            buffer.push((n % 128) | 0x80);
            n = Math.floor(n / 128);
        }
        buffer.push(n);
    }

    return new Uint8Array(buffer);
}

export function decodeVarintAt(data: Uint8Array, start: number): { value: number, nextPos: number } {
    let i = start;
    let zigzag = 0;
    let p2d = 1;

    while (true) {
        if (i >= data.length) throw new IncompleteDataError('Truncated varint');
        const byte = data[i++];
        zigzag += (byte & 0x7F) * p2d;
        if ((byte & 0x80) === 0) break;
        p2d *= 128;
    }

    const value = (zigzag % 2 === 0) ? (zigzag / 2) : -((zigzag + 1) / 2);
    return { value, nextPos: i };
}

export function decodeVarintN(data: Uint8Array, start: number, n: number): { values: number[], nextPos: number } {
    const values: number[] = [];
    let pos = start;
    for (let count = 0; count < n; count++) {
        const decoded = decodeVarintAt(data, pos);
        values.push(decoded.value);
        pos = decoded.nextPos;
    }
    return { values, nextPos: pos };
}

export function concatBytes(chunks: Uint8Array[]): Uint8Array {
    const total = chunks.reduce((sum, b) => sum + b.length, 0);
    const result = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
        result.set(chunk, offset);
        offset += chunk.length;
    }
    return result;
}
