import { crc32 as nodeCrc32 } from 'node:zlib';

export function calculateCRC32(data: Uint8Array): number {
    return nodeCrc32(data);
}
