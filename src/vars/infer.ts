import type { Snapshot } from '../snaptrail-types.js';
import { NotFoundError } from './errors.js';
import type { Value } from './value.js';

export interface InferResult {
    /** Index of the snapshot holding the value */
    index: number;
    value: Value;
}

/**
 * Most recent recorded value of `key` at or before `t`.
 *
 * Trimmed timelines are sparse, so the scan walks backwards from the last
 * snapshot not after `t` until one holds the key.
 */
export function infer(snaps: readonly Snapshot[], t: number, key: string): InferResult {
    // written as !(<=) so a NaN time is rejected too
    if (snaps.length === 0 || !(snaps[0].when <= t)) {
        throw new NotFoundError();
    }
    const before = firstAfter(snaps, t);
    for (let i = before - 1; i >= 0; i--) {
        const value = snaps[i].values.get(key);
        if (value !== undefined) {
            return { index: i, value };
        }
    }
    throw new NotFoundError();
}

/** Index of the first snapshot with `when > t`, or snaps.length. */
export function firstAfter(snaps: readonly Snapshot[], t: number): number {
    let lo = 0;
    let hi = snaps.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (snaps[mid].when > t) {
            hi = mid;
        } else {
            lo = mid + 1;
        }
    }
    return lo;
}
