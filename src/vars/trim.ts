import type { Snapshot } from '../snaptrail-types.js';
import { formatValue } from './value.js';

/**
 * Removes redundant entries from a timeline.
 *
 * Every snapshot but the newest loses the entries whose string form equals the
 * last retained value of the same key; snapshots left empty are dropped. The
 * newest snapshot is never edited, so the result always ends in a full
 * snapshot. The array is edited in place and also returned.
 */
export function trim(snaps: Snapshot[]): Snapshot[] {
    if (snaps.length < 2) return snaps;

    const latest = new Map<string, string>();
    const retained: Snapshot[] = [];
    const last = snaps.length - 1;

    for (let i = 0; i < last; i++) {
        const snap = snaps[i];
        const redundant: string[] = [];
        for (const [key, value] of snap.values) {
            const s = formatValue(value);
            if (latest.get(key) === s) {
                redundant.push(key);
            } else {
                latest.set(key, s);
            }
        }
        for (const key of redundant) {
            snap.values.delete(key);
        }
        if (snap.values.size > 0) {
            retained.push(snap);
        }
    }
    retained.push(snaps[last]);

    snaps.splice(0, snaps.length, ...retained);
    return snaps;
}
