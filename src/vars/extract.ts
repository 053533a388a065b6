import type { ExtractRow, Snapshot } from '../snaptrail-types.js';
import { ExtractError, NotFoundError } from './errors.js';
import { infer, type InferResult } from './infer.js';
import { asNumber, formatValue } from './value.js';

/**
 * Resamples `keys` onto one time axis for plotting.
 *
 * Each row is `[tick, value(keys[0]), value(keys[1]), ...]` with
 * `tick = trunc(when / granularity)`. The first row holds the values at
 * `from`; each later snapshot before `to` yields a row at its tick holding the
 * values after that snapshot, and snapshots sharing a tick collapse into one
 * row. When a snapshot at or after `to` is reached a closing row at the tick
 * of `to` is added, unless that tick is already the last one. Ticks never
 * decrease, so rows are strictly increasing in time and there are never more
 * rows than snapshots.
 *
 * Every key must have a numeric value at `from`.
 */
export function extractNumbers(
    snaps: readonly Snapshot[],
    granularity: number,
    from: number,
    to: number,
    keys: readonly string[]
): ExtractRow[] {
    if (!Number.isFinite(granularity) || granularity <= 0) {
        throw new RangeError(`granularity must be a positive duration, got ${granularity}`);
    }
    const quantize = (t: number): number => Math.trunc(t / granularity);

    const current: number[] = [];
    let minIndex = 0;
    keys.forEach((key, j) => {
        const found = inferAt(snaps, from, key);
        const n = asNumber(found.value);
        if (!n.ok) {
            throw new ExtractError(`error for "${key}" at ${stamp(from)}: ${n.error.message}`, key, from, null, n.error);
        }
        if (j === 0 || found.index > minIndex) minIndex = found.index;
        current.push(n.value);
    });

    const rows: ExtractRow[] = [];
    let tick = quantize(from);
    const emit = (): void => {
        const row = [tick, ...current];
        const last = rows[rows.length - 1];
        if (last !== undefined && last[0] === tick) {
            rows[rows.length - 1] = row;
        } else {
            rows.push(row);
        }
    };

    emit();
    const end = quantize(to);
    for (let i = minIndex + 1; i < snaps.length; i++) {
        const snap = snaps[i];
        if (snap.when >= to) {
            if (end > tick) {
                tick = end;
                emit();
            }
            break;
        }
        for (let j = 0; j < keys.length; j++) {
            const key = keys[j];
            const value = snap.values.get(key);
            if (value === undefined) continue;
            const n = asNumber(value);
            if (!n.ok) {
                throw new ExtractError(
                    `snapshot[${i}]["${key}"] = ${formatValue(value)}: ${n.error.message}`,
                    key, snap.when, i, n.error
                );
            }
            current[j] = n.value;
        }
        tick = Math.max(tick, quantize(snap.when));
        emit();
    }
    return rows;
}

function inferAt(snaps: readonly Snapshot[], from: number, key: string): InferResult {
    try {
        return infer(snaps, from, key);
    } catch (err) {
        if (err instanceof NotFoundError) {
            throw new ExtractError(`error for "${key}" at ${stamp(from)}: ${err.message}`, key, from, null, err);
        }
        throw err;
    }
}

function stamp(t: number): string {
    return Number.isFinite(t) ? new Date(t).toISOString() : String(t);
}
