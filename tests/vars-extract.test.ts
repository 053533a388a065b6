import { extractNumbers } from '../src/vars/extract.js';
import { trim } from '../src/vars/trim.js';
import { Metrics } from '../src/vars/metrics.js';
import { ExtractError, NotFoundError, NotNumberError } from '../src/vars/errors.js';
import { Duration, type Snapshot } from '../src/snaptrail-types.js';
import { snapshotAt, fakeClock } from './helpers/test-utils.js';

function timeline(): Snapshot[] {
    return [
        snapshotAt(1000, { a: 1n, b: 10 }),
        snapshotAt(1500, { a: 2n }),
        snapshotAt(2200, { b: 20 }),
        snapshotAt(2700, { a: 3n, b: 30 }),
    ];
}

describe('extractNumbers', () => {
    it('coalesces snapshots that share a tick', () => {
        const rows = extractNumbers(timeline(), Duration.SECOND, 1000, 3000, ['a', 'b']);
        expect(rows).toEqual([
            [1, 2, 10],
            [2, 3, 30],
        ]);
    });

    it('stops at `to` without repeating the last tick', () => {
        const rows = extractNumbers(timeline(), Duration.SECOND, 1000, 2500, ['a', 'b']);
        expect(rows).toEqual([
            [1, 2, 10],
            [2, 2, 20],
        ]);
    });

    it('closes with a row at the tick of `to`', () => {
        const rows = extractNumbers(timeline(), Duration.MILLISECOND, 1000, 2500, ['a', 'b']);
        expect(rows).toEqual([
            [1000, 1, 10],
            [1500, 2, 10],
            [2200, 2, 20],
            [2500, 2, 20],
        ]);
    });

    it('starts from the values current at `from`', () => {
        const rows = extractNumbers(timeline(), Duration.MILLISECOND, 1600, 2500, ['b', 'a']);
        expect(rows).toEqual([
            [1600, 10, 2],
            [2200, 20, 2],
            [2500, 20, 2],
        ]);
    });

    it('names the key that has no value at `from`', () => {
        let caught: unknown;
        try {
            extractNumbers(timeline(), Duration.SECOND, 1600, 2500, ['a', 'zz']);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(ExtractError);
        if (caught instanceof ExtractError) {
            expect(caught.key).toBe('zz');
            expect(caught.when).toBe(1600);
            expect(caught.index).toBeNull();
            expect(caught.originalError).toBeInstanceOf(NotFoundError);
            expect(caught.message).toBe('error for "zz" at 1970-01-01T00:00:01.600Z: not found');
        }
    });

    it('fails when `from` precedes the timeline', () => {
        expect(() => extractNumbers(timeline(), Duration.SECOND, 999, 2500, ['a'])).toThrow(ExtractError);
    });

    it('rejects a non-numeric starting value', () => {
        const snaps = [snapshotAt(1000, { state: 'idle' }), snapshotAt(2000, { state: 'busy' })];
        expect(() => extractNumbers(snaps, Duration.SECOND, 1000, 2000, ['state']))
            .toThrow('error for "state" at 1970-01-01T00:00:01.000Z: not a number');
    });

    it('rejects a non-numeric update of a requested key with its index', () => {
        const snaps = [
            snapshotAt(1000, { a: 1 }),
            snapshotAt(2000, { a: 'oops' }),
            snapshotAt(3000, { a: 3 }),
        ];
        let caught: unknown;
        try {
            extractNumbers(snaps, Duration.MILLISECOND, 1000, 5000, ['a']);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(ExtractError);
        if (caught instanceof ExtractError) {
            expect(caught.message).toBe('snapshot[1]["a"] = oops: not a number');
            expect(caught.index).toBe(1);
            expect(caught.when).toBe(2000);
            expect(caught.originalError).toBeInstanceOf(NotNumberError);
        }
    });

    it('ignores keys that were not requested', () => {
        const snaps = [
            snapshotAt(1000, { a: 1, label: 'x' }),
            snapshotAt(2000, { label: 'y' }),
            snapshotAt(3000, { a: 2, label: 'y' }),
        ];
        expect(extractNumbers(snaps, Duration.MILLISECOND, 1000, 2500, ['a'])).toEqual([
            [1000, 1],
            [2000, 1],
            [2500, 1],
        ]);
    });

    it('never moves ticks backwards', () => {
        const snaps = [
            snapshotAt(1000, { a: 1 }),
            snapshotAt(1100, { other: 1 }),
            snapshotAt(1200, { a: 2, other: 1 }),
        ];
        // `from` lies after snapshot 1, which holds none of the requested keys
        const rows = extractNumbers(snaps, Duration.MILLISECOND, 1150, 2000, ['a']);
        expect(rows).toEqual([
            [1150, 1],
            [1200, 2],
        ]);
    });

    it('rejects a non-positive granularity', () => {
        expect(() => extractNumbers(timeline(), 0, 1000, 2000, ['a'])).toThrow(RangeError);
        expect(() => extractNumbers(timeline(), Number.NaN, 1000, 2000, ['a'])).toThrow(RangeError);
    });

    it('resamples a recorded timeline onto a shared axis', () => {
        const vs = new Metrics({ clock: fakeClock(1_700_000_000_000, 1) });
        for (let i = 10; i < 16; i++) {
            vs.set(i.toString(16).toUpperCase(), BigInt(i));
        }
        const snaps: Snapshot[] = [vs.snap()];
        for (let i = 0; i < 48; i++) {
            vs.add((10 + (i % 6)).toString(16).toUpperCase(), i);
            snaps.push(vs.snap());
            trim(snaps);
        }

        const from = snaps[0].when;
        const to = snaps[snaps.length - 1].when;
        const nums = extractNumbers(snaps, Duration.MILLISECOND, from, to, ['A', 'C', 'F']);

        expect(nums).toHaveLength(snaps.length);
        expect(nums[0]).toEqual([from, 10, 12, 15]);

        let lastTs = 0;
        for (let i = 0; i < nums.length; i++) {
            const row = nums[i];
            expect(row).toHaveLength(4);
            expect(row[0]).toBeGreaterThan(lastTs);
            lastTs = row[0];
            if (i === 0) continue;
            let changed = 0;
            for (let j = 1; j < row.length; j++) {
                if (nums[i - 1][j] < row[j]) changed++;
            }
            expect(changed, `row ${i}`).toBeLessThanOrEqual(1);
        }
    });
});
