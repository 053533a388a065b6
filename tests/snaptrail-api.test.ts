import Snaptrail, { Duration, NotFoundError, Value, type Snapshot } from '../src/index.js';
import { fakeClock } from './helpers/test-utils.js';

describe('Snaptrail namespace', () => {
    it('records, trims, packs and queries a timeline', async () => {
        const metrics = Snaptrail.create({ clock: fakeClock(10_000, Duration.SECOND) });
        const snaps: Snapshot[] = [];

        metrics.set('jobs', 0n);
        metrics.set('mode', 'idle');
        snaps.push(metrics.snap());
        metrics.set('jobs', 4n);
        snaps.push(metrics.snap());
        metrics.set('jobs', 4n);
        metrics.set('mode', 'busy');
        snaps.push(metrics.snap());

        Snaptrail.trim(snaps);
        expect(snaps[1].values.has('mode')).toBe(false);

        const restored = await Snaptrail.unpack(await Snaptrail.pack(snaps));
        expect(restored).toEqual(snaps);

        expect(Snaptrail.infer(restored, 11_500, 'mode')).toEqual({ index: 0, value: Value.text('idle') });
        expect(() => Snaptrail.infer(restored, 9_999, 'jobs')).toThrow(NotFoundError);
        expect(Snaptrail.extractNumbers(restored, Duration.SECOND, 10_000, 12_000, ['jobs'])).toEqual([
            [10, 0],
            [11, 4],
            [12, 4],
        ]);
        expect(Snaptrail.rate(
            { when: 10_000, value: 0 },
            { when: 12_000, value: 4 },
        )).toBe(2);
    });
});
