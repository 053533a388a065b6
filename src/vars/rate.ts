import type { Sample } from '../snaptrail-types.js';

const MS_PER_SECOND = 1000;

/**
 * Rate of change per second around samples[1].
 *
 * Three or more samples: slope between the first and third (anything after
 * the third is ignored). Two samples: slope between them. Fewer: 0.
 * Equal timestamps are not guarded and yield Infinity or NaN.
 */
export function rate(...samples: Sample[]): number {
    if (samples.length <= 1) return 0;
    const first = samples[0];
    const end = samples.length === 2 ? samples[1] : samples[2];
    return (end.value - first.value) * MS_PER_SECOND / (end.when - first.when);
}
