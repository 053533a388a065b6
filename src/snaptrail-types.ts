/**
 * Snaptrail Types - Core type definitions
 *
 * @module snaptrail
 *
 * All timestamps are milliseconds since the Unix epoch and all durations are
 * milliseconds. Fractional values are allowed.
 */
import type { Value } from './vars/value.js';

export const SNAPTRAIL_VERSION = '1.0.0';

/**
 * A timestamped copy of every value held by a store at one instant.
 * The map belongs to the snapshot; only trim() removes entries from it.
 */
export interface Snapshot {
    /** Capture time, epoch milliseconds */
    readonly when: number;
    readonly values: Map<string, Value>;
}

/** Snapshots in non-decreasing `when` order. */
export type Timeline = Snapshot[];

/** Store-independent (time, value) pair used by rate(). */
export interface Sample {
    when: number;
    value: number;
}

/**
 * One resampled row: `[tick, value(key1), value(key2), ...]` where `tick` is
 * the timestamp divided by the granularity and truncated.
 */
export type ExtractRow = number[];

/** Durations in milliseconds, usable as extractNumbers granularity. */
export const Duration = {
    MICROSECOND: 0.001,
    MILLISECOND: 1,
    SECOND: 1000,
    MINUTE: 60 * 1000,
    HOUR: 60 * 60 * 1000,
} as const;

export type SnaptrailLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};
