/**
 * Recorder
 *
 * Captures snapshots of a Metrics store into a bounded, trimmed timeline,
 * either on demand or on a fixed interval.
 */
import type { ExtractRow, Snapshot, SnaptrailLogger } from '../snaptrail-types.js';
import type { Metrics } from '../vars/metrics.js';
import { trim } from '../vars/trim.js';
import { infer, type InferResult } from '../vars/infer.js';
import { extractNumbers } from '../vars/extract.js';

export interface RecorderConfig {
    /** Capture period for start(). Default 1000ms */
    intervalMs?: number;
    /** Oldest snapshots beyond this count are folded away. Default 1024 */
    maxSnapshots?: number;
    /** Trim after every capture. Default true */
    trimOnCapture?: boolean;
    logger?: SnaptrailLogger | null;
}

export class Recorder {
    public static readonly DEFAULT_INTERVAL_MS = 1000;
    public static readonly DEFAULT_MAX_SNAPSHOTS = 1024;

    private readonly snaps: Snapshot[] = [];
    private readonly intervalMs: number;
    private readonly maxSnapshots: number;
    private readonly trimOnCapture: boolean;
    private readonly logger: SnaptrailLogger | null;
    private timer: NodeJS.Timeout | null = null;

    constructor(private readonly metrics: Metrics, config: RecorderConfig = {}) {
        this.intervalMs = config.intervalMs ?? Recorder.DEFAULT_INTERVAL_MS;
        this.maxSnapshots = config.maxSnapshots ?? Recorder.DEFAULT_MAX_SNAPSHOTS;
        this.trimOnCapture = config.trimOnCapture ?? true;
        this.logger = config.logger ?? null;

        if (!(this.intervalMs > 0)) {
            throw new RangeError(`intervalMs must be positive, got ${this.intervalMs}`);
        }
        if (!Number.isInteger(this.maxSnapshots) || this.maxSnapshots < 1) {
            throw new RangeError(`maxSnapshots must be a positive integer, got ${this.maxSnapshots}`);
        }
    }

    get timeline(): readonly Snapshot[] {
        return this.snaps;
    }

    get running(): boolean {
        return this.timer !== null;
    }

    capture(): Snapshot {
        const snap = this.metrics.snap();
        const last = this.snaps[this.snaps.length - 1];
        if (last !== undefined && snap.when < last.when) {
            throw new RangeError(`clock went backwards (${snap.when} < ${last.when})`);
        }
        this.snaps.push(snap);
        if (this.trimOnCapture) trim(this.snaps);
        this.enforceRetention();
        return snap;
    }

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => this.tick(), this.intervalMs);
        this.timer.unref();
        this.logger?.info?.(`[snaptrail] recorder started (every ${this.intervalMs}ms)`);
    }

    stop(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = null;
        this.logger?.info?.(`[snaptrail] recorder stopped (${this.snaps.length} snapshots)`);
    }

    infer(t: number, key: string): InferResult {
        return infer(this.snaps, t, key);
    }

    extract(granularity: number, from: number, to: number, keys: readonly string[]): ExtractRow[] {
        return extractNumbers(this.snaps, granularity, from, to, keys);
    }

    clear(): void {
        this.snaps.length = 0;
    }

    private tick(): void {
        try {
            this.capture();
        } catch (err) {
            const msg = err instanceof Error ? err.message : String(err);
            this.logger?.error?.(`[snaptrail] capture failed: ${msg}`);
        }
    }

    /**
     * Drops the oldest snapshots over the limit. Entries the successor lacks
     * are carried into a fresh copy of it, so lookups at or after the new
     * first snapshot still see the values that were current then. Snapshots
     * already handed out are never given new entries.
     */
    private enforceRetention(): void {
        while (this.snaps.length > this.maxSnapshots) {
            const oldest = this.snaps[0];
            const next = this.snaps[1];
            const values = new Map(oldest.values);
            for (const [key, value] of next.values) values.set(key, value);
            this.snaps[1] = { when: next.when, values };
            this.snaps.shift();
        }
    }
}
