/**
 * Snaptrail Metrics
 * In-memory store of named metric values.
 */
import type { Snapshot } from '../snaptrail-types.js';
import { InvalidError, NotNumberError } from './errors.js';
import { Value, asNumber, toNumber, toValue, type ValueInput } from './value.js';
import { formatTable } from './report.js';

export interface MetricsOptions {
    /** Epoch-millisecond clock used to stamp snapshots. Default: Date.now */
    clock?: () => number;
}

/**
 * Every method is synchronous, so each one runs to completion before any
 * other caller on the event loop can observe the map. A snapshot therefore
 * never mixes old and new values of an update.
 *
 * A disposed store rejects writes with InvalidError; reads return empty
 * results.
 */
export class Metrics {
    private readonly detail: Map<string, Value> = new Map();
    private readonly clock: () => number;
    private _disposed: boolean = false;

    constructor(options: MetricsOptions = {}) {
        this.clock = options.clock ?? Date.now;
    }

    set(key: string, value: ValueInput): void {
        if (this._disposed) throw new InvalidError();
        this.detail.set(key, toValue(value));
    }

    get(key: string): Value | undefined {
        if (this._disposed) return undefined;
        return this.detail.get(key);
    }

    getNumber(key: string): number {
        if (this._disposed) throw new NotNumberError();
        return toNumber(this.detail.get(key));
    }

    /**
     * Adds n to a numeric metric. A missing or non-numeric metric is
     * replaced by n.
     */
    add(key: string, n: number): void {
        if (this._disposed) throw new InvalidError();
        const current = asNumber(this.detail.get(key));
        this.detail.set(key, Value.float(current.ok ? current.value + n : n));
    }

    has(key: string): boolean {
        return !this._disposed && this.detail.has(key);
    }

    keys(): string[] {
        if (this._disposed) return [];
        return Array.from(this.detail.keys());
    }

    get size(): number {
        return this._disposed ? 0 : this.detail.size;
    }

    get disposed(): boolean {
        return this._disposed;
    }

    snap(): Snapshot {
        const values = this._disposed ? new Map<string, Value>() : new Map(this.detail);
        return { when: this.clock(), values };
    }

    dumpTable(): string {
        if (this._disposed) return '';
        return formatTable(this.snap());
    }

    dispose(): void {
        this._disposed = true;
        this.detail.clear();
    }
}
