/**
 * Metric values.
 *
 * A Value is an immutable tagged union. The numeric variants (`int`, `uint`,
 * `float`) coerce to a JS number; `text` and `opaque` do not.
 */
import { NotNumberError } from './errors.js';

export type Value =
    | { readonly kind: 'int'; readonly value: bigint }
    | { readonly kind: 'uint'; readonly value: bigint }
    | { readonly kind: 'float'; readonly value: number }
    | { readonly kind: 'text'; readonly value: string }
    | { readonly kind: 'opaque'; readonly value: unknown };

export type ValueKind = Value['kind'];

/** Anything `Metrics.set` accepts. Plain inputs are mapped by {@link toValue}. */
export type ValueInput = Value | bigint | number | string | object | boolean | null;

export type NumberResult =
    | { ok: true; value: number }
    | { ok: false; error: NotNumberError };

export const Value = {
    int(n: bigint | number): Value {
        return freeze({ kind: 'int', value: BigInt(n) });
    },
    uint(n: bigint | number): Value {
        const value = BigInt(n);
        if (value < 0n) {
            throw new RangeError(`uint value must be non-negative, got ${value}`);
        }
        return freeze({ kind: 'uint', value });
    },
    float(n: number): Value {
        return freeze({ kind: 'float', value: n });
    },
    text(s: string): Value {
        return freeze({ kind: 'text', value: s });
    },
    opaque(payload: unknown): Value {
        return freeze({ kind: 'opaque', value: payload });
    },
};

function freeze(v: Value): Value {
    return Object.freeze(v);
}

export function isValue(raw: unknown): raw is Value {
    if (typeof raw !== 'object' || raw === null || !('kind' in raw) || !('value' in raw)) {
        return false;
    }
    switch (raw.kind) {
        case 'int':
        case 'uint':
            return typeof raw.value === 'bigint';
        case 'float':
            return typeof raw.value === 'number';
        case 'text':
            return typeof raw.value === 'string';
        case 'opaque':
            return true;
        default:
            return false;
    }
}

/**
 * bigint -> int, number -> float, string -> text, Value passes through,
 * everything else is opaque.
 */
export function toValue(raw: unknown): Value {
    if (isValue(raw)) return raw;
    switch (typeof raw) {
        case 'bigint':
            return Value.int(raw);
        case 'number':
            return Value.float(raw);
        case 'string':
            return Value.text(raw);
        default:
            return Value.opaque(raw);
    }
}

export function isNumeric(v: Value | undefined): boolean {
    return v !== undefined && (v.kind === 'int' || v.kind === 'uint' || v.kind === 'float');
}

export function asNumber(v: Value | undefined): NumberResult {
    if (v === undefined) {
        return { ok: false, error: new NotNumberError() };
    }
    switch (v.kind) {
        case 'int':
        case 'uint':
            return { ok: true, value: Number(v.value) };
        case 'float':
            return { ok: true, value: v.value };
        default:
            return { ok: false, error: new NotNumberError() };
    }
}

export function toNumber(v: Value | undefined): number {
    const result = asNumber(v);
    if (!result.ok) throw result.error;
    return result.value;
}

/** String form used for change detection and reports. */
export function formatValue(v: Value): string {
    switch (v.kind) {
        case 'int':
        case 'uint':
            return v.value.toString();
        case 'float':
            return String(v.value);
        case 'text':
            return v.value;
        case 'opaque':
            return formatOpaque(v.value);
    }
}

function formatOpaque(payload: unknown): string {
    try {
        const json = JSON.stringify(payload);
        if (json !== undefined) return json;
    } catch (err) {
        // cycles and nested bigints fall back to String()
        if (!(err instanceof TypeError)) throw err;
    }
    return String(payload);
}
