import { Value, toValue, asNumber, toNumber, formatValue, isValue, isNumeric } from '../src/vars/value.js';
import { NotNumberError } from '../src/vars/errors.js';

describe('Value', () => {
    it('maps plain inputs onto variants', () => {
        expect(toValue(7n)).toEqual({ kind: 'int', value: 7n });
        expect(toValue(1.5)).toEqual({ kind: 'float', value: 1.5 });
        expect(toValue('up')).toEqual({ kind: 'text', value: 'up' });
        expect(toValue(true)).toEqual({ kind: 'opaque', value: true });
        expect(toValue(null)).toEqual({ kind: 'opaque', value: null });
    });

    it('passes Values through unchanged', () => {
        const v = Value.uint(3);
        expect(toValue(v)).toBe(v);
        expect(isValue(v)).toBe(true);
        expect(isValue({ kind: 'int', value: 3 })).toBe(false);
        expect(isValue({ kind: 'bogus', value: 3 })).toBe(false);
    });

    it('rejects negative unsigned values', () => {
        expect(() => Value.uint(-1)).toThrow(RangeError);
        expect(Value.uint(0n)).toEqual({ kind: 'uint', value: 0n });
    });

    it('produces frozen values', () => {
        expect(Object.isFrozen(Value.text('x'))).toBe(true);
    });

    it('coerces numeric variants and refuses the rest', () => {
        expect(asNumber(Value.int(-4))).toEqual({ ok: true, value: -4 });
        expect(asNumber(Value.uint(9n))).toEqual({ ok: true, value: 9 });
        expect(asNumber(Value.float(0.25))).toEqual({ ok: true, value: 0.25 });

        const text = asNumber(Value.text('12'));
        expect(text.ok).toBe(false);
        if (!text.ok) expect(text.error).toBeInstanceOf(NotNumberError);

        expect(asNumber(undefined).ok).toBe(false);
        expect(() => toNumber(Value.opaque({ n: 1 }))).toThrow(NotNumberError);
        expect(toNumber(Value.int(2))).toBe(2);

        expect(isNumeric(Value.float(1))).toBe(true);
        expect(isNumeric(Value.text('1'))).toBe(false);
        expect(isNumeric(undefined)).toBe(false);
    });

    it('formats every variant', () => {
        expect(formatValue(Value.int(-7n))).toBe('-7');
        expect(formatValue(Value.uint(12345678901234567890n))).toBe('12345678901234567890');
        expect(formatValue(Value.float(0.5))).toBe('0.5');
        expect(formatValue(Value.float(10))).toBe('10');
        expect(formatValue(Value.text('two'))).toBe('two');
        expect(formatValue(Value.opaque({ a: [1, 2] }))).toBe('{"a":[1,2]}');
        expect(formatValue(Value.opaque(undefined))).toBe('undefined');
    });

    it('formats payloads JSON cannot represent with String()', () => {
        const cyclic: { self?: unknown } = {};
        cyclic.self = cyclic;
        expect(formatValue(Value.opaque(cyclic))).toBe('[object Object]');
        expect(formatValue(Value.opaque({ big: 1n }))).toBe('[object Object]');
    });
});
