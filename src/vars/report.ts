import type { ExtractRow, Snapshot } from '../snaptrail-types.js';
import { formatValue } from './value.js';

/**
 * Markdown table of a single snapshot, keys sorted:
 *
 *     key | value at 2024-01-01T00:00:00.000Z
 *     ----|------
 *     a | 4
 *     b | two
 */
export function formatTable(snapshot: Snapshot): string {
    const keys = Array.from(snapshot.values.keys()).sort();
    const lines = [
        `key | value at ${new Date(snapshot.when).toISOString()}`,
        '----|------',
    ];
    for (const key of keys) {
        const value = snapshot.values.get(key);
        if (value === undefined) continue;
        lines.push(`${key} | ${formatValue(value)}`);
    }
    return lines.join('\n') + '\n';
}

/** CSV of extractNumbers output, one line per row plus a header. */
export function toCsv(rows: ExtractRow[], keys: string[]): string {
    const lines = [['time', ...keys.map(csvField)].join(',')];
    for (const row of rows) {
        lines.push(row.map(String).join(','));
    }
    return lines.join('\n') + '\n';
}

function csvField(s: string): string {
    return /[",\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}
