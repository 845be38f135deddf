/**
 * Canonical value forms.
 *
 * Diffs and ledger entries compare values by a canonical string so that
 * `5`, `5.0` and `"5"` in an INTEGER column are one value, while null and
 * the empty string stay distinct.
 */
import type { FieldValue } from './types.js';


/**
 * Convert a value returned by the driver to a FieldValue.
 *
 * better-sqlite3 returns numbers, strings, null, bigints (in safe-integer
 * mode) and Buffers for BLOBs.
 */
export function toFieldValue(value: unknown): FieldValue {

    if (value === null || value === undefined) return null;

    if (typeof value === 'number' || typeof value === 'string') return value;

    if (typeof value === 'bigint') return Number(value);

    if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');

    return String(value);

}

/**
 * Canonical string form of a value.
 *
 * @example
 * ```typescript
 * canonical(null)   // null
 * canonical('')     // ''
 * canonical(12.5)   // '12.5'
 * canonical(1250)   // '1250'
 * ```
 */
export function canonical(value: FieldValue): string | null {

    if (value === null) return null;

    return typeof value === 'number' ? String(value) : value;

}
