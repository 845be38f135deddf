/**
 * Monetary value transform.
 *
 * Columns named `<something>_cents` hold integer cents. Writers supply
 * decimal amounts ("12.50") and readers get two-decimal strings back;
 * the column itself stays a plain INTEGER.
 *
 * Amounts are converted with decimal digit arithmetic, never binary
 * floating point, and half-cent ties round to even.
 */
import { TypeCoercionError, type ColumnDescriptor } from '../schema/index.js';
import type { FieldValue } from './types.js';


/**
 * A value-transform layer over generic column coercion.
 *
 * Transforms are matched by column name. Stored values in the ledger and
 * the values rollback restores bypass them.
 */
export interface ValueTransform {

    readonly name: string;

    /** Whether the transform handles this column */
    applies(column: ColumnDescriptor): boolean;

    /** Extra write key that resolves to this column, if any */
    alias(column: ColumnDescriptor): string | null;

    /** Convert a caller-supplied value to the stored form */
    toStored(column: ColumnDescriptor, value: FieldValue): FieldValue;

    /** Convert a stored value to the form shown to readers */
    toDisplay(column: ColumnDescriptor, value: FieldValue): FieldValue;

}


const CENTS_SUFFIX = '_cents';
const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?$/;


/**
 * Convert a decimal amount to integer cents.
 *
 * Multiplies by 100 exactly, then rounds to the nearest integer with
 * ties to even.
 *
 * @throws TypeCoercionError for anything that isn't a finite decimal
 *
 * @example
 * ```typescript
 * toCents('price_cents', '12.50')  // 1250
 * toCents('price_cents', '12.504') // 1250
 * toCents('price_cents', '0.125')  // 12
 * toCents('price_cents', '0.135')  // 14
 * ```
 */
export function toCents(column: string, amount: string | number): number {

    const text = typeof amount === 'number'
        ? numberToDecimal(column, amount)
        : amount.trim();

    const match = DECIMAL_PATTERN.exec(text);
    const whole = match?.[2] ?? '';
    const fraction = match?.[3] ?? '';

    if (!match || (whole === '' && fraction === '')) {

        throw new TypeCoercionError(column, 'a decimal amount', amount);

    }

    const negative = match[1] === '-';
    const head = fraction.slice(0, 2).padEnd(2, '0');
    const rest = fraction.slice(2);

    let cents = BigInt(`${whole || '0'}${head}`);

    if (rest !== '') {

        const half = '5'.padEnd(rest.length, '0');
        const roundUp = rest > half || (rest === half && cents % 2n === 1n);

        if (roundUp) {

            cents += 1n;

        }

    }

    const result = Number(negative ? -cents : cents);

    if (!Number.isSafeInteger(result)) {

        throw new TypeCoercionError(column, 'an amount within range', amount);

    }

    return result;

}

/**
 * Render integer cents as a two-decimal string.
 *
 * @example
 * ```typescript
 * formatCents(1250) // '12.50'
 * formatCents(-5)   // '-0.05'
 * ```
 */
export function formatCents(cents: number): string {

    const sign = cents < 0 ? '-' : '';
    const abs = Math.abs(cents);
    const whole = Math.trunc(abs / 100);
    const fraction = String(abs % 100).padStart(2, '0');

    return `${sign}${whole}.${fraction}`;

}

/**
 * Write a number in plain decimal notation.
 */
function numberToDecimal(column: string, amount: number): string {

    if (!Number.isFinite(amount)) {

        throw new TypeCoercionError(column, 'a decimal amount', amount);

    }

    const text = String(amount);

    return /e/i.test(text) ? amount.toFixed(20) : text;

}


/**
 * Cents transform for `*_cents` columns.
 *
 * A write key without the suffix (`price` for `price_cents`) resolves to
 * the column when the table has no column of that name.
 */
export const centsTransform: ValueTransform = {

    name: 'cents',

    applies(column) {

        return column.name.toLowerCase().endsWith(CENTS_SUFFIX) && column.type === 'INTEGER';

    },

    alias(column) {

        return column.name.slice(0, -CENTS_SUFFIX.length);

    },

    toStored(column, value) {

        if (value === null) return null;

        return toCents(column.name, value);

    },

    toDisplay(_column, value) {

        if (typeof value === 'number' && Number.isInteger(value)) {

            return formatCents(value);

        }

        return value;

    },

};
