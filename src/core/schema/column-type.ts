/**
 * Column type helpers.
 *
 * Parses requested types, maps declared types to canonical kinds, and
 * renders DDL default clauses.
 */
import { TypeCoercionError, TypeInvalidError } from './errors.js';
import { COLUMN_TYPES, type ColumnType, type DefaultLiteral } from './types.js';


const INTEGER_PATTERN = /^[+-]?\d+$/;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;


/**
 * Parse a requested column type.
 *
 * Case-insensitive; surrounding whitespace is ignored.
 *
 * @throws TypeInvalidError if not one of the four canonical kinds
 *
 * @example
 * ```typescript
 * parseColumnType('integer') // 'INTEGER'
 * parseColumnType('varchar') // throws TypeInvalidError
 * ```
 */
export function parseColumnType(requested: string): ColumnType {

    const upper = requested.trim().toUpperCase();
    const match = COLUMN_TYPES.find((type) => type === upper);

    if (!match) {

        throw new TypeInvalidError(requested);

    }

    return match;

}

/**
 * Map a declared type to its canonical kind.
 *
 * Follows SQLite's affinity rules, in order: INT, then CHAR/CLOB/TEXT,
 * then BLOB or no type, then everything else (REAL and NUMERIC affinity
 * both land on REAL).
 *
 * @example
 * ```typescript
 * affinityOf('VARCHAR(120)') // 'TEXT'
 * affinityOf('BIGINT')       // 'INTEGER'
 * affinityOf('')             // 'BLOB'
 * ```
 */
export function affinityOf(declared: string): ColumnType {

    const upper = declared.toUpperCase();

    if (upper.includes('INT')) return 'INTEGER';

    if (upper.includes('CHAR') || upper.includes('CLOB') || upper.includes('TEXT')) return 'TEXT';

    if (upper.includes('BLOB') || upper.trim() === '') return 'BLOB';

    return 'REAL';

}

/**
 * Check whether text parses as an integer.
 */
export function isIntegerText(text: string): boolean {

    return INTEGER_PATTERN.test(text.trim());

}

/**
 * Check whether text parses as a finite number.
 */
export function isNumberText(text: string): boolean {

    return NUMBER_PATTERN.test(text.trim()) && Number.isFinite(Number(text));

}

/**
 * Zero value used for a required column with no default.
 */
export function zeroValue(type: ColumnType): number | string | null {

    switch (type) {

        case 'INTEGER':
        case 'REAL':
            return 0;

        case 'TEXT':
            return '';

        case 'BLOB':
            return null;

    }

}

/**
 * Render a default literal as SQL text for a column of the given type.
 *
 * DDL can't bind parameters, so this is the single place a literal is
 * written into statement text. Numeric columns take only numbers; text is
 * single-quoted with embedded quotes doubled.
 *
 * @returns SQL expression text, or null when there is no default
 * @throws TypeCoercionError if a numeric column gets a non-numeric default
 *
 * @example
 * ```typescript
 * renderDefault('stock', 'INTEGER', '0')    // '0'
 * renderDefault('category', 'TEXT', "kid's") // "'kid''s'"
 * renderDefault('note', 'TEXT', null)        // null
 * ```
 */
export function renderDefault(
    column: string,
    type: ColumnType,
    literal: DefaultLiteral | undefined,
): string | null {

    if (literal === null || literal === undefined || literal === '') {

        return null;

    }

    const text = String(literal).trim();

    if (type === 'INTEGER') {

        if (!isIntegerText(text)) {

            throw new TypeCoercionError(column, 'an integer default', literal);

        }

        return String(Number.parseInt(text, 10));

    }

    if (type === 'REAL') {

        if (!isNumberText(text)) {

            throw new TypeCoercionError(column, 'a numeric default', literal);

        }

        return String(Number(text));

    }

    return `'${String(literal).replace(/'/g, "''")}'`;

}
