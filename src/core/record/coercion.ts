/**
 * Value coercion.
 *
 * Every write (create, update, rollback) passes through `coerceValue`
 * so a column only ever receives values of its kind.
 */
import {
    isIntegerText,
    isNumberText,
    TypeCoercionError,
    type ColumnDescriptor,
} from '../schema/index.js';
import type { FieldValue } from './types.js';


/**
 * Coerce a value for storage in a column.
 *
 * - INTEGER takes integers and integer text
 * - REAL takes finite numbers and numeric text
 * - TEXT and BLOB take any text; numbers are stringified
 * - null is accepted by nullable columns and the primary key
 *
 * @throws TypeCoercionError when a numeric column gets anything else,
 * or a NOT NULL column gets null
 *
 * @example
 * ```typescript
 * coerceValue(stockColumn, ' 12 ')  // 12
 * coerceValue(stockColumn, '1.5')   // throws TypeCoercionError
 * coerceValue(nameColumn, 42)       // '42'
 * ```
 */
export function coerceValue(column: ColumnDescriptor, value: FieldValue): FieldValue {

    if (value === null) {

        if (column.nullable || column.isPrimaryKey) return null;

        throw new TypeCoercionError(column.name, 'a value (column is NOT NULL)', null);

    }

    switch (column.type) {

        case 'INTEGER': {

            if (typeof value === 'number') {

                if (Number.isInteger(value)) return value;

                throw new TypeCoercionError(column.name, 'an integer', value);

            }

            if (isIntegerText(value)) {

                const parsed = Number(value.trim());

                if (Number.isSafeInteger(parsed)) return parsed;

            }

            throw new TypeCoercionError(column.name, 'an integer', value);

        }

        case 'REAL': {

            if (typeof value === 'number') {

                if (Number.isFinite(value)) return value;

                throw new TypeCoercionError(column.name, 'a finite number', value);

            }

            if (isNumberText(value)) {

                return Number(value.trim());

            }

            throw new TypeCoercionError(column.name, 'a number', value);

        }

        case 'TEXT':
        case 'BLOB':
            return typeof value === 'number' ? String(value) : value;

    }

}
