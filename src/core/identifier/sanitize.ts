/**
 * Identifier sanitization.
 *
 * The only path by which user-supplied names reach SQL statement text.
 * Values never take this path; they are always bound as parameters.
 */
import { sql, type RawBuilder } from 'kysely';

import { IdentifierInvalidError } from './errors.js';


/**
 * A name safe for direct use in generated SQL text: one or more of `[A-Za-z0-9_]`.
 */
export type Identifier = string;

const UNSAFE_CHARS = /[^0-9A-Za-z_]/g;
const SAFE_IDENTIFIER = /^[0-9A-Za-z_]+$/;


/**
 * Map every character outside `[A-Za-z0-9_]` to `_`.
 *
 * Total function: never throws. An empty input stays empty and is
 * rejected later by `assertIdentifier()`.
 *
 * @example
 * ```typescript
 * sanitizeIdentifier('unit price')   // 'unit_price'
 * sanitizeIdentifier('a;DROP TABLE') // 'a_DROP_TABLE'
 * ```
 */
export function sanitizeIdentifier(raw: string): Identifier {

    return raw.replace(UNSAFE_CHARS, '_');

}

/**
 * Check whether a string is already a valid identifier.
 */
export function isIdentifier(value: string): boolean {

    return SAFE_IDENTIFIER.test(value);

}

/**
 * Assert a string is a valid identifier.
 *
 * @throws IdentifierInvalidError if the value bypassed the sanitizer
 */
export function assertIdentifier(value: string): void {

    if (!isIdentifier(value)) {

        throw new IdentifierInvalidError(value);

    }

}

/**
 * Render an identifier into statement text, double-quoted.
 *
 * @throws IdentifierInvalidError if the value is not a sanitized identifier
 *
 * @example
 * ```typescript
 * await sql`SELECT ${ident(column)} FROM ${ident(table)}`.execute(db)
 * ```
 */
export function ident(value: string): RawBuilder<unknown> {

    assertIdentifier(value);

    return sql.id(value);

}
