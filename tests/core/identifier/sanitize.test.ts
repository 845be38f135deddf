/**
 * Identifier sanitization tests.
 */
import { describe, it, expect } from 'vitest';
import { sql } from 'kysely';

import {
    sanitizeIdentifier,
    isIdentifier,
    assertIdentifier,
    ident,
    IdentifierInvalidError,
} from '../../../src/core/identifier/index.js';
import { createTestDb } from '../../utils/db.js';


describe('identifier: sanitize', () => {

    describe('sanitizeIdentifier', () => {

        it('should keep letters, digits and underscores', () => {

            expect(sanitizeIdentifier('price_cents2')).toBe('price_cents2');

        });

        it('should replace every other character with an underscore', () => {

            expect(sanitizeIdentifier('unit price')).toBe('unit_price');
            expect(sanitizeIdentifier('a;DROP TABLE')).toBe('a_DROP_TABLE');
            expect(sanitizeIdentifier('x"y')).toBe('x_y');

        });

        it('should replace each non-ASCII character with one underscore', () => {

            expect(sanitizeIdentifier('café')).toBe('caf_');

        });

        it('should leave an empty string empty', () => {

            expect(sanitizeIdentifier('')).toBe('');

        });

    });

    describe('assertIdentifier', () => {

        it('should accept sanitized names', () => {

            expect(isIdentifier('stock')).toBe(true);
            expect(() => assertIdentifier('stock')).not.toThrow();

        });

        it('should reject names that skipped sanitization', () => {

            expect(isIdentifier('bad name')).toBe(false);
            expect(() => assertIdentifier('bad name')).toThrow(IdentifierInvalidError);

        });

        it('should reject the empty string', () => {

            expect(() => assertIdentifier('')).toThrow('Invalid identifier: ""');

        });

    });

    describe('ident', () => {

        it('should render a double-quoted identifier', async () => {

            const db = createTestDb();
            const compiled = sql`SELECT ${ident('stock')}`.compile(db);

            expect(compiled.sql).toBe('SELECT "stock"');

            await db.destroy();

        });

        it('should throw for an unsanitized name', () => {

            expect(() => ident('a;b')).toThrow(IdentifierInvalidError);

        });

    });

});
