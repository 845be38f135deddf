/**
 * Column type helper tests.
 */
import { describe, it, expect } from 'vitest';

import {
    parseColumnType,
    affinityOf,
    isIntegerText,
    isNumberText,
    zeroValue,
    renderDefault,
    TypeInvalidError,
    TypeCoercionError,
} from '../../../src/core/schema/index.js';


describe('schema: column-type', () => {

    describe('parseColumnType', () => {

        it('should accept the four kinds in any case', () => {

            expect(parseColumnType('integer')).toBe('INTEGER');
            expect(parseColumnType(' Real ')).toBe('REAL');
            expect(parseColumnType('TEXT')).toBe('TEXT');
            expect(parseColumnType('blob')).toBe('BLOB');

        });

        it('should reject anything else', () => {

            expect(() => parseColumnType('varchar')).toThrow(TypeInvalidError);
            expect(() => parseColumnType('varchar')).toThrow(
                "Invalid column type 'varchar': expected INTEGER, REAL, TEXT or BLOB",
            );

        });

    });

    describe('affinityOf', () => {

        it('should follow SQLite affinity rules', () => {

            expect(affinityOf('BIGINT')).toBe('INTEGER');
            expect(affinityOf('VARCHAR(120)')).toBe('TEXT');
            expect(affinityOf('CLOB')).toBe('TEXT');
            expect(affinityOf('')).toBe('BLOB');
            expect(affinityOf('BLOB')).toBe('BLOB');
            expect(affinityOf('DOUBLE')).toBe('REAL');
            expect(affinityOf('NUMERIC')).toBe('REAL');

        });

        it('should check INT before CHAR', () => {

            expect(affinityOf('CHARINT')).toBe('INTEGER');

        });

    });

    describe('numeric text', () => {

        it('should recognize integer text', () => {

            expect(isIntegerText(' -12 ')).toBe(true);
            expect(isIntegerText('1.5')).toBe(false);
            expect(isIntegerText('')).toBe(false);

        });

        it('should recognize number text', () => {

            expect(isNumberText('1.5')).toBe(true);
            expect(isNumberText('.5')).toBe(true);
            expect(isNumberText('2e3')).toBe(true);
            expect(isNumberText('abc')).toBe(false);
            expect(isNumberText('')).toBe(false);

        });

    });

    describe('zeroValue', () => {

        it('should give a zero per kind', () => {

            expect(zeroValue('INTEGER')).toBe(0);
            expect(zeroValue('REAL')).toBe(0);
            expect(zeroValue('TEXT')).toBe('');
            expect(zeroValue('BLOB')).toBeNull();

        });

    });

    describe('renderDefault', () => {

        it('should render no default for null, undefined or empty', () => {

            expect(renderDefault('c', 'TEXT', null)).toBeNull();
            expect(renderDefault('c', 'TEXT', undefined)).toBeNull();
            expect(renderDefault('c', 'INTEGER', '')).toBeNull();

        });

        it('should render integers', () => {

            expect(renderDefault('stock', 'INTEGER', '0')).toBe('0');
            expect(renderDefault('stock', 'INTEGER', ' 007 ')).toBe('7');
            expect(renderDefault('stock', 'INTEGER', 5)).toBe('5');

        });

        it('should reject non-integer integer defaults', () => {

            expect(() => renderDefault('stock', 'INTEGER', '1.5')).toThrow(TypeCoercionError);
            expect(() => renderDefault('stock', 'INTEGER', 'abc')).toThrow(
                'Cannot store "abc" in \'stock\': expected an integer default',
            );

        });

        it('should render reals', () => {

            expect(renderDefault('weight', 'REAL', '1.50')).toBe('1.5');
            expect(() => renderDefault('weight', 'REAL', 'heavy')).toThrow(TypeCoercionError);

        });

        it('should quote text and double embedded quotes', () => {

            expect(renderDefault('category', 'TEXT', 'mugs')).toBe("'mugs'");
            expect(renderDefault('category', 'TEXT', "kid's")).toBe("'kid''s'");

        });

    });

});
