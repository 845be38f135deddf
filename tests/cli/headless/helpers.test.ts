/**
 * Headless helper tests.
 */
import { describe, it, expect } from 'vitest'

import { flagOverrides, formatField, formatTable } from '../../../src/cli/headless/_helpers.js'
import type { CliFlags } from '../../../src/cli/types.js'


const baseFlags: CliFlags = {
    json: false,
    allowProtected: false,
    null: [],
    raw: false,
}


describe('cli: headless helpers', () => {

    describe('flagOverrides', () => {

        it('should leave out unset flags', () => {

            expect(flagOverrides(baseFlags)).toEqual({})
        })

        it('should map set flags to settings', () => {

            expect(flagOverrides({
                ...baseFlags,
                database: './catalog.db',
                actor: 'alice',
                table: 'item',
            })).toEqual({
                database: './catalog.db',
                actor: 'alice',
                table: { name: 'item' },
            })
        })
    })

    describe('formatField', () => {

        it('should render null as NULL', () => {

            expect(formatField(null)).toBe('NULL')
            expect(formatField(4)).toBe('4')
            expect(formatField('12.50')).toBe('12.50')
        })
    })

    describe('formatTable', () => {

        it('should align columns under the header', () => {

            expect(formatTable(['id', 'name'], [['1', 'Mug']])).toBe('id  name\n--  ----\n1   Mug')
        })

        it('should widen columns to the longest cell', () => {

            expect(formatTable(['f', 'v'], [['stock', '4'], ['name', 'Mug']]))
                .toBe('f      v\n-----  ---\nstock  4\nname   Mug')
        })
    })
})
