/**
 * CLI route table tests.
 */
import { describe, it, expect } from 'vitest'

import { isRoute, ROUTES } from '../../src/cli/types.js'


describe('cli: types', () => {

    describe('isRoute', () => {

        it('should accept every declared route', () => {

            for (const route of ROUTES) {

                expect(isRoute(route)).toBe(true)
            }
        })

        it('should reject unknown routes', () => {

            expect(isRoute('record/purge')).toBe(false)
            expect(isRoute('')).toBe(false)
            expect(isRoute('Record')).toBe(false)
        })
    })
})
