/**
 * CLI argument parsing tests.
 */
import { describe, it, expect } from 'vitest'

import {
    parseRouteFromInput,
    parseId,
    parseAssignments,
    parseOrder,
    UsageError,
} from '../../src/cli/parse.js'


describe('cli: parse', () => {

    describe('parseRouteFromInput', () => {

        it('should route empty input to help', () => {

            expect(parseRouteFromInput([])).toEqual({ route: 'help', params: { args: [] } })
        })

        it('should parse colon notation', () => {

            expect(parseRouteFromInput(['record:get', '3'])).toEqual({
                route: 'record/get',
                params: { args: ['3'] },
            })
        })

        it('should parse space notation', () => {

            expect(parseRouteFromInput(['schema', 'add', 'weight', 'REAL'])).toEqual({
                route: 'schema/add',
                params: { args: ['weight', 'REAL'] },
            })
        })

        it('should treat a non-action second word as an argument', () => {

            expect(parseRouteFromInput(['version', '12'])).toEqual({
                route: 'version',
                params: { args: ['12'] },
            })
        })

        it('should keep help topics as arguments', () => {

            expect(parseRouteFromInput(['help', 'record', 'create'])).toEqual({
                route: 'help',
                params: { args: ['record', 'create'] },
            })
        })
    })

    describe('parseId', () => {

        it('should parse a positive integer', () => {

            expect(parseId('42')).toBe(42)
        })

        it('should reject missing and non-numeric values', () => {

            expect(() => parseId(undefined)).toThrow('Expected a numeric id, got nothing')
            expect(() => parseId('abc', 'version id')).toThrow("Expected a numeric version id, got 'abc'")
            expect(() => parseId('-1')).toThrow(UsageError)
        })

        it('should reject zero', () => {

            expect(() => parseId('0')).toThrow("Expected a positive id, got '0'")
        })
    })

    describe('parseAssignments', () => {

        it('should split on the first equals sign', () => {

            expect(parseAssignments(['name=Mug', 'description=a=b'])).toEqual({
                name: 'Mug',
                description: 'a=b',
            })
        })

        it('should keep empty values as empty strings', () => {

            expect(parseAssignments(['category='])).toEqual({ category: '' })
        })

        it('should set null fields last', () => {

            expect(parseAssignments(['name=Mug', 'description=x'], ['description'])).toEqual({
                name: 'Mug',
                description: null,
            })
        })

        it('should reject arguments without a field', () => {

            expect(() => parseAssignments(['Mug'])).toThrow("Expected field=value, got 'Mug'")
            expect(() => parseAssignments(['=Mug'])).toThrow("Expected field=value, got '=Mug'")
        })
    })

    describe('parseOrder', () => {

        it('should accept either case', () => {

            expect(parseOrder('ASC')).toBe('asc')
            expect(parseOrder('desc')).toBe('desc')
            expect(parseOrder(undefined)).toBeUndefined()
        })

        it('should reject other values', () => {

            expect(() => parseOrder('up')).toThrow("Expected --order asc or desc, got 'up'")
        })
    })
})
