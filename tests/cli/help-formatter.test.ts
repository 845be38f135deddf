/**
 * Help formatter tests.
 *
 * Colors depend on the terminal, so assertions compare stripped text.
 */
import { describe, it, expect } from 'vitest'

import { formatHelp, stripColors } from '../../src/cli/help-formatter.js'


describe('cli: help-formatter', () => {

    describe('stripColors', () => {

        it('should remove ANSI sequences', () => {

            expect(stripColors('\x1b[1m\x1b[34mRECORD\x1b[39m\x1b[22m')).toBe('RECORD')
        })

        it('should leave plain text alone', () => {

            expect(stripColors('plain [text]')).toBe('plain [text]')
        })
    })

    describe('formatHelp', () => {

        it('should drop heading markers', () => {

            expect(stripColors(formatHelp('# RECORD GET\n## Usage'))).toBe('RECORD GET\nUsage')
        })

        it('should drop backticks around inline code', () => {

            expect(stripColors(formatHelp('Use `--raw` for stored values'))).toBe('Use --raw for stored values')
        })

        it('should keep placeholders and brackets', () => {

            expect(stripColors(formatHelp('Takes <id> and [--raw]'))).toBe('Takes <id> and [--raw]')
        })

        it('should normalise spacing in indented commands', () => {

            expect(stripColors(formatHelp('    tabledrift  record get   3 --raw')))
                .toBe('    tabledrift record get 3 --raw')
        })

        it('should leave code blocks untouched', () => {

            const text = '```json\n{ "id": 4 }\n```'

            expect(stripColors(formatHelp(text))).toBe(text)
        })
    })
})
