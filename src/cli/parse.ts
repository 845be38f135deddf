/**
 * Argument parsing helpers.
 *
 * Turns positional CLI input into a route and typed values.
 */
import type { WriteValues } from '../core/record/index.js'
import type { RouteParams } from './types.js'


/**
 * Error thrown for malformed command line input.
 */
export class UsageError extends Error {

    override readonly name = 'UsageError' as const

    constructor(message: string) {

        super(message)
    }
}


/**
 * Second words that select an action within a section.
 */
const ACTIONS = new Set([
    'show', 'add', 'drop', 'modify', 'sql',
    'get', 'create', 'update', 'delete', 'list', 'export',
    'rollback',
    'status', 'force',
])


/**
 * Parse route and params from CLI input array.
 *
 * Supports both colon notation (schema:add) and space notation (schema add).
 *
 * @example
 * ```typescript
 * parseRouteFromInput(['schema', 'add', 'weight', 'REAL'])
 * // { route: 'schema/add', params: { args: ['weight', 'REAL'] } }
 *
 * parseRouteFromInput(['record:get', '3'])
 * // { route: 'record/get', params: { args: ['3'] } }
 * ```
 */
export function parseRouteFromInput(input: readonly string[]): { route: string; params: RouteParams } {

    const [first, ...rest] = input

    if (first === undefined) {

        return { route: 'help', params: { args: [] } }
    }

    // Handle colon notation (schema:add)
    if (first.includes(':')) {

        const [section, action] = first.split(':')
        const route = action ? `${section}/${action}` : `${section}`

        return { route, params: { args: rest } }
    }

    // Handle space notation (schema add)
    const [second, ...tail] = rest

    if (second !== undefined && first !== 'help' && ACTIONS.has(second)) {

        return { route: `${first}/${second}`, params: { args: tail } }
    }

    return { route: first, params: { args: rest } }
}


/**
 * Parse a record or version id.
 *
 * @throws UsageError unless the value is a positive integer
 */
export function parseId(value: string | undefined, label = 'id'): number {

    if (value === undefined || !/^\d+$/.test(value)) {

        throw new UsageError(`Expected a numeric ${label}, got ${value === undefined ? 'nothing' : `'${value}'`}`)
    }

    const id = Number(value)

    if (!Number.isSafeInteger(id) || id < 1) {

        throw new UsageError(`Expected a positive ${label}, got '${value}'`)
    }

    return id
}


/**
 * Parse `field=value` assignments into write values.
 *
 * Everything after the first `=` is the value, so values may contain
 * `=`. Fields named in `nulls` are set to null.
 *
 * @example
 * ```typescript
 * parseAssignments(['name=Mug', 'price=12.50'], ['description'])
 * // { name: 'Mug', price: '12.50', description: null }
 * ```
 *
 * @throws UsageError for an argument without `=` or with an empty field
 */
export function parseAssignments(args: readonly string[], nulls: readonly string[] = []): WriteValues {

    const values: WriteValues = {}

    for (const arg of args) {

        const index = arg.indexOf('=')

        if (index < 1) {

            throw new UsageError(`Expected field=value, got '${arg}'`)
        }

        values[arg.slice(0, index)] = arg.slice(index + 1)
    }

    for (const field of nulls) {

        values[field] = null
    }

    return values
}


/**
 * Parse a sort direction.
 *
 * @throws UsageError unless the value is asc or desc
 */
export function parseOrder(value: string | undefined): 'asc' | 'desc' | undefined {

    if (value === undefined) {

        return undefined
    }

    const order = value.toLowerCase()

    if (order !== 'asc' && order !== 'desc') {

        throw new UsageError(`Expected --order asc or desc, got '${value}'`)
    }

    return order
}
