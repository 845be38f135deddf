/**
 * CLI type definitions for the tabledrift command line.
 */


/**
 * All valid route identifiers.
 *
 * Routes follow a hierarchical `section` or `section/action` pattern.
 */
export const ROUTES = [
    // Schema
    'schema',
    'schema/show',
    'schema/add',
    'schema/drop',
    'schema/modify',
    'schema/sql',
    // Records
    'record',
    'record/get',
    'record/create',
    'record/update',
    'record/delete',
    'record/list',
    'record/export',
    // Versions
    'version',
    'version/list',
    'version/show',
    'version/rollback',
    // Lock
    'lock',
    'lock/status',
    'lock/force',
    // Help
    'help',
] as const

export type Route = typeof ROUTES[number]


/**
 * Check whether a string names a known route.
 */
export function isRoute(value: string): value is Route {

    return ROUTES.some((route) => route === value)
}


/**
 * Positional arguments after the route.
 *
 * Each command interprets them itself, e.g. `schema add <name> <type>`
 * or `record update <id> field=value...`.
 */
export interface RouteParams {

    args: string[]
}


/**
 * CLI flags parsed by meow.
 */
export interface CliFlags {

    /** Output JSON instead of text */
    json: boolean

    /** Settings file (default: .tabledrift/settings.yml) */
    settings?: string

    /** Database file override */
    database?: string

    /** Managed table override */
    table?: string

    /** Actor recorded in the ledger */
    actor?: string

    /** Allow destructive operations on a protected table */
    allowProtected: boolean

    /** Default value for schema add/modify */
    default?: string

    /** Fields to set to null on record create/update */
    null: string[]

    /** Read stored values without display transforms */
    raw: boolean

    // Listing
    search?: string
    sort?: string
    order?: 'asc' | 'desc'
    limit?: number
    offset?: number

    /** Record id filter for version list */
    record?: number

    /** Field name filter for version list */
    field?: string
}


/**
 * Result of parsing the command line.
 */
export interface ParsedCli {

    /** Route path, e.g. 'schema/add' (may be unknown) */
    route: string
    params: RouteParams
    flags: CliFlags
}
