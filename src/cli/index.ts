#!/usr/bin/env node
/**
 * CLI entry point for tabledrift.
 *
 * Parses command line arguments with meow and runs the command.
 *
 * @example
 * ```bash
 * tabledrift schema show
 * tabledrift schema:add weight REAL
 * tabledrift --json record export
 * ```
 */
import meow from 'meow'

import type { CliFlags, ParsedCli } from './types.js'
import { parseOrder, parseRouteFromInput } from './parse.js'
import { runHeadless } from './headless/index.js'
import { shouldOutputJson } from '../core/config/index.js'


/**
 * Help text for the CLI.
 */
const HELP_TEXT = `
  Usage
    $ tabledrift <command> [options]

  Commands
    schema show                     List columns
    schema add <name> <type>        Add a column
    schema drop <name>              Drop a column
    schema modify <old> <new> <type>  Rename and/or retype a column
    schema sql <statement>          Run a raw statement

    record get <id> [<id>...]       Show one record or compare several
    record create field=value...    Insert a record
    record update <id> field=value...  Change fields
    record delete <id>              Delete a record
    record list                     List records
    record export                   Print all records as JSON

    version list                    List ledger entries
    version show <id>               Show a ledger entry
    version rollback <id>           Restore a field's previous value

    lock status                     Show lock status
    lock force                      Force release the lock

    help [command]                  Show help for a command

  Options
    --json                Output JSON (or TABLEDRIFT_JSON=1)
    --settings, -s FILE   Settings file
    --database, -d FILE   Database file
    --table, -t NAME      Managed table
    --actor, -a NAME      Actor recorded in the ledger
    --allow-protected     Allow destructive operations on a protected table
    --default VALUE       Default value (schema add/modify)
    --null FIELD          Set a field to NULL (record create/update, repeatable)
    --raw                 Show stored values (record get/list)
    --search TEXT         Filter records (record list)
    --sort FIELD          Sort field (record list, version list)
    --order asc|desc      Sort direction
    --limit N             Maximum rows
    --offset N            Rows to skip (record list)
    --record ID           Record filter (version list)
    --field NAME          Field filter (version list)
    --help, -h            Show this help
    --version             Show version

  Examples
    $ tabledrift record create name=Mug price=12.50
    $ tabledrift version list --record 1
    $ tabledrift version rollback 3
`


/**
 * Parse CLI arguments with meow.
 */
function parseCli(): ParsedCli {

    const cli = meow(HELP_TEXT, {
        importMeta: import.meta,
        flags: {
            json: { type: 'boolean', default: false },
            settings: { type: 'string', shortFlag: 's' },
            database: { type: 'string', shortFlag: 'd' },
            table: { type: 'string', shortFlag: 't' },
            actor: { type: 'string', shortFlag: 'a' },
            allowProtected: { type: 'boolean', default: false },
            default: { type: 'string' },
            null: { type: 'string', isMultiple: true, default: [] },
            raw: { type: 'boolean', default: false },
            search: { type: 'string' },
            sort: { type: 'string' },
            order: { type: 'string' },
            limit: { type: 'number' },
            offset: { type: 'number' },
            record: { type: 'number' },
            field: { type: 'string' },
        },
    })

    const flags: CliFlags = {
        json: cli.flags.json || shouldOutputJson(),
        settings: cli.flags.settings,
        database: cli.flags.database,
        table: cli.flags.table,
        actor: cli.flags.actor,
        allowProtected: cli.flags.allowProtected,
        default: cli.flags.default,
        null: cli.flags.null,
        raw: cli.flags.raw,
        search: cli.flags.search,
        sort: cli.flags.sort,
        order: parseOrder(cli.flags.order),
        limit: cli.flags.limit,
        offset: cli.flags.offset,
        record: cli.flags.record,
        field: cli.flags.field,
    }

    const { route, params } = parseRouteFromInput(cli.input)

    return { route, params, flags }
}


/**
 * Main entry point.
 */
async function main(): Promise<void> {

    const { route, params, flags } = parseCli()
    const exitCode = await runHeadless(route, params, flags)

    process.exit(exitCode)
}


main().catch((error: unknown) => {

    console.error('Fatal error:', error)
    process.exit(1)
})
