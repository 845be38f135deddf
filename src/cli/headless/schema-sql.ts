import { UsageError } from '../parse.js';
import { withContext, formatTable, writeJson, writeLine, type HeadlessCommand } from './_helpers.js';

export const help = `
# SCHEMA SQL

Run a raw statement against the database

## Usage

    tabledrift schema sql <statement...>

## Description

Bypasses the planner. Refused unless \`guards.allowRawStatements\` is
set in settings (or TABLEDRIFT_GUARDS_allowRawStatements=true).
Every statement is audited as a \`schema:raw:*\` event.

## Examples

    tabledrift schema sql "CREATE INDEX product_name_idx ON product (name)"
`;

export const run: HeadlessCommand = async (params, flags, logger) => {

    const statement = params.args.join(' ').trim();

    if (statement === '') {

        throw new UsageError('Usage: tabledrift schema sql <statement>');

    }

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const result = await ctx.runRawStatement(statement);

            if (flags.json) {

                writeJson(result);
                return;

            }

            if (result.columns.length > 0) {

                writeLine(formatTable(
                    result.columns,
                    result.rows.map((row) => result.columns.map((column) => String(row[column] ?? 'NULL'))),
                ));

            }

        },
    });

};
