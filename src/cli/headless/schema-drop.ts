import { UsageError } from '../parse.js';
import { withContext, writeJson, type HeadlessCommand } from './_helpers.js';

export const help = `
# SCHEMA DROP

Drop a column from the managed table

## Usage

    tabledrift schema drop <name> [--allow-protected]

## Description

Rebuilds the table without the column. The column's data is lost;
its ledger history stays but can no longer be rolled back.
The primary key cannot be dropped.

## Examples

    tabledrift schema drop weight
`;

export const run: HeadlessCommand = async (params, flags, logger) => {

    const [name] = params.args;

    if (!name) {

        throw new UsageError('Usage: tabledrift schema drop <name>');

    }

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const result = await ctx.dropColumn(name);

            if (flags.json) {

                writeJson(result);

            }

        },
    });

};
