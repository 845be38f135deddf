import { parseId } from '../parse.js';
import { withContext, writeJson, type HeadlessCommand } from './_helpers.js';

export const help = `
# RECORD DELETE

Delete a record

## Usage

    tabledrift record delete <id> [--allow-protected]

## Description

Deletion is not versioned: the record's ledger history remains, but it
can no longer be rolled back.

## Examples

    tabledrift record delete 3
`;

export const run: HeadlessCommand = async (params, flags, logger) => {

    const id = parseId(params.args[0]);

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            await ctx.deleteRecord(id);

            if (flags.json) {

                writeJson({ id, deleted: true });

            }

        },
    });

};
