import { UsageError } from '../parse.js';
import { withContext, writeJson, type HeadlessCommand } from './_helpers.js';

export const help = `
# SCHEMA ADD

Add a column to the managed table

## Usage

    tabledrift schema add <name> <type> [--default VALUE]

## Description

Adds a nullable column with ALTER TABLE. The name is sanitized: any
character outside letters, digits and underscore becomes \`_\`.
The type must be INTEGER, REAL, TEXT or BLOB (any case).

## Examples

    tabledrift schema add weight REAL
    tabledrift schema add color TEXT --default black
`;

export const run: HeadlessCommand = async (params, flags, logger) => {

    const [name, type] = params.args;

    if (!name || !type) {

        throw new UsageError('Usage: tabledrift schema add <name> <type>');

    }

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const column = await ctx.addColumn(name, type, flags.default);

            if (flags.json) {

                writeJson(column);

            }

        },
    });

};
