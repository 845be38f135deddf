import { UsageError } from '../parse.js';
import { withContext, writeJson, type HeadlessCommand } from './_helpers.js';

export const help = `
# SCHEMA MODIFY

Rename and/or retype a column

## Usage

    tabledrift schema modify <old-name> <new-name> <type> [--default VALUE]

## Description

Rebuilds the table with the column replaced. The new column is nullable.
Data is copied only when the name is unchanged: a renamed column starts
out empty. The primary key cannot be modified.

## Examples

    tabledrift schema modify stock stock INTEGER --default 0
    tabledrift schema modify weight weight_kg REAL
`;

export const run: HeadlessCommand = async (params, flags, logger) => {

    const [oldName, newName, type] = params.args;

    if (!oldName || !newName || !type) {

        throw new UsageError('Usage: tabledrift schema modify <old-name> <new-name> <type>');

    }

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const result = await ctx.modifyColumn(oldName, newName, type, flags.default);

            if (flags.json) {

                writeJson(result);

            }

        },
    });

};
