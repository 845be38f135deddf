import { withContext, writeJson, type HeadlessCommand } from './_helpers.js';

export const help = `
# RECORD EXPORT

Print all records as a JSON array

## Usage

    tabledrift record export

## Description

Records are ordered oldest first. Monetary columns are rendered as
two-decimal strings.

## Examples

    tabledrift record export > products.json
`;

export const run: HeadlessCommand = async (_params, flags, logger) => {

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            writeJson(await ctx.exportRecords());

        },
    });

};
