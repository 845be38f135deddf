import { withContext, writeJson, writeLine, type HeadlessCommand } from './_helpers.js';

export const help = `
# LOCK FORCE

Force release the writer lock

## Usage

    tabledrift lock force [--allow-protected]

## Description

Removes the lock regardless of who holds it. Only use this when the
holder is known to have crashed.

## Examples

    tabledrift lock force
`;

export const run: HeadlessCommand = async (_params, flags, logger) => {

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const released = await ctx.forceReleaseLock();

            if (flags.json) {

                writeJson({ released });

            }
            else if (!released) {

                writeLine('No active lock');

            }

        },
    });

};
