import { type HeadlessCommand } from './_helpers.js';
import { formatHelp } from '../help-formatter.js';

export const help = `
# LOCK

Writer lock management

## Usage

    tabledrift lock [subcommand] [options]

## Subcommands

    status      Check current lock status
    force       Force release (override ownership)

## Description

Schema changes hold a lock on the managed table so two processes never
rebuild it at once. Locks are stored in the database and expire on
their own after \`lock.timeout\`. Use \`force\` to clear a lock left by
a crashed process.

## Examples

    tabledrift lock status
    tabledrift lock force

See \`tabledrift help lock status\`.
`;

export const run: HeadlessCommand = async (_params, flags) => {

    const output = flags.json ? help : formatHelp(help);
    process.stdout.write(`${output}\n`);

    return 0;

};
