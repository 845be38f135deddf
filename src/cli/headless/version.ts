import { type HeadlessCommand } from './_helpers.js';
import { formatHelp } from '../help-formatter.js';

export const help = `
# VERSION

Browse the field-level version ledger and roll changes back

## Usage

    tabledrift version [subcommand] [options]

## Subcommands

    list        List ledger entries
    show        Show one entry
    rollback    Restore a field to its value before an entry

## Description

Every field change made through tabledrift is appended to the ledger
with its old value, new value, time and actor. Entries are never
modified; a rollback appends a new entry, so it can itself be rolled back.

## Examples

    tabledrift version list --record 3
    tabledrift version rollback 12
`;

export const run: HeadlessCommand = async (_params, flags) => {

    const output = flags.json ? help : formatHelp(help);
    process.stdout.write(`${output}\n`);

    return 0;

};
