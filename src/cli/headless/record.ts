import { type HeadlessCommand } from './_helpers.js';
import { formatHelp } from '../help-formatter.js';

export const help = `
# RECORD

Read and write records of the managed table

## Usage

    tabledrift record [subcommand] [options]

## Subcommands

    get         Show one record, or several side by side
    create      Insert a record
    update      Change fields of a record
    delete      Delete a record
    list        List records with search, sort and paging
    export      Print all records as JSON

## Description

Fields are given as \`field=value\` pairs and coerced to each column's
type. Monetary columns ending in \`_cents\` take decimal amounts through
their short name: \`price=12.50\` stores 1250 in \`price_cents\`.
Every changed field is recorded in the version ledger.

## Examples

    tabledrift record create name=Mug price=12.50 stock=4
    tabledrift record update 1 stock=3
    tabledrift record list --search mug --sort name --order asc
`;

export const run: HeadlessCommand = async (_params, flags) => {

    const output = flags.json ? help : formatHelp(help);
    process.stdout.write(`${output}\n`);

    return 0;

};
