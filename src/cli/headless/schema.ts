import { type HeadlessCommand } from './_helpers.js';
import { formatHelp } from '../help-formatter.js';

export const help = `
# SCHEMA

Inspect and evolve the managed table's columns

## Usage

    tabledrift schema [subcommand] [options]

## Subcommands

    show        List columns and the table definition
    add         Add a nullable column
    drop        Drop a column (rebuilds the table)
    modify      Rename and/or retype a column (rebuilds the table)
    sql         Run a raw statement (requires guards.allowRawStatements)

## Description

Column types are INTEGER, REAL, TEXT and BLOB. Dropping or modifying a
column rebuilds the table inside one transaction: a failure leaves the
live table exactly as it was. Data in a dropped or renamed column is lost.

## Examples

    tabledrift schema show
    tabledrift schema add weight REAL --default 0
    tabledrift schema modify weight weight_kg REAL
    tabledrift schema drop weight_kg

See \`tabledrift help schema add\` for details on each subcommand.
`;

export const run: HeadlessCommand = async (_params, flags) => {

    const output = flags.json ? help : formatHelp(help);
    process.stdout.write(`${output}\n`);

    return 0;

};
