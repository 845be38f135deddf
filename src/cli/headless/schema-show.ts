import { withContext, formatTable, writeJson, writeLine, type HeadlessCommand } from './_helpers.js';

export const help = `
# SCHEMA SHOW

List the managed table's columns

## Usage

    tabledrift schema show [--json]

## Description

Reads the live schema on every call, so columns added by another
process show up immediately. Also prints the stored CREATE TABLE
statement.

## JSON Output

\`\`\`json
{
    "table": "product",
    "columns": [
        { "ordinal": 0, "name": "id", "type": "INTEGER", "nullable": false, "default": null, "isPrimaryKey": true }
    ],
    "definition": "CREATE TABLE \\"product\\" (...)"
}
\`\`\`
`;

export const run: HeadlessCommand = async (_params, flags, logger) => {

    return withContext({
        flags,
        logger,
        fn: async (ctx) => {

            const columns = await ctx.listColumns();
            const definition = await ctx.getDefinitionStatement();

            if (flags.json) {

                writeJson({ table: ctx.table, columns, definition });
                return;

            }

            writeLine(formatTable(
                ['#', 'name', 'type', 'nullable', 'default', 'pk'],
                columns.map((column) => [
                    String(column.ordinal),
                    column.name,
                    column.declaredType || column.type,
                    column.nullable ? 'yes' : 'no',
                    column.default ?? '',
                    column.isPrimaryKey ? 'yes' : '',
                ]),
            ));

            if (definition) {

                writeLine();
                writeLine(definition);

            }

        },
    });

};
