/**
 * Schema module.
 *
 * Introspection, planned mutations and table rebuilds for the managed table.
 */
export {
    tableExists,
    listColumns,
    getTableSchema,
    getDefinitionStatement,
    findPrimaryKey,
    findColumn,
} from './introspector.js';

export {
    addColumn,
    dropColumn,
    modifyColumn,
    runRawStatement,
} from './planner.js';

export { rebuildTable, sharedColumns, shadowName, SHADOW_SUFFIX } from './rebuilder.js';
export { createTable, columnDefinition } from './ddl.js';

export {
    parseColumnType,
    affinityOf,
    isIntegerText,
    isNumberText,
    zeroValue,
    renderDefault,
} from './column-type.js';

export {
    ColumnNotFoundError,
    ColumnExistsError,
    PrimaryKeyImmutableError,
    TypeInvalidError,
    TypeCoercionError,
    MigrationFailureError,
} from './errors.js';

export type { MigrationStep } from './errors.js';
export * from './types.js';
