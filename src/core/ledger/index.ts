/**
 * Versioning ledger module.
 */
export { VersionLedger } from './ledger.js';
export { VersionNotFoundError, LedgerQueryError } from './errors.js';
export {
    ListVersionsOptionsSchema,
    VERSION_SORT_FIELDS,
} from './types.js';
export type {
    VersionEntry,
    VersionDiff,
    VersionSortField,
    ListVersionsOptions,
} from './types.js';
