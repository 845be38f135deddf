/**
 * Record module.
 *
 * Schema-driven access to the managed table's rows.
 */
export { RecordAccessor } from './accessor.js';
export type { RecordAccessorOptions } from './accessor.js';
export { coerceValue } from './coercion.js';
export { canonical, toFieldValue } from './canonical.js';
export { centsTransform, toCents, formatCents } from './money.js';
export type { ValueTransform } from './money.js';
export { RecordNotFoundError, TableNotReadyError } from './errors.js';
export type {
    FieldValue,
    WriteValues,
    DynamicRecord,
    FieldChange,
    ReadOptions,
    ListRecordsOptions,
    AppliedValue,
} from './types.js';
