/**
 * Rollback module.
 */
export { RollbackExecutor } from './executor.js';
export type { RollbackExecutorOptions } from './executor.js';
export { FieldNoLongerExistsError } from './errors.js';
export type { RollbackState, RollbackOutcome } from './types.js';
