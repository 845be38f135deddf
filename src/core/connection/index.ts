/**
 * Connection module exports.
 *
 * Provides SQLite connection creation.
 */
export { createConnection, testConnection, isBusyError } from './factory.js';
export { DEFAULT_BUSY_TIMEOUT } from './dialects/sqlite.js';
export * from './types.js';
