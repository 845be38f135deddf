/**
 * SDK Context Implementation.
 *
 * The Context class provides programmatic access to every tabledrift
 * operation on the managed table. It wraps core modules, applies the
 * safety guards, and holds the writer lock across schema changes.
 */
import { randomUUID } from 'node:crypto';
import path from 'node:path';

import type { Kysely } from 'kysely';

import { ledgerTableName, type Settings } from '../core/config/index.js';
import { createConnection, type ConnectionResult } from '../core/connection/index.js';
import { bootstrap, type BootstrapResult } from '../core/bootstrap/index.js';
import {
    addColumn,
    dropColumn,
    getDefinitionStatement,
    listColumns,
    modifyColumn,
    runRawStatement,
    type ColumnDescriptor,
    type DefaultLiteral,
    type RawStatementResult,
    type RebuildResult,
} from '../core/schema/index.js';
import {
    RecordAccessor,
    type DynamicRecord,
    type FieldChange,
    type ListRecordsOptions,
    type ReadOptions,
    type WriteValues,
} from '../core/record/index.js';
import {
    VersionLedger,
    VersionNotFoundError,
    type ListVersionsOptions,
    type VersionEntry,
} from '../core/ledger/index.js';
import { RollbackExecutor, type RollbackOutcome } from '../core/rollback/index.js';
import { LockManager, type LockStatus } from '../core/lock/index.js';
import { toError } from '../core/shared/index.js';
import { observer } from '../core/observer.js';

import { checkProtectedTable, checkRawStatementsAllowed } from './guards.js';
import type { CreateContextOptions, ExportedRecord } from './types.js';

// ─────────────────────────────────────────────────────────────
// Context Class
// ─────────────────────────────────────────────────────────────

/**
 * SDK Context implementation.
 *
 * @example
 * ```typescript
 * const ctx = await createContext()
 * await ctx.connect()
 *
 * await ctx.addColumn('weight', 'REAL')
 * const id = await ctx.createRecord({ name: 'Mug', price: '12.50', weight: 0.4 })
 *
 * // Clean disconnect
 * await ctx.disconnect()
 * ```
 */
export class Context {

    #connection: ConnectionResult | null = null;
    #settings: Settings;
    #options: CreateContextOptions;
    #projectRoot: string;
    #ledger: VersionLedger;
    #accessor: RecordAccessor;
    #rollback: RollbackExecutor;
    #locks = new LockManager();
    #lockOwner: string;

    constructor(
        settings: Settings,
        options: CreateContextOptions,
        projectRoot: string,
    ) {

        this.#settings = settings;
        this.#options = options;
        this.#projectRoot = projectRoot;
        this.#lockOwner = `${settings.actor}:${process.pid}:${randomUUID()}`;

        this.#ledger = new VersionLedger(ledgerTableName(settings));
        this.#accessor = new RecordAccessor({ table: settings.table.name, ledger: this.#ledger });
        this.#rollback = new RollbackExecutor({ accessor: this.#accessor, ledger: this.#ledger });

    }

    // ─────────────────────────────────────────────────────────
    // Read-only Properties
    // ─────────────────────────────────────────────────────────

    get settings(): Settings {

        return this.#settings;

    }

    get table(): string {

        return this.#settings.table.name;

    }

    get ledgerTable(): string {

        return this.#ledger.table;

    }

    get actor(): string {

        return this.#settings.actor;

    }

    /**
     * Holder name written to the lock table.
     *
     * Unique per context, so two contexts sharing an actor still
     * exclude each other.
     */
    get lockOwner(): string {

        return this.#lockOwner;

    }

    /**
     * Database file path, resolved against the project root.
     */
    get databasePath(): string {

        const database = this.#settings.database;

        if (database === ':memory:') {

            return database;

        }

        return path.resolve(this.#projectRoot, database);

    }

    get connected(): boolean {

        return this.#connection !== null;

    }

    get observer() {

        return observer;

    }

    get kysely(): Kysely<unknown> {

        if (!this.#connection) {

            throw new Error('Not connected. Call connect() first.');

        }

        return this.#connection.db;

    }

    // ─────────────────────────────────────────────────────────
    // Lifecycle
    // ─────────────────────────────────────────────────────────

    /**
     * Open the database and create whatever tables are missing.
     */
    async connect(): Promise<BootstrapResult | null> {

        if (this.#connection) return null;

        const connection = await this.#run('connection', () =>
            createConnection({ database: this.databasePath }),
        );

        try {

            const result = await bootstrap(connection.db, {
                table: this.#settings.table.name,
                primaryKey: this.#settings.table.primaryKey,
                columns: this.#settings.table.columns,
                ledger: this.#ledger,
            });

            this.#connection = connection;

            return result;

        }
        catch (err) {

            await connection.destroy();
            this.#report('bootstrap', err);
            throw err;

        }

    }

    async disconnect(): Promise<void> {

        if (!this.#connection) return;

        await this.#connection.destroy();
        this.#connection = null;

        observer.emit('connection:close', { database: this.databasePath });

    }

    // ─────────────────────────────────────────────────────────
    // Schema
    // ─────────────────────────────────────────────────────────

    async listColumns(): Promise<ColumnDescriptor[]> {

        return this.#run('schema', () => listColumns(this.kysely, this.table));

    }

    async getDefinitionStatement(): Promise<string | null> {

        return this.#run('schema', () => getDefinitionStatement(this.kysely, this.table));

    }

    async addColumn(name: string, type: string, defaultValue?: DefaultLiteral): Promise<ColumnDescriptor> {

        return this.#mutate(`add column ${name}`, () =>
            addColumn(this.kysely, this.table, name, type, defaultValue),
        );

    }

    async dropColumn(name: string): Promise<RebuildResult> {

        return this.#mutate(
            `drop column ${name}`,
            () => dropColumn(this.kysely, this.table, name),
            () => checkProtectedTable(this.#settings, 'drop column', this.#options),
        );

    }

    async modifyColumn(
        oldName: string,
        newName: string,
        newType: string,
        newDefault?: DefaultLiteral,
    ): Promise<RebuildResult> {

        return this.#mutate(
            `modify column ${oldName}`,
            () => modifyColumn(this.kysely, this.table, oldName, newName, newType, newDefault),
            () => checkProtectedTable(this.#settings, 'modify column', this.#options),
        );

    }

    /**
     * Run an operator-issued statement, bypassing the planner.
     *
     * @throws RawStatementDeniedError unless guards.allowRawStatements is set
     */
    async runRawStatement(statement: string): Promise<RawStatementResult> {

        return this.#mutate(
            'raw statement',
            () => runRawStatement(this.kysely, this.table, statement),
            () => {

                checkRawStatementsAllowed(this.#settings);
                checkProtectedTable(this.#settings, 'run a raw statement', this.#options);

            },
        );

    }

    // ─────────────────────────────────────────────────────────
    // Records
    // ─────────────────────────────────────────────────────────

    async createRecord(values: WriteValues): Promise<number> {

        return this.#run('record', () => this.#accessor.create(this.kysely, values, this.actor));

    }

    async getRecord(id: number, options?: ReadOptions): Promise<DynamicRecord> {

        return this.#run('record', () => this.#accessor.get(this.kysely, id, options));

    }

    /**
     * Get several records side by side, in the order given.
     */
    async getRecords(ids: readonly number[], options?: ReadOptions): Promise<DynamicRecord[]> {

        return this.#run('record', () => this.#accessor.getMany(this.kysely, ids, options));

    }

    async listRecords(options?: ListRecordsOptions): Promise<DynamicRecord[]> {

        return this.#run('record', () => this.#accessor.list(this.kysely, options));

    }

    /**
     * All records, oldest first, flattened to plain objects.
     */
    async exportRecords(): Promise<ExportedRecord[]> {

        const records = await this.listRecords({ order: 'asc' });

        return records.map((record) => ({ ...record.values }));

    }

    async updateRecord(id: number, values: WriteValues): Promise<FieldChange[]> {

        return this.#run('record', () => this.#accessor.update(this.kysely, id, values, this.actor));

    }

    async deleteRecord(id: number): Promise<void> {

        return this.#run('record', () => {

            checkProtectedTable(this.#settings, 'delete a record', this.#options);

            return this.#accessor.delete(this.kysely, id);

        });

    }

    // ─────────────────────────────────────────────────────────
    // Versions
    // ─────────────────────────────────────────────────────────

    async listVersions(options: ListVersionsOptions): Promise<VersionEntry[]> {

        return this.#run('ledger', () => this.#ledger.list(this.kysely, options));

    }

    /**
     * @throws VersionNotFoundError
     */
    async getVersion(versionId: number): Promise<VersionEntry> {

        return this.#run('ledger', async () => {

            const entry = await this.#ledger.getById(this.kysely, versionId);

            if (!entry) {

                throw new VersionNotFoundError(versionId);

            }

            return entry;

        });

    }

    /**
     * Restore a field to the value it held before the given entry.
     */
    async rollback(versionId: number): Promise<RollbackOutcome> {

        return this.#run('rollback', () => this.#rollback.rollback(this.kysely, versionId, this.actor));

    }

    // ─────────────────────────────────────────────────────────
    // Locks
    // ─────────────────────────────────────────────────────────

    async lockStatus(): Promise<LockStatus> {

        return this.#run('lock', () => this.#locks.status(this.kysely, this.table));

    }

    /**
     * Clear a lock left behind by a crashed writer.
     *
     * @returns true if a lock was released
     */
    async forceReleaseLock(): Promise<boolean> {

        return this.#run('lock', () => {

            checkProtectedTable(this.#settings, 'force-release the lock', this.#options);

            return this.#locks.forceRelease(this.kysely, this.table);

        });

    }

    // ─────────────────────────────────────────────────────────
    // Internals
    // ─────────────────────────────────────────────────────────

    /**
     * Run a schema mutation, holding the table lock when enabled.
     *
     * The guard runs first, before the lock is taken.
     */
    async #mutate<T>(reason: string, operation: () => Promise<T>, guard?: () => void): Promise<T> {

        const lock = this.#settings.lock;

        return this.#run('schema', () => {

            guard?.();

            if (!lock.enabled) {

                return operation();

            }

            return this.#locks.withLock(this.kysely, this.table, this.#lockOwner, operation, {
                timeout: lock.timeout,
                wait: lock.wait,
                waitTimeout: lock.waitTimeout,
                reason,
            });

        });

    }

    /**
     * Run a core operation, reporting failures on the observer.
     *
     * Every failure, guard refusals included, is emitted as an `error`
     * event before it is rethrown.
     */
    async #run<T>(source: string, operation: () => Promise<T>): Promise<T> {

        try {

            return await operation();

        }
        catch (err) {

            this.#report(source, err);
            throw err;

        }

    }

    #report(source: string, err: unknown): void {

        observer.emit('error', {
            source,
            error: toError(err),
            context: { table: this.table },
        });

    }

}
