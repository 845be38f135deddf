/**
 * Versioning ledger tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { sql } from 'kysely';

import { VersionLedger, LedgerQueryError } from '../../../src/core/ledger/index.js';
import { observer } from '../../../src/core/observer.js';
import { createTestDb } from '../../utils/db.js';
import type { Kysely } from 'kysely';


describe('ledger: VersionLedger', () => {

    let db: Kysely<unknown>;
    let ledger: VersionLedger;

    beforeEach(async () => {

        db = createTestDb();
        ledger = new VersionLedger('product_field_versions');
        await ledger.ensure(db);

    });

    afterEach(async () => {

        await db.destroy();

    });

    describe('ensure', () => {

        it('should create the table with its fixed layout', async () => {

            const result = await sql<{ name: string }>`PRAGMA table_info(product_field_versions)`.execute(db);

            expect(result.rows.map((r) => r.name)).toEqual([
                'id',
                'record_id',
                'field_name',
                'old_value',
                'new_value',
                'changed_at',
                'changed_by',
            ]);

        });

        it('should create the record index', async () => {

            const result = await sql<{ name: string }>`
                SELECT name FROM sqlite_master WHERE type = 'index' AND name = 'product_field_versions_record_idx'
            `.execute(db);

            expect(result.rows).toHaveLength(1);

        });

        it('should be safe to run twice', async () => {

            await expect(ledger.ensure(db)).resolves.toBeUndefined();

        });

        it('should sanitize the table name', () => {

            expect(new VersionLedger('product versions').table).toBe('product_versions');

        });

    });

    describe('record', () => {

        it('should append entries in diff order with one timestamp', async () => {

            const entries = await ledger.record(db, 1, [
                { field: 'name', oldValue: null, newValue: 'Mug' },
                { field: 'stock', oldValue: '0', newValue: '4' },
            ], 'alice');

            expect(entries.map((e) => [e.id, e.recordId, e.fieldName, e.oldValue, e.newValue, e.actor])).toEqual([
                [1, 1, 'name', null, 'Mug', 'alice'],
                [2, 1, 'stock', '0', '4', 'alice'],
            ]);
            expect(entries[0]?.timestamp).toBeInstanceOf(Date);
            expect(entries[0]?.timestamp.getTime()).toBe(entries[1]?.timestamp.getTime());

        });

        it('should append nothing for no diffs', async () => {

            expect(await ledger.record(db, 1, [], 'alice')).toEqual([]);
            expect(await ledger.list(db, { limit: 10 })).toEqual([]);

        });

        it('should keep null and the empty string apart', async () => {

            await ledger.record(db, 1, [{ field: 'category', oldValue: null, newValue: '' }], 'alice');

            const [entry] = await ledger.list(db, { limit: 1 });

            expect(entry?.oldValue).toBeNull();
            expect(entry?.newValue).toBe('');

        });

        it('should emit ledger:appended', async () => {

            const events: unknown[] = [];
            const cleanup = observer.on('ledger:appended', (data) => events.push(data));

            await ledger.record(db, 3, [{ field: 'name', oldValue: null, newValue: 'Mug' }], 'alice');
            cleanup();

            expect(events).toEqual([{ table: 'product_field_versions', recordId: 3, count: 1, actor: 'alice' }]);

        });

    });

    describe('list', () => {

        beforeEach(async () => {

            await ledger.record(db, 1, [{ field: 'name', oldValue: null, newValue: 'Mug' }], 'alice');
            await ledger.record(db, 2, [{ field: 'name', oldValue: null, newValue: 'Cup' }], 'bob');
            await ledger.record(db, 1, [{ field: 'stock', oldValue: '0', newValue: '3' }], 'carol');

        });

        it('should return newest first by default', async () => {

            const entries = await ledger.list(db, { limit: 10 });

            expect(entries.map((e) => e.id)).toEqual([3, 2, 1]);

        });

        it('should filter by record and field', async () => {

            expect((await ledger.list(db, { recordId: 1, limit: 10 })).map((e) => e.id)).toEqual([3, 1]);
            expect((await ledger.list(db, { recordId: 1, fieldName: 'name', limit: 10 })).map((e) => e.id)).toEqual([1]);

        });

        it('should sort by an attribute with id as tie-break', async () => {

            const entries = await ledger.list(db, { sortField: 'fieldName', order: 'asc', limit: 10 });

            expect(entries.map((e) => e.id)).toEqual([1, 2, 3]);

        });

        it('should sort by actor descending', async () => {

            const entries = await ledger.list(db, { sortField: 'actor', limit: 10 });

            expect(entries.map((e) => e.actor)).toEqual(['carol', 'bob', 'alice']);

        });

        it('should cut to the limit', async () => {

            expect(await ledger.list(db, { limit: 2 })).toHaveLength(2);

        });

        it('should reject a non-positive limit', async () => {

            await expect(ledger.list(db, { limit: 0 })).rejects.toThrow(LedgerQueryError);

        });

        it('should reject an empty field name', async () => {

            const failure = await ledger.list(db, { fieldName: '', limit: 5 }).catch((err: unknown) => err);

            expect(failure).toBeInstanceOf(LedgerQueryError);
            expect(failure).toMatchObject({ name: 'LedgerQueryError' });

        });

    });

    describe('getById', () => {

        it('should return the entry', async () => {

            await ledger.record(db, 5, [{ field: 'name', oldValue: 'Mug', newValue: 'Cup' }], 'alice');

            expect(await ledger.getById(db, 1)).toMatchObject({
                id: 1,
                recordId: 5,
                fieldName: 'name',
                oldValue: 'Mug',
                newValue: 'Cup',
                actor: 'alice',
            });

        });

        it('should return null for an unknown id', async () => {

            expect(await ledger.getById(db, 99)).toBeNull();

        });

    });

});
