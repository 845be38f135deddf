/**
 * Record accessor tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { sql } from 'kysely';

import {
    RecordAccessor,
    RecordNotFoundError,
    TableNotReadyError,
} from '../../../src/core/record/index.js';
import {
    addColumn,
    ColumnNotFoundError,
    PrimaryKeyImmutableError,
    TypeCoercionError,
} from '../../../src/core/schema/index.js';
import { observer } from '../../../src/core/observer.js';
import { createCatalog, createTestDb, type Catalog } from '../../utils/db.js';
import { VersionLedger } from '../../../src/core/ledger/index.js';
import { bootstrap } from '../../../src/core/bootstrap/index.js';


describe('record: accessor', () => {

    let catalog: Catalog;

    beforeEach(async () => {

        catalog = await createCatalog();

    });

    afterEach(async () => {

        await catalog.db.destroy();

    });

    describe('create', () => {

        it('should return increasing ids', async () => {

            const first = await catalog.accessor.create(catalog.db, { name: 'Mug' }, 'alice');
            const second = await catalog.accessor.create(catalog.db, { name: 'Cup' }, 'alice');

            expect(first).toBe(1);
            expect(second).toBe(2);

        });

        it('should fill defaults, zero values and nulls', async () => {

            await addColumn(catalog.db, 'product', 'weight', 'REAL');

            const id = await catalog.accessor.create(catalog.db, {}, 'alice');
            const record = await catalog.accessor.get(catalog.db, id, { raw: true });

            expect(record.values).toEqual({
                id,
                name: '',
                description: null,
                price_cents: 0,
                stock: 0,
                category: null,
                image_url: null,
                weight: null,
            });

        });

        it('should require a value for a NOT NULL BLOB with no default', async () => {

            const db = createTestDb();
            const ledger = new VersionLedger('asset_field_versions');

            await bootstrap(db, {
                table: 'asset',
                primaryKey: 'id',
                columns: [{ name: 'payload', type: 'BLOB', nullable: false }],
                ledger,
            });

            const assets = new RecordAccessor({ table: 'asset', ledger });

            await expect(assets.create(db, {}, 'alice')).rejects.toThrow(
                "Cannot store null in 'payload': expected a value (column is NOT NULL)",
            );
            expect(await assets.create(db, { payload: 'abc' }, 'alice')).toBe(1);

            await db.destroy();

        });

        it('should store price through its alias', async () => {

            const id = await catalog.accessor.create(catalog.db, { name: 'Mug', price: '12.50' }, 'alice');

            const raw = await catalog.accessor.get(catalog.db, id, { raw: true });
            const display = await catalog.accessor.get(catalog.db, id);

            expect(raw.values['price_cents']).toBe(1250);
            expect(display.values['price_cents']).toBe('12.50');

        });

        it('should treat a direct price_cents write as a decimal amount', async () => {

            const id = await catalog.accessor.create(catalog.db, { price_cents: '3' }, 'alice');
            const raw = await catalog.accessor.get(catalog.db, id, { raw: true });

            expect(raw.values['price_cents']).toBe(300);

        });

        it('should log one entry per supplied field, in schema order', async () => {

            const id = await catalog.accessor.create(catalog.db, { stock: '4', name: 'Mug' }, 'alice');
            const entries = await catalog.ledger.list(catalog.db, { recordId: id, limit: 10, order: 'asc' });

            expect(entries.map((e) => [e.fieldName, e.oldValue, e.newValue, e.actor])).toEqual([
                ['name', null, 'Mug', 'alice'],
                ['stock', null, '4', 'alice'],
            ]);

        });

        it('should reject unknown fields and write nothing', async () => {

            await expect(catalog.accessor.create(catalog.db, { name: 'Mug', colour: 'red' }, 'alice'))
                .rejects.toThrow(ColumnNotFoundError);

            expect(await catalog.accessor.list(catalog.db)).toEqual([]);

        });

        it('should reject the primary key', async () => {

            await expect(catalog.accessor.create(catalog.db, { id: 9 }, 'alice'))
                .rejects.toThrow(PrimaryKeyImmutableError);

        });

        it('should reject values of the wrong kind', async () => {

            await expect(catalog.accessor.create(catalog.db, { stock: 'lots' }, 'alice'))
                .rejects.toThrow(TypeCoercionError);

        });

        it('should reject null for a NOT NULL column and write nothing', async () => {

            await expect(catalog.accessor.create(catalog.db, { name: 'Mug', stock: null }, 'alice'))
                .rejects.toThrow(TypeCoercionError);

            expect(await catalog.accessor.list(catalog.db)).toEqual([]);
            expect(await catalog.ledger.list(catalog.db, { limit: 10 })).toEqual([]);

        });

        it('should emit record:created', async () => {

            const events: unknown[] = [];
            const cleanup = observer.on('record:created', (data) => events.push(data));

            await catalog.accessor.create(catalog.db, { name: 'Mug' }, 'alice');
            cleanup();

            expect(events).toEqual([{ table: 'product', id: 1, fields: ['name'] }]);

        });

    });

    describe('update', () => {

        it('should write and log only changed fields', async () => {

            const id = await catalog.accessor.create(catalog.db, { name: 'Mug', stock: 4 }, 'alice');

            const changes = await catalog.accessor.update(
                catalog.db,
                id,
                { name: 'Mug', stock: '5', category: 'kitchen' },
                'bob',
            );

            expect(changes).toEqual([
                { field: 'stock', oldValue: '4', newValue: '5' },
                { field: 'category', oldValue: null, newValue: 'kitchen' },
            ]);

            const entries = await catalog.ledger.list(catalog.db, { recordId: id, limit: 10 });

            expect(entries).toHaveLength(4);
            expect(entries[0]).toMatchObject({ fieldName: 'category', actor: 'bob' });

        });

        it('should treat equal canonical forms as unchanged', async () => {

            const id = await catalog.accessor.create(catalog.db, { stock: 5 }, 'alice');

            expect(await catalog.accessor.update(catalog.db, id, { stock: '5' }, 'bob')).toEqual([]);

        });

        it('should tell null and the empty string apart', async () => {

            const id = await catalog.accessor.create(catalog.db, { name: 'Mug' }, 'alice');

            const changes = await catalog.accessor.update(catalog.db, id, { category: '' }, 'bob');

            expect(changes).toEqual([{ field: 'category', oldValue: null, newValue: '' }]);

        });

        it('should log cents in stored form', async () => {

            const id = await catalog.accessor.create(catalog.db, { name: 'Mug' }, 'alice');

            const changes = await catalog.accessor.update(catalog.db, id, { price: '9.99' }, 'bob');

            expect(changes).toEqual([{ field: 'price_cents', oldValue: '0', newValue: '999' }]);

        });

        it('should reject null for a NOT NULL column and keep the value', async () => {

            const id = await catalog.accessor.create(catalog.db, { name: 'Mug' }, 'alice');

            await expect(catalog.accessor.update(catalog.db, id, { name: null }, 'bob'))
                .rejects.toThrow("Cannot store null in 'name': expected a value (column is NOT NULL)");

            expect((await catalog.accessor.get(catalog.db, id)).values['name']).toBe('Mug');
            expect(await catalog.ledger.list(catalog.db, { recordId: id, limit: 10 })).toHaveLength(1);

        });

        it('should throw for a missing record', async () => {

            await expect(catalog.accessor.update(catalog.db, 42, { name: 'x' }, 'bob'))
                .rejects.toThrow(RecordNotFoundError);

        });

    });

    describe('delete', () => {

        it('should remove the record', async () => {

            const id = await catalog.accessor.create(catalog.db, { name: 'Mug' }, 'alice');

            await catalog.accessor.delete(catalog.db, id);

            await expect(catalog.accessor.get(catalog.db, id)).rejects.toThrow(RecordNotFoundError);

        });

        it('should keep the ledger history', async () => {

            const id = await catalog.accessor.create(catalog.db, { name: 'Mug' }, 'alice');

            await catalog.accessor.delete(catalog.db, id);

            expect(await catalog.ledger.list(catalog.db, { recordId: id, limit: 10 })).toHaveLength(1);

        });

        it('should throw for a missing record', async () => {

            await expect(catalog.accessor.delete(catalog.db, 42)).rejects.toThrow(RecordNotFoundError);

        });

    });

    describe('reads', () => {

        beforeEach(async () => {

            await catalog.accessor.create(catalog.db, { name: 'Blue Mug', stock: 3, category: 'kitchen' }, 'alice');
            await catalog.accessor.create(catalog.db, { name: 'Desk Lamp', stock: 1, category: 'office' }, 'alice');
            await catalog.accessor.create(catalog.db, { name: 'Red Mug', stock: 7, category: 'kitchen' }, 'alice');

        });

        it('should carry the live schema with each record', async () => {

            const record = await catalog.accessor.get(catalog.db, 1);

            expect(record.id).toBe(1);
            expect(record.schema.table).toBe('product');
            expect(record.schema.columns.map((c) => c.name)).toContain('stock');

        });

        it('should pick up columns added after the accessor was built', async () => {

            await addColumn(catalog.db, 'product', 'color', 'TEXT');
            await catalog.accessor.update(catalog.db, 1, { color: 'blue' }, 'alice');

            const record = await catalog.accessor.get(catalog.db, 1);

            expect(record.values['color']).toBe('blue');

        });

        it('should get many in the order asked', async () => {

            const records = await catalog.accessor.getMany(catalog.db, [3, 1]);

            expect(records.map((r) => r.id)).toEqual([3, 1]);

        });

        it('should fail getMany on the first missing id', async () => {

            await expect(catalog.accessor.getMany(catalog.db, [1, 9, 10]))
                .rejects.toThrow(new RecordNotFoundError('product', 9).message);

        });

        it('should return nothing for no ids', async () => {

            expect(await catalog.accessor.getMany(catalog.db, [])).toEqual([]);

        });

        it('should list newest first by default', async () => {

            const records = await catalog.accessor.list(catalog.db);

            expect(records.map((r) => r.id)).toEqual([3, 2, 1]);

        });

        it('should search text columns case-insensitively', async () => {

            const records = await catalog.accessor.list(catalog.db, { search: 'mug' });

            expect(records.map((r) => r.id)).toEqual([3, 1]);

        });

        it('should treat LIKE wildcards in the search literally', async () => {

            expect(await catalog.accessor.list(catalog.db, { search: '%' })).toEqual([]);

        });

        it('should sort by a column with the key as tie-break', async () => {

            const records = await catalog.accessor.list(catalog.db, { sortBy: 'category', order: 'asc' });

            expect(records.map((r) => r.id)).toEqual([1, 3, 2]);

        });

        it('should page', async () => {

            const records = await catalog.accessor.list(catalog.db, { order: 'asc', limit: 1, offset: 1 });

            expect(records.map((r) => r.id)).toEqual([2]);

        });

        it('should reject an unknown sort column', async () => {

            await expect(catalog.accessor.list(catalog.db, { sortBy: 'nope' }))
                .rejects.toThrow(ColumnNotFoundError);

        });

    });

    describe('applyStoredValue', () => {

        it('should write the stored form without transforms or ledger entries', async () => {

            const id = await catalog.accessor.create(catalog.db, { name: 'Mug' }, 'alice');

            const applied = await catalog.accessor.applyStoredValue(catalog.db, id, 'price_cents', '250');
            const raw = await catalog.accessor.get(catalog.db, id, { raw: true });

            expect(applied).toEqual({ field: 'price_cents', previous: '0', current: '250' });
            expect(raw.values['price_cents']).toBe(250);
            expect(await catalog.ledger.list(catalog.db, { recordId: id, limit: 10 })).toHaveLength(1);

        });

    });

    describe('missing table', () => {

        it('should throw TableNotReadyError', async () => {

            const db = createTestDb();
            const accessor = new RecordAccessor({ table: 'product', ledger: new VersionLedger('log') });

            await expect(accessor.get(db, 1)).rejects.toThrow(TableNotReadyError);
            await db.destroy();

        });

        it('should throw TableNotReadyError without a primary key', async () => {

            const db = createTestDb();
            await sql`CREATE TABLE product (name TEXT)`.execute(db);

            const accessor = new RecordAccessor({ table: 'product', ledger: new VersionLedger('log') });

            await expect(accessor.list(db)).rejects.toThrow(TableNotReadyError);
            await db.destroy();

        });

    });

});
