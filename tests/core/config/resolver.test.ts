/**
 * Settings loader and resolver tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
    loadSettingsFile,
    resolveSettings,
    settingsFilePath,
    ConfigValidationError,
} from '../../../src/core/config/index.js';


describe('config: resolver', () => {

    let projectRoot: string;

    beforeEach(async () => {

        projectRoot = await mkdtemp(join(tmpdir(), 'tabledrift-config-'));

    });

    afterEach(async () => {

        await rm(projectRoot, { recursive: true, force: true });

    });

    async function writeSettings(content: string): Promise<void> {

        await mkdir(join(projectRoot, '.tabledrift'), { recursive: true });
        await writeFile(settingsFilePath(projectRoot), content);

    }

    describe('loadSettingsFile', () => {

        it('should use defaults when the file is missing', async () => {

            const loaded = await loadSettingsFile(projectRoot);

            expect(loaded.fromFile).toBe(false);
            expect(loaded.path).toBe(join(projectRoot, '.tabledrift', 'settings.yml'));
            expect(loaded.settings.table.name).toBe('product');

        });

        it('should read YAML', async () => {

            await writeSettings('database: ./catalog.db\ntable:\n  name: book\n');

            const loaded = await loadSettingsFile(projectRoot);

            expect(loaded.fromFile).toBe(true);
            expect(loaded.settings.database).toBe('./catalog.db');
            expect(loaded.settings.table.name).toBe('book');

        });

        it('should treat an empty file as defaults', async () => {

            await writeSettings('');

            const loaded = await loadSettingsFile(projectRoot);

            expect(loaded.fromFile).toBe(true);
            expect(loaded.settings.database).toBe('tabledrift.db');

        });

        it('should reject invalid YAML', async () => {

            await writeSettings('table: [unclosed\n');

            await expect(loadSettingsFile(projectRoot)).rejects.toThrow('Invalid YAML in settings file');

        });

        it('should reject invalid settings', async () => {

            await writeSettings('lock:\n  timeout: soon\n');

            await expect(loadSettingsFile(projectRoot)).rejects.toThrow(ConfigValidationError);

        });

        it('should require an explicit file to exist', async () => {

            const file = join(projectRoot, 'missing.yml');

            await expect(loadSettingsFile(projectRoot, file)).rejects.toThrow(`Settings file not found: ${file}`);

        });

    });

    describe('resolveSettings', () => {

        it('should resolve defaults with no sources', async () => {

            const settings = await resolveSettings({ projectRoot, env: {} });

            expect(settings.database).toBe('tabledrift.db');
            expect(settings.actor).toBe('tabledrift');

        });

        it('should layer file, env and overrides', async () => {

            await writeSettings('database: ./file.db\nactor: file-actor\nlock:\n  timeout: 1000\n');

            const settings = await resolveSettings({
                projectRoot,
                env: { TABLEDRIFT_ACTOR: 'env-actor', TABLEDRIFT_LOCK_WAIT: 'true' },
                overrides: { actor: 'flag-actor' },
            });

            expect(settings.database).toBe('./file.db');
            expect(settings.actor).toBe('flag-actor');
            expect(settings.lock.timeout).toBe(1000);
            expect(settings.lock.wait).toBe(true);

        });

        it('should let env override the file', async () => {

            await writeSettings('table:\n  name: book\n');

            const settings = await resolveSettings({
                projectRoot,
                env: { TABLEDRIFT_TABLE_NAME: 'album' },
            });

            expect(settings.table.name).toBe('album');
            expect(settings.table.primaryKey).toBe('id');

        });

        it('should replace seed columns rather than append', async () => {

            const settings = await resolveSettings({
                projectRoot,
                env: {},
                overrides: { table: { columns: [{ name: 'title', type: 'TEXT' }] } },
            });

            expect(settings.table.columns).toEqual([{ name: 'title', type: 'TEXT' }]);

        });

        it('should read an explicit settings file', async () => {

            const file = join(projectRoot, 'custom.yml');
            await writeFile(file, 'database: ./custom.db\n');

            const settings = await resolveSettings({ projectRoot, file, env: {} });

            expect(settings.database).toBe('./custom.db');

        });

    });

});
