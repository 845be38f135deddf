/**
 * Event classifier tests.
 */
import { describe, it, expect } from 'vitest';

import { classifyEvent, shouldLog, passesLevel } from '../../../src/core/logger/index.js';


describe('logger: classifier', () => {

    describe('classifyEvent', () => {

        it('should classify errors and failures', () => {

            expect(classifyEvent('error')).toBe('error');
            expect(classifyEvent('connection:error')).toBe('error');
            expect(classifyEvent('schema:rebuild:failed')).toBe('error');
            expect(classifyEvent('rollback:rejected')).toBe('error');
            expect(classifyEvent('rollback:failed')).toBe('error');

        });

        it('should classify lock contention as warn', () => {

            expect(classifyEvent('lock:blocked')).toBe('warn');
            expect(classifyEvent('lock:expired')).toBe('warn');

        });

        it('should classify changes as info', () => {

            expect(classifyEvent('schema:column:added')).toBe('info');
            expect(classifyEvent('schema:rebuild:complete')).toBe('info');
            expect(classifyEvent('record:updated')).toBe('info');
            expect(classifyEvent('rollback:logged')).toBe('info');
            expect(classifyEvent('lock:acquired')).toBe('info');

        });

        it('should always audit raw statements', () => {

            expect(classifyEvent('schema:raw:before')).toBe('info');
            expect(classifyEvent('schema:raw:after')).toBe('info');

        });

        it('should classify everything else as debug', () => {

            expect(classifyEvent('ledger:appended')).toBe('debug');
            expect(classifyEvent('rollback:validated')).toBe('debug');
            expect(classifyEvent('connection:open')).toBe('debug');

        });

    });

    describe('shouldLog', () => {

        it('should filter by verbosity', () => {

            expect(shouldLog('error', 'warn')).toBe(true);
            expect(shouldLog('record:created', 'info')).toBe(true);
            expect(shouldLog('record:created', 'warn')).toBe(false);
            expect(shouldLog('ledger:appended', 'info')).toBe(false);
            expect(shouldLog('ledger:appended', 'verbose')).toBe(true);

        });

        it('should log nothing when silent', () => {

            expect(shouldLog('error', 'silent')).toBe(false);

        });

    });

    describe('passesLevel', () => {

        it('should compare entry and configured levels', () => {

            expect(passesLevel('warn', 'info')).toBe(true);
            expect(passesLevel('debug', 'info')).toBe(false);
            expect(passesLevel('error', 'error')).toBe(true);

        });

    });

});
