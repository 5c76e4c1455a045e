import { describe, it, expect, afterEach } from 'vitest';
import { Writable } from 'node:stream';

import { Logger } from '../../../src/core/logger/logger.js';
import { observer } from '../../../src/core/observer.js';

/**
 * Writable that keeps every chunk written to it.
 */
function captureStream(): { stream: Writable; lines: string[] } {

    const lines: string[] = [];
    const stream = new Writable({
        write(chunk, _encoding, callback) {

            lines.push(String(chunk));
            callback();

        },
    });

    return { stream, lines };

}

/**
 * Drop the leading `[timestamp] ` of a line.
 */
function withoutTimestamp(line: string | undefined): string {

    const text = line ?? '';

    return text.slice(text.indexOf('] ') + 2);

}

describe('logger: Logger class', () => {

    let logger: Logger | null = null;

    afterEach(async () => {

        await logger?.stop();
        logger = null;

    });

    describe('construction', () => {

        it('should default to info', () => {

            logger = new Logger({ console: null });

            expect(logger.level).toBe('info');
            expect(logger.isEnabled).toBe(true);
            expect(logger.state).toBe('idle');

        });

        it('should be disabled when silent', () => {

            logger = new Logger({ config: { level: 'silent' }, console: null });
            logger.start();

            expect(logger.isEnabled).toBe(false);
            expect(logger.state).toBe('idle');

        });

    });

    describe('start/stop', () => {

        it('should not log its own lifecycle events', async () => {

            const { stream, lines } = captureStream();

            logger = new Logger({ config: { level: 'verbose', format: 'line' }, console: stream });
            logger.start();

            expect(logger.state).toBe('running');

            await logger.stop();

            expect(logger.state).toBe('stopped');
            expect(lines).toEqual([]);

        });

        it('should report entries written when stopping', async () => {

            const { stream } = captureStream();
            const counts: number[] = [];
            const cleanup = observer.on('logger:stopped', ({ entriesWritten }) => {

                counts.push(entriesWritten);

            });

            try {

                logger = new Logger({ config: { level: 'info', format: 'line' }, console: stream });
                logger.start();

                observer.emit('db:open', { filename: ':memory:' });
                observer.emit('db:close', { filename: ':memory:' });

                await logger.stop();

                expect(counts).toEqual([2]);

            }
            finally {

                cleanup();

            }

        });

        it('should stop listening after stop', async () => {

            const { stream, lines } = captureStream();

            logger = new Logger({ config: { level: 'info', format: 'line' }, console: stream });
            logger.start();
            await logger.stop();

            observer.emit('db:open', { filename: ':memory:' });

            expect(lines).toEqual([]);

        });

        it('should end the file stream on stop', async () => {

            const { stream, lines } = captureStream();

            logger = new Logger({ config: { level: 'info', format: 'line' }, console: null, file: stream });
            logger.start();

            observer.emit('db:open', { filename: ':memory:' });

            await logger.stop();

            expect(stream.writableEnded).toBe(true);
            expect(lines).toHaveLength(1);

        });

    });

    describe('line format', () => {

        it('should write compact lines', () => {

            const { stream, lines } = captureStream();

            logger = new Logger({ config: { level: 'info', format: 'line' }, console: stream });
            logger.start();

            observer.emit('db:open', { filename: ':memory:' });

            expect(lines).toHaveLength(1);
            expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] /);
            expect(withoutTimestamp(lines[0])).toBe('[INFO ] [db:open] Opened settings database :memory:\n');

        });

        it('should filter by level', () => {

            const { stream, lines } = captureStream();

            logger = new Logger({ config: { level: 'warn', format: 'line' }, console: stream });
            logger.start();

            observer.emit('setting:set', { name: 'ui.bind_port', namespace: 'strata', store: 'db' });
            observer.emit('settings:env-conflict', { name: 'x', envVars: ['A', 'B'], used: 'A' });

            expect(lines.map(withoutTimestamp)).toEqual([
                '[WARN ] [settings:env-conflict] Conflicting values for x in A, B, using A\n',
            ]);

        });

        it('should append data when verbose', () => {

            const { stream, lines } = captureStream();

            logger = new Logger({ config: { level: 'verbose', format: 'line' }, console: stream });
            logger.start();

            observer.emit('setting:get', { name: 'a', namespace: 'strata', source: 'env', redacted: false });

            expect(withoutTimestamp(lines[0])).toBe(
                '[DEBUG] [setting:get] Resolved a from env (strata) '
                + '{"name":"a","namespace":"strata","source":"env","redacted":false}\n',
            );

        });

    });

    describe('json format', () => {

        it('should write one entry per line with context', () => {

            const { stream, lines } = captureStream();

            logger = new Logger({
                config: { level: 'info', format: 'json' },
                context: { projectRoot: '/srv/app' },
                console: stream,
            });
            logger.start();

            observer.emit('project:saved', { path: '/srv/app/strata.yml' });

            const entry: unknown = JSON.parse(lines[0] ?? '');

            expect(entry).toMatchObject({
                level: 'info',
                event: 'project:saved',
                message: 'Project saved to /srv/app/strata.yml',
                context: { projectRoot: '/srv/app' },
            });
            expect(entry).not.toHaveProperty('data');

        });

        it('should mask sensitive payload fields', () => {

            const { stream, lines } = captureStream();

            logger = new Logger({ config: { level: 'verbose', format: 'json' }, console: stream });
            logger.start();

            observer.emit('error', {
                source: 'settings',
                error: new Error('boom'),
                context: { password: 'test-secret' },
            });

            const entry: unknown = JSON.parse(lines[0] ?? '');

            expect(entry).toMatchObject({
                level: 'error',
                message: 'Error in settings: boom',
                data: {
                    source: 'settings',
                    error: { name: 'Error', message: 'boom' },
                    context: { password: '<Password test******* (11) />' },
                },
            });

        });

        it('should leave context out when none is configured', () => {

            const { stream, lines } = captureStream();

            logger = new Logger({ config: { level: 'info', format: 'json' }, console: stream });
            logger.start();

            observer.emit('db:close', { filename: ':memory:' });

            expect(JSON.parse(lines[0] ?? '')).not.toHaveProperty('context');

        });

    });

    it('should write nothing before start', () => {

        const { stream, lines } = captureStream();

        logger = new Logger({ config: { level: 'info', format: 'line' }, console: stream });

        observer.emit('db:close', { filename: ':memory:' });

        expect(lines).toEqual([]);
        expect(logger.entriesWritten).toBe(0);

    });

});
