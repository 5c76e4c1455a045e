/**
 * Logger
 *
 * Simple stream-based logger subscribed to every observer event.
 * Writes to console and/or file streams.
 *
 * @example
 * ```typescript
 * import { createWriteStream } from 'node:fs'
 *
 * const logger = new Logger({
 *     config: { level: 'info' },
 *     file: createWriteStream('.strata/strata.log', { flags: 'a' }),
 * })
 *
 * logger.start()
 *
 * // Logger automatically captures all observer events
 * // and writes them with appropriate formatting and redaction
 * ```
 */
import type { Writable } from 'node:stream';

import { observer } from '../observer.js';
import { isCi } from '../environment.js';
import { classifyEvent, shouldLog } from './classifier.js';
import { generateMessage, serializeEntry, formatEntry } from './formatter.js';
import { filterData } from './redact.js';
import type { EntryLevel, LogFormat, LoggerConfig, LoggerState } from './types.js';
import { DEFAULT_LOGGER_CONFIG } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    /** Logger configuration */
    config?: Partial<LoggerConfig>;

    /** Context to include with every entry */
    context?: Record<string, unknown>;

    /** File stream to write to (omit for console-only) */
    file?: Writable;

    /** Console stream to write to (defaults to stdout in CI mode, null for none) */
    console?: Writable | null;
}

/**
 * Logger that captures observer events and writes to streams.
 *
 * Automatically detects CI mode and writes compact lines to stdout.
 */
export class Logger {

    #config: LoggerConfig;
    #format: LogFormat;
    #context: Record<string, unknown>;
    #file: Writable | null = null;
    #console: Writable | null = null;
    #state: LoggerState = 'idle';
    #entriesWritten = 0;
    #unsubscribe: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#config = { ...DEFAULT_LOGGER_CONFIG, ...options.config };
        this.#format = this.#config.format ?? (isCi() ? 'line' : 'json');
        this.#context = { ...options.context };

        if (options.console !== undefined) {

            this.#console = options.console;

        }
        else if (isCi()) {

            this.#console = process.stdout;

        }

        if (options.file) {

            this.#file = options.file;

        }

    }

    /**
     * Get the current logger state.
     */
    get state(): LoggerState {

        return this.#state;

    }

    /**
     * Get the current log level.
     */
    get level(): LoggerConfig['level'] {

        return this.#config.level;

    }

    /**
     * Number of lines written since start.
     */
    get entriesWritten(): number {

        return this.#entriesWritten;

    }

    /**
     * Check if logging is enabled.
     */
    get isEnabled(): boolean {

        return this.#config.level !== 'silent';

    }

    /**
     * Start the logger.
     *
     * Subscribes to every observer event.
     */
    start(): void {

        if (this.#state !== 'idle' || !this.isEnabled) {

            return;

        }

        this.#unsubscribe = observer.on(/./, ({ event, data }) => {

            this.#handleEvent(String(event), isPayload(data) ? data : {});

        });

        this.#state = 'running';

        observer.emit('logger:started', { level: this.#config.level });

    }

    /**
     * Stop the logger.
     *
     * Unsubscribes and closes the file stream.
     */
    async stop(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        if (this.#unsubscribe) {

            this.#unsubscribe();
            this.#unsubscribe = null;

        }

        const file = this.#file;

        if (file && file !== process.stdout && file !== process.stderr) {

            await new Promise<void>((resolve) => {

                file.end(() => resolve());

            });

        }

        this.#state = 'stopped';

        observer.emit('logger:stopped', { entriesWritten: this.#entriesWritten });

    }

    /**
     * Handle an observer event.
     */
    #handleEvent(event: string, data: Record<string, unknown>): void {

        // Skip logger's own events to avoid loops
        if (event.startsWith('logger:')) {

            return;

        }

        if (!shouldLog(event, this.#config.level)) {

            return;

        }

        const filteredData = filterData(data, this.#config.level);

        if (this.#format === 'line') {

            this.#writeLine(classifyEvent(event), event, filteredData);

        }
        else {

            this.#writeEntry(event, filteredData);

        }

    }

    /**
     * Write a compact log line (CI mode).
     */
    #writeLine(level: EntryLevel, event: string, data: Record<string, unknown>): void {

        const timestamp = new Date().toISOString();
        const message = generateMessage(event, data);
        const levelLabel = level.toUpperCase().padEnd(5);

        let line = `[${timestamp}] [${levelLabel}] [${event}] ${message}`;

        // Add data in verbose mode
        if (this.#config.level === 'verbose' && Object.keys(data).length > 0) {

            line += ` ${JSON.stringify(data)}`;

        }

        this.#write(line + '\n');

    }

    /**
     * Write a JSON log entry.
     */
    #writeEntry(event: string, data: Record<string, unknown>): void {

        const includeData = this.#config.level === 'verbose';
        const entry = formatEntry(event, data, this.#context, includeData);

        this.#write(serializeEntry(entry));

    }

    #write(line: string): void {

        if (this.#console) {

            this.#console.write(line);

        }

        if (this.#file) {

            this.#file.write(line);

        }

        this.#entriesWritten++;

    }

}

/**
 * Narrow an event payload to a record.
 */
function isPayload(data: unknown): data is Record<string, unknown> {

    return typeof data === 'object' && data !== null && !Array.isArray(data);

}
