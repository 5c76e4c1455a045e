/**
 * Logger Types
 *
 * Type definitions for the strata logging system.
 * The logger captures observer events and streams them
 * to the console and/or a log file with configurable verbosity.
 */

/**
 * Log verbosity levels.
 *
 * - silent: No logging
 * - error: Errors only
 * - warn: Errors + warnings
 * - info: Errors + warnings + info (default)
 * - verbose: All events including debug
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

/**
 * Every log level, in increasing verbosity.
 */
export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'verbose'] as const;

/**
 * Numeric priority for log levels.
 * Higher numbers = more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Entry level in the log output.
 * Maps to standard logging conventions.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Numeric priority for entry levels.
 * Lower = more severe.
 */
export const ENTRY_LEVEL_PRIORITY: Record<EntryLevel, number> = {
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

/**
 * A single log entry.
 *
 * Entries are JSON-serialized, one per line.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2024-01-15T10:30:00.000Z",
 *     "level": "info",
 *     "event": "setting:set",
 *     "message": "Set ui.bind_port in project_yml (strata)"
 * }
 * ```
 */
export interface LogEntry {
    /** ISO 8601 timestamp */
    timestamp: string;

    /** Entry severity level */
    level: EntryLevel;

    /** Observer event name */
    event: string;

    /** Human-readable summary */
    message: string;

    /** Event payload (included at verbose level) */
    data?: Record<string, unknown>;

    /** Additional context (project root, plugin, etc.) */
    context?: Record<string, unknown>;
}

/**
 * Output format.
 *
 * - line: compact `[time] [LEVEL] [event] message` lines (CI/headless)
 * - json: one LogEntry per line
 */
export type LogFormat = 'line' | 'json';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
    /** Minimum level to capture */
    level: LogLevel;

    /** Output format (default: line in CI, json otherwise) */
    format?: LogFormat;
}

/**
 * Default logger configuration.
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    level: 'info',
};

/**
 * Logger state for lifecycle management.
 */
export type LoggerState = 'idle' | 'running' | 'stopped';
