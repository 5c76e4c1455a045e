/**
 * Logger Module
 *
 * Captures observer events and streams them to log outputs.
 *
 * Features:
 * - Automatic CI detection (compact lines on stdout)
 * - Smart redaction of sensitive fields and redacted settings
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LogFormat,
    LoggerConfig,
    LoggerState,
} from './types.js';

export { LOG_LEVELS, LOG_LEVEL_PRIORITY, ENTRY_LEVEL_PRIORITY, DEFAULT_LOGGER_CONFIG } from './types.js';

// Classifier
export { classifyEvent, shouldLog } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, serializeEntry } from './formatter.js';

// Redaction
export {
    addMaskedFields,
    addSettingName,
    isMaskedField,
    maskValue,
    listenForRedactedSettings,
    filterData,
} from './redact.js';

// Logger
export { Logger, type LoggerOptions } from './logger.js';
