/**
 * Event Classifier
 *
 * Classifies observer events by log level based on naming patterns.
 *
 * Classification rules:
 * - 'error' or '*:error', '*:failed' -> error
 * - '*:warning', '*:conflict', '*:suppressed' -> warn
 * - '*:loaded', '*:set', '*:reset', etc. -> info
 * - Everything else -> debug
 */
import type { EntryLevel, LogLevel } from './types.js';
import { ENTRY_LEVEL_PRIORITY, LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Patterns that classify an event as error level.
 */
const ERROR_PATTERNS = [/^error$/, /:error$/, /:failed$/];

/**
 * Patterns that classify an event as warn level.
 */
const WARN_PATTERNS = [/:warning$/, /[:-]conflict$/, /:suppressed$/];

/**
 * Patterns that classify an event as info level.
 * Writes and lifecycle events worth logging at default verbosity.
 */
const INFO_PATTERNS = [
    /[:-]loaded$/,
    /:saved$/,
    /:open$/,
    /:close$/,
    /:set$/,
    /:unset$/,
    /:reset$/,
    /:started$/,
    /:stopped$/,
];

/**
 * Classify an event name to determine its log level.
 *
 * @param event - Observer event name
 * @returns The classified entry level
 *
 * @example
 * ```typescript
 * classifyEvent('error')                 // 'error'
 * classifyEvent('settings:env-conflict') // 'warn'
 * classifyEvent('setting:set')           // 'info'
 * classifyEvent('setting:get')           // 'debug'
 * ```
 */
export function classifyEvent(event: string): EntryLevel {

    // Check error patterns
    for (const pattern of ERROR_PATTERNS) {

        if (pattern.test(event)) {

            return 'error';

        }

    }

    // Check warn patterns
    for (const pattern of WARN_PATTERNS) {

        if (pattern.test(event)) {

            return 'warn';

        }

    }

    // Check info patterns
    for (const pattern of INFO_PATTERNS) {

        if (pattern.test(event)) {

            return 'info';

        }

    }

    // Default to debug
    return 'debug';

}

/**
 * Check if an event should be logged at the given verbosity level.
 *
 * @param event - Observer event name
 * @param configLevel - Configured minimum log level
 * @returns true if the event should be logged
 *
 * @example
 * ```typescript
 * shouldLog('error', 'warn')            // true (errors always logged)
 * shouldLog('setting:set', 'info')      // true (info event at info level)
 * shouldLog('setting:get', 'info')      // false (debug event at info level)
 * shouldLog('setting:get', 'verbose')   // true (everything at verbose)
 * ```
 */
export function shouldLog(event: string, configLevel: LogLevel): boolean {

    if (configLevel === 'silent') {

        return false;

    }

    if (configLevel === 'verbose') {

        return true;

    }

    const eventLevel = classifyEvent(event);

    return ENTRY_LEVEL_PRIORITY[eventLevel] <= LOG_LEVEL_PRIORITY[configLevel];

}
