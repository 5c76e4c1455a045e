/**
 * Log Formatter
 *
 * Converts observer events into LogEntry objects and serializes them
 * for output. Each entry is a single JSON line.
 */
import type { LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


/**
 * Human-readable message templates for common events.
 * Keys are event names, values are functions that generate messages from event data.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Single settings
    'setting:get': (d) => `Resolved ${d['name']} from ${d['source']} (${d['namespace']})${d['redacted'] ? ' [redacted]' : ''}`,
    'setting:set': (d) => `Set ${d['name']} in ${d['store']} (${d['namespace']})`,
    'setting:unset': (d) => `Unset ${d['name']} in ${d['store']} (${d['namespace']})`,
    'setting:suppressed': (d) => `Ignored redacted placeholder for ${d['name']} in ${d['store']} (${d['namespace']})`,

    // Catalog and stores
    'settings:reset': (d) => `Reset ${d['store']} (${d['namespace']})`,
    'settings:env-conflict': (d) => `Conflicting values for ${d['name']} in ${listOf(d['envVars'])}, using ${d['used']}`,
    'settings:definitions-loaded': (d) => `Loaded ${d['count']} ${d['label']} settings (${d['missing']} undeclared)`,
    'settings:definitions-invalidated': (d) => `Invalidated ${d['label']} settings catalog`,

    // Project file
    'project:loaded': (d) => d['fromFile']
        ? `Project loaded from ${d['path']}`
        : `No project file at ${d['path']}, using an empty project`,
    'project:saved': (d) => `Project saved to ${d['path']}`,

    // System database
    'db:open': (d) => `Opened settings database ${d['filename']}`,
    'db:close': (d) => `Closed settings database ${d['filename']}`,

    // Generic error
    'error': (d) => `Error in ${d['source']}: ${d['error'] instanceof Error ? d['error'].message : String(d['error'])}`,
}


/**
 * Join a list payload for display.
 */
function listOf(value: unknown): string {

    return Array.isArray(value) ? value.join(', ') : String(value)
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to generic format.
 *
 * @param event - Observer event name
 * @param data - Event payload
 * @returns Human-readable message
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    // Generic format: "Event occurred" or "Event: key=value, ..."
    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return String(value)
    }

    if (typeof value === 'string') {

        if (value.length > 50) {

            return `"${value.slice(0, 47)}..."`
        }

        return `"${value}"`
    }

    if (typeof value === 'number' || typeof value === 'boolean') {

        return String(value)
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Format an event into a LogEntry.
 *
 * @param event - Observer event name
 * @param data - Event payload
 * @param context - Additional context (project root, plugin, etc.)
 * @param includeData - Whether to include full payload (verbose mode)
 * @returns Formatted log entry
 *
 * @example
 * ```typescript
 * const entry = formatEntry('db:open', { filename: ':memory:' }, { project: '/srv/app' }, true)
 * // {
 * //     timestamp: '2024-01-15T10:30:00.000Z',
 * //     level: 'info',
 * //     event: 'db:open',
 * //     message: 'Opened settings database :memory:',
 * //     data: { filename: ':memory:' },
 * //     context: { project: '/srv/app' }
 * // }
 * ```
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    context?: Record<string, unknown>,
    includeData = false
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: classifyEvent(event),
        event,
        message: generateMessage(event, data),
    }

    // Include full data at verbose level
    if (includeData && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    // Include context if provided
    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Sanitize data for logging.
 * Handles non-serializable values; masking happens before formatting.
 */
function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        // Handle Error objects
        if (value instanceof Error) {

            result[key] = {
                name: value.name,
                message: value.message,
                stack: value.stack?.split('\n').slice(0, 3).join('\n'),
            }
            continue
        }

        // Handle Date objects
        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        // Handle circular references / non-serializable
        try {

            JSON.stringify(value)
            result[key] = value
        }
        catch {

            result[key] = String(value)
        }
    }

    return result
}


/**
 * Serialize a LogEntry to a JSON line.
 *
 * @param entry - Log entry to serialize
 * @returns JSON string with newline
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}
