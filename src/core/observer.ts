/**
 * Central event system for strata.
 *
 * Core modules emit events, consumers (the logger, embedding tools) subscribe.
 * Business logic never prints; everything observable goes through here.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('setting:set', { name, store, namespace })
 *
 * // In a consumer - subscribe to events
 * const cleanup = observer.on('setting:set', (data) => refresh(data.name))
 *
 * // Pattern matching for multiple events
 * observer.on(/^setting:/, ({ event, data }) => audit(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import { isDebug } from './environment.js'


/**
 * All events emitted by strata core modules.
 *
 * Events are namespaced by module:
 * - `setting:*` - Single setting reads and writes
 * - `settings:*` - Catalog and store-wide operations
 * - `project:*` - Project file load/save
 * - `db:*` - System database lifecycle
 * - `logger:*` - Logger lifecycle
 * - `error` - Catch-all errors
 *
 * Payloads carry names, stores and flags. Setting values are never emitted.
 */
export interface StrataEvents {

    // Single settings
    'setting:get': { name: string; namespace: string; source: string; redacted: boolean }
    'setting:set': { name: string; namespace: string; store: string }
    'setting:suppressed': { name: string; namespace: string; store: string }
    'setting:unset': { name: string; namespace: string; store: string }

    // Catalog and stores
    'settings:reset': { namespace: string; store: string }
    'settings:env-conflict': { name: string; envVars: string[]; used: string }
    'settings:definitions-loaded': { label: string; count: number; missing: number; redacted: string[] }
    'settings:definitions-invalidated': { label: string }

    // Project file
    'project:loaded': { path: string; fromFile: boolean }
    'project:saved': { path: string }

    // System database
    'db:open': { filename: string }
    'db:close': { filename: string }

    // Logger
    'logger:started': { level: string }
    'logger:stopped': { entriesWritten: number }

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type StrataEventNames = Events<StrataEvents>;
export type StrataEventCallback<E extends StrataEventNames> = ObserverEngine.EventCallback<StrataEvents[E]>

/**
 * Global observer instance for strata.
 *
 * Enable debug mode with `STRATA_DEBUG=1` to see all events as they occur.
 */
export const observer = new ObserverEngine<StrataEvents>({
    name: 'strata',
    spy: isDebug()
        ? (action) => console.error(`[strata:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine }
