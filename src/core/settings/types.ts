/**
 * Settings engine types.
 *
 * The engine resolves logical settings against a stack of stores. Each
 * settings variant (project, plugin) supplies its catalog and YAML access
 * through SettingsCapabilities.
 */
import type { Kysely } from 'kysely'

import type { SettingsDatabase } from '../db/tables.js'
import type { SettingDefinition } from './definition.js'
import type { SettingValueStore } from './store.js'
import type { EnvMapping } from './utils.js'


/**
 * Reserved placeholder emitted instead of redacted values.
 *
 * Writing it back is a no-op: a masked value round-tripped through a UI
 * must never overwrite the real one.
 */
export const REDACTED_VALUE = '(redacted)'


/**
 * What a settings variant must supply to the engine.
 *
 * @example
 * ```typescript
 * const capabilities: SettingsCapabilities = {
 *     label: 'project',
 *     docsUrl: null,
 *     envPrefixes: ['STRATA'],
 *     genericEnvPrefix: null,
 *     dbNamespace: 'strata',
 *     definitions: catalog,
 *     yamlConfig: () => project.current,
 *     updateYamlConfig: (config) => project.update(config),
 *     processConfig: (config) => config,
 * }
 * ```
 */
export interface SettingsCapabilities {

    /** Human label used in messages ("project", "extractor 'tap-csv'") */
    readonly label: string

    /** Where the settings are documented */
    readonly docsUrl: string | null

    /** Env var prefixes, most specific first */
    readonly envPrefixes: readonly string[]

    /** Prefix shared by every plugin of a type, included in env projection only */
    readonly genericEnvPrefix: string | null

    /** Namespace of this variant's rows in the system database */
    readonly dbNamespace: string

    /** Declared setting definitions */
    readonly definitions: readonly SettingDefinition[]

    /** Current YAML-backed config (nested) */
    yamlConfig(): Record<string, unknown>

    /** Replace the YAML-backed config and persist it */
    updateYamlConfig(config: Record<string, unknown>): Promise<void>

    /** Post-process a resolved config mapping (`asDict({ process: true })`) */
    processConfig(config: Record<string, unknown>): Record<string, unknown>
}


/**
 * Options for constructing a SettingsService.
 */
export interface SettingsServiceOptions {

    /** Base environment (default: process.env). Writes to the env store land here. */
    env?: EnvMapping

    /** Values layered over `env` */
    envOverride?: Readonly<Record<string, string>>

    /** Values for the `config_override` store */
    configOverride?: Readonly<Record<string, unknown>>

    /** Include `hidden` settings in the catalog (default: true) */
    showHidden?: boolean

    /** Path of the `.env` file backing the dotenv store */
    dotenvPath?: string | null

    /** System database for the db store */
    db?: SettingsDb | null

    /** Reject every write */
    readonly?: boolean
}


/**
 * Database handle type for the db store.
 */
export type SettingsDb = Kysely<SettingsDatabase>


/**
 * Provenance of a resolved value.
 */
export interface SettingMetadata {

    /** Canonical name (or the requested name for undeclared settings) */
    name: string

    /** Store that produced the value */
    source: SettingValueStore

    /** Definition, or null for an anonymous setting */
    setting: SettingDefinition | null

    /** Raw value before casting, present only when casting changed it */
    uncastValue?: unknown

    /** True when the value was replaced by REDACTED_VALUE */
    redacted?: boolean

    /** Env var the value was read from (env and dotenv stores) */
    envVar?: string

    /** Key the value was found under (override and YAML stores) */
    key?: string

    /** Value may contain `$VAR` references */
    expandable?: boolean
}


/**
 * A resolved value together with its metadata.
 */
export interface SettingWithValue extends SettingMetadata {

    value: unknown
}


/**
 * Metadata returned by write operations.
 */
export interface SetMetadata {

    name: string
    path: string[]
    store: SettingValueStore
    setting: SettingDefinition | null
    uncastValue?: unknown
    redacted?: boolean
    envVar?: string
    key?: string
}


/**
 * Metadata returned by reset.
 */
export interface ResetMetadata {

    store: SettingValueStore
}


/**
 * Partial metadata a store manager contributes to a read.
 */
export type StoreGetMetadata = Partial<Pick<SettingMetadata, 'source' | 'envVar' | 'key' | 'expandable'>>


/**
 * Partial metadata a store manager contributes to a write.
 */
export type StoreSetMetadata = Partial<Pick<SetMetadata, 'envVar' | 'key'>>


/**
 * Result of a store manager read. `value` is undefined when the store has
 * no entry.
 */
export interface StoreGetResult {

    value: unknown
    metadata: StoreGetMetadata
}
