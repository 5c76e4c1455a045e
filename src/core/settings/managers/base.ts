/**
 * Store manager base class.
 *
 * A manager adapts one store to the engine's get/set/unset/reset
 * contract for one settings service. Operations a store cannot perform
 * throw StoreNotSupportedError, which callers must not swallow.
 */
import { StoreNotSupportedError } from '../errors.js'
import type { SettingDefinition } from '../definition.js'
import type { SettingsService } from '../service.js'
import type { SettingValueStore } from '../store.js'
import type { StoreGetResult, StoreSetMetadata } from '../types.js'
import type { EnvMapping } from '../utils.js'


/**
 * Options for constructing a store manager.
 */
export interface StoreManagerOptions {

    /**
     * Cache the backing payload across lookups.
     *
     * Scope a bulk manager to one resolution pass; never keep it around
     * between independent calls, its cache goes stale.
     */
    bulk?: boolean
}


/**
 * Base class for every store manager.
 */
export abstract class SettingsStoreManager {

    abstract readonly store: SettingValueStore

    bulk: boolean

    constructor(
        protected readonly service: SettingsService,
        options: StoreManagerOptions = {},
    ) {

        this.bulk = options.bulk ?? false
    }

    /**
     * Read a value. Resolves `value: undefined` when the store has no entry.
     */
    abstract get(
        name: string,
        setting: SettingDefinition | null,
        expandibleEnv: EnvMapping,
    ): Promise<StoreGetResult>

    /**
     * Write a value.
     */
    async set(
        name: string,
        path: readonly string[],
        value: unknown,
        setting: SettingDefinition | null,
    ): Promise<StoreSetMetadata> {

        throw new StoreNotSupportedError(this.store, 'store is read-only')
    }

    /**
     * Remove a value.
     */
    async unset(
        name: string,
        path: readonly string[],
        setting: SettingDefinition | null,
    ): Promise<StoreSetMetadata> {

        throw new StoreNotSupportedError(this.store, 'store is read-only')
    }

    /**
     * Remove every value this store holds for the service.
     */
    async reset(): Promise<StoreSetMetadata> {

        throw new StoreNotSupportedError(this.store, 'store is read-only')
    }

    /**
     * Reject writes on a read-only service.
     */
    protected assertWritable(): void {

        if (this.service.readonly) {

            throw new StoreNotSupportedError(this.store, `${this.service.label} settings are read-only`)
        }
    }

    /**
     * Stores keyed by env var names need a definition to derive them.
     */
    protected requireSetting(name: string, setting: SettingDefinition | null): SettingDefinition {

        if (!setting) {

            throw new StoreNotSupportedError(this.store, `setting '${name}' is not declared`)
        }

        return setting
    }
}
