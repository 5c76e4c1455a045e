/**
 * Project file store: the YAML-backed config of the settings variant
 * (top-level project keys, or a plugin's `config:` block).
 *
 * Lookups use dotted keys of the flattened config. Writes go through the
 * variant's updateYamlConfig so the variant decides where they land.
 */
import { clone } from '@logosdx/utils'

import { SettingValueStore } from '../store.js'
import { popAtPath, setAtPath } from '../utils.js'
import { SettingsStoreManager } from './base.js'
import type { SettingDefinition } from '../definition.js'
import type { StoreGetResult, StoreSetMetadata } from '../types.js'


export class ProjectYmlStoreManager extends SettingsStoreManager {

    readonly store = SettingValueStore.PROJECT_YML

    #flat: Record<string, unknown> | null = null

    async get(name: string, setting: SettingDefinition | null): Promise<StoreGetResult> {

        const flat = this.#flatConfig()
        const keys = setting?.names ?? [name]

        for (const key of keys) {

            if (Object.hasOwn(flat, key)) {

                return { value: flat[key], metadata: { key, expandable: true } }
            }
        }

        return { value: undefined, metadata: {} }
    }

    async set(
        name: string,
        path: readonly string[],
        value: unknown,
        setting: SettingDefinition | null,
    ): Promise<StoreSetMetadata> {

        this.assertWritable()

        const config = clone(this.service.yamlConfig())

        for (const other of this.#namePaths(name, setting)) {

            popAtPath(config, other)
        }

        setAtPath(config, path, value)

        await this.#save(config)

        return { key: path.join('.') }
    }

    async unset(
        name: string,
        path: readonly string[],
        setting: SettingDefinition | null,
    ): Promise<StoreSetMetadata> {

        this.assertWritable()

        const config = clone(this.service.yamlConfig())

        popAtPath(config, path)

        for (const other of this.#namePaths(name, setting)) {

            popAtPath(config, other)
        }

        await this.#save(config)

        return { key: path.join('.') }
    }

    async reset(): Promise<StoreSetMetadata> {

        this.assertWritable()

        await this.#save({})

        return {}
    }

    #flatConfig(): Record<string, unknown> {

        if (this.bulk && this.#flat) {

            return this.#flat
        }

        const flat = this.service.flatYamlConfig()

        if (this.bulk) {

            this.#flat = flat
        }

        return flat
    }

    /**
     * Every place the setting may live under: each name both as a literal
     * dotted key and as a nested path.
     */
    #namePaths(name: string, setting: SettingDefinition | null): string[][] {

        const names = setting?.names ?? [name]
        const paths = new Map<string, string[]>()

        for (const key of names) {

            paths.set(JSON.stringify([key]), [key])
            paths.set(JSON.stringify(key.split('.')), key.split('.'))
        }

        return [...paths.values()]
    }

    async #save(config: Record<string, unknown>): Promise<void> {

        await this.service.capabilities.updateYamlConfig(config)
        this.#flat = null
    }
}
