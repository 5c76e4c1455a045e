/**
 * Environment store: reads the setting's env vars from the service's
 * environment; writes land in the base environment object.
 *
 * Env overrides are fixed for the service's lifetime, so a setting whose
 * variables they define cannot be written or unset here.
 */
import { observer } from '../../observer.js'
import { StoreNotSupportedError } from '../errors.js'
import { SettingValueStore } from '../store.js'
import { SettingsStoreManager } from './base.js'
import { truthy } from '../utils.js'
import type { EnvVar, SettingDefinition } from '../definition.js'
import type { StoreGetResult, StoreSetMetadata } from '../types.js'


export class EnvStoreManager extends SettingsStoreManager {

    readonly store = SettingValueStore.ENV

    async get(name: string, setting: SettingDefinition | null): Promise<StoreGetResult> {

        const def = this.requireSetting(name, setting)
        const env = this.service.env

        const found: { envVar: string; value: string }[] = []

        for (const envVar of this.service.settingEnvVars(def)) {

            const value = envVar.get(env)

            if (value !== undefined) {

                found.push({ envVar: envVar.key, value })
            }
        }

        const [first] = found

        if (!first) {

            return { value: undefined, metadata: {} }
        }

        const normalize = (value: string) => def.kind === 'boolean' ? String(truthy(value)) : value

        if (found.some((entry) => normalize(entry.value) !== normalize(first.value))) {

            observer.emit('settings:env-conflict', {
                name: def.name,
                envVars: found.map((entry) => entry.envVar),
                used: first.envVar,
            })
        }

        return { value: first.value, metadata: { envVar: first.envVar } }
    }

    async set(
        name: string,
        path: readonly string[],
        value: unknown,
        setting: SettingDefinition | null,
    ): Promise<StoreSetMetadata> {

        this.assertWritable()

        const def = this.requireSetting(name, setting)
        const envVars = this.service.settingEnvVars(def)
        const [primary, ...others] = envVars

        if (!primary) {

            throw new StoreNotSupportedError(this.store, `setting '${def.name}' has no env vars`)
        }

        this.#assertNotOverridden(def, envVars)

        const target = this.service.baseEnv

        for (const envVar of others) {

            delete target[envVar.key]
        }

        target[primary.key] = def.stringifyValue(value)

        return { envVar: primary.key }
    }

    async unset(
        name: string,
        path: readonly string[],
        setting: SettingDefinition | null,
    ): Promise<StoreSetMetadata> {

        this.assertWritable()

        const def = this.requireSetting(name, setting)
        const envVars = this.service.settingEnvVars(def)
        const target = this.service.baseEnv

        this.#assertNotOverridden(def, envVars)

        for (const envVar of envVars) {

            delete target[envVar.key]
        }

        return {}
    }

    async reset(): Promise<StoreSetMetadata> {

        throw new StoreNotSupportedError(this.store, 'the environment cannot be reset')
    }

    #assertNotOverridden(def: SettingDefinition, envVars: readonly EnvVar[]): void {

        const overridden = envVars.find((envVar) => Object.hasOwn(this.service.envOverride, envVar.key))

        if (overridden) {

            throw new StoreNotSupportedError(this.store, `setting '${def.name}' is overridden by ${overridden.key}`)
        }
    }
}
