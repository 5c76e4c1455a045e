/**
 * Config override store: values passed in programmatically for the
 * lifetime of one service. Highest precedence, read-only.
 */
import { SettingValueStore } from '../store.js'
import { SettingsStoreManager } from './base.js'
import type { SettingDefinition } from '../definition.js'
import type { StoreGetResult } from '../types.js'


export class ConfigOverrideStoreManager extends SettingsStoreManager {

    readonly store = SettingValueStore.CONFIG_OVERRIDE

    async get(name: string, setting: SettingDefinition | null): Promise<StoreGetResult> {

        const overrides = this.service.configOverride
        const keys = setting?.names ?? [name]

        for (const key of keys) {

            if (Object.hasOwn(overrides, key)) {

                return { value: overrides[key], metadata: { key } }
            }
        }

        return { value: undefined, metadata: {} }
    }
}
