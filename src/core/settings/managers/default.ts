/**
 * Default store: the definition's declared default. Lowest precedence,
 * read-only.
 */
import { SettingValueStore } from '../store.js'
import { SettingsStoreManager } from './base.js'
import type { SettingDefinition } from '../definition.js'
import type { StoreGetResult } from '../types.js'


export class DefaultStoreManager extends SettingsStoreManager {

    readonly store = SettingValueStore.DEFAULT

    async get(name: string, setting: SettingDefinition | null): Promise<StoreGetResult> {

        const value = setting?.value

        if (value === undefined) {

            return { value: undefined, metadata: {} }
        }

        return { value, metadata: { expandable: true } }
    }
}
