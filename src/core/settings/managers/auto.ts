/**
 * Auto store: searches concrete stores in precedence order.
 *
 * Reads only. Stores that cannot answer (StoreNotSupportedError) are
 * skipped; the first store with a defined value wins. Writes must name a
 * concrete store.
 */
import { attempt } from '@logosdx/utils'

import { StoreNotSupportedError } from '../errors.js'
import { SettingValueStore, STORE_PRECEDENCE, type ConcreteStore } from '../store.js'
import { expandEnvVars, type EnvMapping } from '../utils.js'
import { SettingsStoreManager, type StoreManagerOptions } from './base.js'
import type { SettingDefinition } from '../definition.js'
import type { SettingsService } from '../service.js'
import type { StoreGetResult, StoreSetMetadata } from '../types.js'


/**
 * Builds the manager of a concrete store.
 */
export type ConcreteManagerFactory = (store: ConcreteStore, options: StoreManagerOptions) => SettingsStoreManager


export class AutoStoreManager extends SettingsStoreManager {

    readonly store = SettingValueStore.AUTO

    #managers = new Map<ConcreteStore, SettingsStoreManager>()

    constructor(
        service: SettingsService,
        options: StoreManagerOptions,
        private readonly factory: ConcreteManagerFactory,
    ) {

        super(service, options)
    }

    async get(
        name: string,
        setting: SettingDefinition | null,
        expandibleEnv: EnvMapping,
    ): Promise<StoreGetResult> {

        for (const store of STORE_PRECEDENCE) {

            const [result, err] = await attempt(async () => this.#managerFor(store).get(name, setting, expandibleEnv))

            if (err) {

                if (err instanceof StoreNotSupportedError) {

                    continue
                }

                throw err
            }

            const isLast = store === SettingValueStore.DEFAULT

            if (!isLast && (result.value === undefined || result.value === null)) {

                continue
            }

            const value = result.metadata.expandable
                ? expandEnvVars(result.value, { ...this.service.env, ...expandibleEnv })
                : result.value

            return { value, metadata: { ...result.metadata, source: store } }
        }

        return { value: undefined, metadata: { source: SettingValueStore.DEFAULT } }
    }

    async set(): Promise<StoreSetMetadata> {

        throw new StoreNotSupportedError(this.store, 'writes must target a concrete store')
    }

    async unset(): Promise<StoreSetMetadata> {

        throw new StoreNotSupportedError(this.store, 'writes must target a concrete store')
    }

    async reset(): Promise<StoreSetMetadata> {

        throw new StoreNotSupportedError(this.store, 'writes must target a concrete store')
    }

    #managerFor(store: ConcreteStore): SettingsStoreManager {

        let manager = this.#managers.get(store)

        if (!manager) {

            manager = this.factory(store, { bulk: this.bulk })
            this.#managers.set(store, manager)
        }

        manager.bulk = this.bulk

        return manager
    }
}
