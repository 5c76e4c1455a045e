/**
 * Store manager strategy table.
 *
 * Maps every store to its manager constructor. `auto` wraps the table
 * itself so it can reach each concrete store in turn.
 */
import { SettingValueStore, type ConcreteStore } from '../store.js'
import type { SettingsService } from '../service.js'
import { AutoStoreManager } from './auto.js'
import { SettingsStoreManager, type StoreManagerOptions } from './base.js'
import { ConfigOverrideStoreManager } from './config-override.js'
import { DbStoreManager } from './db.js'
import { DefaultStoreManager } from './default.js'
import { DotenvStoreManager } from './dotenv.js'
import { EnvStoreManager } from './env.js'
import { ProjectYmlStoreManager } from './project-yml.js'


type ManagerConstructor = (service: SettingsService, options: StoreManagerOptions) => SettingsStoreManager


/**
 * Concrete store managers.
 */
export const STORE_MANAGERS: Readonly<Record<ConcreteStore, ManagerConstructor>> = Object.freeze({
    config_override: (service, options) => new ConfigOverrideStoreManager(service, options),
    env: (service, options) => new EnvStoreManager(service, options),
    dotenv: (service, options) => new DotenvStoreManager(service, options),
    project_yml: (service, options) => new ProjectYmlStoreManager(service, options),
    db: (service, options) => new DbStoreManager(service, options),
    default: (service, options) => new DefaultStoreManager(service, options),
})


/**
 * Create the manager of a store for a settings service.
 *
 * @example
 * ```typescript
 * const manager = createStoreManager('auto', service, { bulk: true })
 * const { value, metadata } = await manager.get('ui.bind_port', setting, {})
 * ```
 */
export function createStoreManager(
    store: SettingValueStore,
    service: SettingsService,
    options: StoreManagerOptions = {},
): SettingsStoreManager {

    if (store === SettingValueStore.AUTO) {

        return new AutoStoreManager(
            service,
            options,
            (concrete, concreteOptions) => STORE_MANAGERS[concrete](service, concreteOptions),
        )
    }

    return STORE_MANAGERS[store](service, options)
}

export { SettingsStoreManager, type StoreManagerOptions } from './base.js'
export { AutoStoreManager, type ConcreteManagerFactory } from './auto.js'
export { ConfigOverrideStoreManager } from './config-override.js'
export { DbStoreManager } from './db.js'
export { DefaultStoreManager } from './default.js'
export { DotenvStoreManager, quoteDotenvValue } from './dotenv.js'
export { EnvStoreManager } from './env.js'
export { ProjectYmlStoreManager } from './project-yml.js'
