/**
 * Settings Module
 *
 * Layered settings resolution: definitions, stores, managers and the
 * service that resolves, casts and redacts values.
 */

// Types
export type {
    SettingsCapabilities,
    SettingsServiceOptions,
    SettingsDb,
    SettingMetadata,
    SettingWithValue,
    SetMetadata,
    ResetMetadata,
    StoreGetMetadata,
    StoreSetMetadata,
    StoreGetResult,
} from './types.js'

export { REDACTED_VALUE } from './types.js'

// Schemas and Validation
export {
    SettingKindSchema,
    SettingDefinitionSchema,
    SettingCatalogSchema,
    SettingDefinitionValidationError,
    parseSettingDefinition,
    parseSettingCatalog,
} from './schema.js'

export type {
    SettingKind,
    SettingOption,
    SettingDefinitionInput,
    SettingDefinitionData,
} from './schema.js'

// Definitions
export { SettingDefinition, EnvVar, envVarKey, type FromKeyValueOptions } from './definition.js'

// Stores
export {
    SettingValueStore,
    STORE_RANKS,
    STORE_PRECEDENCE,
    STORE_LABELS,
    isConcreteStore,
    parseStore,
    overrides,
    type ConcreteStore,
} from './store.js'

// Errors
export { SettingMissingError, StoreNotSupportedError, SettingValueError } from './errors.js'

// Managers
export * from './managers/index.js'

// Passes
export { castWithMetadata, redactWithMetadata } from './passes.js'

// Service
export {
    SettingsService,
    type GetOptions,
    type ConfigOptions,
    type AsDictOptions,
} from './service.js'

// Catalogs and variants
export { PROJECT_CATALOG_PATH, buildSettingCatalog, loadSettingCatalog } from './catalog.js'
export { ProjectSettings, MANAGED_SECTIONS } from './project-settings.js'
export { PluginSettings, PluginNotFoundError, PLUGIN_VERBS, pluginNamespace } from './plugin-settings.js'

// Helpers
export {
    flatten,
    nestObject,
    setAtPath,
    popAtPath,
    expandEnvVars,
    isPresent,
    isPlainObject,
    truthy,
    type EnvMapping,
} from './utils.js'
