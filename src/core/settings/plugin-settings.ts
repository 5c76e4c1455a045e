/**
 * Plugin settings: a plugin's `config:` block plus its extras.
 *
 * Extras are settings that configure how strata drives the plugin rather
 * than the plugin itself. They live beside `config:` in the plugin entry
 * (`select:`, `metadata:`, `schema:`) and are addressed as `_select`,
 * `_metadata` and `_schema`.
 */
import { SettingDefinition } from './definition.js'
import { parseSettingDefinition } from './schema.js'
import { nestObject } from './utils.js'
import type { SettingsCapabilities } from './types.js'
import { parsePluginEntry, type ProjectFile } from '../project/file.js'
import type { PluginEntry, PluginType } from '../project/schema.js'


/**
 * Plugin entry fields that back an extra.
 */
type ExtraField = 'select' | 'metadata' | 'schema'

interface ExtraSetting {

    setting: SettingDefinition
    field: ExtraField
}


/**
 * Verb of each plugin type, used for the generic env prefix.
 */
export const PLUGIN_VERBS: Readonly<Record<PluginType, string>> = Object.freeze({
    extractors: 'extract',
    loaders: 'load',
    transformers: 'transform',
    mappers: 'map',
    utilities: 'utility',
})


const PLUGIN_LABELS: Readonly<Record<PluginType, string>> = Object.freeze({
    extractors: 'extractor',
    loaders: 'loader',
    transformers: 'transformer',
    mappers: 'mapper',
    utilities: 'utility',
})


/**
 * Extra settings per plugin type. Each extra maps to one field of the
 * plugin entry.
 */
const EXTRAS: Readonly<Record<PluginType, readonly ExtraSetting[]>> = Object.freeze({
    extractors: [
        { setting: extra({ name: '_select', kind: 'array', value: ['*.*'] }), field: 'select' },
        { setting: extra({ name: '_metadata', kind: 'object', value: {} }), field: 'metadata' },
        { setting: extra({ name: '_schema', kind: 'object', value: {} }), field: 'schema' },
    ],
    loaders: [],
    transformers: [],
    mappers: [],
    utilities: [],
})


function extra(input: Record<string, unknown>): SettingDefinition {

    return new SettingDefinition(parseSettingDefinition(input), { extra: true })
}


/**
 * No plugin of a type and name is declared in the project file.
 */
export class PluginNotFoundError extends Error {

    override readonly name = 'PluginNotFoundError' as const

    constructor(
        public readonly pluginType: PluginType,
        public readonly pluginName: string,
    ) {

        super(`No ${PLUGIN_LABELS[pluginType]} named '${pluginName}' in the project`)
    }
}


/**
 * Default namespace of a plugin: its name with dashes replaced.
 *
 * @example
 * ```typescript
 * pluginNamespace({ name: 'tap-gitlab' })  // 'tap_gitlab'
 * ```
 */
export function pluginNamespace(entry: Pick<PluginEntry, 'name' | 'namespace'>): string {

    return entry.namespace ?? entry.name.replace(/-/g, '_')
}


/**
 * Capabilities of one plugin's settings.
 *
 * @example
 * ```typescript
 * const settings = new SettingsService(new PluginSettings(project, 'extractors', 'tap-csv'), { db })
 *
 * await settings.get('files')        // from TAP_CSV_FILES, config.files, ...
 * await settings.get('_select')      // ['*.*'] unless `select:` is set
 * ```
 */
export class PluginSettings implements SettingsCapabilities {

    readonly label: string
    readonly docsUrl: string | null
    readonly envPrefixes: readonly string[]
    readonly genericEnvPrefix: string
    readonly dbNamespace: string
    readonly definitions: readonly SettingDefinition[]

    #extras: readonly ExtraSetting[]

    /**
     * @throws PluginNotFoundError if the plugin is not declared
     * @throws SettingDefinitionValidationError if a declared setting is invalid
     */
    constructor(
        private readonly project: ProjectFile,
        readonly pluginType: PluginType,
        readonly pluginName: string,
    ) {

        const entry = this.#entry()

        this.label = `${PLUGIN_LABELS[pluginType]} '${pluginName}'`
        this.docsUrl = entry.docs ?? null
        this.envPrefixes = [...new Set([pluginName, pluginNamespace(entry)])]
        this.genericEnvPrefix = `STRATA_${PLUGIN_VERBS[pluginType].toUpperCase()}`
        this.dbNamespace = `${pluginType}.${pluginName}`
        this.#extras = EXTRAS[pluginType]

        this.definitions = [
            ...(entry.settings ?? []).map((input) => SettingDefinition.parse(input)),
            ...this.#extras.map(({ setting }) => setting),
        ]
    }

    yamlConfig(): Record<string, unknown> {

        const entry = this.#entry()
        const config: Record<string, unknown> = { ...entry.config }

        for (const { setting, field } of this.#extras) {

            if (entry[field] !== undefined) {

                config[setting.name] = entry[field]
            }
        }

        return config
    }

    async updateYamlConfig(config: Record<string, unknown>): Promise<void> {

        const entry: Record<string, unknown> = { ...this.#entry() }
        const pluginConfig = { ...config }

        for (const { setting, field } of this.#extras) {

            if (Object.hasOwn(pluginConfig, setting.name)) {

                entry[field] = pluginConfig[setting.name]
                delete pluginConfig[setting.name]
            }
            else {

                delete entry[field]
            }
        }

        entry['config'] = pluginConfig

        await this.project.updatePlugin(this.pluginType, this.pluginName, parsePluginEntry(entry))
    }

    processConfig(config: Record<string, unknown>): Record<string, unknown> {

        return nestObject(config)
    }

    #entry(): PluginEntry {

        const entry = this.project.getPlugin(this.pluginType, this.pluginName)

        if (!entry) {

            throw new PluginNotFoundError(this.pluginType, this.pluginName)
        }

        return entry
    }
}
