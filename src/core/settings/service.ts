/**
 * Settings Service
 *
 * Resolves logical settings against the store stack, annotates values with
 * their provenance, casts them and optionally redacts them. Also writes,
 * unsets and resets values in a named store.
 *
 * The service is written against SettingsCapabilities only; project and
 * plugin settings differ solely in the capabilities they pass in.
 */
import { attemptSync } from '@logosdx/utils'

import { observer } from '../observer.js'
import { SettingDefinition, type EnvVar } from './definition.js'
import { SettingMissingError } from './errors.js'
import { createStoreManager, type SettingsStoreManager, type StoreManagerOptions } from './managers/index.js'
import { castWithMetadata, redactWithMetadata } from './passes.js'
import { SettingValueStore, overrides } from './store.js'
import { flatten, type EnvMapping } from './utils.js'
import { REDACTED_VALUE } from './types.js'

import type {
    ResetMetadata,
    SetMetadata,
    SettingMetadata,
    SettingsCapabilities,
    SettingsDb,
    SettingsServiceOptions,
    SettingWithValue,
} from './types.js'


/**
 * Options for single-setting reads.
 */
export interface GetOptions {

    /** Replace sensitive values with REDACTED_VALUE */
    redacted?: boolean

    /** Store to read from (default: auto) */
    source?: SettingValueStore

    /** Manager to reuse, typically the bulk manager of an ongoing pass */
    sourceManager?: SettingsStoreManager | null

    /** Already-resolved definition, skips the catalog lookup */
    setting?: SettingDefinition | null
}


/**
 * Options for whole-config reads.
 */
export interface ConfigOptions {

    /** Only settings whose name starts with this; stripped from the keys */
    prefix?: string

    /** true: extras only, false: no extras, undefined: everything */
    extras?: boolean

    redacted?: boolean
    source?: SettingValueStore
    sourceManager?: SettingsStoreManager | null
}


/**
 * Options for asDict.
 */
export interface AsDictOptions extends ConfigOptions {

    /** Run the variant's processConfig over the result */
    process?: boolean
}


/**
 * Settings resolution engine.
 *
 * @example
 * ```typescript
 * const settings = new SettingsService(projectCapabilities, { db })
 *
 * const [port, metadata] = await settings.getWithMetadata('ui.bind_port')
 * // port: 5000, metadata.source: 'env', metadata.uncastValue: '5000'
 *
 * await settings.set(['ui', 'bind_port'], '8080', 'project_yml')
 *
 * const env = await settings.asEnv()
 * // { STRATA_UI_BIND_PORT: '8080', ... }
 * ```
 */
export class SettingsService {

    readonly capabilities: SettingsCapabilities
    readonly baseEnv: EnvMapping
    readonly envOverride: Readonly<Record<string, string>>
    readonly configOverride: Readonly<Record<string, unknown>>
    readonly showHidden: boolean
    readonly dotenvPath: string | null
    readonly db: SettingsDb | null
    readonly readonly: boolean

    #definitions: SettingDefinition[] | null = null

    constructor(capabilities: SettingsCapabilities, options: SettingsServiceOptions = {}) {

        this.capabilities = capabilities
        this.baseEnv = options.env ?? process.env
        this.envOverride = Object.freeze({ ...options.envOverride })
        this.configOverride = Object.freeze({ ...options.configOverride })
        this.showHidden = options.showHidden ?? true
        this.dotenvPath = options.dotenvPath ?? null
        this.db = options.db ?? null
        this.readonly = options.readonly ?? false
    }

    // ─────────────────────────────────────────────────────────────
    // Capabilities
    // ─────────────────────────────────────────────────────────────

    get label(): string {

        return this.capabilities.label
    }

    get docsUrl(): string | null {

        return this.capabilities.docsUrl
    }

    get dbNamespace(): string {

        return this.capabilities.dbNamespace
    }

    /**
     * Effective environment: base env with overrides layered on top.
     */
    get env(): EnvMapping {

        return { ...this.baseEnv, ...this.envOverride }
    }

    yamlConfig(): Record<string, unknown> {

        return this.capabilities.yamlConfig()
    }

    /**
     * YAML-backed config keyed by dotted paths.
     */
    flatYamlConfig(): Record<string, unknown> {

        return flatten(this.capabilities.yamlConfig())
    }

    /**
     * Drop entries holding the redaction placeholder.
     */
    static unredact(values: Readonly<Record<string, unknown>>): Record<string, unknown> {

        return Object.fromEntries(
            Object.entries(values).filter(([, value]) => value !== REDACTED_VALUE),
        )
    }

    /**
     * Build a store manager bound to this service.
     */
    manager(store: SettingValueStore, options: StoreManagerOptions = {}): SettingsStoreManager {

        return createStoreManager(store, this, options)
    }

    // ─────────────────────────────────────────────────────────────
    // Catalog
    // ─────────────────────────────────────────────────────────────

    /**
     * Declared definitions plus definitions synthesized for YAML keys
     * nothing declares.
     *
     * Computed once and cached; call invalidateDefinitions() after the
     * YAML config changes outside this service.
     */
    definitions(extras?: boolean): SettingDefinition[] {

        if (!this.#definitions) {

            const declared = this.capabilities.definitions
            const visible = declared.filter((def) => def.kind !== 'hidden' || this.showHidden)
            const missing = SettingDefinition.fromMissing(declared, this.flatYamlConfig())

            this.#definitions = [...visible, ...missing]

            observer.emit('settings:definitions-loaded', {
                label: this.label,
                count: this.#definitions.length,
                missing: missing.length,
                redacted: this.#definitions.filter((def) => def.isRedacted).map((def) => def.name),
            })
        }

        if (extras === undefined) {

            return [...this.#definitions]
        }

        return this.#definitions.filter((def) => def.isExtra === extras)
    }

    /**
     * Forget the cached catalog.
     */
    invalidateDefinitions(): void {

        if (!this.#definitions) {

            return
        }

        this.#definitions = null

        observer.emit('settings:definitions-invalidated', { label: this.label })
    }

    /**
     * Find a definition by canonical name or alias.
     *
     * @throws SettingMissingError if nothing matches
     */
    findSetting(name: string): SettingDefinition {

        const setting = this.definitions().find((def) => def.name === name || def.aliases.includes(name))

        if (!setting) {

            throw new SettingMissingError(name)
        }

        return setting
    }

    /**
     * Env vars of a setting under this variant's prefixes.
     */
    settingEnvVars(setting: SettingDefinition, includeGeneric = false): EnvVar[] {

        const prefixes = [...this.capabilities.envPrefixes]
        const generic = this.capabilities.genericEnvPrefix

        if (includeGeneric && generic) {

            prefixes.push(generic)
        }

        return setting.envVars(prefixes)
    }

    /**
     * Primary env var of a setting.
     */
    settingEnv(setting: SettingDefinition): string | undefined {

        return this.settingEnvVars(setting)[0]?.key
    }

    // ─────────────────────────────────────────────────────────────
    // Reads
    // ─────────────────────────────────────────────────────────────

    /**
     * Resolve one setting with its metadata.
     *
     * Undeclared names resolve as anonymous settings: no casting, no
     * redaction.
     */
    async getWithMetadata(name: string, options: GetOptions = {}): Promise<[unknown, SettingMetadata]> {

        const redacted = options.redacted ?? false
        const source = options.source ?? SettingValueStore.AUTO
        const sourceManager = options.sourceManager ?? null
        const setting = options.setting ?? this.#tryFindSetting(name)
        const settingName = setting?.name ?? name

        let metadata: SettingMetadata = { name: settingName, source, setting }

        // Extras may reference sibling settings through their env vars
        const expandibleEnv: EnvMapping = setting?.isExtra
            ? await this.asEnv({ extras: false, redacted, source, sourceManager })
            : {}

        const manager = sourceManager ?? this.manager(source)
        const result = await manager.get(settingName, setting, expandibleEnv)

        metadata = { ...metadata, ...result.metadata }

        let value = result.value

        if (setting?.kind === 'object' && metadata.source === SettingValueStore.DEFAULT) {

            const assembled = await this.#assembleObject(setting, { redacted, source, sourceManager })

            if (assembled) {

                value = assembled.value
                metadata = { ...metadata, source: assembled.source }
            }
        }

        ;[value, metadata] = castWithMetadata(setting, value, metadata)
        ;[value, metadata] = redactWithMetadata(setting, value, metadata, redacted)

        observer.emit('setting:get', {
            name: settingName,
            namespace: this.dbNamespace,
            source: metadata.source,
            redacted: metadata.redacted === true,
        })

        return [value, metadata]
    }

    async getWithSource(name: string, options: GetOptions = {}): Promise<[unknown, SettingValueStore]> {

        const [value, metadata] = await this.getWithMetadata(name, options)

        return [value, metadata.source]
    }

    async get(name: string, options: GetOptions = {}): Promise<unknown> {

        const [value] = await this.getWithMetadata(name, options)

        return value
    }

    /**
     * Resolve every applicable setting in one pass.
     *
     * One bulk manager serves the whole pass: the passed one, switched to
     * bulk mode, or a fresh one.
     */
    async configWithMetadata(options: ConfigOptions = {}): Promise<Record<string, SettingWithValue>> {

        const { prefix, extras } = options
        const redacted = options.redacted ?? false
        const source = options.source ?? SettingValueStore.AUTO
        const sourceManager = options.sourceManager ?? this.manager(source, { bulk: true })

        sourceManager.bulk = true

        const config: Record<string, SettingWithValue> = {}

        for (const setting of this.definitions(extras)) {

            if (prefix && !setting.name.startsWith(prefix)) {

                continue
            }

            const [value, metadata] = await this.getWithMetadata(setting.name, {
                setting,
                redacted,
                source,
                sourceManager,
            })

            const key = prefix ? setting.name.slice(prefix.length) : setting.name

            config[key] = { ...metadata, value }
        }

        return config
    }

    /**
     * Resolved config as a plain name to value mapping.
     */
    async asDict(options: AsDictOptions = {}): Promise<Record<string, unknown>> {

        const { process, ...configOptions } = options
        const full = await this.configWithMetadata(configOptions)

        const config = Object.fromEntries(
            Object.entries(full).map(([key, entry]) => [key, entry.value]),
        )

        return process ? this.capabilities.processConfig(config) : config
    }

    /**
     * Resolved config as environment variables.
     *
     * Every non-negated env var of a setting gets the stringified value,
     * the generic prefix included. Null and absent values are left out.
     */
    async asEnv(options: ConfigOptions = {}): Promise<Record<string, string>> {

        const full = await this.configWithMetadata(options)
        const env: Record<string, string> = {}

        for (const entry of Object.values(full)) {

            if (entry.value === null || entry.value === undefined || !entry.setting) {

                continue
            }

            const value = entry.setting.stringifyValue(entry.value)

            for (const envVar of this.settingEnvVars(entry.setting, true)) {

                if (envVar.negated) {

                    continue
                }

                env[envVar.key] = value
            }
        }

        return env
    }

    // ─────────────────────────────────────────────────────────────
    // Writes
    // ─────────────────────────────────────────────────────────────

    /**
     * Write a value to a concrete store.
     *
     * Writing REDACTED_VALUE is a no-op reported with `redacted: true`.
     *
     * @throws StoreNotSupportedError if the store cannot be written (including `auto`)
     */
    async setWithMetadata(
        path: string | readonly string[],
        value: unknown,
        store: SettingValueStore,
    ): Promise<[unknown, SetMetadata]> {

        const target = this.#resolvePath(path)

        let metadata: SetMetadata = {
            name: target.name,
            path: target.path,
            store,
            setting: target.setting,
        }

        if (value === REDACTED_VALUE) {

            observer.emit('setting:suppressed', { name: target.name, namespace: this.dbNamespace, store })

            return [null, { ...metadata, redacted: true }]
        }

        let castValue: unknown

        ;[castValue, metadata] = castWithMetadata(target.setting, value, metadata)

        const manager = this.manager(store)
        const setMetadata = await manager.set(target.name, target.path, castValue, target.setting)

        metadata = { ...metadata, ...setMetadata }

        this.invalidateDefinitions()

        observer.emit('setting:set', { name: target.name, namespace: this.dbNamespace, store })

        return [castValue, metadata]
    }

    async set(path: string | readonly string[], value: unknown, store: SettingValueStore): Promise<unknown> {

        const [castValue] = await this.setWithMetadata(path, value, store)

        return castValue
    }

    /**
     * Remove a value from a concrete store.
     *
     * @throws StoreNotSupportedError if the store cannot be written
     */
    async unset(path: string | readonly string[], store: SettingValueStore): Promise<SetMetadata> {

        const target = this.#resolvePath(path)

        const manager = this.manager(store)
        const unsetMetadata = await manager.unset(target.name, target.path, target.setting)

        this.invalidateDefinitions()

        observer.emit('setting:unset', { name: target.name, namespace: this.dbNamespace, store })

        return {
            name: target.name,
            path: target.path,
            store,
            setting: target.setting,
            ...unsetMetadata,
        }
    }

    /**
     * Remove every value a concrete store holds for this variant.
     *
     * @throws StoreNotSupportedError if the store cannot be reset
     */
    async reset(store: SettingValueStore): Promise<ResetMetadata> {

        const manager = this.manager(store)
        const resetMetadata = await manager.reset()

        this.invalidateDefinitions()

        observer.emit('settings:reset', { namespace: this.dbNamespace, store })

        return { ...resetMetadata, store }
    }

    // ─────────────────────────────────────────────────────────────
    // Private Helpers
    // ─────────────────────────────────────────────────────────────

    #tryFindSetting(name: string): SettingDefinition | null {

        const [setting, err] = attemptSync(() => this.findSetting(name))

        if (err) {

            if (err instanceof SettingMissingError) {

                return null
            }

            throw err
        }

        return setting
    }

    /**
     * Join a path into a name and resolve its definition. Names given by
     * alias are rewritten to the canonical name so every store keys the
     * value the same way.
     */
    #resolvePath(path: string | readonly string[]): {
        name: string
        path: string[]
        setting: SettingDefinition | null
    } {

        const segments = typeof path === 'string' ? [path] : [...path]
        const name = segments.join('.')
        const setting = this.#tryFindSetting(name)

        if (setting && setting.name !== name) {

            return { name: setting.name, path: setting.name.split('.'), setting }
        }

        return { name, path: segments, setting }
    }

    /**
     * Assemble an object setting from its dotted sub-keys.
     *
     * The first occurrence of a nested key wins; the object's source is
     * the highest-precedence source among its parts.
     */
    async #assembleObject(
        setting: SettingDefinition,
        options: Pick<ConfigOptions, 'redacted' | 'source' | 'sourceManager'>,
    ): Promise<{ value: Record<string, unknown>; source: SettingValueStore } | null> {

        const value: Record<string, unknown> = {}
        let source: SettingValueStore = SettingValueStore.DEFAULT

        for (const key of setting.names) {

            const nested = await this.configWithMetadata({ ...options, prefix: `${key}.` })

            for (const [nestedKey, entry] of Object.entries(nested)) {

                if (Object.hasOwn(value, nestedKey)) {

                    continue
                }

                value[nestedKey] = entry.value

                if (overrides(entry.source, source)) {

                    source = entry.source
                }
            }
        }

        if (Object.keys(value).length === 0) {

            return null
        }

        return { value, source }
    }
}
