/**
 * Setting definitions.
 *
 * A SettingDefinition describes one logical setting: its canonical name,
 * aliases, kind, default, and the environment variables it maps to.
 * Definitions are immutable once built.
 */
import { attemptSync } from '@logosdx/utils'

import { parseSettingDefinition } from './schema.js'
import type { SettingDefinitionData, SettingKind, SettingOption } from './schema.js'
import { SettingValueError } from './errors.js'
import { isPlainObject, truthy, type EnvMapping } from './utils.js'


/**
 * Build the environment variable name for a prefix and setting name.
 *
 * @example
 * ```typescript
 * envVarKey('tap-gitlab', 'start_date')  // 'TAP_GITLAB_START_DATE'
 * envVarKey('STRATA', 'ui.bind_host')    // 'STRATA_UI_BIND_HOST'
 * ```
 */
export function envVarKey(prefix: string, name: string): string {

    return `${prefix}_${name}`.replace(/[^A-Za-z0-9]+/g, '_').toUpperCase()
}


/**
 * One environment variable a setting can be read from.
 *
 * A negated variable holds the inverse of a boolean setting
 * (e.g. `STRATA_DISABLE_TRACKING` for `send_anonymous_usage_stats`).
 */
export class EnvVar {

    constructor(
        public readonly key: string,
        public readonly negated = false,
    ) {}

    /**
     * Parse a declared alias; a leading `!` marks it negated.
     */
    static fromAlias(alias: string): EnvVar {

        if (alias.startsWith('!')) {

            return new EnvVar(alias.slice(1), true)
        }

        return new EnvVar(alias)
    }

    /**
     * Read this variable from an env mapping.
     *
     * Negated variables return the inverted boolean as `'true'`/`'false'`.
     */
    get(env: EnvMapping): string | undefined {

        const value = env[this.key]

        if (value === undefined) {

            return undefined
        }

        if (this.negated) {

            return String(!truthy(value))
        }

        return value
    }
}


/**
 * Extra options accepted by {@link SettingDefinition.fromKeyValue}.
 */
export interface FromKeyValueOptions {

    custom?: boolean
    extra?: boolean
}


/**
 * Descriptor of one logical setting.
 *
 * @example
 * ```typescript
 * const setting = SettingDefinition.parse({
 *     name: 'send_anonymous_usage_stats',
 *     kind: 'boolean',
 *     value: true,
 *     env_aliases: ['!STRATA_DISABLE_TRACKING'],
 * })
 *
 * setting.castValue('false')          // false
 * setting.envVars(['STRATA']).map((v) => v.key)
 * // ['STRATA_SEND_ANONYMOUS_USAGE_STATS', 'STRATA_DISABLE_TRACKING']
 * ```
 */
export class SettingDefinition {

    readonly name: string
    readonly aliases: readonly string[]
    readonly kind: SettingKind
    readonly value: unknown
    readonly label?: string
    readonly description?: string
    readonly documentation?: string
    readonly placeholder?: string
    readonly options: readonly SettingOption[]
    readonly env?: string
    readonly envAliases: readonly string[]
    readonly sensitive: boolean
    readonly isExtra: boolean
    readonly isCustom: boolean

    constructor(data: SettingDefinitionData, options: FromKeyValueOptions = {}) {

        this.name = data.name
        this.aliases = Object.freeze([...data.aliases])
        this.kind = data.kind
        this.value = data.value
        this.label = data.label
        this.description = data.description
        this.documentation = data.documentation
        this.placeholder = data.placeholder
        this.options = Object.freeze([...data.options])
        this.env = data.env
        this.envAliases = Object.freeze([...data.env_aliases])
        this.sensitive = data.sensitive
        this.isExtra = data.extra || options.extra === true
        this.isCustom = options.custom === true

        Object.freeze(this)
    }

    /**
     * Validate raw YAML input and build a definition.
     *
     * @throws SettingDefinitionValidationError if the input is invalid
     */
    static parse(input: unknown): SettingDefinition {

        return new SettingDefinition(parseSettingDefinition(input))
    }

    /**
     * Synthesize a definition for a key found only in config.
     *
     * The kind is inferred from the value; no default is recorded since
     * the value itself lives in the store it was found in.
     */
    static fromKeyValue(key: string, value: unknown, options: FromKeyValueOptions = {}): SettingDefinition {

        let kind: SettingKind = 'string'

        if (typeof value === 'boolean') {

            kind = 'boolean'
        }
        else if (typeof value === 'number' && Number.isInteger(value)) {

            kind = 'integer'
        }
        else if (Array.isArray(value)) {

            kind = 'array'
        }
        else if (isPlainObject(value)) {

            kind = 'object'
        }

        return new SettingDefinition(
            parseSettingDefinition({ name: key, kind }),
            options,
        )
    }

    /**
     * Synthesize definitions for flattened config keys no declared
     * definition (by name or alias) accounts for.
     *
     * Keys starting with `_` become extras.
     */
    static fromMissing(
        declared: readonly SettingDefinition[],
        flatConfig: Record<string, unknown>,
    ): SettingDefinition[] {

        const known = new Set<string>()

        for (const def of declared) {

            known.add(def.name)
            def.aliases.forEach((alias) => known.add(alias))
        }

        return Object.entries(flatConfig)
            .filter(([key]) => !known.has(key))
            .map(([key, value]) => SettingDefinition.fromKeyValue(key, value, {
                custom: true,
                extra: key.startsWith('_'),
            }))
    }

    /**
     * Canonical name followed by every alias.
     */
    get names(): string[] {

        return [this.name, ...this.aliases]
    }

    /**
     * Whether values of this setting must be hidden from output.
     */
    get isRedacted(): boolean {

        return this.sensitive || this.kind === 'password' || this.kind === 'oauth'
    }

    /**
     * Environment variables this setting maps to, in lookup order.
     *
     * Custom `env` first, then every prefix and name combination, then
     * declared env aliases. Duplicates are dropped.
     */
    envVars(prefixes: readonly string[]): EnvVar[] {

        const vars: EnvVar[] = []

        if (this.env) {

            vars.push(new EnvVar(this.env))
        }

        for (const prefix of prefixes) {

            for (const name of this.names) {

                vars.push(new EnvVar(envVarKey(prefix, name)))
            }
        }

        vars.push(...this.envAliases.map((alias) => EnvVar.fromAlias(alias)))

        const seen = new Set<string>()

        return vars.filter((envVar) => {

            if (seen.has(envVar.key)) {

                return false
            }

            seen.add(envVar.key)

            return true
        })
    }

    /**
     * Cast a raw value to this setting's kind.
     *
     * Only strings are converted; anything else is returned as is, which
     * keeps casting idempotent.
     *
     * @throws SettingValueError if a string cannot be converted
     */
    castValue(value: unknown): unknown {

        if (typeof value !== 'string') {

            return value
        }

        switch (this.kind) {

            case 'boolean':
                return truthy(value)

            case 'integer': {

                const trimmed = value.trim()

                if (!/^[-+]?\d+$/.test(trimmed)) {

                    throw new SettingValueError(this.name, this.kind, value)
                }

                return Number.parseInt(trimmed, 10)
            }

            case 'array':
            case 'object':
                return this.#parseJson(value)

            default:
                return value
        }
    }

    /**
     * Render a value the way it would appear in an environment variable.
     */
    stringifyValue(value: unknown): string {

        if (typeof value === 'string') {

            return value
        }

        return JSON.stringify(value)
    }

    #parseJson(value: string): unknown {

        const [parsed, err] = attemptSync((): unknown => JSON.parse(value))

        if (err) {

            throw new SettingValueError(this.name, this.kind, value)
        }

        const matchesKind = this.kind === 'array'
            ? Array.isArray(parsed)
            : isPlainObject(parsed)

        if (!matchesKind) {

            throw new SettingValueError(this.name, this.kind, value)
        }

        return parsed
    }
}
