/**
 * Helpers for nested config mappings and env var interpolation.
 *
 * YAML-backed config is nested; the settings engine addresses it by
 * dotted keys. These helpers convert between both shapes.
 */


/**
 * Mapping of environment variable names to values.
 *
 * Compatible with `process.env`.
 */
export type EnvMapping = Record<string, string | undefined>


/**
 * Check that a value is a plain (non-array, non-null) object.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {

    if (typeof value !== 'object' || value === null || Array.isArray(value)) {

        return false
    }

    const proto = Object.getPrototypeOf(value)

    return proto === Object.prototype || proto === null
}


/**
 * Flatten a nested mapping into dotted keys.
 *
 * Arrays and scalars are leaves. Empty objects produce no keys.
 *
 * @example
 * ```typescript
 * flatten({ ui: { bind_host: '0.0.0.0', bind_port: 5000 } })
 * // { 'ui.bind_host': '0.0.0.0', 'ui.bind_port': 5000 }
 * ```
 */
export function flatten(config: Record<string, unknown>, prefix = ''): Record<string, unknown> {

    const flat: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(config)) {

        const fullKey = prefix ? `${prefix}.${key}` : key

        if (isPlainObject(value)) {

            Object.assign(flat, flatten(value, fullKey))
            continue
        }

        flat[fullKey] = value
    }

    return flat
}


/**
 * Nest dotted keys back into objects.
 *
 * Later keys win when a scalar and a nested key collide.
 *
 * @example
 * ```typescript
 * nestObject({ 'auth.user': 'alice', 'auth.token': 'x', start: 1 })
 * // { auth: { user: 'alice', token: 'x' }, start: 1 }
 * ```
 */
export function nestObject(flat: Record<string, unknown>): Record<string, unknown> {

    const nested: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(flat)) {

        setAtPath(nested, key.split('.'), value)
    }

    return nested
}


/**
 * Set a value at a path, creating intermediate objects.
 *
 * Mutates `target`. Non-object intermediates are replaced.
 */
export function setAtPath(target: Record<string, unknown>, path: readonly string[], value: unknown): void {

    const [head, ...rest] = path

    if (head === undefined) {

        return
    }

    if (rest.length === 0) {

        target[head] = value
        return
    }

    let child = target[head]

    if (!isPlainObject(child)) {

        child = {}
        target[head] = child
    }

    if (isPlainObject(child)) {

        setAtPath(child, rest, value)
    }
}


/**
 * Remove the value at a path and prune parents left empty.
 *
 * Mutates `target`. Returns whether anything was removed.
 */
export function popAtPath(target: Record<string, unknown>, path: readonly string[]): boolean {

    const [head, ...rest] = path

    if (head === undefined || !(head in target)) {

        return false
    }

    if (rest.length === 0) {

        delete target[head]
        return true
    }

    const child = target[head]

    if (!isPlainObject(child)) {

        return false
    }

    const removed = popAtPath(child, rest)

    if (removed && Object.keys(child).length === 0) {

        delete target[head]
    }

    return removed
}


const ENV_VAR_PATTERN = /\$\{(\w+)\}|\$(\w+)/g


/**
 * Expand `$VAR` and `${VAR}` references.
 *
 * Strings are expanded; arrays and objects are walked; everything else is
 * returned untouched. Unknown variables expand to an empty string.
 *
 * @example
 * ```typescript
 * expandEnvVars('postgres://$DB_USER@${DB_HOST}/app', { DB_USER: 'app', DB_HOST: 'db' })
 * // 'postgres://app@db/app'
 * ```
 */
export function expandEnvVars(value: unknown, env: EnvMapping): unknown {

    if (typeof value === 'string') {

        return value.replace(ENV_VAR_PATTERN, (_, braced: string | undefined, bare: string | undefined) => {

            const key = braced ?? bare ?? ''

            return env[key] ?? ''
        })
    }

    if (Array.isArray(value)) {

        return value.map((item) => expandEnvVars(item, env))
    }

    if (isPlainObject(value)) {

        const expanded: Record<string, unknown> = {}

        for (const [key, item] of Object.entries(value)) {

            expanded[key] = expandEnvVars(item, env)
        }

        return expanded
    }

    return value
}


/**
 * Whether a value counts as present for redaction purposes.
 *
 * Absent, null, empty string, false, zero, empty arrays and empty
 * objects are not present.
 */
export function isPresent(value: unknown): boolean {

    if (value === undefined || value === null || value === '' || value === false || value === 0) {

        return false
    }

    if (Array.isArray(value)) {

        return value.length > 0
    }

    if (isPlainObject(value)) {

        return Object.keys(value).length > 0
    }

    return true
}


const TRUTHY_STRINGS = new Set(['true', '1', 'yes', 'y', 't', 'on'])


/**
 * Interpret a string as a boolean toggle.
 */
export function truthy(value: string): boolean {

    return TRUTHY_STRINGS.has(value.trim().toLowerCase())
}
