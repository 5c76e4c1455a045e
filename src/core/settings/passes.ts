/**
 * Value passes applied after a store produced a raw value.
 *
 * Casting always runs first and redaction second, so `uncastValue` can
 * never hold the redaction placeholder.
 */
import { REDACTED_VALUE } from './types.js'
import { isPresent } from './utils.js'
import type { SettingDefinition } from './definition.js'


interface CastMetadata {

    uncastValue?: unknown
}

interface RedactMetadata {

    redacted?: boolean
}


/**
 * Cast a value to its setting's kind.
 *
 * Returns the cast value and a copy of `metadata` that records the raw
 * input under `uncastValue` when casting changed it. Anonymous settings
 * pass through untouched.
 *
 * @example
 * ```typescript
 * const [value, metadata] = castWithMetadata(portSetting, '5000', { name: 'ui.bind_port' })
 * // value: 5000, metadata: { name: 'ui.bind_port', uncastValue: '5000' }
 * ```
 */
export function castWithMetadata<M extends CastMetadata>(
    setting: SettingDefinition | null,
    value: unknown,
    metadata: M,
): [unknown, M] {

    if (!setting) {

        return [value, { ...metadata }]
    }

    const cast = setting.castValue(value)

    if (cast !== value) {

        return [cast, { ...metadata, uncastValue: value }]
    }

    return [cast, { ...metadata }]
}


/**
 * Replace a sensitive value with REDACTED_VALUE.
 *
 * Applies only when redaction was requested, the setting is redacted and
 * the value is present.
 */
export function redactWithMetadata<M extends RedactMetadata>(
    setting: SettingDefinition | null,
    value: unknown,
    metadata: M,
    redacted: boolean,
): [unknown, M] {

    if (redacted && setting?.isRedacted && isPresent(value)) {

        return [REDACTED_VALUE, { ...metadata, redacted: true }]
    }

    return [value, { ...metadata }]
}
