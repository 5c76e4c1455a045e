/**
 * Settings errors.
 *
 * SettingMissingError is recoverable: read and write paths catch it and
 * continue with an anonymous setting. StoreNotSupportedError always
 * reaches the caller.
 */
import { STORE_LABELS, type SettingValueStore } from './store.js'


/**
 * No definition matches a name or alias.
 *
 * @example
 * ```typescript
 * const [setting, err] = attemptSync(() => service.findSetting('ui.bind_host'))
 * if (err instanceof SettingMissingError) {
 *     // proceed with an untyped setting
 * }
 * ```
 */
export class SettingMissingError extends Error {

    override readonly name = 'SettingMissingError' as const

    constructor(public readonly settingName: string) {

        super(`Cannot find setting '${settingName}'`)
    }
}


/**
 * A store cannot perform the requested operation.
 *
 * Thrown for read-only stores, writes targeting `auto`, lookups that need
 * a definition when none exists, and a database store with no database.
 */
export class StoreNotSupportedError extends Error {

    override readonly name = 'StoreNotSupportedError' as const

    constructor(
        public readonly store: SettingValueStore,
        public readonly reason?: string,
    ) {

        const reasonSuffix = reason ? `: ${reason}` : ''

        super(`Operation not supported by store '${store}' (${STORE_LABELS[store]})${reasonSuffix}`)
    }
}


/**
 * A value cannot be cast to its setting's kind.
 */
export class SettingValueError extends Error {

    override readonly name = 'SettingValueError' as const

    constructor(
        public readonly settingName: string,
        public readonly kind: string,
        public readonly value: unknown,
    ) {

        super(`Value for setting '${settingName}' is not a valid ${kind}`)
    }
}
