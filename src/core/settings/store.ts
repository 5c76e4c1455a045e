/**
 * Setting value stores.
 *
 * Concrete stores each hold setting values in one backend. Their
 * precedence is explicit: a lower rank wins when more than one store
 * defines a value. `auto` is virtual and searches concrete stores in
 * rank order.
 */


/**
 * Store identifiers.
 */
export const SettingValueStore = Object.freeze({
    CONFIG_OVERRIDE: 'config_override' as const,
    ENV: 'env' as const,
    DOTENV: 'dotenv' as const,
    PROJECT_YML: 'project_yml' as const,
    DB: 'db' as const,
    DEFAULT: 'default' as const,
    AUTO: 'auto' as const,
})

export type SettingValueStore = (typeof SettingValueStore)[keyof typeof SettingValueStore]

/**
 * Every store except `auto`.
 */
export type ConcreteStore = Exclude<SettingValueStore, 'auto'>


/**
 * Precedence rank per concrete store. Lower wins.
 */
export const STORE_RANKS: Readonly<Record<ConcreteStore, number>> = Object.freeze({
    config_override: 0,
    env: 1,
    dotenv: 2,
    project_yml: 3,
    db: 4,
    default: 5,
})


/**
 * Concrete stores in the order `auto` consults them.
 */
export const STORE_PRECEDENCE: readonly ConcreteStore[] = Object.freeze(
    [
        SettingValueStore.CONFIG_OVERRIDE,
        SettingValueStore.ENV,
        SettingValueStore.DOTENV,
        SettingValueStore.PROJECT_YML,
        SettingValueStore.DB,
        SettingValueStore.DEFAULT,
    ].sort((a, b) => STORE_RANKS[a] - STORE_RANKS[b]),
)


/**
 * Human-readable store labels.
 */
export const STORE_LABELS: Readonly<Record<SettingValueStore, string>> = Object.freeze({
    config_override: 'the command-line override',
    env: 'the environment',
    dotenv: 'the `.env` file',
    project_yml: 'the project file',
    db: 'the system database',
    default: 'the default',
    auto: 'the most specific store',
})


/**
 * Narrow an arbitrary store to a concrete one.
 */
export function isConcreteStore(store: SettingValueStore): store is ConcreteStore {

    return store !== SettingValueStore.AUTO
}


/**
 * Parse a store identifier from user input.
 *
 * @throws Error if the identifier is unknown
 */
export function parseStore(value: string): SettingValueStore {

    const store = Object.values(SettingValueStore).find((candidate) => candidate === value)

    if (!store) {

        throw new Error(`Unknown settings store '${value}'`)
    }

    return store
}


/**
 * Whether `store` takes precedence over `other`.
 *
 * `auto` never overrides and is never overridden.
 *
 * @example
 * ```typescript
 * overrides('env', 'project_yml')   // true
 * overrides('default', 'db')        // false
 * ```
 */
export function overrides(store: SettingValueStore, other: SettingValueStore): boolean {

    if (!isConcreteStore(store) || !isConcreteStore(other)) {

        return false
    }

    return STORE_RANKS[store] < STORE_RANKS[other]
}
