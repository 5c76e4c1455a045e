/**
 * System database module.
 *
 * Table types, connection helpers and the settings table bootstrap.
 */

export { STRATA_TABLES } from './tables.js'

export type {
    StrataTableName,
    StrataSettingsTable,
    StrataSetting,
    NewStrataSetting,
    StrataSettingUpdate,
    SettingsDatabase,
} from './tables.js'

export {
    openSettingsDatabase,
    sqliteFilename,
    type SettingsConnection,
} from './connection.js'

export { ensureSettingsTable } from './migrate.js'
