/**
 * Kysely table types for the strata system database.
 *
 * Kysely uses these types to provide type-safe queries. They match the
 * schema created by ensureSettingsTable.
 */
import type { Generated, Insertable, Selectable, Updateable } from 'kysely';

/**
 * Strata table names.
 *
 * Use these constants instead of hardcoding table names.
 */
export const STRATA_TABLES = Object.freeze({
    /** Setting values stored in the database, one row per namespace and name */
    settings: 'strata_settings' as const,
});

/**
 * Type for table names.
 */
export type StrataTableName = (typeof STRATA_TABLES)[keyof typeof STRATA_TABLES];

/**
 * Setting value table.
 *
 * Each settings variant owns the rows of its namespace
 * (`strata` for the project, `<type>.<name>` for plugins).
 */
export interface StrataSettingsTable {
    /** Settings variant namespace */
    namespace: string;

    /** Canonical setting name */
    name: string;

    /** JSON-encoded value */
    value: string;

    /** 1 when the row is active; disabled rows are ignored on read */
    enabled: Generated<number>;
}

export type StrataSetting = Selectable<StrataSettingsTable>;
export type NewStrataSetting = Insertable<StrataSettingsTable>;
export type StrataSettingUpdate = Updateable<StrataSettingsTable>;

/**
 * Database interface for Kysely.
 */
export interface SettingsDatabase {
    strata_settings: StrataSettingsTable;
}
