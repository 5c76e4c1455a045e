/**
 * Settings table bootstrap.
 */
import type { Kysely } from 'kysely'

import { STRATA_TABLES, type SettingsDatabase } from './tables.js'


/**
 * Create the settings table if it does not exist.
 *
 * Idempotent; safe to call on every open.
 */
export async function ensureSettingsTable(db: Kysely<SettingsDatabase>): Promise<void> {

    await db.schema
        .createTable(STRATA_TABLES.settings)
        .ifNotExists()
        .addColumn('namespace', 'text', (col) => col.notNull())
        .addColumn('name', 'text', (col) => col.notNull())
        .addColumn('value', 'text', (col) => col.notNull())
        .addColumn('enabled', 'integer', (col) => col.notNull().defaultTo(1))
        .addPrimaryKeyConstraint('strata_settings_pk', ['namespace', 'name'])
        .execute()
}
