/**
 * Database store: rows of the `strata_settings` table in the service's
 * namespace. Values are stored JSON-encoded.
 */
import { attemptSync } from '@logosdx/utils'

import { StoreNotSupportedError } from '../errors.js'
import { SettingValueStore } from '../store.js'
import { STRATA_TABLES } from '../../db/tables.js'
import { SettingsStoreManager } from './base.js'
import type { SettingDefinition } from '../definition.js'
import type { SettingsDb, StoreGetResult, StoreSetMetadata } from '../types.js'


/**
 * Decode a stored value; rows written by hand may hold plain text.
 */
function decodeValue(raw: string): unknown {

    const [parsed, err] = attemptSync((): unknown => JSON.parse(raw))

    return err ? raw : parsed
}


export class DbStoreManager extends SettingsStoreManager {

    readonly store = SettingValueStore.DB

    #rows: Map<string, string> | null = null

    async get(name: string, setting: SettingDefinition | null): Promise<StoreGetResult> {

        const raw = this.bulk
            ? (await this.#allRows()).get(name)
            : await this.#row(name)

        if (raw === undefined) {

            return { value: undefined, metadata: {} }
        }

        return { value: decodeValue(raw), metadata: { expandable: true } }
    }

    async set(
        name: string,
        path: readonly string[],
        value: unknown,
        setting: SettingDefinition | null,
    ): Promise<StoreSetMetadata> {

        this.assertWritable()

        const db = this.#db()
        const encoded = JSON.stringify(value ?? null)

        await db
            .insertInto(STRATA_TABLES.settings)
            .values({
                namespace: this.service.dbNamespace,
                name,
                value: encoded,
                enabled: 1,
            })
            .onConflict((oc) => oc
                .columns(['namespace', 'name'])
                .doUpdateSet({ value: encoded, enabled: 1 }))
            .execute()

        this.#rows = null

        return {}
    }

    async unset(
        name: string,
        path: readonly string[],
        setting: SettingDefinition | null,
    ): Promise<StoreSetMetadata> {

        this.assertWritable()

        await this.#db()
            .deleteFrom(STRATA_TABLES.settings)
            .where('namespace', '=', this.service.dbNamespace)
            .where('name', '=', name)
            .execute()

        this.#rows = null

        return {}
    }

    async reset(): Promise<StoreSetMetadata> {

        this.assertWritable()

        await this.#db()
            .deleteFrom(STRATA_TABLES.settings)
            .where('namespace', '=', this.service.dbNamespace)
            .execute()

        this.#rows = null

        return {}
    }

    #db(): SettingsDb {

        const db = this.service.db

        if (!db) {

            throw new StoreNotSupportedError(this.store, 'no system database is configured')
        }

        return db
    }

    async #row(name: string): Promise<string | undefined> {

        const row = await this.#db()
            .selectFrom(STRATA_TABLES.settings)
            .select(['value'])
            .where('namespace', '=', this.service.dbNamespace)
            .where('name', '=', name)
            .where('enabled', '=', 1)
            .executeTakeFirst()

        return row?.value
    }

    async #allRows(): Promise<Map<string, string>> {

        if (this.#rows) {

            return this.#rows
        }

        const rows = await this.#db()
            .selectFrom(STRATA_TABLES.settings)
            .select(['name', 'value'])
            .where('namespace', '=', this.service.dbNamespace)
            .where('enabled', '=', 1)
            .execute()

        this.#rows = new Map(rows.map((row) => [row.name, row.value]))

        return this.#rows
    }
}
