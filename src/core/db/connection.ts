/**
 * System database connection.
 *
 * Uses better-sqlite3 through Kysely's SqliteDialect. The database
 * location comes from the project's `database_uri` setting.
 */
import { mkdir } from 'node:fs/promises'
import { dirname, isAbsolute, join } from 'node:path'
import { Kysely, SqliteDialect } from 'kysely'
import Database from 'better-sqlite3'
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import { ensureSettingsTable } from './migrate.js'
import type { SettingsDatabase } from './tables.js'


/**
 * An open settings database.
 */
export interface SettingsConnection {

    db: Kysely<SettingsDatabase>
    filename: string
    destroy: () => Promise<void>
}


const SQLITE_URI_PREFIX = 'sqlite:///'


/**
 * Resolve a `sqlite:///path` URI (or bare path) to a filename.
 *
 * Relative paths resolve against `projectRoot`.
 *
 * @example
 * ```typescript
 * sqliteFilename('sqlite:///.strata/strata.db', '/srv/app')  // '/srv/app/.strata/strata.db'
 * sqliteFilename('sqlite:///:memory:', '/srv/app')           // ':memory:'
 * ```
 */
export function sqliteFilename(uri: string, projectRoot: string): string {

    if (uri.includes('://') && !uri.startsWith(SQLITE_URI_PREFIX)) {

        throw new Error(`Unsupported database URI '${uri}': only sqlite:/// is supported`)
    }

    const path = uri.startsWith(SQLITE_URI_PREFIX)
        ? uri.slice(SQLITE_URI_PREFIX.length)
        : uri

    if (path === ':memory:' || isAbsolute(path)) {

        return path
    }

    return join(projectRoot, path)
}


/**
 * Open the settings database and make sure its table exists.
 *
 * @example
 * ```typescript
 * const conn = await openSettingsDatabase('sqlite:///:memory:', process.cwd())
 * // ... use conn.db
 * await conn.destroy()
 * ```
 */
export async function openSettingsDatabase(uri: string, projectRoot: string): Promise<SettingsConnection> {

    const filename = sqliteFilename(uri, projectRoot)

    if (filename !== ':memory:') {

        const [, mkdirErr] = await attempt(() => mkdir(dirname(filename), { recursive: true }))

        if (mkdirErr) {

            throw new Error(`Failed to create database directory: ${mkdirErr.message}`)
        }
    }

    const db = new Kysely<SettingsDatabase>({
        dialect: new SqliteDialect({
            database: new Database(filename),
        }),
    })

    await ensureSettingsTable(db)

    observer.emit('db:open', { filename })

    return {
        db,
        filename,
        destroy: async () => {

            await db.destroy()
            observer.emit('db:close', { filename })
        },
    }
}
