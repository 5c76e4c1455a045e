/**
 * Open a project: resolve the engine config, load the project file and
 * the settings catalog, then wire the settings services to the system
 * database.
 */
import { createWriteStream } from 'node:fs'
import { mkdir } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { attempt } from '@logosdx/utils'

import { resolveEngineConfig, type EngineConfig, type EngineConfigInput } from '../config/index.js'
import { openSettingsDatabase } from '../db/index.js'
import { Logger, listenForRedactedSettings } from '../logger/index.js'
import { loadSettingCatalog } from '../settings/catalog.js'
import { PluginSettings } from '../settings/plugin-settings.js'
import { ProjectSettings } from '../settings/project-settings.js'
import { SettingsService } from '../settings/service.js'
import { ProjectFile } from './file.js'
import type { Writable } from 'node:stream'
import type { PluginType } from './schema.js'
import type { SettingsDb, SettingsServiceOptions } from '../settings/types.js'
import type { EnvMapping } from '../settings/utils.js'


/**
 * Options for openProject.
 */
export interface OpenProjectOptions {

    /** Engine config overrides */
    flags?: EngineConfigInput

    /** Process environment (default: process.env) */
    env?: EnvMapping

    /** Values layered over `env` for settings lookups */
    envOverride?: Readonly<Record<string, string>>

    /** Values for the `config_override` store */
    configOverride?: Readonly<Record<string, unknown>>

    /** Project settings catalog to load instead of the bundled one */
    catalogPath?: string

    /** Console stream for the logger; a logger starts when this or a log file is set */
    console?: Writable
}


/**
 * An opened project.
 */
export interface OpenProject {

    config: EngineConfig
    project: ProjectFile
    settings: SettingsService
    db: SettingsDb
    logger: Logger | null

    /** Settings of one declared plugin */
    pluginSettings(type: PluginType, name: string): SettingsService

    /** Close the database and stop the logger */
    close(): Promise<void>
}


/**
 * Open a project.
 *
 * A failure while opening stops the logger it started.
 *
 * @example
 * ```typescript
 * const app = await openProject({ flags: { projectRoot: '/srv/app' } })
 *
 * const port = await app.settings.get('ui.bind_port')
 * await app.pluginSettings('extractors', 'tap-csv').set('files', '[]', 'db')
 *
 * await app.close()
 * ```
 */
export async function openProject(options: OpenProjectOptions = {}): Promise<OpenProject> {

    const env = options.env ?? process.env
    const config = resolveEngineConfig({ flags: options.flags, env })

    const logger = await startLogger(config, options.console)
    const stopListening = listenForRedactedSettings()

    const [services, err] = await attempt(() => openServices(config, env, options))

    if (err) {

        stopListening()
        await logger?.stop()

        throw err
    }

    const { project, catalog, connection, serviceOptions } = services

    return {
        config,
        project,
        settings: new SettingsService(new ProjectSettings(project, catalog), serviceOptions),
        db: connection.db,
        logger,
        pluginSettings: (type, name) => new SettingsService(new PluginSettings(project, type, name), serviceOptions),
        close: async () => {

            await connection.destroy()
            stopListening()

            if (logger) {

                await logger.stop()
            }
        },
    }
}


/**
 * Load the project file and catalog, then open the system database.
 *
 * The system database location and the read-only flag are settings
 * themselves, so they are resolved first through a service without a
 * database.
 */
async function openServices(config: EngineConfig, env: EnvMapping, options: OpenProjectOptions) {

    const project = new ProjectFile(config.projectRoot, config.projectFile)
    await project.load()

    const catalog = await loadSettingCatalog(options.catalogPath)

    const baseOptions: SettingsServiceOptions = {
        env,
        envOverride: options.envOverride,
        configOverride: options.configOverride,
        showHidden: config.showHidden,
        dotenvPath: join(config.projectRoot, config.dotenvFile),
    }

    const bootstrap = new SettingsService(new ProjectSettings(project, catalog), baseOptions)
    const databaseUri = await bootstrap.get('database_uri')
    const readonly = await bootstrap.get('project_readonly')

    if (typeof databaseUri !== 'string') {

        throw new Error('Setting database_uri must be a string')
    }

    const connection = await openSettingsDatabase(databaseUri, config.projectRoot)

    const serviceOptions: SettingsServiceOptions = {
        ...baseOptions,
        db: connection.db,
        readonly: readonly === true,
    }

    return { project, catalog, connection, serviceOptions }
}


/**
 * Start a logger when a log file or console is configured.
 */
async function startLogger(config: EngineConfig, console: Writable | undefined): Promise<Logger | null> {

    const { level, file } = config.logging

    if (level === 'silent' || (!file && !console)) {

        return null
    }

    let fileStream: Writable | undefined

    if (file) {

        const path = join(config.projectRoot, file)
        const [, mkdirErr] = await attempt(() => mkdir(dirname(path), { recursive: true }))

        if (mkdirErr) {

            throw new Error(`Failed to create log directory: ${mkdirErr.message}`)
        }

        fileStream = createWriteStream(path, { flags: 'a' })
    }

    const logger = new Logger({
        config: { level },
        file: fileStream,
        console: console ?? null,
        context: { projectRoot: config.projectRoot },
    })

    logger.start()

    return logger
}
