/**
 * Environment variable configuration.
 *
 * Engine config properties can be overridden via STRATA_* meta env vars.
 * These steer the engine itself; setting values use their own env vars.
 *
 * @example
 * ```bash
 * STRATA_PROJECT_ROOT=/srv/app
 * STRATA_PROJECT_FILE=strata.yml
 * STRATA_DOTENV_FILE=.env.local
 * STRATA_SHOW_HIDDEN=false
 * STRATA_LOG_LEVEL=verbose
 * STRATA_LOG_FILE=.strata/strata.log
 * ```
 */
import type { EngineConfigInput } from './types.js'
import { LogLevelSchema } from './schema.js'
import { LOG_LEVELS } from '../logger/types.js'
import type { EnvMapping } from '../settings/utils.js'


/**
 * Parse a `1`/`true` style boolean.
 */
function envFlag(value: string): boolean {

    return value === '1' || value.toLowerCase() === 'true'
}


/**
 * Read engine config values from environment variables.
 *
 * Unset variables leave their key out so they never mask defaults.
 *
 * @throws Error if STRATA_LOG_LEVEL is not a known level
 *
 * @example
 * ```typescript
 * getEnvConfig({ STRATA_PROJECT_FILE: 'meta.yml', STRATA_LOG_LEVEL: 'warn' })
 * // { projectFile: 'meta.yml', logging: { level: 'warn' } }
 * ```
 */
export function getEnvConfig(env: EnvMapping = process.env): EngineConfigInput {

    const config: EngineConfigInput = {}

    const projectRoot = env['STRATA_PROJECT_ROOT']
    const projectFile = env['STRATA_PROJECT_FILE']
    const dotenvFile = env['STRATA_DOTENV_FILE']
    const showHidden = env['STRATA_SHOW_HIDDEN']
    const logLevel = env['STRATA_LOG_LEVEL']
    const logFile = env['STRATA_LOG_FILE']

    if (projectRoot) config.projectRoot = projectRoot
    if (projectFile) config.projectFile = projectFile
    if (dotenvFile) config.dotenvFile = dotenvFile
    if (showHidden) config.showHidden = envFlag(showHidden)

    if (logLevel) {

        const result = LogLevelSchema.safeParse(logLevel)

        if (!result.success) {

            throw new Error(
                `Invalid STRATA_LOG_LEVEL: must be one of ${LOG_LEVELS.join(', ')}`
            )
        }

        config.logging = { ...config.logging, level: result.data }
    }

    if (logFile) {

        config.logging = { ...config.logging, file: logFile }
    }

    return config
}
