/**
 * Engine configuration types.
 *
 * The engine configuration tells strata where the project lives and how
 * to log. It is resolved before any setting can be read and is not itself
 * a setting.
 */
import type { LogLevel } from '../logger/types.js'


/**
 * Fully resolved engine configuration.
 *
 * @example
 * ```typescript
 * const config: EngineConfig = {
 *     projectRoot: '/srv/app',
 *     projectFile: 'strata.yml',
 *     dotenvFile: '.env',
 *     showHidden: true,
 *     logging: { level: 'info', file: null },
 * }
 * ```
 */
export interface EngineConfig {

    projectRoot: string
    projectFile: string     // Relative to project root
    dotenvFile: string      // Relative to project root
    showHidden: boolean

    logging: {
        level: LogLevel
        file: string | null // Relative to project root
    }
}


/**
 * Partial engine configuration from env vars or flags.
 */
export interface EngineConfigInput {

    projectRoot?: string
    projectFile?: string
    dotenvFile?: string
    showHidden?: boolean
    logging?: Partial<EngineConfig['logging']>
}
