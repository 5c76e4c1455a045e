/**
 * Engine config resolver - merges configuration from multiple sources.
 *
 * Priority order (highest to lowest):
 * 1. Flags passed by the embedding program
 * 2. Environment variables
 * 3. Defaults
 */
import { merge, clone } from '@logosdx/utils'

import type { EngineConfig, EngineConfigInput } from './types.js'
import { getEnvConfig } from './env.js'
import { parseEngineConfig } from './schema.js'
import type { EnvMapping } from '../settings/utils.js'


/**
 * Default config values. The project root defaults to the working
 * directory at resolution time.
 */
const DEFAULTS: EngineConfigInput = {

    projectFile: 'strata.yml',
    dotenvFile: '.env',
    showHidden: true,
    logging: {
        level: 'info',
        file: null,
    },
}


/**
 * Options for resolving the engine config.
 */
export interface ResolveEngineConfigOptions {

    /** Flag overrides */
    flags?: EngineConfigInput

    /** Environment to read STRATA_* meta vars from (default: process.env) */
    env?: EnvMapping
}


/**
 * Resolve the engine config from all sources.
 *
 * @throws EngineConfigValidationError if the merged config is invalid
 *
 * @example
 * ```typescript
 * const config = resolveEngineConfig({
 *     flags: { projectRoot: '/srv/app', logging: { level: 'verbose' } },
 * })
 * ```
 */
export function resolveEngineConfig(options: ResolveEngineConfigOptions = {}): EngineConfig {

    // Clone DEFAULTS to avoid mutation
    const defaults: EngineConfigInput = { ...clone(DEFAULTS), projectRoot: process.cwd() }

    // Merge: defaults <- env <- flags
    const merged = merge(
        merge(defaults, getEnvConfig(options.env)),
        options.flags ?? {}
    )

    return parseEngineConfig(merged)
}
