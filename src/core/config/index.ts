/**
 * Config module - engine configuration for strata.
 *
 * Resolves where the project lives and how to log, from defaults,
 * STRATA_* meta env vars and flags.
 */

// Types
export * from './types.js';

// Schema & Validation
export {
    EngineConfigSchema,
    LogLevelSchema,
    EngineConfigValidationError,
    parseEngineConfig,
    type EngineConfigSchemaType,
} from './schema.js';

// Resolver
export {
    resolveEngineConfig,
    type ResolveEngineConfigOptions,
} from './resolver.js';

// Environment variables
export { getEnvConfig } from './env.js';
