/**
 * Engine configuration Zod schemas and validation.
 *
 * Uses Zod for declarative validation with better error messages
 * and type inference.
 */
import { z } from 'zod';

import { LOG_LEVELS } from '../logger/types.js';

/**
 * Valid log levels.
 */
export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Relative file path inside the project.
 */
const ProjectPathSchema = z.string().min(1, 'Path must not be empty');

/**
 * Logging configuration schema.
 */
const LoggingSchema = z.object({
    level: LogLevelSchema.default('info'),
    file: ProjectPathSchema.nullable().default(null),
});

/**
 * Full engine config schema.
 */
export const EngineConfigSchema = z.object({
    projectRoot: z.string().min(1, 'Project root is required'),
    projectFile: ProjectPathSchema.default('strata.yml'),
    dotenvFile: ProjectPathSchema.default('.env'),
    showHidden: z.boolean().default(true),
    logging: LoggingSchema.default({}),
});

// ─────────────────────────────────────────────────────────────
// Type Exports
// ─────────────────────────────────────────────────────────────

export type EngineConfigSchemaType = z.infer<typeof EngineConfigSchema>;

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when engine config validation fails.
 *
 * Includes the specific field that failed and all validation issues.
 */
export class EngineConfigValidationError extends Error {

    override readonly name = 'EngineConfigValidationError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);

    }

}

/**
 * Parse and validate engine config, returning defaults for missing fields.
 *
 * @throws EngineConfigValidationError if validation fails
 *
 * @example
 * ```typescript
 * const config = parseEngineConfig({ projectRoot: '/srv/app' })
 * // config.projectFile === 'strata.yml' (default)
 * // config.logging.level === 'info' (default)
 * ```
 */
export function parseEngineConfig(config: unknown): EngineConfigSchemaType {

    const result = EngineConfigSchema.safeParse(config);

    if (!result.success) {

        const firstIssue = result.error.issues[0];

        throw new EngineConfigValidationError(
            firstIssue?.message ?? 'Validation failed',
            firstIssue?.path.join('.') || 'unknown',
            result.error.issues,
        );

    }

    return result.data;

}
