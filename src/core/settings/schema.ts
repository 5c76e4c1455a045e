/**
 * Setting definition Zod schemas.
 *
 * Definitions are declared in YAML (the bundled project catalog, or a
 * plugin's `settings:` list in the project file) using snake_case keys.
 */
import { z } from 'zod';

/**
 * Supported setting kinds.
 */
export const SettingKindSchema = z.enum([
    'string',
    'integer',
    'boolean',
    'date_iso8601',
    'email',
    'password',
    'oauth',
    'options',
    'file',
    'array',
    'object',
    'hidden',
]);

/**
 * One selectable value of an `options` setting.
 */
const SettingOptionSchema = z.object({
    label: z.string().optional(),
    value: z.union([z.string(), z.number(), z.boolean()]),
});

/**
 * A setting definition as written in YAML.
 */
export const SettingDefinitionSchema = z
    .object({
        name: z.string().min(1, 'Setting name is required'),
        aliases: z.array(z.string().min(1)).default([]),
        kind: SettingKindSchema.default('string'),
        value: z.unknown().optional(),
        label: z.string().optional(),
        description: z.string().optional(),
        documentation: z.string().optional(),
        placeholder: z.string().optional(),
        options: z.array(SettingOptionSchema).default([]),
        env: z.string().optional(),
        env_aliases: z.array(z.string().min(1)).default([]),
        sensitive: z.boolean().default(false),
        extra: z.boolean().default(false),
    })
    .refine(
        (def) => def.env_aliases.every((alias) => !alias.startsWith('!')) || def.kind === 'boolean',
        {
            message: 'Negated env aliases are only allowed on boolean settings',
            path: ['env_aliases'],
        },
    );

/**
 * A catalog file: a top-level `settings:` list.
 */
export const SettingCatalogSchema = z.object({
    settings: z.array(SettingDefinitionSchema).default([]),
});

export type SettingKind = z.infer<typeof SettingKindSchema>;
export type SettingOption = z.infer<typeof SettingOptionSchema>;
export type SettingDefinitionInput = z.input<typeof SettingDefinitionSchema>;
export type SettingDefinitionData = z.output<typeof SettingDefinitionSchema>;

/**
 * Error thrown when a setting definition fails validation.
 */
export class SettingDefinitionValidationError extends Error {

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);
        this.name = 'SettingDefinitionValidationError';

    }

}

/**
 * Convert a ZodError into a SettingDefinitionValidationError.
 */
function toValidationError(error: z.ZodError, context: string): SettingDefinitionValidationError {

    const firstIssue = error.issues[0];
    const field = firstIssue?.path.join('.') ?? 'unknown';
    const message = firstIssue?.message ?? 'Validation failed';

    return new SettingDefinitionValidationError(`${context}: ${field}: ${message}`, field, error.issues);

}

/**
 * Parse one definition, applying defaults.
 *
 * @throws SettingDefinitionValidationError if validation fails
 */
export function parseSettingDefinition(input: unknown): SettingDefinitionData {

    const result = SettingDefinitionSchema.safeParse(input);

    if (!result.success) {

        throw toValidationError(result.error, 'Invalid setting definition');

    }

    return result.data;

}

/**
 * Parse a catalog document, applying defaults.
 *
 * An empty document yields an empty catalog.
 *
 * @throws SettingDefinitionValidationError if validation fails
 */
export function parseSettingCatalog(input: unknown): SettingDefinitionData[] {

    const result = SettingCatalogSchema.safeParse(input ?? {});

    if (!result.success) {

        throw toValidationError(result.error, 'Invalid setting catalog');

    }

    return result.data.settings;

}
