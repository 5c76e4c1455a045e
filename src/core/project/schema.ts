/**
 * Project file Zod schemas.
 *
 * Only the sections strata manages are validated. Every other top-level
 * key is kept as is: those keys hold project settings.
 */
import { z } from 'zod';

/**
 * Plugin types, as they appear under `plugins:`.
 */
export const PLUGIN_TYPES = ['extractors', 'loaders', 'transformers', 'mappers', 'utilities'] as const;

export const PluginTypeSchema = z.enum(PLUGIN_TYPES);

/**
 * One plugin entry.
 *
 * `settings` holds raw setting definitions; they are validated when the
 * plugin's settings are built.
 */
export const PluginEntrySchema = z
    .object({
        name: z.string().min(1, 'Plugin name is required'),
        namespace: z.string().min(1).optional(),
        variant: z.string().optional(),
        pip_url: z.string().optional(),
        docs: z.string().optional(),
        settings: z.array(z.unknown()).optional(),
        config: z.record(z.unknown()).optional(),
        select: z.array(z.string()).optional(),
        metadata: z.record(z.unknown()).optional(),
        schema: z.record(z.unknown()).optional(),
    })
    .passthrough();

/**
 * The `plugins:` section.
 */
export const PluginsSchema = z
    .object({
        extractors: z.array(PluginEntrySchema).optional(),
        loaders: z.array(PluginEntrySchema).optional(),
        transformers: z.array(PluginEntrySchema).optional(),
        mappers: z.array(PluginEntrySchema).optional(),
        utilities: z.array(PluginEntrySchema).optional(),
    })
    .strict();

/**
 * The whole project file.
 */
export const ProjectSchema = z
    .object({
        version: z.number().int().positive().optional(),
        plugins: PluginsSchema.optional(),
    })
    .passthrough();

// ─────────────────────────────────────────────────────────────
// Type Exports
// ─────────────────────────────────────────────────────────────

export type PluginType = z.infer<typeof PluginTypeSchema>;
export type PluginEntry = z.infer<typeof PluginEntrySchema>;
export type ProjectData = z.infer<typeof ProjectSchema>;
