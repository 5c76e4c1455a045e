/**
 * Project settings: top-level keys of the project file.
 */
import type { ProjectFile } from '../project/file.js'
import type { SettingDefinition } from './definition.js'
import type { SettingsCapabilities } from './types.js'


/**
 * Project file sections that hold structure rather than settings.
 */
export const MANAGED_SECTIONS: readonly string[] = Object.freeze([
    'version',
    'plugins',
    'schedules',
    'jobs',
    'environments',
    'include_paths',
])


/**
 * Capabilities of the project settings variant.
 *
 * @example
 * ```typescript
 * const project = new ProjectFile(root)
 * await project.load()
 *
 * const settings = new SettingsService(
 *     new ProjectSettings(project, await loadSettingCatalog()),
 *     { db },
 * )
 * ```
 */
export class ProjectSettings implements SettingsCapabilities {

    readonly label = 'project'
    readonly docsUrl = null
    readonly envPrefixes: readonly string[] = ['STRATA']
    readonly genericEnvPrefix = null
    readonly dbNamespace = 'strata'

    constructor(
        private readonly project: ProjectFile,
        readonly definitions: readonly SettingDefinition[],
    ) {}

    yamlConfig(): Record<string, unknown> {

        return Object.fromEntries(
            Object.entries(this.project.current).filter(([key]) => !MANAGED_SECTIONS.includes(key)),
        )
    }

    async updateYamlConfig(config: Record<string, unknown>): Promise<void> {

        const managed = Object.fromEntries(
            Object.entries(this.project.current).filter(([key]) => MANAGED_SECTIONS.includes(key)),
        )

        await this.project.update({ ...managed, ...config })
    }

    processConfig(config: Record<string, unknown>): Record<string, unknown> {

        return config
    }
}
