/**
 * Project File
 *
 * Loads, validates and saves the project's `strata.yml`. The file holds
 * project settings at the top level and plugin declarations under
 * `plugins:`. Changes are persisted immediately.
 */
import { readFile, writeFile, mkdir, access } from 'node:fs/promises'
import { join, dirname } from 'node:path'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import { attempt, attemptSync, clone } from '@logosdx/utils'

import { observer } from '../observer.js'
import { ProjectFileError, ProjectValidationError } from './errors.js'
import { PluginEntrySchema, ProjectSchema, type PluginEntry, type PluginType, type ProjectData } from './schema.js'


/**
 * Default project file name.
 */
export const PROJECT_FILE_NAME = 'strata.yml'


/**
 * Validate raw project data.
 *
 * @throws ProjectValidationError if the data violates the schema
 */
export function parseProject(input: unknown): ProjectData {

    const result = ProjectSchema.safeParse(input ?? {})

    if (!result.success) {

        const firstIssue = result.error.issues[0]

        throw new ProjectValidationError(
            firstIssue?.message ?? 'Validation failed',
            firstIssue?.path.join('.') || 'unknown',
            result.error.issues,
        )
    }

    return result.data
}


/**
 * Validate one plugin entry.
 *
 * @throws ProjectValidationError if the entry violates the schema
 */
export function parsePluginEntry(input: unknown): PluginEntry {

    const result = PluginEntrySchema.safeParse(input)

    if (!result.success) {

        const firstIssue = result.error.issues[0]

        throw new ProjectValidationError(
            firstIssue?.message ?? 'Validation failed',
            firstIssue?.path.join('.') || 'unknown',
            result.error.issues,
        )
    }

    return result.data
}


/**
 * The project's YAML file.
 *
 * @example
 * ```typescript
 * const project = new ProjectFile('/srv/app')
 * await project.load()
 *
 * const extractor = project.getPlugin('extractors', 'tap-csv')
 * await project.update({ ...project.current, default_environment: 'dev' })
 * ```
 */
export class ProjectFile {

    #projectRoot: string
    #fileName: string
    #data: ProjectData = {}
    #loaded = false

    constructor(projectRoot: string, fileName = PROJECT_FILE_NAME) {

        this.#projectRoot = projectRoot
        this.#fileName = fileName
    }

    // ─────────────────────────────────────────────────────────────
    // Path Helpers
    // ─────────────────────────────────────────────────────────────

    get projectRoot(): string {

        return this.#projectRoot
    }

    /**
     * Full path to the project file.
     */
    get path(): string {

        return join(this.#projectRoot, this.#fileName)
    }

    get isLoaded(): boolean {

        return this.#loaded
    }

    // ─────────────────────────────────────────────────────────────
    // Loading / Saving
    // ─────────────────────────────────────────────────────────────

    /**
     * Check if the project file exists.
     */
    async exists(): Promise<boolean> {

        const [, err] = await attempt(() => access(this.path))

        return !err
    }

    /**
     * Load the project file from disk.
     *
     * A missing or empty file loads as an empty project.
     *
     * @throws ProjectFileError if the file cannot be read or parsed
     * @throws ProjectValidationError if the file violates the schema
     */
    async load(): Promise<ProjectData> {

        const fileExists = await this.exists()

        if (!fileExists) {

            this.#data = {}
            this.#loaded = true

            observer.emit('project:loaded', { path: this.path, fromFile: false })

            return this.current
        }

        const [content, readErr] = await attempt(() => readFile(this.path, 'utf-8'))

        if (readErr) {

            throw this.#fail(`Failed to read project file: ${readErr.message}`, readErr)
        }

        const [parsed, yamlErr] = attemptSync((): unknown => parseYaml(content))

        if (yamlErr) {

            throw this.#fail(`Invalid YAML in project file: ${yamlErr.message}`, yamlErr)
        }

        this.#data = parseProject(parsed)
        this.#loaded = true

        observer.emit('project:loaded', { path: this.path, fromFile: true })

        return this.current
    }

    /**
     * Save the current data to disk.
     *
     * Creates the parent directory if it doesn't exist.
     */
    async save(): Promise<void> {

        const [, mkdirErr] = await attempt(() => mkdir(dirname(this.path), { recursive: true }))

        if (mkdirErr) {

            throw this.#fail(`Failed to create project directory: ${mkdirErr.message}`, mkdirErr)
        }

        const yaml = stringifyYaml(this.#data, {
            indent: 2,
            lineWidth: 120,
        })

        const [, writeErr] = await attempt(() => writeFile(this.path, yaml, 'utf-8'))

        if (writeErr) {

            throw this.#fail(`Failed to write project file: ${writeErr.message}`, writeErr)
        }

        observer.emit('project:saved', { path: this.path })
    }

    // ─────────────────────────────────────────────────────────────
    // Accessors
    // ─────────────────────────────────────────────────────────────

    /**
     * Deep copy of the project data.
     */
    get current(): ProjectData {

        return clone(this.#data)
    }

    /**
     * Replace the whole project data and save.
     *
     * @throws ProjectValidationError if the data violates the schema
     */
    async update(data: Record<string, unknown>): Promise<void> {

        this.#data = parseProject(clone(data))
        this.#loaded = true

        await this.save()
    }

    /**
     * Find a plugin entry by type and name.
     */
    getPlugin(type: PluginType, name: string): PluginEntry | null {

        const entry = this.#data.plugins?.[type]?.find((plugin) => plugin.name === name)

        return entry ? clone(entry) : null
    }

    /**
     * Replace a plugin entry (or add it) and save.
     */
    async updatePlugin(type: PluginType, name: string, entry: PluginEntry): Promise<void> {

        const data = this.current
        const plugins = { ...data.plugins }
        const entries = [...(plugins[type] ?? [])]
        const index = entries.findIndex((plugin) => plugin.name === name)

        if (index === -1) {

            entries.push(entry)
        }
        else {

            entries[index] = entry
        }

        plugins[type] = entries

        await this.update({ ...data, plugins })
    }

    // ─────────────────────────────────────────────────────────────
    // Private Helpers
    // ─────────────────────────────────────────────────────────────

    #fail(message: string, cause: Error): ProjectFileError {

        const error = new ProjectFileError(message, this.path, cause)

        observer.emit('error', { source: 'project', error, context: { path: this.path } })

        return error
    }
}
