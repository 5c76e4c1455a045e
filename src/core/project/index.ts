/**
 * Project Module
 *
 * The project file and the entry point that wires a project's settings.
 */

// Schemas
export {
    PLUGIN_TYPES,
    PluginTypeSchema,
    PluginEntrySchema,
    PluginsSchema,
    ProjectSchema,
    type PluginType,
    type PluginEntry,
    type ProjectData,
} from './schema.js'

// Errors
export { ProjectFileError, ProjectValidationError } from './errors.js'

// File
export { ProjectFile, PROJECT_FILE_NAME, parseProject, parsePluginEntry } from './file.js'

// Open
export { openProject, type OpenProjectOptions, type OpenProject } from './open.js'
