/**
 * strata
 *
 * Layered settings resolution across command-line overrides, the
 * environment, `.env`, the project file, the system database and
 * declared defaults.
 *
 * @example
 * ```typescript
 * import { openProject } from 'strata'
 *
 * const app = await openProject()
 * const [port, metadata] = await app.settings.getWithMetadata('ui.bind_port')
 * // metadata.source: 'env' | 'dotenv' | 'project_yml' | 'db' | 'default' | ...
 * await app.close()
 * ```
 */
export * from './core/index.js'
