/**
 * Setting catalogs.
 *
 * A catalog is a YAML document with a top-level `settings:` list. The
 * project catalog ships with the package; plugins declare theirs inline.
 */
import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { parse as parseYaml } from 'yaml'
import { attempt, attemptSync } from '@logosdx/utils'

import { SettingDefinition } from './definition.js'
import { parseSettingCatalog } from './schema.js'


/**
 * Location of the bundled project settings catalog.
 */
export const PROJECT_CATALOG_PATH = fileURLToPath(new URL('../../../catalog/project-settings.yml', import.meta.url))


/**
 * Build definitions from raw catalog data.
 *
 * @throws SettingDefinitionValidationError if an entry is invalid
 */
export function buildSettingCatalog(input: unknown): SettingDefinition[] {

    return parseSettingCatalog(input).map((data) => new SettingDefinition(data))
}


/**
 * Load a catalog file.
 *
 * @example
 * ```typescript
 * const catalog = await loadSettingCatalog(PROJECT_CATALOG_PATH)
 * catalog.find((def) => def.name === 'database_uri')?.value
 * // 'sqlite:///.strata/strata.db'
 * ```
 */
export async function loadSettingCatalog(path: string = PROJECT_CATALOG_PATH): Promise<SettingDefinition[]> {

    const [content, readErr] = await attempt(() => readFile(path, 'utf-8'))

    if (readErr) {

        throw new Error(`Failed to read setting catalog ${path}: ${readErr.message}`)
    }

    const [parsed, yamlErr] = attemptSync((): unknown => parseYaml(content))

    if (yamlErr) {

        throw new Error(`Invalid YAML in setting catalog ${path}: ${yamlErr.message}`)
    }

    return buildSettingCatalog(parsed)
}
