/**
 * Shared fixtures for settings tests.
 *
 * An in-memory capability set stands in for the project file and an
 * in-memory SQLite database backs the db store.
 */
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';

import { openSettingsDatabase, type SettingsConnection } from '../../../src/core/db/index.js';
import { SettingDefinition } from '../../../src/core/settings/definition.js';
import { SettingsService } from '../../../src/core/settings/service.js';
import type { SettingsCapabilities, SettingsServiceOptions } from '../../../src/core/settings/types.js';
import type { EnvMapping } from '../../../src/core/settings/utils.js';

/**
 * Catalog used by most service tests.
 */
export const TEST_CATALOG: readonly unknown[] = [
    { name: 'database_uri', value: 'sqlite:///.strata/strata.db' },
    { name: 'ui.bind_host', value: '0.0.0.0' },
    { name: 'ui.bind_port', kind: 'integer', value: 5000 },
    { name: 'ui.secret_key', sensitive: true },
    { name: 'ui.password_salt', kind: 'password' },
    { name: 'ui.server_name', aliases: ['ui.hostname'] },
    { name: 'send_anonymous_usage_stats', kind: 'boolean', value: true, env_aliases: ['!STRATA_DISABLE_TRACKING'] },
    { name: 'project_id', kind: 'hidden', value: 'test-project' },
    { name: 'greeting', value: 'hello $USER_NAME' },
    { name: 'tags', kind: 'array' },
    { name: 'ff', kind: 'object' },
    { name: '_endpoint', extra: true, value: 'http://$STRATA_UI_BIND_HOST:${STRATA_UI_BIND_PORT}' },
];

/**
 * Capability set backed by a plain object.
 */
export interface MemoryCapabilities extends SettingsCapabilities {
    config: Record<string, unknown>;
    saves: number;
}

type CapabilityOverrides = Partial<Pick<
    SettingsCapabilities,
    'label' | 'envPrefixes' | 'genericEnvPrefix' | 'dbNamespace' | 'processConfig'
>>;

/**
 * Build an in-memory capability set.
 */
export function memoryCapabilities(
    catalog: readonly unknown[] = TEST_CATALOG,
    config: Record<string, unknown> = {},
    overrides: CapabilityOverrides = {},
): MemoryCapabilities {

    const capabilities: MemoryCapabilities = {
        label: overrides.label ?? 'test',
        docsUrl: null,
        envPrefixes: overrides.envPrefixes ?? ['STRATA'],
        genericEnvPrefix: overrides.genericEnvPrefix ?? null,
        dbNamespace: overrides.dbNamespace ?? 'test',
        definitions: catalog.map((input) => SettingDefinition.parse(input)),
        config: structuredClone(config),
        saves: 0,
        yamlConfig: () => structuredClone(capabilities.config),
        updateYamlConfig: async (next) => {

            capabilities.config = structuredClone(next);
            capabilities.saves++;

        },
        processConfig: overrides.processConfig ?? ((resolved) => resolved),
    };

    return capabilities;

}

/**
 * A test context: capabilities, env, in-memory database, temp directory
 * for the `.env` file, and a service over all of them.
 */
export interface ServiceContext {
    tempDir: string;
    dotenvPath: string;
    env: EnvMapping;
    capabilities: MemoryCapabilities;
    connection: SettingsConnection;
    service: SettingsService;
    cleanup: () => Promise<void>;
}

export interface ServiceContextOptions extends Omit<SettingsServiceOptions, 'env' | 'db' | 'dotenvPath'> {
    catalog?: readonly unknown[];
    config?: Record<string, unknown>;
    env?: EnvMapping;
    overrides?: CapabilityOverrides;
}

/**
 * Creates a fresh service context.
 */
export async function createServiceContext(options: ServiceContextOptions = {}): Promise<ServiceContext> {

    const { catalog, config, env: givenEnv, overrides, ...serviceOptions } = options;

    const tempDir = mkdtempSync(join(process.cwd(), 'tmp', 'strata-settings-test-'));
    const dotenvPath = join(tempDir, '.env');
    const env: EnvMapping = { ...givenEnv };
    const capabilities = memoryCapabilities(catalog, config, overrides);
    const connection = await openSettingsDatabase('sqlite:///:memory:', tempDir);

    const service = new SettingsService(capabilities, {
        ...serviceOptions,
        env,
        db: connection.db,
        dotenvPath,
    });

    const cleanup = async () => {

        await connection.destroy();

        if (existsSync(tempDir)) {

            rmSync(tempDir, { recursive: true });

        }

    };

    return { tempDir, dotenvPath, env, capabilities, connection, service, cleanup };

}
