import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';

import {
    SettingsService,
    SettingMissingError,
    SettingValueError,
    StoreNotSupportedError,
    REDACTED_VALUE,
} from '../../../src/core/settings/index.js';
import { observer } from '../../../src/core/observer.js';
import { createServiceContext, type ServiceContext } from './helpers.js';

describe('settings: SettingsService', () => {

    let ctx: ServiceContext;

    afterEach(async () => {

        await ctx.cleanup();

    });

    describe('precedence', () => {

        beforeEach(async () => {

            ctx = await createServiceContext();

        });

        it('should fall back to the declared default', async () => {

            const [value, metadata] = await ctx.service.getWithMetadata('ui.bind_port');

            expect(value).toBe(5000);
            expect(metadata.source).toBe('default');
            expect(metadata.uncastValue).toBeUndefined();

        });

        it('should let each store override the ones below it', async () => {

            const { service, env } = ctx;

            await service.set('ui.bind_port', 6000, 'db');
            expect(await service.getWithSource('ui.bind_port')).toEqual([6000, 'db']);

            await service.set(['ui', 'bind_port'], '7000', 'project_yml');
            expect(await service.getWithSource('ui.bind_port')).toEqual([7000, 'project_yml']);

            await service.set('ui.bind_port', 7500, 'dotenv');
            expect(await service.getWithSource('ui.bind_port')).toEqual([7500, 'dotenv']);

            env['STRATA_UI_BIND_PORT'] = '8000';
            expect(await service.getWithSource('ui.bind_port')).toEqual([8000, 'env']);

        });

        it('should record the uncast value when casting changes it', async () => {

            ctx.env['STRATA_UI_BIND_PORT'] = '8080';

            const [value, metadata] = await ctx.service.getWithMetadata('ui.bind_port');

            expect(value).toBe(8080);
            expect(metadata.source).toBe('env');
            expect(metadata.envVar).toBe('STRATA_UI_BIND_PORT');
            expect(metadata.uncastValue).toBe('8080');

        });

        it('should not record an uncast value for values already of the right kind', async () => {

            await ctx.service.set(['ui', 'bind_port'], 6000, 'project_yml');

            const [value, metadata] = await ctx.service.getWithMetadata('ui.bind_port');

            expect(value).toBe(6000);
            expect(metadata).not.toHaveProperty('uncastValue');

        });

        it('should reject values that cannot be cast', async () => {

            ctx.env['STRATA_UI_BIND_PORT'] = 'abc';

            await expect(ctx.service.get('ui.bind_port')).rejects.toBeInstanceOf(SettingValueError);

        });

        it('should read a negated env alias as the inverted boolean', async () => {

            ctx.env['STRATA_DISABLE_TRACKING'] = '1';

            const [value, metadata] = await ctx.service.getWithMetadata('send_anonymous_usage_stats');

            expect(value).toBe(false);
            expect(metadata.source).toBe('env');
            expect(metadata.envVar).toBe('STRATA_DISABLE_TRACKING');

        });

        it('should report conflicting env vars and use the first one', async () => {

            ctx.env['STRATA_SEND_ANONYMOUS_USAGE_STATS'] = 'true';
            ctx.env['STRATA_DISABLE_TRACKING'] = '1';

            const conflicts: { name: string; envVars: string[]; used: string }[] = [];
            const cleanup = observer.on('settings:env-conflict', (data) => {

                conflicts.push(data);

            });

            try {

                expect(await ctx.service.get('send_anonymous_usage_stats')).toBe(true);
                expect(conflicts).toEqual([{
                    name: 'send_anonymous_usage_stats',
                    envVars: ['STRATA_SEND_ANONYMOUS_USAGE_STATS', 'STRATA_DISABLE_TRACKING'],
                    used: 'STRATA_SEND_ANONYMOUS_USAGE_STATS',
                }]);

            }
            finally {

                cleanup();

            }

        });

        it('should read a value stored under an alias', async () => {

            await ctx.cleanup();
            ctx = await createServiceContext({ config: { ui: { hostname: 'legacy.test' } } });

            const [value, metadata] = await ctx.service.getWithMetadata('ui.server_name');

            expect(value).toBe('legacy.test');
            expect(metadata.source).toBe('project_yml');
            expect(metadata.key).toBe('ui.hostname');

        });

        it('should read from one store when a source is given', async () => {

            ctx.env['STRATA_UI_BIND_PORT'] = '8080';

            expect(await ctx.service.getWithSource('ui.bind_port', { source: 'db' })).toEqual([undefined, 'db']);
            expect(await ctx.service.getWithSource('ui.bind_port', { source: 'default' })).toEqual([5000, 'default']);

        });

        it('should propagate an unsupported explicit store', async () => {

            await expect(ctx.service.get('not.declared', { source: 'env' })).rejects.toBeInstanceOf(StoreNotSupportedError);

        });

    });

    describe('overrides', () => {

        it('should give config overrides the highest precedence', async () => {

            ctx = await createServiceContext({
                env: { STRATA_UI_BIND_PORT: '8080' },
                configOverride: { 'ui.bind_port': 9000 },
            });

            const [value, metadata] = await ctx.service.getWithMetadata('ui.bind_port');

            expect(value).toBe(9000);
            expect(metadata.source).toBe('config_override');
            expect(metadata.key).toBe('ui.bind_port');

        });

        it('should layer env overrides over the base env', async () => {

            ctx = await createServiceContext({
                env: { STRATA_UI_BIND_HOST: '127.0.0.1' },
                envOverride: { STRATA_UI_BIND_HOST: 'override.test' },
            });

            expect(await ctx.service.getWithSource('ui.bind_host')).toEqual(['override.test', 'env']);

        });

    });

    describe('undeclared settings', () => {

        beforeEach(async () => {

            ctx = await createServiceContext();

        });

        it('should resolve to nothing without throwing', async () => {

            const [value, metadata] = await ctx.service.getWithMetadata('not.declared');

            expect(value).toBeUndefined();
            expect(metadata.source).toBe('default');
            expect(metadata.setting).toBeNull();

        });

        it('should resolve from the db without casting', async () => {

            await ctx.service.set('anon.count', '42', 'db');

            const [value, metadata] = await ctx.service.getWithMetadata('anon.count');

            expect(value).toBe('42');
            expect(metadata.source).toBe('db');
            expect(metadata.uncastValue).toBeUndefined();

        });

        it('should not be writable to the env store', async () => {

            await expect(ctx.service.set('anon.count', '42', 'env')).rejects.toBeInstanceOf(StoreNotSupportedError);

        });

        it('should throw SettingMissingError from findSetting', () => {

            expect(() => ctx.service.findSetting('not.declared')).toThrow(SettingMissingError);

        });

    });

    describe('redaction', () => {

        beforeEach(async () => {

            ctx = await createServiceContext({
                env: {
                    STRATA_UI_SECRET_KEY: 'test-secret',
                    STRATA_UI_PASSWORD_SALT: 'test-salt',
                },
            });

        });

        it('should redact sensitive values on request', async () => {

            const [value, metadata] = await ctx.service.getWithMetadata('ui.secret_key', { redacted: true });

            expect(value).toBe(REDACTED_VALUE);
            expect(metadata.redacted).toBe(true);
            expect(metadata.source).toBe('env');

        });

        it('should redact password kinds', async () => {

            expect(await ctx.service.get('ui.password_salt', { redacted: true })).toBe(REDACTED_VALUE);

        });

        it('should return real values when redaction is not requested', async () => {

            const [value, metadata] = await ctx.service.getWithMetadata('ui.secret_key');

            expect(value).toBe('test-secret');
            expect(metadata.redacted).toBeUndefined();

        });

        it('should redact after casting and keep the uncast input', async () => {

            await ctx.cleanup();
            ctx = await createServiceContext({
                catalog: [{ name: 'ui.pin', kind: 'integer', sensitive: true }],
                env: { STRATA_UI_PIN: '123' },
            });

            const [redactedValue, redactedMetadata] = await ctx.service.getWithMetadata('ui.pin', { redacted: true });

            expect(redactedValue).toBe(REDACTED_VALUE);
            expect(redactedMetadata.redacted).toBe(true);
            expect(redactedMetadata.uncastValue).toBe('123');

            const [value, metadata] = await ctx.service.getWithMetadata('ui.pin');

            expect(value).toBe(123);
            expect(metadata.uncastValue).toBe('123');
            expect(metadata.redacted).toBeUndefined();

        });

        it('should leave absent sensitive values alone', async () => {

            delete ctx.env['STRATA_UI_SECRET_KEY'];

            const [value, metadata] = await ctx.service.getWithMetadata('ui.secret_key', { redacted: true });

            expect(value).toBeUndefined();
            expect(metadata.redacted).toBeUndefined();

        });

        it('should ignore writes of the redaction placeholder', async () => {

            const [value, metadata] = await ctx.service.setWithMetadata('ui.secret_key', REDACTED_VALUE, 'db');

            expect(value).toBeNull();
            expect(metadata.redacted).toBe(true);
            expect(await ctx.service.getWithSource('ui.secret_key', { source: 'db' })).toEqual([undefined, 'db']);

        });

        it('should drop placeholders with unredact', () => {

            expect(SettingsService.unredact({ a: REDACTED_VALUE, b: 1 })).toEqual({ b: 1 });

        });

    });

    describe('writes', () => {

        beforeEach(async () => {

            ctx = await createServiceContext();

        });

        it('should cast before writing and report the uncast value', async () => {

            const [value, metadata] = await ctx.service.setWithMetadata(['ui', 'bind_port'], '7000', 'project_yml');

            expect(value).toBe(7000);
            expect(metadata.uncastValue).toBe('7000');
            expect(metadata.path).toEqual(['ui', 'bind_port']);
            expect(ctx.capabilities.config).toEqual({ ui: { bind_port: 7000 } });

        });

        it('should write an alias under the canonical name', async () => {

            const [, metadata] = await ctx.service.setWithMetadata('ui.hostname', 'example.test', 'project_yml');

            expect(metadata.name).toBe('ui.server_name');
            expect(ctx.capabilities.config).toEqual({ ui: { server_name: 'example.test' } });
            expect(await ctx.service.get('ui.hostname')).toBe('example.test');

        });

        it('should refuse writes through auto', async () => {

            await expect(ctx.service.set('ui.bind_port', 1, 'auto')).rejects.toBeInstanceOf(StoreNotSupportedError);

        });

        it('should write env values into the base env', async () => {

            const [, metadata] = await ctx.service.setWithMetadata('ui.bind_port', 8080, 'env');

            expect(metadata.envVar).toBe('STRATA_UI_BIND_PORT');
            expect(ctx.env['STRATA_UI_BIND_PORT']).toBe('8080');

        });

        it('should write dotenv values to the file', async () => {

            await ctx.service.set('ui.bind_host', 'local host', 'dotenv');

            expect(readFileSync(ctx.dotenvPath, 'utf-8')).toBe("STRATA_UI_BIND_HOST='local host'\n");
            expect(await ctx.service.getWithSource('ui.bind_host')).toEqual(['local host', 'dotenv']);

        });

        it('should unset a value and prune empty parents', async () => {

            await ctx.service.set(['ui', 'bind_port'], 7000, 'project_yml');
            await ctx.service.unset(['ui', 'bind_port'], 'project_yml');

            expect(ctx.capabilities.config).toEqual({});
            expect(await ctx.service.getWithSource('ui.bind_port')).toEqual([5000, 'default']);

        });

        it('should unset db values', async () => {

            await ctx.service.set('ui.bind_port', 6000, 'db');
            await ctx.service.unset('ui.bind_port', 'db');

            expect(await ctx.service.getWithSource('ui.bind_port')).toEqual([5000, 'default']);

        });

        it('should emit setting:set after a write', async () => {

            const events: { name: string; namespace: string; store: string }[] = [];
            const cleanup = observer.on('setting:set', (data) => {

                events.push(data);

            });

            try {

                await ctx.service.set('ui.bind_port', 6000, 'db');

                expect(events).toEqual([{ name: 'ui.bind_port', namespace: 'test', store: 'db' }]);

            }
            finally {

                cleanup();

            }

        });

    });

    describe('reset', () => {

        beforeEach(async () => {

            ctx = await createServiceContext();

        });

        it('should empty the project file config', async () => {

            await ctx.service.set(['ui', 'bind_port'], 7000, 'project_yml');
            await ctx.service.set('greeting', 'hi', 'project_yml');

            const metadata = await ctx.service.reset('project_yml');

            expect(metadata).toEqual({ store: 'project_yml' });
            expect(ctx.capabilities.config).toEqual({});

        });

        it('should delete every db row of the namespace', async () => {

            await ctx.service.set('ui.bind_port', 6000, 'db');
            await ctx.service.set('greeting', 'hi', 'db');
            await ctx.service.reset('db');

            expect(await ctx.service.get('ui.bind_port', { source: 'db' })).toBeUndefined();
            expect(await ctx.service.get('greeting', { source: 'db' })).toBeUndefined();

        });

        it('should delete the .env file', async () => {

            await ctx.service.set('ui.bind_host', 'localhost', 'dotenv');
            await ctx.service.reset('dotenv');

            expect(existsSync(ctx.dotenvPath)).toBe(false);

        });

        it('should refuse to reset the environment', async () => {

            await expect(ctx.service.reset('env')).rejects.toBeInstanceOf(StoreNotSupportedError);

        });

        it('should refuse to reset defaults', async () => {

            await expect(ctx.service.reset('default')).rejects.toBeInstanceOf(StoreNotSupportedError);

        });

    });

    describe('read-only', () => {

        beforeEach(async () => {

            ctx = await createServiceContext({ readonly: true });

        });

        it('should reject writes to every writable store', async () => {

            await expect(ctx.service.set('ui.bind_port', 1, 'db')).rejects.toBeInstanceOf(StoreNotSupportedError);
            await expect(ctx.service.set('ui.bind_port', 1, 'project_yml')).rejects.toBeInstanceOf(StoreNotSupportedError);
            await expect(ctx.service.set('ui.bind_port', 1, 'dotenv')).rejects.toBeInstanceOf(StoreNotSupportedError);
            await expect(ctx.service.set('ui.bind_port', 1, 'env')).rejects.toBeInstanceOf(StoreNotSupportedError);

        });

        it('should still read', async () => {

            expect(await ctx.service.get('ui.bind_port')).toBe(5000);

        });

    });

    describe('definitions', () => {

        it('should include hidden settings unless told otherwise', async () => {

            ctx = await createServiceContext();

            const names = ctx.service.definitions().map((def) => def.name);

            expect(names).toContain('project_id');

            await ctx.cleanup();
            ctx = await createServiceContext({ showHidden: false });

            expect(ctx.service.definitions().map((def) => def.name)).not.toContain('project_id');

        });

        it('should synthesize definitions for undeclared config keys', async () => {

            ctx = await createServiceContext({ config: { custom: { nested: 'x' }, ui: { bind_port: 6000 } } });

            const custom = ctx.service.findSetting('custom.nested');

            expect(custom.isCustom).toBe(true);
            expect(custom.kind).toBe('string');
            expect(ctx.service.definitions()).toHaveLength(13);

        });

        it('should split extras from regular settings', async () => {

            ctx = await createServiceContext({ config: { _custom_extra: 1 } });

            expect(ctx.service.definitions(true).map((def) => def.name)).toEqual(['_endpoint', '_custom_extra']);
            expect(ctx.service.definitions(false).map((def) => def.name)).not.toContain('_endpoint');

        });

        it('should serve a stale catalog until invalidated', async () => {

            ctx = await createServiceContext();
            ctx.service.definitions();

            ctx.capabilities.config = { brand_new: true };

            expect(() => ctx.service.findSetting('brand_new')).toThrow(SettingMissingError);

            ctx.service.invalidateDefinitions();

            expect(ctx.service.findSetting('brand_new').kind).toBe('boolean');

        });

        it('should invalidate the catalog after a write', async () => {

            ctx = await createServiceContext();
            ctx.service.definitions();

            await ctx.service.set('another_key', 'x', 'project_yml');

            expect(ctx.service.findSetting('another_key').isCustom).toBe(true);

        });

        it('should name the primary env var', async () => {

            ctx = await createServiceContext();

            expect(ctx.service.settingEnv(ctx.service.findSetting('ui.bind_port'))).toBe('STRATA_UI_BIND_PORT');

        });

    });

    describe('expansion', () => {

        beforeEach(async () => {

            ctx = await createServiceContext({ env: { USER_NAME: 'ada' } });

        });

        it('should expand references in defaults', async () => {

            expect(await ctx.service.get('greeting')).toBe('hello ada');

        });

        it('should expand references in db values', async () => {

            await ctx.service.set('greeting', '$USER_NAME-db', 'db');

            expect(await ctx.service.get('greeting')).toBe('ada-db');

        });

        it('should keep env values verbatim', async () => {

            ctx.env['STRATA_GREETING'] = '$USER_NAME';

            expect(await ctx.service.get('greeting')).toBe('$USER_NAME');

        });

        it('should expand extras against the env projection of regular settings', async () => {

            ctx.env['STRATA_UI_BIND_PORT'] = '8080';

            expect(await ctx.service.get('_endpoint')).toBe('http://0.0.0.0:8080');

        });

    });

    describe('object settings', () => {

        it('should assemble an object from its nested keys', async () => {

            ctx = await createServiceContext({
                config: { ff: { strict_env_var_mode: true, plugin_locks: false } },
            });

            const [value, metadata] = await ctx.service.getWithMetadata('ff');

            expect(value).toEqual({ strict_env_var_mode: true, plugin_locks: false });
            expect(metadata.source).toBe('project_yml');

        });

        it('should promote the source of the object to its most specific part', async () => {

            ctx = await createServiceContext({
                config: { ff: { strict_env_var_mode: true, plugin_locks: false } },
                env: { STRATA_FF_PLUGIN_LOCKS: 'true' },
            });

            const [value, metadata] = await ctx.service.getWithMetadata('ff');

            expect(value).toEqual({ strict_env_var_mode: true, plugin_locks: true });
            expect(metadata.source).toBe('env');

        });

        it('should stay empty when nothing nests under it', async () => {

            ctx = await createServiceContext();

            expect(await ctx.service.getWithSource('ff')).toEqual([undefined, 'default']);

        });

        it('should prefer a whole object stored in one store', async () => {

            ctx = await createServiceContext();

            await ctx.service.set('ff', '{"strict_env_var_mode":false}', 'db');

            expect(await ctx.service.getWithSource('ff')).toEqual([{ strict_env_var_mode: false }, 'db']);

        });

    });

    describe('projections', () => {

        beforeEach(async () => {

            ctx = await createServiceContext({
                env: { STRATA_UI_BIND_PORT: '8080' },
                config: { ui: { bind_host: '127.0.0.1' } },
            });

        });

        it('should resolve every setting with metadata', async () => {

            const config = await ctx.service.configWithMetadata();

            expect(config['ui.bind_port']?.value).toBe(8080);
            expect(config['ui.bind_port']?.source).toBe('env');
            expect(config['ui.bind_host']?.source).toBe('project_yml');
            expect(config['database_uri']?.source).toBe('default');

        });

        it('should switch a passed manager to bulk mode', async () => {

            const manager = ctx.service.manager('auto');

            expect(manager.bulk).toBe(false);

            await ctx.service.configWithMetadata({ sourceManager: manager });

            expect(manager.bulk).toBe(true);

        });

        it('should strip the prefix from keys', async () => {

            expect(await ctx.service.asDict({ prefix: 'ui.' })).toEqual({
                bind_host: '127.0.0.1',
                bind_port: 8080,
            });

        });

        it('should return only extras when asked', async () => {

            expect(await ctx.service.asDict({ extras: true })).toEqual({
                _endpoint: 'http://127.0.0.1:8080',
            });

        });

        it('should project values onto env vars', async () => {

            expect(await ctx.service.asEnv()).toEqual({
                STRATA_DATABASE_URI: 'sqlite:///.strata/strata.db',
                STRATA_UI_BIND_HOST: '127.0.0.1',
                STRATA_UI_BIND_PORT: '8080',
                STRATA_SEND_ANONYMOUS_USAGE_STATS: 'true',
                STRATA_PROJECT_ID: 'test-project',
                STRATA_GREETING: 'hello ',
                STRATA_ENDPOINT: 'http://127.0.0.1:8080',
            });

        });

        it('should project redacted values as the placeholder', async () => {

            ctx.env['STRATA_UI_SECRET_KEY'] = 'test-secret';

            const env = await ctx.service.asEnv({ redacted: true });

            expect(env['STRATA_UI_SECRET_KEY']).toBe(REDACTED_VALUE);

        });

        it('should run processConfig when asked', async () => {

            await ctx.cleanup();
            ctx = await createServiceContext({
                overrides: { processConfig: (config) => ({ count: Object.keys(config).length }) },
            });

            expect(await ctx.service.asDict({ process: true, prefix: 'ui.' })).toEqual({ count: 5 });

        });

    });

});
