import { describe, it, expect } from 'vitest';

import {
    ConfigOverrideStoreManager,
    DefaultStoreManager,
    SettingsService,
    StoreNotSupportedError,
} from '../../../../src/core/settings/index.js';
import { memoryCapabilities } from '../helpers.js';

describe('settings: read-only stores', () => {

    describe('ConfigOverrideStoreManager', () => {

        const service = new SettingsService(memoryCapabilities(), {
            env: {},
            configOverride: { 'ui.hostname': 'override.test', 'anon.key': 3 },
        });

        it('should be the manager of the config_override store', () => {

            expect(service.manager('config_override')).toBeInstanceOf(ConfigOverrideStoreManager);

        });

        it('should match overrides by any name of the setting', async () => {

            const setting = service.findSetting('ui.server_name');

            expect(await service.manager('config_override').get('ui.server_name', setting, {})).toEqual({
                value: 'override.test',
                metadata: { key: 'ui.hostname' },
            });

        });

        it('should match undeclared names literally', async () => {

            expect((await service.manager('config_override').get('anon.key', null, {})).value).toBe(3);

        });

        it('should be frozen on the service', () => {

            expect(Object.isFrozen(service.configOverride)).toBe(true);

        });

        it('should refuse writes', async () => {

            const manager = service.manager('config_override');

            await expect(manager.set('anon.key', ['anon', 'key'], 1, null)).rejects.toThrow(
                "Operation not supported by store 'config_override' (the command-line override): store is read-only",
            );
            await expect(manager.reset()).rejects.toBeInstanceOf(StoreNotSupportedError);

        });

    });

    describe('DefaultStoreManager', () => {

        const service = new SettingsService(memoryCapabilities(), { env: {} });

        it('should be the manager of the default store', () => {

            expect(service.manager('default')).toBeInstanceOf(DefaultStoreManager);

        });

        it('should return the declared default as expandable', async () => {

            const setting = service.findSetting('ui.bind_port');

            expect(await service.manager('default').get('ui.bind_port', setting, {})).toEqual({
                value: 5000,
                metadata: { expandable: true },
            });

        });

        it('should return nothing without a default', async () => {

            const setting = service.findSetting('ui.secret_key');

            expect(await service.manager('default').get('ui.secret_key', setting, {})).toEqual({
                value: undefined,
                metadata: {},
            });
            expect(await service.manager('default').get('anon', null, {})).toEqual({
                value: undefined,
                metadata: {},
            });

        });

        it('should refuse writes', async () => {

            await expect(service.manager('default').unset('ui.bind_port', ['ui', 'bind_port'], null))
                .rejects.toBeInstanceOf(StoreNotSupportedError);

        });

    });

});
