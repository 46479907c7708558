import { describe, it, expect } from 'vitest';
import {
    ConfigurationFrozenError,
    ConfigurationStore,
    HostSettingsError,
    SettingsMerger,
    envKeyFor,
} from '../compose/settings.js';
import { checkSettingValue, coerceSettingString } from '../plugins/setting-types.js';
import type { SettingValue } from '../plugins/types.js';
import { appPlugin, group, makeHost } from './helpers.js';

const plugin = appPlugin('billing', [group('v1')], {
    RETRIES: { type: 'integer', default: 2 },
    TIMEOUT: { type: 'integer' },
    WEBHOOK_URL: { type: 'string' },
    'billing.currency': { type: 'string', default: 'EUR' },
});

function merger(env: Record<string, string | undefined> = {}, globalDefaults: Record<string, SettingValue> = {}, envPrefix?: string) {
    const store = new ConfigurationStore();
    return { store, merger: new SettingsMerger(store, { env, envPrefix, globalDefaults }) };
}

describe('envKeyFor', () => {
    it('should upper-case the key and replace separators', () => {
        expect(envKeyFor('billing.currency')).toBe('BILLING_CURRENCY');
        expect(envKeyFor('RETRIES', 'APP_')).toBe('APP_RETRIES');
    });
});

describe('SettingsMerger', () => {
    it('should prefer an override, then the plugin default, then the global default', () => {
        const { store, merger: m } = merger({ RETRIES: '5' }, { RETRIES: 9, TIMEOUT: 30 });

        expect(m.apply(plugin, 'RETRIES')).toBeNull();
        expect(m.apply(plugin, 'TIMEOUT')).toBeNull();
        expect(m.apply(plugin, 'WEBHOOK_URL')).toBeNull();

        expect(store.entry('RETRIES')).toEqual({ key: 'RETRIES', owner: 'billing', type: 'integer', value: 5, source: 'override' });
        expect(store.entry('TIMEOUT')).toEqual({ key: 'TIMEOUT', owner: 'billing', type: 'integer', value: 30, source: 'global' });
        expect(store.entry('WEBHOOK_URL')).toEqual({
            key: 'WEBHOOK_URL', owner: 'billing', type: 'string', value: undefined, source: 'unset',
        });
    });

    it('should resolve 3 with an override and 2 once the override is removed', () => {
        const owned = appPlugin('billing', [group('v1')], { X: { type: 'integer', default: 2 } });

        const withOverride = merger({ X: '3' }, { X: 1 });
        withOverride.merger.apply(owned, 'X');
        expect(withOverride.store.get('X')).toBe(3);

        const without = merger({}, { X: 1 });
        without.merger.apply(owned, 'X');
        expect(without.store.get('X')).toBe(2);
    });

    it('should fall back to the plugin default without an override', () => {
        const { store, merger: m } = merger({}, { RETRIES: 9 });
        m.apply(plugin, 'RETRIES');
        expect(store.get('RETRIES')).toBe(2);
        expect(store.entry('RETRIES')?.source).toBe('plugin');
    });

    it('should read overrides through the derived variable name and prefix', () => {
        const { store, merger: m } = merger({ APP_BILLING_CURRENCY: 'USD' }, {}, 'APP_');
        m.apply(plugin, 'billing.currency');
        expect(store.get('billing.currency')).toBe('USD');
    });

    it('should return a SettingsTypeError for an override of the wrong type', () => {
        const { store, merger: m } = merger({ RETRIES: 'lots' });

        expect(m.apply(plugin, 'RETRIES')).toEqual({
            code: 'SettingsTypeError',
            plugin: 'billing',
            message: 'setting "RETRIES": override RETRIES: expected integer, got "lots"',
        });
        expect(store.has('RETRIES')).toBe(false);
    });

    it('should throw for a bad override of a host setting', () => {
        const host = makeHost({ settings: { MAINTENANCE: { type: 'boolean', default: false } } });
        const { merger: m } = merger({ MAINTENANCE: 'sometimes' });
        expect(() => m.seedHost(host)).toThrow(HostSettingsError);
    });

    it('should seed host settings under the host owner', () => {
        const host = makeHost({ settings: { MAINTENANCE: { type: 'boolean', default: false } } });
        const { store, merger: m } = merger({ MAINTENANCE: 'yes' });
        m.seedHost(host);
        expect(store.entry('MAINTENANCE')).toEqual({
            key: 'MAINTENANCE', owner: '<host>', type: 'boolean', value: true, source: 'override',
        });
    });

    it('should discard a plugin\'s keys on rollback', () => {
        const { store, merger: m } = merger();
        m.apply(plugin, 'RETRIES');
        m.apply(plugin, 'billing.currency');

        expect(m.rollback('billing')).toEqual(['RETRIES', 'billing.currency']);
        expect(store.entries()).toEqual([]);
    });
});

describe('ConfigurationStore', () => {
    it('should refuse writes once frozen', () => {
        const store = new ConfigurationStore();
        store.define({ key: 'A', owner: 'alpha', type: 'string', value: 'x', source: 'plugin' });
        store.freeze();

        expect(store.isFrozen).toBe(true);
        expect(() => store.define({ key: 'B', owner: 'alpha', type: 'string', value: 'y', source: 'plugin' }))
            .toThrow(ConfigurationFrozenError);
        expect(() => store.discard('alpha')).toThrow(ConfigurationFrozenError);
        expect(store.toJSON()).toEqual({ A: 'x' });
    });
});

describe('coerceSettingString', () => {
    it('should coerce environment strings into declared types', () => {
        expect(coerceSettingString('boolean', 'yes')).toEqual({ ok: true, value: true });
        expect(coerceSettingString('boolean', '0')).toEqual({ ok: true, value: false });
        expect(coerceSettingString('number', '2.5')).toEqual({ ok: true, value: 2.5 });
        expect(coerceSettingString('list', 'eu, us,')).toEqual({ ok: true, value: ['eu', 'us'] });
        expect(coerceSettingString('list', '["eu","us"]')).toEqual({ ok: true, value: ['eu', 'us'] });
        expect(coerceSettingString('json', '{"retries":3}')).toEqual({ ok: true, value: { retries: 3 } });
    });

    it('should accept the same integer range for defaults and overrides', () => {
        expect(checkSettingValue('integer', Number.MAX_SAFE_INTEGER)).toEqual({ ok: true, value: Number.MAX_SAFE_INTEGER });
        expect(checkSettingValue('integer', 2 ** 60).ok).toBe(false);
        expect(coerceSettingString('integer', String(2 ** 60)).ok).toBe(false);
    });

    it('should reject strings that do not fit', () => {
        expect(coerceSettingString('integer', '2.5')).toEqual({ ok: false, reason: 'expected integer, got "2.5"' });
        expect(coerceSettingString('json', '{oops')).toEqual({ ok: false, reason: 'expected json, got "{oops"' });
    });
});
