import { describe, it, expect } from 'vitest';
import { PluginRegistry, RegistryError } from '../plugins/registry.js';
import { MemorySource, billingManifest, brokenManifest, candidate } from './helpers.js';

const appManifest = (version = '1.0.0') => ({ version, app: { routerGroups: ['v1'] } });

describe('PluginRegistry', () => {
    it('should register plugins in scan order and keep failed ones', async () => {
        const source = new MemorySource([
            candidate('billing', billingManifest, ['v1', 'v2']),
            candidate('broken', brokenManifest, ['v1']),
        ]);
        const registry = new PluginRegistry(source);

        const entries = await registry.load();

        expect(entries.map((e) => [e.name, e.status])).toEqual([['billing', 'ready'], ['broken', 'failed']]);
        const broken = registry.get('broken');
        expect(broken?.status).toBe('failed');
        expect(broken?.history).toEqual([
            { code: 'MalformedManifest', plugin: 'broken', message: 'version: version is required' },
        ]);
        expect(registry.enabledDescriptors().map((d) => d.name)).toEqual(['billing']);
    });

    it('should reject a duplicate name from another directory', async () => {
        const source = new MemorySource([
            candidate('billing', appManifest(), ['v1'], '/plugins/billing'),
            candidate('billing', appManifest('2.0.0'), ['v1'], '/vendor/billing'),
        ]);
        const registry = new PluginRegistry(source);
        await registry.load();

        expect(registry.size).toBe(1);
        expect(registry.get('billing')?.dir).toBe('/plugins/billing');
        const rejected = registry.rejected();
        expect(rejected).toHaveLength(1);
        expect(rejected[0].outcome).toEqual({
            ok: false,
            error: {
                code: 'DuplicateName',
                plugin: 'billing',
                message: 'plugin "billing" at /vendor/billing duplicates the one at /plugins/billing',
            },
        });
    });

    it('should report added, removed and modified plugins on reload', async () => {
        const source = new MemorySource([
            candidate('alpha', appManifest(), ['v1']),
            candidate('beta', appManifest(), ['v1']),
        ]);
        const registry = new PluginRegistry(source);
        await registry.load();

        source.candidates = [
            candidate('beta', appManifest('1.1.0'), ['v1']),
            candidate('gamma', appManifest(), ['v1']),
        ];
        const changes = await registry.reload();

        expect(changes).toEqual([
            { type: 'added', name: 'gamma' },
            { type: 'removed', name: 'alpha' },
            { type: 'modified', name: 'beta' },
        ]);
        expect(registry.list().map((e) => e.name)).toEqual(['beta', 'gamma']);
    });

    it('should report no changes when nothing moved', async () => {
        const registry = new PluginRegistry(new MemorySource([candidate('alpha', appManifest(), ['v1'])]));
        await registry.load();
        expect(await registry.reload()).toEqual([]);
    });

    it('should carry the enabled state across reloads', async () => {
        const registry = new PluginRegistry(new MemorySource([candidate('alpha', appManifest(), ['v1'])]));
        await registry.load();

        expect(registry.setEnabled('alpha', false)).toBe(true);
        expect(registry.setEnabled('alpha', false)).toBe(false);
        await registry.reload();

        expect(registry.get('alpha')?.enabled).toBe(false);
        expect(registry.enabledDescriptors()).toEqual([]);
    });

    it('should start plugins listed as disabled switched off', async () => {
        const registry = new PluginRegistry(
            new MemorySource([candidate('alpha', appManifest(), ['v1'])]),
            { disabled: ['alpha'] }
        );
        await registry.load();
        expect(registry.get('alpha')?.enabled).toBe(false);
    });

    it('should throw for an unknown plugin', async () => {
        const registry = new PluginRegistry(new MemorySource([]));
        await registry.load();
        expect(() => registry.setEnabled('ghost', true)).toThrow(RegistryError);
        expect(() => registry.setEnabled('ghost', true)).toThrow('Unknown plugin "ghost"');
    });

    it('should keep each distinct failure once in the history', async () => {
        const registry = new PluginRegistry(new MemorySource([candidate('broken', brokenManifest, ['v1'])]));
        await registry.load();
        await registry.reload();
        registry.recordFailure({ code: 'MountFailure', plugin: 'broken', message: 'boom' });
        registry.recordFailure({ code: 'MountFailure', plugin: 'broken', message: 'boom' });

        expect(registry.get('broken')?.history.map((h) => h.code)).toEqual(['MalformedManifest', 'MountFailure']);
    });
});
