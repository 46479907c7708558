import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { DirectoryPluginSource } from '../plugins/discovery.js';
import { scanLayout, findManifest } from '../plugins/layout.js';

let root: string;

async function put(relative: string, content = ''): Promise<void> {
    const file = path.join(root, relative);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, content, 'utf-8');
}

beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'plugmount-discovery-'));
});

afterEach(async () => {
    await rm(root, { recursive: true, force: true });
});

describe('scanLayout', () => {
    it('should list standard folders and route groups under api/', async () => {
        await put('billing/api/v1/routes.ts');
        await put('billing/api/v2.ts');
        await put('billing/api/__init__.py');
        await put('billing/api/.DS_Store');
        await put('billing/model/invoice.ts');

        const layout = await scanLayout(path.join(root, 'billing'));

        expect(layout.folders).toEqual(['api', 'model']);
        expect(layout.routeGroups).toEqual(['v1', 'v2']);
        expect(layout.entryPoints).toEqual({ v1: path.join('api', 'v1'), v2: path.join('api', 'v2.ts') });
    });

    it('should find plugin.json before plugin.yaml', async () => {
        await put('billing/plugin.yaml', 'version: 1.0.0');
        await put('billing/plugin.json', '{}');

        const found = await findManifest(path.join(root, 'billing'));
        expect(found?.file).toBe('plugin.json');
    });
});

describe('DirectoryPluginSource', () => {
    it('should parse app-level plugins before extensions and return scan order', async () => {
        // "audit" sorts before the "billing" namespace it extends
        await put('plugins/audit/plugin.yaml', [
            'version: 0.1.0',
            'extends:',
            '  target: billing',
            '  routeGroups:',
            '    - { name: v1, prefix: /audit, tag: audit }',
        ].join('\n'));
        await put('plugins/audit/api/v1.ts');
        await put('plugins/billing/plugin.json', JSON.stringify({ version: '1.0.0', app: { routerGroups: ['v1'] } }));
        await put('plugins/billing/api/v1/index.ts');
        await put('plugins/broken/api/v1.ts');
        await put('plugins/.cache/plugin.json', '{}');

        const source = new DirectoryPluginSource([path.join(root, 'plugins')], new Map());
        const discovered = await source.scan();

        expect(discovered.map((d) => d.name)).toEqual(['audit', 'billing', 'broken']);
        expect(discovered[0].outcome.ok).toBe(true);
        expect(discovered[0].dir).toBe(path.join(root, 'plugins', 'audit'));
        expect(discovered[1].outcome.ok).toBe(true);
        expect(discovered[2].outcome).toEqual({
            ok: false,
            error: { code: 'MalformedManifest', plugin: 'broken', message: 'no plugin.json or plugin.yaml found' },
        });
    });

    it('should skip directories starting with an underscore', async () => {
        await put('plugins/__pycache__/billing.cpython-312.pyc');
        await put('plugins/billing/plugin.json', JSON.stringify({ version: '1.0.0', app: { routerGroups: ['v1'] } }));
        await put('plugins/billing/api/v1.ts');

        const source = new DirectoryPluginSource([path.join(root, 'plugins')], new Map());
        const discovered = await source.scan();

        expect(discovered.map((d) => d.name)).toEqual(['billing']);
    });

    it('should scan install paths in the configured order', async () => {
        const manifest = JSON.stringify({ version: '1.0.0', app: { routerGroups: ['v1'] } });
        await put('vendor/zeta/plugin.json', manifest);
        await put('vendor/zeta/api/v1.ts');
        await put('local/alpha/plugin.json', manifest);
        await put('local/alpha/api/v1.ts');

        const source = new DirectoryPluginSource([path.join(root, 'vendor'), path.join(root, 'local')], new Map());
        const discovered = await source.scan();

        expect(discovered.map((d) => d.name)).toEqual(['zeta', 'alpha']);
    });

    it('should treat a missing install path as empty', async () => {
        const source = new DirectoryPluginSource([path.join(root, 'does-not-exist')], new Map());
        expect(await source.scan()).toEqual([]);
    });
});
