import { readFile, readdir, access } from 'node:fs/promises';
import path from 'node:path';
import { findManifest, scanLayout, byName } from './layout.js';
import { formatOf, parseManifest, peekKind, type ManifestFormat } from './manifest.js';
import { failure, type DiscoveredPlugin, type NamespaceCatalog, type PluginLayout } from './types.js';

/**
 * Anything that can produce the current set of plugins
 */
export interface PluginSource {
    scan(): Promise<DiscoveredPlugin[]>;
}

export interface PluginCandidate {
    name: string;
    dir: string;
    manifest: { raw: string; format: ManifestFormat } | null;
    layout: PluginLayout | null;
    readError?: string;
}

/**
 * Directory Plugin Source — discovers plugin directories on disk
 *
 * Every subdirectory of an install path is a plugin, except those starting
 * with `.` or `_` (`.git`, `__pycache__`). Install paths are
 * scanned in the configured order and their subdirectories by name, which
 * fixes the scan order used for settings ownership and report ordering.
 *
 * Parsing runs in two passes: app-level plugins first, so that their
 * namespaces can be extended by extension-level plugins in the second pass.
 */
export class DirectoryPluginSource implements PluginSource {
    constructor(
        private installPaths: string[],
        private hostCatalog: NamespaceCatalog
    ) { }

    async scan(): Promise<DiscoveredPlugin[]> {
        const candidates: PluginCandidate[] = [];
        for (const installPath of this.installPaths) {
            candidates.push(...await this.scanDirectory(installPath));
        }
        return parseCandidates(candidates, this.hostCatalog);
    }

    /**
     * Read every plugin directory under one install path
     */
    private async scanDirectory(dirPath: string): Promise<PluginCandidate[]> {
        try {
            await access(dirPath);
        } catch {
            return []; // Install path doesn't exist
        }

        const entries = await readdir(dirPath, { withFileTypes: true });
        const names = entries
            .filter((e) => e.isDirectory() && !e.name.startsWith('.') && !e.name.startsWith('_'))
            .map((e) => e.name)
            .sort(byName);

        const candidates: PluginCandidate[] = [];
        for (const name of names) {
            candidates.push(await readCandidate(path.join(dirPath, name), name));
        }
        return candidates;
    }
}

async function readCandidate(dir: string, name: string): Promise<PluginCandidate> {
    try {
        const found = await findManifest(dir);
        const layout = await scanLayout(dir);
        if (!found) {
            return { name, dir, manifest: null, layout };
        }
        const raw = await readFile(found.path, 'utf-8');
        return { name, dir, manifest: { raw, format: formatOf(found.file) }, layout };
    } catch (err) {
        return { name, dir, manifest: null, layout: null, readError: (err as Error).message };
    }
}

/**
 * Parse candidates in two passes and return them in scan order
 */
export function parseCandidates(candidates: PluginCandidate[], hostCatalog: NamespaceCatalog): DiscoveredPlugin[] {
    const results = new Map<PluginCandidate, DiscoveredPlugin>();
    const catalog = new Map(hostCatalog);

    // Pass 1: app-level plugins become extendable namespaces
    for (const candidate of candidates) {
        if (!candidate.manifest || peekKind(candidate.manifest.raw, candidate.manifest.format) !== 'app') continue;
        const discovered = parseCandidate(candidate, hostCatalog);
        results.set(candidate, discovered);

        const { outcome } = discovered;
        if (outcome.ok && !catalog.has(outcome.descriptor.name)) {
            catalog.set(outcome.descriptor.name, outcome.descriptor.routerGroups.map((g) => g.name));
        }
    }

    // Pass 2: everything else
    for (const candidate of candidates) {
        if (results.has(candidate)) continue;
        results.set(candidate, parseCandidate(candidate, catalog));
    }

    return candidates.map((c) => results.get(c) ?? parseCandidate(c, catalog));
}

function parseCandidate(candidate: PluginCandidate, catalog: NamespaceCatalog): DiscoveredPlugin {
    const { name, dir } = candidate;

    if (!candidate.manifest || !candidate.layout) {
        const reason = candidate.readError
            ? `cannot read plugin directory: ${candidate.readError}`
            : 'no plugin.json or plugin.yaml found';
        return { name, dir, outcome: { ok: false, error: failure('MalformedManifest', name, reason) } };
    }

    const outcome = parseManifest(
        { name, dir, raw: candidate.manifest.raw, format: candidate.manifest.format, layout: candidate.layout },
        catalog
    );
    return { name, dir, outcome };
}

