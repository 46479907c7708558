import { readdir, access } from 'node:fs/promises';
import path from 'node:path';
import { LAYOUT_FOLDERS, type LayoutFolder, type PluginLayout } from './types.js';

export const MANIFEST_FILES = ['plugin.json', 'plugin.yaml', 'plugin.yml'] as const;

export type ManifestFile = typeof MANIFEST_FILES[number];

/**
 * Read the on-disk layout of a plugin directory
 *
 * Route groups are the entries under `api/`: folders (`api/v1/`) or files
 * (`api/reports.ts`), named without their extension. Names beginning with
 * `.` or `_` (`__init__.py`, `.DS_Store`) are not route groups.
 */
export async function scanLayout(pluginDir: string): Promise<PluginLayout> {
    const folders: LayoutFolder[] = [];
    for (const folder of LAYOUT_FOLDERS) {
        if (await isDirectory(path.join(pluginDir, folder))) {
            folders.push(folder);
        }
    }

    const entryPoints: Record<string, string> = {};
    if (folders.includes('api')) {
        const entries = await readdir(path.join(pluginDir, 'api'), { withFileTypes: true });
        entries.sort((a, b) => byName(a.name, b.name));
        for (const entry of entries) {
            if (entry.name.startsWith('.') || entry.name.startsWith('_')) continue;
            if (!entry.isDirectory() && !entry.isFile()) continue;

            const group = entry.isDirectory() ? entry.name : path.parse(entry.name).name;
            entryPoints[group] ??= path.join('api', entry.name);
        }
    }

    return {
        folders,
        routeGroups: Object.keys(entryPoints).sort(byName),
        entryPoints,
    };
}

/**
 * Code-unit order, independent of the process locale
 */
export function byName(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

/**
 * Find the manifest file in a plugin directory
 */
export async function findManifest(pluginDir: string): Promise<{ path: string; file: ManifestFile } | null> {
    for (const file of MANIFEST_FILES) {
        const manifestPath = path.join(pluginDir, file);
        try {
            await access(manifestPath);
            return { path: manifestPath, file };
        } catch {
            continue;
        }
    }
    return null;
}

async function isDirectory(dirPath: string): Promise<boolean> {
    try {
        await readdir(dirPath);
        return true;
    } catch {
        return false;
    }
}
