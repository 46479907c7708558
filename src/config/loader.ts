import { readFile, writeFile, access } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml, parseDocument } from 'yaml';
import { configSchema, ConfigError, isLogLevel, type HostConfig } from './schema.js';

export const CONFIG_FILES = ['plugmount.yaml', 'plugmount.yml', 'plugmount.json'] as const;

/**
 * Config Loader — reads plugmount.yaml from the project root
 *
 * A missing file means all defaults. `PLUGMOUNT_LOG_LEVEL` overrides
 * `logging.level`.
 */
export class ConfigLoader {
    constructor(
        private projectRoot: string = process.cwd(),
        private env: Record<string, string | undefined> = process.env
    ) { }

    async load(): Promise<HostConfig> {
        const file = await this.findFile();
        let raw: unknown = {};

        if (file) {
            const content = await readFile(file, 'utf-8');
            try {
                raw = file.endsWith('.json') ? JSON.parse(content) : parseYaml(content) ?? {};
            } catch (err) {
                throw new ConfigError(`Cannot parse ${path.basename(file)}: ${(err as Error).message}`);
            }
        }

        const parsed = configSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
            throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
        }

        const config = parsed.data;
        const level = this.env['PLUGMOUNT_LOG_LEVEL'];
        if (level && isLogLevel(level)) {
            config.logging.level = level;
        }
        config.plugins.installPaths = config.plugins.installPaths.map((p) => path.resolve(this.projectRoot, p));
        if (config.logging.file) {
            config.logging.file = path.resolve(this.projectRoot, config.logging.file);
        }
        return config;
    }

    /**
     * Persist a plugin's enabled state in `plugins.disabled`.
     * Returns whether the file changed.
     */
    async setDisabled(name: string, disabled: boolean): Promise<boolean> {
        const existing = await this.findFile();
        const file = existing ?? path.join(this.projectRoot, CONFIG_FILES[0]);
        const content = existing ? await readFile(existing, 'utf-8') : '';

        if (file.endsWith('.json')) {
            const data: unknown = content.trim() ? JSON.parse(content) : {};
            const config = isRecord(data) ? data : {};
            const plugins = isRecord(config['plugins']) ? config['plugins'] : {};
            const current = toStringList(plugins['disabled']);
            const next = toggle(current, name, disabled);
            if (next === current) return false;
            config['plugins'] = { ...plugins, disabled: next };
            await writeFile(file, JSON.stringify(config, null, 2) + '\n', 'utf-8');
            return true;
        }

        // YAML edits keep the file's comments and layout
        const doc = parseDocument(content);
        const data: unknown = doc.toJS();
        const plugins = isRecord(data) && isRecord(data['plugins']) ? data['plugins'] : {};
        const current = toStringList(plugins['disabled']);
        const next = toggle(current, name, disabled);
        if (next === current) return false;
        doc.setIn(['plugins', 'disabled'], doc.createNode(next));
        await writeFile(file, doc.toString(), 'utf-8');
        return true;
    }

    /**
     * Path of the config file in use, if any
     */
    async findFile(): Promise<string | null> {
        for (const name of CONFIG_FILES) {
            const candidate = path.join(this.projectRoot, name);
            try {
                await access(candidate);
                return candidate;
            } catch {
                continue;
            }
        }
        return null;
    }
}

function toggle(list: string[], name: string, present: boolean): string[] {
    const has = list.includes(name);
    if (present && !has) return [...list, name];
    if (!present && has) return list.filter((n) => n !== name);
    return list;
}

function toStringList(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
