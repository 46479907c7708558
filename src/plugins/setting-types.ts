import type { SettingType, SettingValue } from './types.js';

export type CoerceResult =
    | { ok: true; value: SettingValue }
    | { ok: false; reason: string };

/**
 * Check an already-typed value (manifest default, YAML default) against a declared type
 */
export function checkSettingValue(type: SettingType, value: unknown): CoerceResult {
    switch (type) {
        case 'string':
            return typeof value === 'string' ? { ok: true, value } : mismatch(type, value);
        case 'number':
            return typeof value === 'number' && Number.isFinite(value) ? { ok: true, value } : mismatch(type, value);
        case 'integer':
            return typeof value === 'number' && Number.isSafeInteger(value) ? { ok: true, value } : mismatch(type, value);
        case 'boolean':
            return typeof value === 'boolean' ? { ok: true, value } : mismatch(type, value);
        case 'list':
            if (Array.isArray(value) && value.every((v) => typeof v === 'string')) {
                return { ok: true, value: value.map((v) => String(v)) };
            }
            return mismatch(type, value);
        case 'json':
            return isJsonValue(value) ? { ok: true, value } : mismatch(type, value);
    }
}

/**
 * Coerce an environment-style string into the declared type
 */
export function coerceSettingString(type: SettingType, raw: string): CoerceResult {
    const text = raw.trim();
    switch (type) {
        case 'string':
            return { ok: true, value: raw };
        case 'number': {
            const n = Number(text);
            return text !== '' && Number.isFinite(n) ? { ok: true, value: n } : mismatch(type, raw);
        }
        case 'integer': {
            const n = Number(text);
            return /^[-+]?\d+$/.test(text) && Number.isSafeInteger(n) ? { ok: true, value: n } : mismatch(type, raw);
        }
        case 'boolean': {
            const lower = text.toLowerCase();
            if (lower === 'true' || lower === '1' || lower === 'yes') return { ok: true, value: true };
            if (lower === 'false' || lower === '0' || lower === 'no') return { ok: true, value: false };
            return mismatch(type, raw);
        }
        case 'list': {
            if (text.startsWith('[')) {
                const parsed = parseJson(text);
                return parsed.ok ? checkSettingValue('list', parsed.value) : mismatch(type, raw);
            }
            return { ok: true, value: text.split(',').map((s) => s.trim()).filter(Boolean) };
        }
        case 'json': {
            const parsed = parseJson(text);
            return parsed.ok ? checkSettingValue('json', parsed.value) : mismatch(type, raw);
        }
    }
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
    try {
        return { ok: true, value: JSON.parse(text) };
    } catch {
        return { ok: false };
    }
}

function isJsonValue(value: unknown): value is SettingValue {
    if (value === null) return true;
    if (typeof value === 'string' || typeof value === 'boolean') return true;
    if (typeof value === 'number') return Number.isFinite(value);
    if (Array.isArray(value)) return value.every(isJsonValue);
    if (typeof value === 'object') return Object.values(value).every(isJsonValue);
    return false;
}

function mismatch(type: SettingType, value: unknown): CoerceResult {
    return { ok: false, reason: `expected ${type}, got ${JSON.stringify(value)}` };
}
