/**
 * Normalize a route prefix: one leading slash, no trailing slash, no empty
 * segments. Returns null for prefixes that name no segment at all.
 */
export function normalizePrefix(prefix: string): string | null {
    const segments = prefix.trim().split('/').filter(Boolean);
    if (segments.length === 0) return null;
    if (segments.some((s) => /\s/.test(s))) return null;
    return '/' + segments.join('/');
}

/**
 * Split a request path into its namespace segment and the remainder
 */
export function splitNamespace(requestPath: string): { namespace: string; rest: string } | null {
    const segments = requestPath.split('?')[0].split('/').filter(Boolean);
    if (segments.length === 0) return null;
    return {
        namespace: segments[0],
        rest: '/' + segments.slice(1).join('/'),
    };
}

/**
 * True if `path` is `prefix` itself or lies below it
 */
export function isUnderPrefix(requestPath: string, prefix: string): boolean {
    return requestPath === prefix || requestPath.startsWith(prefix + '/');
}
