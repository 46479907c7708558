const SEMVER = /^(\d+)\.(\d+)\.(\d+)(?:-([0-9A-Za-z.-]+))?(?:\+[0-9A-Za-z.-]+)?$/;

export interface SemVer {
    major: number;
    minor: number;
    patch: number;
    prerelease?: string;
}

export function parseSemVer(version: string): SemVer | null {
    const m = version.trim().match(SEMVER);
    if (!m) return null;
    return {
        major: Number(m[1]),
        minor: Number(m[2]),
        patch: Number(m[3]),
        prerelease: m[4],
    };
}

export function compareSemVer(a: SemVer, b: SemVer): number {
    if (a.major !== b.major) return a.major - b.major;
    if (a.minor !== b.minor) return a.minor - b.minor;
    if (a.patch !== b.patch) return a.patch - b.patch;
    // A pre-release sorts before its release
    if (a.prerelease === b.prerelease) return 0;
    if (a.prerelease === undefined) return 1;
    if (b.prerelease === undefined) return -1;
    return a.prerelease < b.prerelease ? -1 : 1;
}

/**
 * Check a host version against a minimum requirement (">=1.2.0" or "1.2.0").
 * Returns null when satisfied, otherwise a warning line.
 */
export function checkHostVersion(requirement: string, hostVersion: string): string | null {
    const wanted = parseSemVer(requirement.replace(/^>=\s*/, ''));
    const actual = parseSemVer(hostVersion);
    if (!wanted || !actual) {
        return `cannot compare host version ${hostVersion} with requirement "${requirement}"`;
    }
    if (compareSemVer(actual, wanted) < 0) {
        return `requires host ${requirement}, running ${hostVersion}`;
    }
    return null;
}
