import picomatch from 'picomatch';

/** Patterns appended to every watcher's ignore list unless opted out. */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
    '.git/',
    '*.tmp',
    '*.swp',
    '.DS_Store',
    'Thumbs.db',
];

// Shell-glob syntax only: `*`, `?` and `[...]`. A leading `!`, braces and extglobs are literal.
const MATCH_OPTIONS: picomatch.PicomatchOptions = {
    dot: true,
    nonegate: true,
    nobrace: true,
    noextglob: true,
};

type CompiledPattern =
    | { type: 'directory'; source: string; segments: picomatch.Matcher[] }
    | { type: 'glob'; source: string; matcher: picomatch.Matcher };

/** Normalize a relative path to `/` separators with no leading `./` or `/`. */
export function normalizeRelativePath(relativePath: string): string {
    return relativePath.replace(/\\/g, '/').replace(/^(\.\/)+/, '').replace(/^\/+/, '');
}

function isDirectoryPattern(pattern: string): boolean {
    return pattern.endsWith('/') || pattern.endsWith('\\');
}

function compile(pattern: string): CompiledPattern {
    if (typeof pattern !== 'string' || pattern.trim().length === 0) {
        throw new Error(`[PathFilter] Invalid ignore pattern: ${JSON.stringify(pattern)}`);
    }

    if (isDirectoryPattern(pattern)) {
        const segments = normalizeRelativePath(pattern)
            .split('/')
            .filter((segment) => segment.length > 0);
        if (segments.length === 0) {
            throw new Error(`[PathFilter] Directory pattern has no name: ${JSON.stringify(pattern)}`);
        }
        return {
            type: 'directory',
            source: pattern,
            segments: segments.map((segment) => picomatch(segment, MATCH_OPTIONS)),
        };
    }

    return {
        type: 'glob',
        source: pattern,
        matcher: picomatch(normalizeRelativePath(pattern), MATCH_OPTIONS),
    };
}

/** True when `segments` appear consecutively among the directory components. */
function containsDirectory(directories: string[], segments: picomatch.Matcher[]): boolean {
    const last = directories.length - segments.length;
    for (let start = 0; start <= last; start++) {
        if (segments.every((matches, offset) => matches(directories[start + offset] ?? ''))) {
            return true;
        }
    }
    return false;
}

/**
 * Decides whether a changed path should be ignored.
 *
 * A pattern ending in a path separator excludes any path that has a directory
 * with that name at any depth (`node_modules/` matches `a/node_modules/b.js`).
 * Every other pattern is a shell glob tested against the whole relative path and
 * against its final component, so `*.log` matches both `build.log` and
 * `logs/app.log`. Matching is case-sensitive.
 *
 * The pattern list is captured at construction; a malformed pattern throws.
 */
export class PathFilter {
    readonly #compiled: readonly CompiledPattern[];

    constructor(patterns: readonly string[]) {
        this.#compiled = patterns.map(compile);
    }

    get patterns(): string[] {
        return this.#compiled.map((entry) => entry.source);
    }

    shouldIgnore(relativePath: string): boolean {
        const normalized = normalizeRelativePath(relativePath);
        if (normalized.length === 0) return false;

        const components = normalized.split('/');
        const directories = components.slice(0, -1);
        const baseName = components[components.length - 1] ?? normalized;

        for (const entry of this.#compiled) {
            if (entry.type === 'directory') {
                if (containsDirectory(directories, entry.segments)) return true;
                continue;
            }
            if (entry.matcher(normalized) || entry.matcher(baseName)) return true;
        }
        return false;
    }
}
