import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ChangeSet } from '../types/file-watcher.js';

export type ChangeType = 'addition' | 'modification' | 'deletion' | 'mixed' | 'none';

export interface ChangeSummary {
    total: number;
    created: number;
    modified: number;
    deleted: number;
    changeType: ChangeType;
    /** Path count per file category, e.g. `{ source: 2, docs: 1 }`. */
    categories: Record<string, number>;
}

const CATEGORIES_PATH = fileURLToPath(new URL('../../data/file-categories.json', import.meta.url));

let cachedLookup: Map<string, string> | null = null;

/** Maps an extension (`.ts`) or exact file name (`Dockerfile`) to its category. */
function loadCategoryLookup(): Map<string, string> {
    if (cachedLookup) return cachedLookup;

    const parsed: unknown = JSON.parse(readFileSync(CATEGORIES_PATH, 'utf8'));
    const lookup = new Map<string, string>();
    if (typeof parsed === 'object' && parsed !== null) {
        for (const [category, keys] of Object.entries(parsed)) {
            if (!Array.isArray(keys)) continue;
            for (const key of keys) {
                if (typeof key === 'string') lookup.set(key, category);
            }
        }
    }

    cachedLookup = lookup;
    return lookup;
}

export function categorizePath(relativePath: string): string {
    const lookup = loadCategoryLookup();
    const baseName = path.posix.basename(relativePath.replace(/\\/g, '/'));
    return lookup.get(baseName) ?? lookup.get(path.posix.extname(baseName).toLowerCase()) ?? 'other';
}

function classify(created: number, modified: number, deleted: number): ChangeType {
    const kinds = [created, modified, deleted].filter((count) => count > 0).length;
    if (kinds === 0) return 'none';
    if (kinds > 1) return 'mixed';
    if (created > 0) return 'addition';
    if (modified > 0) return 'modification';
    return 'deletion';
}

/** Count a change-set by kind and file category. */
export function summarizeChangeSet(changes: ChangeSet): ChangeSummary {
    let created = 0;
    let modified = 0;
    let deleted = 0;
    const categories: Record<string, number> = {};

    for (const change of changes) {
        if (change.kind === 'created') created++;
        else if (change.kind === 'modified') modified++;
        else deleted++;

        const category = categorizePath(change.path);
        categories[category] = (categories[category] ?? 0) + 1;
    }

    return {
        total: changes.length,
        created,
        modified,
        deleted,
        changeType: classify(created, modified, deleted),
        categories,
    };
}

/** One-line rendering, e.g. `3 change(s) [mixed]: +1 ~2 -0 (docs: 1, source: 2)`. */
export function formatChangeSummary(summary: ChangeSummary): string {
    const categories = Object.entries(summary.categories)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([category, count]) => `${category}: ${count}`)
        .join(', ');
    const head = `${summary.total} change(s) [${summary.changeType}]: +${summary.created} ~${summary.modified} -${summary.deleted}`;
    return categories ? `${head} (${categories})` : head;
}
