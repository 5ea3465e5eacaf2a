import type { ChangeEntry, ChangeKind, ChangeSet } from '../types/file-watcher.js';

export interface DebounceBufferOptions {
    debounceMs: number;
    /** Invoked once the quiet period elapses with at least one pending entry. */
    onSettle: () => void;
    now?: () => number;
}

function coalesceKind(previous: ChangeKind, next: ChangeKind): ChangeKind {
    // A file created and then written during one burst is still new to git.
    if (previous === 'created' && next === 'modified') return 'created';
    return next;
}

/**
 * Accumulates change entries for one watched root and signals once a quiet
 * period elapses with no further entries.
 *
 * Each `add()` bumps a generation counter and re-arms a single timer; a timer
 * only settles when its captured generation is still current, so a timer that
 * was cancelled but already queued cannot fire late.
 */
export class DebounceBuffer {
    readonly #debounceMs: number;
    readonly #onSettle: () => void;
    readonly #now: () => number;
    readonly #pending: Map<string, ChangeEntry> = new Map();
    #timer: NodeJS.Timeout | null = null;
    #generation = 0;
    #armedAt: number | null = null;

    constructor(options: DebounceBufferOptions) {
        this.#debounceMs = Math.max(0, Math.floor(options.debounceMs));
        this.#onSettle = options.onSettle;
        this.#now = options.now ?? (() => Date.now());
    }

    get debounceMs(): number {
        return this.#debounceMs;
    }

    get size(): number {
        return this.#pending.size;
    }

    get isArmed(): boolean {
        return this.#timer !== null;
    }

    /** Epoch milliseconds the timer was last armed, or null when idle. */
    get armedAt(): number | null {
        return this.#armedAt;
    }

    get generation(): number {
        return this.#generation;
    }

    /** Record a change and restart the quiet period. */
    add(path: string, kind: ChangeKind): void {
        const detectedAt = new Date(this.#now()).toISOString();
        const existing = this.#pending.get(path);

        if (existing) {
            existing.kind = coalesceKind(existing.kind, kind);
            existing.detectedAt = detectedAt;
        } else {
            this.#pending.set(path, { path, kind, detectedAt });
        }

        this.#arm();
    }

    /** Restart the quiet period without recording anything. No-op when empty. */
    rearm(): void {
        if (this.#pending.size > 0) {
            this.#arm();
        }
    }

    /** Read-only copy of the pending entries. */
    entries(): ChangeSet {
        return [...this.#pending.values()].map((entry) => ({ ...entry }));
    }

    /** Take every pending entry and disarm the timer. */
    drain(): ChangeSet {
        const snapshot = this.entries();
        this.#disarm();
        this.#pending.clear();
        return snapshot;
    }

    /** Drop every pending entry and disarm the timer. */
    cancel(): void {
        this.#disarm();
        this.#pending.clear();
    }

    #arm(): void {
        this.#disarm();
        const generation = this.#generation;
        this.#armedAt = this.#now();
        this.#timer = setTimeout(() => {
            this.#expire(generation);
        }, this.#debounceMs);
    }

    #disarm(): void {
        this.#generation++;
        if (this.#timer) {
            clearTimeout(this.#timer);
            this.#timer = null;
        }
        this.#armedAt = null;
    }

    #expire(generation: number): void {
        if (generation !== this.#generation) return;
        this.#timer = null;
        this.#armedAt = null;
        if (this.#pending.size === 0) return;
        this.#onSettle();
    }
}
