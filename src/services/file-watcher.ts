import { statSync } from 'node:fs';
import path from 'node:path';
import { logThought } from '../utils/logger.js';
import { DebounceBuffer } from './debounce-buffer.js';
import { DEFAULT_IGNORE_PATTERNS, PathFilter, normalizeRelativePath } from './path-filter.js';
import { subscribeWithChokidar } from './watch-subscription.js';
import type {
    ChangeEntry,
    ChangeKind,
    ChangeSet,
    CommitCallback,
    WatchSubscriber,
    WatchSubscription,
    WatcherStatus,
} from '../types/file-watcher.js';
import type { TriggerEvent, TriggerEventListener } from '../types/trigger.js';

export const DEFAULT_DEBOUNCE_SECONDS = 5;

/** Longest quiet period `setTimeout` can hold (2^31 - 1 ms), in whole seconds. */
export const MAX_DEBOUNCE_SECONDS = Math.floor(0x7fffffff / 1000);

export interface FileWatcherOptions {
    /** Trigger id, used in log lines and emitted events. */
    id: string;
    /** Root directory to watch. Passed to the callback exactly as given. */
    repoPath: string;
    callback: CommitCallback;
    ignorePatterns?: readonly string[];
    /** Quiet period in seconds, clamped to {@link MAX_DEBOUNCE_SECONDS}. @default 5 */
    debounceSeconds?: number;
    /** Append {@link DEFAULT_IGNORE_PATTERNS} to `ignorePatterns`. @default true */
    useDefaultIgnores?: boolean;
    /** OS subscription factory. Defaults to chokidar. */
    subscribe?: WatchSubscriber;
    onEvent?: TriggerEventListener;
    now?: () => number;
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

function isDirectory(target: string): boolean {
    try {
        return statSync(target).isDirectory();
    } catch {
        return false;
    }
}

function normalizeDebounceSeconds(value: number | undefined): number {
    if (value === undefined || !Number.isFinite(value)) return DEFAULT_DEBOUNCE_SECONDS;
    return Math.min(MAX_DEBOUNCE_SECONDS, Math.max(0, value));
}

/**
 * Watches one directory tree and turns bursts of changes into a single
 * commit callback.
 *
 * Raw events pass through the ignore filter into a {@link DebounceBuffer};
 * once the quiet period elapses the buffered change-set is handed to the
 * callback and cleared. Callback failures are logged and the change-set is
 * dropped. An async callback is awaited, and a burst that settles meanwhile
 * is dispatched once it finishes, so one watcher never runs two callbacks at
 * once.
 *
 * Usage:
 * ```ts
 * const watcher = new FileWatcher({
 *   id: 'docs',
 *   repoPath: '/path/to/repo',
 *   ignorePatterns: ['*.log', 'node_modules/'],
 *   callback: (repoPath, changes) => git.commitAll(repoPath, changes),
 * });
 * watcher.start();
 * ```
 */
export class FileWatcher {
    readonly #id: string;
    readonly #repoPath: string;
    readonly #root: string;
    readonly #callback: CommitCallback;
    readonly #patterns: readonly string[];
    readonly #debounceSeconds: number;
    readonly #subscribe: WatchSubscriber;
    readonly #onEvent: TriggerEventListener | undefined;
    readonly #buffer: DebounceBuffer;

    #filter: PathFilter | null = null;
    #subscription: WatchSubscription | null = null;
    #session = 0;
    #isMonitoring = false;
    #isPaused = false;
    #inFlight = false;
    #closing: Promise<void> = Promise.resolve();

    constructor(options: FileWatcherOptions) {
        this.#id = options.id;
        this.#repoPath = options.repoPath;
        this.#root = path.resolve(options.repoPath);
        this.#callback = options.callback;
        this.#patterns = [
            ...(options.ignorePatterns ?? []),
            ...((options.useDefaultIgnores ?? true) ? DEFAULT_IGNORE_PATTERNS : []),
        ];
        this.#debounceSeconds = normalizeDebounceSeconds(options.debounceSeconds);
        this.#subscribe = options.subscribe ?? subscribeWithChokidar;
        this.#onEvent = options.onEvent;
        this.#buffer = new DebounceBuffer({
            debounceMs: Math.round(this.#debounceSeconds * 1000),
            onSettle: () => {
                this.#settle();
            },
            now: options.now,
        });
    }

    get id(): string {
        return this.#id;
    }

    get repoPath(): string {
        return this.#repoPath;
    }

    get isMonitoring(): boolean {
        return this.#isMonitoring;
    }

    get isPaused(): boolean {
        return this.#isPaused;
    }

    /** Effective ignore patterns, caller patterns first. */
    get ignorePatterns(): string[] {
        return [...this.#patterns];
    }

    /**
     * Attach the OS subscription. Returns false, keeping no state, when the
     * root is not a directory, a pattern is malformed or the subscription
     * cannot be attached.
     */
    start(): boolean {
        if (this.#isMonitoring) return true;

        if (!isDirectory(this.#root)) {
            this.#reportStartFailure(`watch path is not a directory: ${this.#root}`);
            return false;
        }

        if (!this.#filter) {
            try {
                this.#filter = new PathFilter(this.#patterns);
            } catch (err) {
                this.#reportStartFailure(errorMessage(err));
                return false;
            }
        }

        const session = ++this.#session;
        try {
            this.#subscription = this.#subscribe(this.#root, {
                onChange: (filePath, kind) => {
                    if (session !== this.#session) return;
                    this.handleRawEvent(filePath, kind);
                },
                onError: (err) => {
                    if (session !== this.#session) return;
                    console.error(`[FileWatcher] Subscription error on trigger '${this.#id}':`, errorMessage(err));
                },
            });
        } catch (err) {
            this.#session++;
            this.#reportStartFailure(`subscription failed: ${errorMessage(err)}`);
            return false;
        }

        this.#isMonitoring = true;
        void logThought(`[FileWatcher] Started trigger '${this.#id}' at ${this.#root}.`);
        return true;
    }

    /**
     * Entry point for the subscription layer. Accepts absolute paths or paths
     * relative to the root; anything outside the root is dropped.
     */
    handleRawEvent(filePath: string, kind: ChangeKind): void {
        if (!this.#isMonitoring || this.#isPaused || !this.#filter) return;

        const relative = path.relative(this.#root, path.resolve(this.#root, filePath));
        if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
            return;
        }

        const normalized = normalizeRelativePath(relative);
        if (this.#filter.shouldIgnore(normalized)) return;

        this.#buffer.add(normalized, kind);
    }

    /**
     * Ignore new events until {@link resume}. Changes collected before the
     * pause stay pending and are dispatched when their timer expires.
     */
    pause(): boolean {
        this.#isPaused = true;
        void logThought(`[FileWatcher] Paused trigger '${this.#id}'.`);
        return true;
    }

    resume(): boolean {
        this.#isPaused = false;
        void logThought(`[FileWatcher] Resumed trigger '${this.#id}'.`);
        return true;
    }

    /**
     * Cancel the timer, detach the subscription and clear pending changes.
     * A callback already running is left to complete.
     */
    stop(): boolean {
        this.#buffer.cancel();
        if (!this.#isMonitoring && !this.#subscription) return true;

        this.#session++;
        this.#isMonitoring = false;

        const subscription = this.#subscription;
        this.#subscription = null;
        if (subscription) {
            this.#trackClose(subscription);
        }

        void logThought(`[FileWatcher] Stopped trigger '${this.#id}'.`);
        return true;
    }

    /** Resolves once every detached subscription has released its handles. */
    closed(): Promise<void> {
        return this.#closing;
    }

    /**
     * Dispatch the pending change-set now instead of waiting for the quiet
     * period. Returns false when nothing is pending or a callback is running.
     */
    flush(): boolean {
        if (this.#buffer.size === 0 || this.#inFlight) return false;
        this.#settle();
        return true;
    }

    getPendingChanges(): ChangeEntry[] {
        return [...this.#buffer.entries()];
    }

    status(): WatcherStatus {
        const armedAt = this.#buffer.armedAt;
        return {
            isMonitoring: this.#isMonitoring,
            isPaused: this.#isPaused,
            pendingChanges: this.#buffer.size,
            debounceSeconds: this.#debounceSeconds,
            armedAt: armedAt === null ? null : new Date(armedAt).toISOString(),
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #settle(): void {
        // The burst stays buffered and is picked up when the running callback finishes.
        if (this.#inFlight) return;

        const changes = this.#buffer.drain();
        if (changes.length === 0) return;

        let result: Promise<void> | void;
        try {
            result = this.#callback(this.#repoPath, changes);
        } catch (err) {
            this.#reportCallbackFailure(changes, err);
            return;
        }

        if (result instanceof Promise) {
            this.#inFlight = true;
            void this.#awaitCallback(result, changes);
            return;
        }

        this.#reportFired(changes);
    }

    async #awaitCallback(pending: Promise<void>, changes: ChangeSet): Promise<void> {
        try {
            await pending;
            this.#reportFired(changes);
        } catch (err) {
            this.#reportCallbackFailure(changes, err);
        } finally {
            this.#inFlight = false;
        }

        if (this.#isMonitoring && !this.#buffer.isArmed && this.#buffer.size > 0) {
            this.#settle();
        }
    }

    #trackClose(subscription: WatchSubscription): void {
        const closing = subscription.close().catch((err: unknown) => {
            console.error(`[FileWatcher] Failed to close subscription for trigger '${this.#id}':`, errorMessage(err));
        });
        const previous = this.#closing;
        this.#closing = Promise.all([previous, closing]).then(() => undefined);
    }

    #reportStartFailure(reason: string): void {
        console.error(`[FileWatcher] Failed to start trigger '${this.#id}': ${reason}`);
        void logThought(`[FileWatcher] Failed to start trigger '${this.#id}': ${reason}`);
    }

    #reportFired(changes: ChangeSet): void {
        void logThought(
            `[FileWatcher] Trigger '${this.#id}' dispatched ${changes.length} change(s) in ${this.#repoPath}.`,
        );
        this.#emit({
            type: 'trigger:fired',
            triggerId: this.#id,
            kind: 'file_change',
            repoPath: this.#repoPath,
            changeCount: changes.length,
            timestamp: new Date(),
        });
    }

    #reportCallbackFailure(changes: ChangeSet, err: unknown): void {
        const message = errorMessage(err);
        console.error(
            `[FileWatcher] Commit callback for trigger '${this.#id}' failed; ${changes.length} path(s) discarded:`,
            message,
        );
        void logThought(
            `[FileWatcher] Commit callback for trigger '${this.#id}' failed; ${changes.length} path(s) discarded: ${message}`,
        );
        this.#emit({
            type: 'trigger:error',
            triggerId: this.#id,
            kind: 'file_change',
            repoPath: this.#repoPath,
            changeCount: changes.length,
            timestamp: new Date(),
            error: message,
        });
    }

    #emit(event: TriggerEvent): void {
        if (!this.#onEvent) return;
        try {
            this.#onEvent(event);
        } catch (listenerErr) {
            console.error('[FileWatcher] Event listener threw an error:', listenerErr);
        }
    }
}
