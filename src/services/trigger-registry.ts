import { logThought } from '../utils/logger.js';
import { DEFAULT_DEBOUNCE_SECONDS, FileWatcher } from './file-watcher.js';
import { ScheduleTrigger } from './schedule-trigger.js';
import type { CommitCallback, WatchSubscriber } from '../types/file-watcher.js';
import type {
    RegistryStatus,
    TriggerEvent,
    TriggerEventListener,
    TriggerEventType,
    TriggerRecordBase,
    TriggerSnapshot,
} from '../types/trigger.js';

export interface FileTriggerRecord extends TriggerRecordBase {
    kind: 'file_change';
    watcher: FileWatcher;
}

export interface ScheduleTriggerRecord extends TriggerRecordBase {
    kind: 'schedule';
    schedule: ScheduleTrigger;
}

export type TriggerRecord = FileTriggerRecord | ScheduleTriggerRecord;

export interface TriggerRegistryOptions {
    /** Subscription factory handed to every file watcher. Defaults to chokidar. */
    subscribe?: WatchSubscriber;
    now?: () => number;
}

export interface FileTriggerOptions {
    useDefaultIgnores?: boolean;
}

export interface ScheduleOptions {
    timezone?: string;
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Owns every trigger that can produce a commit signal.
 *
 * Creates and tears down file watchers and time-based triggers, starts and
 * stops them in bulk, and reports aggregate status. Every public operation
 * reports success as a boolean; faults are logged, never thrown.
 *
 * Usage:
 * ```ts
 * const registry = new TriggerRegistry();
 * registry.addFileTrigger('app', '/path/to/repo', onCommit, ['*.log'], 5);
 * registry.addScheduleTrigger('nightly', '/path/to/repo', onCommit, ['23:30']);
 * registry.start();
 * ```
 */
export class TriggerRegistry {
    readonly #records: Map<string, TriggerRecord> = new Map();
    readonly #listeners: Map<TriggerEventType, Set<TriggerEventListener>> = new Map();
    readonly #subscribe: WatchSubscriber | undefined;
    readonly #now: () => number;
    #isRunning = false;
    #detached: Promise<void> = Promise.resolve();

    constructor(options: TriggerRegistryOptions = {}) {
        this.#subscribe = options.subscribe;
        this.#now = options.now ?? (() => Date.now());
    }

    get isRunning(): boolean {
        return this.#isRunning;
    }

    /**
     * Register and start a file-change trigger. An existing trigger with the
     * same id is removed first. The record is kept only if the watcher starts.
     */
    addFileTrigger(
        id: string,
        repoPath: string,
        callback: CommitCallback,
        ignorePatterns: readonly string[] = [],
        debounceSeconds: number = DEFAULT_DEBOUNCE_SECONDS,
        options: FileTriggerOptions = {},
    ): boolean {
        try {
            this.#replaceExisting(id);

            const watcher = new FileWatcher({
                id,
                repoPath,
                callback,
                ignorePatterns,
                debounceSeconds,
                useDefaultIgnores: options.useDefaultIgnores,
                subscribe: this.#subscribe,
                onEvent: (event) => {
                    this.#emit(event);
                },
                now: this.#now,
            });

            if (!watcher.start()) {
                console.error(`[TriggerRegistry] Failed to start file trigger '${id}'.`);
                return false;
            }

            this.#records.set(id, {
                id,
                kind: 'file_change',
                repoPath,
                callback,
                watcher,
                createdAt: new Date(this.#now()),
            });
            void logThought(`[TriggerRegistry] Added file trigger '${id}' for ${repoPath}.`);
            return true;
        } catch (err) {
            this.#reportFault('addFileTrigger', id, err);
            return false;
        }
    }

    /** Register and start a time-based trigger firing at each `HH:MM` in `times`. */
    addScheduleTrigger(
        id: string,
        repoPath: string,
        callback: CommitCallback,
        times: readonly string[],
        options: ScheduleOptions = {},
    ): boolean {
        try {
            this.#replaceExisting(id);

            const schedule = new ScheduleTrigger({
                id,
                repoPath,
                callback,
                times: [...times],
                timezone: options.timezone,
                onEvent: (event) => {
                    this.#emit(event);
                },
            });

            if (!schedule.start()) {
                console.error(`[TriggerRegistry] Failed to start schedule trigger '${id}'.`);
                return false;
            }

            this.#records.set(id, {
                id,
                kind: 'schedule',
                repoPath,
                callback,
                schedule,
                createdAt: new Date(this.#now()),
            });
            void logThought(`[TriggerRegistry] Added schedule trigger '${id}' for ${repoPath}.`);
            return true;
        } catch (err) {
            this.#reportFault('addScheduleTrigger', id, err);
            return false;
        }
    }

    /** Stop and unregister a trigger. Returns false when the id is unknown. */
    removeTrigger(id: string): boolean {
        try {
            const record = this.#records.get(id);
            if (!record) {
                void logThought(`[TriggerRegistry] Trigger '${id}' does not exist.`);
                return false;
            }

            this.#teardown(record);
            this.#records.delete(id);
            void logThought(`[TriggerRegistry] Removed trigger '${id}'.`);
            return true;
        } catch (err) {
            this.#reportFault('removeTrigger', id, err);
            return false;
        }
    }

    /**
     * Start every registered trigger that is not already running. Individual
     * failures leave that trigger stopped and do not abort the loop.
     */
    start(): boolean {
        if (this.#isRunning) return true;

        for (const record of this.#records.values()) {
            try {
                if (record.kind === 'file_change') {
                    if (!record.watcher.isMonitoring) record.watcher.start();
                } else if (!record.schedule.isScheduled) {
                    record.schedule.start();
                }
            } catch (err) {
                this.#reportFault('start', record.id, err);
            }
        }

        this.#isRunning = true;
        void logThought(`[TriggerRegistry] Started with ${this.#records.size} trigger(s).`);
        return true;
    }

    /** Stop every registered trigger, whatever its individual state. */
    stop(): boolean {
        for (const record of this.#records.values()) {
            try {
                this.#teardown(record);
            } catch (err) {
                this.#reportFault('stop', record.id, err);
            }
        }

        this.#isRunning = false;
        void logThought('[TriggerRegistry] Stopped.');
        return true;
    }

    pauseTrigger(id: string): boolean {
        const record = this.#records.get(id);
        if (!record || record.kind !== 'file_change') return false;
        return record.watcher.pause();
    }

    resumeTrigger(id: string): boolean {
        const record = this.#records.get(id);
        if (!record || record.kind !== 'file_change') return false;
        return record.watcher.resume();
    }

    /** Snapshot of every registered trigger. Order is not significant. */
    listTriggers(): TriggerSnapshot[] {
        return [...this.#records.values()].map((record) => this.#snapshot(record));
    }

    /** Snapshot of one trigger, or `undefined` when the id is unknown. */
    getTrigger(id: string): TriggerSnapshot | undefined {
        const record = this.#records.get(id);
        return record ? this.#snapshot(record) : undefined;
    }

    getStatus(): RegistryStatus {
        let fileTriggers = 0;
        let activeWatchers = 0;
        for (const record of this.#records.values()) {
            if (record.kind !== 'file_change') continue;
            fileTriggers++;
            if (record.watcher.isMonitoring) activeWatchers++;
        }

        return {
            isRunning: this.#isRunning,
            totalTriggers: this.#records.size,
            fileTriggers,
            scheduleTriggers: this.#records.size - fileTriggers,
            activeWatchers,
        };
    }

    /** Stop and remove every trigger. */
    clearAll(): void {
        for (const record of this.#records.values()) {
            try {
                this.#teardown(record);
            } catch (err) {
                this.#reportFault('clearAll', record.id, err);
            }
        }
        this.#records.clear();
        void logThought('[TriggerRegistry] Cleared all triggers.');
    }

    /** Subscribe to trigger events. Returns an unsubscribe function. */
    on(eventType: TriggerEventType, listener: TriggerEventListener): () => void {
        let set = this.#listeners.get(eventType);
        if (!set) {
            set = new Set();
            this.#listeners.set(eventType, set);
        }
        set.add(listener);

        return () => {
            set?.delete(listener);
        };
    }

    /** Resolves once every stopped or removed watcher has released its subscription. */
    closed(): Promise<void> {
        const pending = [this.#detached];
        for (const record of this.#records.values()) {
            if (record.kind === 'file_change') pending.push(record.watcher.closed());
        }
        return Promise.all(pending).then(() => undefined);
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #replaceExisting(id: string): void {
        if (!this.#records.has(id)) return;
        console.warn(`[TriggerRegistry] Trigger '${id}' already exists and will be replaced.`);
        void logThought(`[TriggerRegistry] Replacing trigger '${id}'.`);
        this.removeTrigger(id);
    }

    #teardown(record: TriggerRecord): void {
        if (record.kind === 'file_change') {
            record.watcher.stop();
            const previous = this.#detached;
            this.#detached = Promise.all([previous, record.watcher.closed()]).then(() => undefined);
        } else {
            record.schedule.stop();
        }
    }

    #snapshot(record: TriggerRecord): TriggerSnapshot {
        const base = {
            id: record.id,
            repoPath: record.repoPath,
            createdAt: record.createdAt.toISOString(),
        };

        if (record.kind === 'file_change') {
            const status = record.watcher.status();
            return {
                ...base,
                kind: 'file_change',
                isMonitoring: status.isMonitoring,
                isPaused: status.isPaused,
                pendingChanges: status.pendingChanges,
            };
        }

        const status = record.schedule.status();
        return {
            ...base,
            kind: 'schedule',
            isScheduled: status.isScheduled,
            isPaused: status.isPaused,
            times: status.times,
        };
    }

    #emit(event: TriggerEvent): void {
        const listeners = this.#listeners.get(event.type);
        if (!listeners) return;

        for (const listener of listeners) {
            try {
                listener(event);
            } catch (listenerErr) {
                console.error('[TriggerRegistry] Event listener threw an error:', listenerErr);
            }
        }
    }

    #reportFault(operation: string, id: string, err: unknown): void {
        const message = errorMessage(err);
        console.error(`[TriggerRegistry] ${operation} failed for trigger '${id}':`, message);
        void logThought(`[TriggerRegistry] ${operation} failed for trigger '${id}': ${message}`);
    }
}

/**
 * Run `fn` with a started registry and always stop it afterwards, waiting for
 * every subscription to close, including when `fn` throws.
 */
export async function withTriggerRegistry<T>(
    fn: (registry: TriggerRegistry) => Promise<T> | T,
    options: TriggerRegistryOptions = {},
): Promise<T> {
    const registry = new TriggerRegistry(options);
    registry.start();
    try {
        return await fn(registry);
    } finally {
        registry.stop();
        await registry.closed();
    }
}
