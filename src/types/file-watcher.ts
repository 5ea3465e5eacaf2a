/** Kinds of filesystem changes a watcher tracks. Directory events are not tracked. */
export type ChangeKind = 'created' | 'modified' | 'deleted';

/** One path in a pending or dispatched change-set. */
export interface ChangeEntry {
    /** Path relative to the watched root, always with `/` separators. */
    path: string;
    kind: ChangeKind;
    /** ISO-8601 timestamp of the latest event seen for this path. */
    detectedAt: string;
}

/** Deduplicated change entries, ordered by first detection. */
export type ChangeSet = readonly ChangeEntry[];

/**
 * Invoked when a change is ready to act on. Consumed by the git layer, which
 * performs the actual commit/push.
 */
export type CommitCallback = (repoPath: string, changes: ChangeSet) => Promise<void> | void;

/** Callbacks handed to a subscription by the watcher that owns it. */
export interface RawChangeHandlers {
    onChange(filePath: string, kind: ChangeKind): void;
    onError(error: unknown): void;
}

/** A live OS-level change subscription. */
export interface WatchSubscription {
    close(): Promise<void>;
}

/** Attaches a recursive change subscription on `root`. Throws when it cannot be attached. */
export type WatchSubscriber = (root: string, handlers: RawChangeHandlers) => WatchSubscription;

/** Read-only snapshot of a watcher's state. */
export interface WatcherStatus {
    isMonitoring: boolean;
    isPaused: boolean;
    /** Number of paths waiting for the quiet period to elapse. */
    pendingChanges: number;
    debounceSeconds: number;
    /** ISO-8601 time the debounce timer was last armed, or null when idle. */
    armedAt: string | null;
}
