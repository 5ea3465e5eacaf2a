import type { CommitCallback } from './file-watcher.js';

export type TriggerKind = 'file_change' | 'schedule';

/**
 * Event types emitted by triggers and forwarded by the registry.
 * - 'trigger:fired': the commit callback completed for a change-set.
 * - 'trigger:error': the commit callback threw; the change-set is discarded.
 */
export type TriggerEventType = 'trigger:fired' | 'trigger:error';

export interface TriggerEvent {
    type: TriggerEventType;
    triggerId: string;
    kind: TriggerKind;
    repoPath: string;
    /** Number of paths in the dispatched change-set. */
    changeCount: number;
    timestamp: Date;
    error?: string;
}

export type TriggerEventListener = (event: TriggerEvent) => void;

/** Fields shared by every registered trigger. */
export interface TriggerRecordBase {
    id: string;
    kind: TriggerKind;
    repoPath: string;
    callback: CommitCallback;
    createdAt: Date;
}

interface TriggerSnapshotBase {
    id: string;
    repoPath: string;
    createdAt: string;
}

export interface FileTriggerSnapshot extends TriggerSnapshotBase {
    kind: 'file_change';
    isMonitoring: boolean;
    isPaused: boolean;
    pendingChanges: number;
}

export interface ScheduleTriggerSnapshot extends TriggerSnapshotBase {
    kind: 'schedule';
    isScheduled: boolean;
    isPaused: boolean;
    times: string[];
}

export type TriggerSnapshot = FileTriggerSnapshot | ScheduleTriggerSnapshot;

export interface RegistryStatus {
    isRunning: boolean;
    totalTriggers: number;
    fileTriggers: number;
    scheduleTriggers: number;
    /** Watchers with `isMonitoring === true` at the moment of the call. */
    activeWatchers: number;
}
