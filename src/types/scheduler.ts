import type { CommitCallback } from './file-watcher.js';
import type { TriggerEventListener } from './trigger.js';

/** Configuration for a time-based trigger. */
export interface ScheduleTriggerOptions {
    id: string;
    repoPath: string;
    callback: CommitCallback;
    /** Wall-clock times of day in 24h `HH:MM` form, e.g. `['09:00', '18:30']`. */
    times: string[];
    /** IANA timezone passed to node-cron. Defaults to the process timezone. */
    timezone?: string;
    onEvent?: TriggerEventListener;
}

/** Read-only snapshot of a time-based trigger. */
export interface ScheduleStatus {
    isScheduled: boolean;
    isPaused: boolean;
    times: string[];
    lastFiredAt: string | null;
}
