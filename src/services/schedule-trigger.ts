import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import type { ChangeSet, CommitCallback } from '../types/file-watcher.js';
import type { ScheduleStatus, ScheduleTriggerOptions } from '../types/scheduler.js';
import type { TriggerEvent, TriggerEventListener } from '../types/trigger.js';

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)$/;

/** Convert a 24h `HH:MM` time to a daily node-cron expression, or null when malformed. */
export function timeToCronExpression(time: string): string | null {
    const match = TIME_OF_DAY.exec(time.trim());
    if (!match) return null;
    const [, hours, minutes] = match;
    return `${Number(minutes)} ${Number(hours)} * * *`;
}

const NO_CHANGES: ChangeSet = [];

/**
 * Fires a commit callback at fixed wall-clock times each day.
 *
 * The time-based peer of {@link FileWatcher}: same callback contract, invoked
 * with an empty change-set since there is no burst to report. A firing that
 * lands while the previous callback is still running is skipped.
 */
export class ScheduleTrigger {
    readonly #id: string;
    readonly #repoPath: string;
    readonly #callback: CommitCallback;
    readonly #times: string[];
    readonly #timezone: string | undefined;
    readonly #onEvent: TriggerEventListener | undefined;

    #tasks: ScheduledTask[] = [];
    #isPaused = false;
    #inFlight = false;
    #lastFiredAt: Date | null = null;

    constructor(options: ScheduleTriggerOptions) {
        this.#id = options.id;
        this.#repoPath = options.repoPath;
        this.#callback = options.callback;
        this.#times = [...options.times];
        this.#timezone = options.timezone;
        this.#onEvent = options.onEvent;
    }

    get id(): string {
        return this.#id;
    }

    get repoPath(): string {
        return this.#repoPath;
    }

    get isScheduled(): boolean {
        return this.#tasks.length > 0;
    }

    /** Schedule every configured time. Returns false for an empty or malformed time list. */
    start(): boolean {
        if (this.isScheduled) return true;

        if (this.#times.length === 0) {
            this.#reportStartFailure('no times configured');
            return false;
        }

        const expressions: string[] = [];
        for (const time of this.#times) {
            const expression = timeToCronExpression(time);
            if (!expression) {
                this.#reportStartFailure(`invalid time '${time}' (expected HH:MM)`);
                return false;
            }
            expressions.push(expression);
        }

        const tasks: ScheduledTask[] = [];
        try {
            for (const expression of expressions) {
                tasks.push(
                    cron.schedule(
                        expression,
                        () => {
                            this.#onTick();
                        },
                        { scheduled: true, timezone: this.#timezone },
                    ),
                );
            }
        } catch (err) {
            for (const task of tasks) task.stop();
            this.#reportStartFailure(err instanceof Error ? err.message : String(err));
            return false;
        }

        this.#tasks = tasks;
        void logThought(`[ScheduleTrigger] Scheduled trigger '${this.#id}' at ${this.#times.join(', ')}.`);
        return true;
    }

    stop(): boolean {
        if (!this.isScheduled) return true;
        for (const task of this.#tasks) {
            task.stop();
        }
        this.#tasks = [];
        void logThought(`[ScheduleTrigger] Stopped trigger '${this.#id}'.`);
        return true;
    }

    pause(): boolean {
        this.#isPaused = true;
        return true;
    }

    resume(): boolean {
        this.#isPaused = false;
        return true;
    }

    /** Run the callback now. Returns false when a previous run is still in flight. */
    fire(): boolean {
        if (this.#inFlight) {
            void logThought(`[ScheduleTrigger] Trigger '${this.#id}' skipped: previous run still in progress.`);
            return false;
        }

        this.#lastFiredAt = new Date();

        let result: Promise<void> | void;
        try {
            result = this.#callback(this.#repoPath, NO_CHANGES);
        } catch (err) {
            this.#reportCallbackFailure(err);
            return true;
        }

        if (result instanceof Promise) {
            this.#inFlight = true;
            void this.#awaitCallback(result);
            return true;
        }

        this.#reportFired();
        return true;
    }

    status(): ScheduleStatus {
        return {
            isScheduled: this.isScheduled,
            isPaused: this.#isPaused,
            times: [...this.#times],
            lastFiredAt: this.#lastFiredAt ? this.#lastFiredAt.toISOString() : null,
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #onTick(): void {
        if (this.#isPaused) {
            void logThought(`[ScheduleTrigger] Trigger '${this.#id}' is paused; skipping scheduled run.`);
            return;
        }
        this.fire();
    }

    async #awaitCallback(pending: Promise<void>): Promise<void> {
        try {
            await pending;
            this.#reportFired();
        } catch (err) {
            this.#reportCallbackFailure(err);
        } finally {
            this.#inFlight = false;
        }
    }

    #reportStartFailure(reason: string): void {
        console.error(`[ScheduleTrigger] Failed to start trigger '${this.#id}': ${reason}`);
        void logThought(`[ScheduleTrigger] Failed to start trigger '${this.#id}': ${reason}`);
    }

    #reportFired(): void {
        void logThought(`[ScheduleTrigger] Trigger '${this.#id}' fired for ${this.#repoPath}.`);
        this.#emit({
            type: 'trigger:fired',
            triggerId: this.#id,
            kind: 'schedule',
            repoPath: this.#repoPath,
            changeCount: 0,
            timestamp: new Date(),
        });
    }

    #reportCallbackFailure(err: unknown): void {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[ScheduleTrigger] Commit callback for trigger '${this.#id}' failed:`, message);
        void logThought(`[ScheduleTrigger] Commit callback for trigger '${this.#id}' failed: ${message}`);
        this.#emit({
            type: 'trigger:error',
            triggerId: this.#id,
            kind: 'schedule',
            repoPath: this.#repoPath,
            changeCount: 0,
            timestamp: new Date(),
            error: message,
        });
    }

    #emit(event: TriggerEvent): void {
        if (!this.#onEvent) return;
        try {
            this.#onEvent(event);
        } catch (listenerErr) {
            console.error('[ScheduleTrigger] Event listener threw an error:', listenerErr);
        }
    }
}
