import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { TriggerEvent } from '../../src/types/trigger.js';
import { flushMicrotasks } from '../helpers/fake-watch.js';

const cronMock = vi.hoisted(() => {
    const tasks: Array<{ expression: string; tick: () => void; options: unknown; stop: ReturnType<typeof vi.fn> }> = [];
    const schedule = vi.fn((expression: string, tick: () => void, options: unknown) => {
        const task = { expression, tick, options, stop: vi.fn() };
        tasks.push(task);
        return task;
    });
    return { tasks, schedule };
});

vi.mock('node-cron', () => ({
    default: { schedule: cronMock.schedule },
}));

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn().mockResolvedValue(undefined),
}));

import { ScheduleTrigger, timeToCronExpression } from '../../src/services/schedule-trigger.js';

describe('timeToCronExpression', () => {
    it('converts HH:MM to a daily expression', () => {
        expect(timeToCronExpression('09:30')).toBe('30 9 * * *');
        expect(timeToCronExpression('00:00')).toBe('0 0 * * *');
        expect(timeToCronExpression(' 23:05 ')).toBe('5 23 * * *');
    });

    it('rejects malformed times', () => {
        expect(timeToCronExpression('24:00')).toBeNull();
        expect(timeToCronExpression('9:30')).toBeNull();
        expect(timeToCronExpression('12:60')).toBeNull();
        expect(timeToCronExpression('noon')).toBeNull();
    });
});

describe('ScheduleTrigger', () => {
    let errors: string[];

    beforeEach(() => {
        cronMock.tasks.length = 0;
        cronMock.schedule.mockClear();
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2026-05-01T18:00:00Z'));
        errors = [];
        vi.spyOn(console, 'error').mockImplementation((...args) => {
            errors.push(args.join(' '));
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        vi.useRealTimers();
    });

    it('schedules one task per configured time', () => {
        const trigger = new ScheduleTrigger({
            id: 'nightly',
            repoPath: '/srv/notes',
            callback: vi.fn(),
            times: ['18:00', '06:15'],
            timezone: 'Europe/Berlin',
        });

        expect(trigger.start()).toBe(true);
        expect(trigger.isScheduled).toBe(true);
        expect(cronMock.tasks.map((task) => task.expression)).toEqual(['0 18 * * *', '15 6 * * *']);
        expect(cronMock.tasks[0]?.options).toEqual({ scheduled: true, timezone: 'Europe/Berlin' });
    });

    it('does not schedule twice', () => {
        const trigger = new ScheduleTrigger({ id: 'n', repoPath: '/srv/notes', callback: vi.fn(), times: ['18:00'] });
        trigger.start();

        expect(trigger.start()).toBe(true);
        expect(cronMock.schedule).toHaveBeenCalledTimes(1);
    });

    it('refuses an empty time list', () => {
        const trigger = new ScheduleTrigger({ id: 'empty', repoPath: '/srv/notes', callback: vi.fn(), times: [] });

        expect(trigger.start()).toBe(false);
        expect(errors[0]).toBe("[ScheduleTrigger] Failed to start trigger 'empty': no times configured");
    });

    it('refuses a malformed time without scheduling any of the others', () => {
        const trigger = new ScheduleTrigger({
            id: 'bad',
            repoPath: '/srv/notes',
            callback: vi.fn(),
            times: ['08:00', '8pm'],
        });

        expect(trigger.start()).toBe(false);
        expect(cronMock.schedule).not.toHaveBeenCalled();
        expect(errors[0]).toBe("[ScheduleTrigger] Failed to start trigger 'bad': invalid time '8pm' (expected HH:MM)");
    });

    it('stops tasks already created when scheduling throws', () => {
        cronMock.schedule.mockImplementationOnce((expression: string, tick: () => void, options: unknown) => {
            const task = { expression, tick, options, stop: vi.fn() };
            cronMock.tasks.push(task);
            return task;
        });
        cronMock.schedule.mockImplementationOnce(() => {
            throw new Error('Invalid timezone');
        });
        const trigger = new ScheduleTrigger({
            id: 'tz',
            repoPath: '/srv/notes',
            callback: vi.fn(),
            times: ['08:00', '20:00'],
            timezone: 'Mars/Olympus',
        });

        expect(trigger.start()).toBe(false);
        expect(trigger.isScheduled).toBe(false);
        expect(cronMock.tasks[0]?.stop).toHaveBeenCalledOnce();
        expect(errors[0]).toBe("[ScheduleTrigger] Failed to start trigger 'tz': Invalid timezone");
    });

    it('invokes the callback with an empty change-set on each tick', () => {
        const callback = vi.fn();
        const trigger = new ScheduleTrigger({ id: 'n', repoPath: '/srv/notes', callback, times: ['18:00'] });
        trigger.start();

        cronMock.tasks[0]?.tick();

        expect(callback).toHaveBeenCalledWith('/srv/notes', []);
        expect(trigger.status().lastFiredAt).toBe('2026-05-01T18:00:00.000Z');
    });

    it('skips ticks while paused', () => {
        const callback = vi.fn();
        const trigger = new ScheduleTrigger({ id: 'n', repoPath: '/srv/notes', callback, times: ['18:00'] });
        trigger.start();

        trigger.pause();
        cronMock.tasks[0]?.tick();
        expect(callback).not.toHaveBeenCalled();
        expect(trigger.status().isPaused).toBe(true);

        trigger.resume();
        cronMock.tasks[0]?.tick();
        expect(callback).toHaveBeenCalledOnce();
    });

    it('skips a firing while the previous async run is in flight', async () => {
        let release: () => void = () => undefined;
        const running = new Promise<void>((resolve) => {
            release = resolve;
        });
        const callback = vi.fn().mockReturnValueOnce(running);
        const trigger = new ScheduleTrigger({ id: 'n', repoPath: '/srv/notes', callback, times: ['18:00'] });

        expect(trigger.fire()).toBe(true);
        expect(trigger.fire()).toBe(false);

        release();
        await flushMicrotasks();

        expect(trigger.fire()).toBe(true);
        expect(callback).toHaveBeenCalledTimes(2);
    });

    it('reports fired and failed runs as events', async () => {
        const events: TriggerEvent[] = [];
        const callback = vi
            .fn()
            .mockImplementationOnce(() => undefined)
            .mockImplementationOnce(() => {
                throw new Error('nothing to commit');
            })
            .mockRejectedValueOnce(new Error('push rejected'));
        const trigger = new ScheduleTrigger({
            id: 'n',
            repoPath: '/srv/notes',
            callback,
            times: ['18:00'],
            onEvent: (event) => events.push(event),
        });

        trigger.fire();
        trigger.fire();
        trigger.fire();
        await flushMicrotasks();

        expect(events.map((event) => [event.type, event.kind, event.changeCount, event.error])).toEqual([
            ['trigger:fired', 'schedule', 0, undefined],
            ['trigger:error', 'schedule', 0, 'nothing to commit'],
            ['trigger:error', 'schedule', 0, 'push rejected'],
        ]);
        expect(errors[0]).toBe("[ScheduleTrigger] Commit callback for trigger 'n' failed: nothing to commit");
    });

    it('stop cancels every task', () => {
        const trigger = new ScheduleTrigger({
            id: 'n',
            repoPath: '/srv/notes',
            callback: vi.fn(),
            times: ['08:00', '20:00'],
        });
        trigger.start();

        expect(trigger.stop()).toBe(true);
        expect(trigger.isScheduled).toBe(false);
        for (const task of cronMock.tasks) {
            expect(task.stop).toHaveBeenCalledOnce();
        }
        expect(trigger.stop()).toBe(true);
    });

    it('reports its status', () => {
        const trigger = new ScheduleTrigger({ id: 'n', repoPath: '/srv/notes', callback: vi.fn(), times: ['08:00'] });

        expect(trigger.status()).toEqual({
            isScheduled: false,
            isPaused: false,
            times: ['08:00'],
            lastFiredAt: null,
        });
    });
});
