import { readConfig, type CommitWatchConfig } from '../config/json-config.js';
import { formatChangeSummary, summarizeChangeSet } from '../services/change-summary.js';
import { TriggerRegistry } from '../services/trigger-registry.js';
import { logThought } from '../utils/logger.js';
import type { CommitCallback } from '../types/file-watcher.js';

export interface RegistrationResult {
    registered: string[];
    failed: string[];
}

/**
 * Callback used by `watch` when no git layer is attached: reports each
 * settled change-set on stdout and in the daily log.
 */
export function createReportingCallback(print: (line: string) => void = console.log): CommitCallback {
    return async (repoPath, changes) => {
        const summary = formatChangeSummary(summarizeChangeSet(changes));
        print(`[commitwatch] ${repoPath}: ${summary}`);
        for (const change of changes) {
            print(`  ${change.kind.padEnd(8)} ${change.path}`);
        }
        await logThought(`[Watch] Commit signal for ${repoPath}: ${summary}`);
    };
}

/** Register every configured trigger. Failures are collected, not thrown. */
export function registerConfiguredTriggers(
    registry: TriggerRegistry,
    config: CommitWatchConfig,
    callback: CommitCallback,
): RegistrationResult {
    const result: RegistrationResult = { registered: [], failed: [] };

    for (const trigger of config.triggers.files) {
        const ok = registry.addFileTrigger(
            trigger.id,
            trigger.repoPath,
            callback,
            [...config.defaults.ignorePatterns, ...trigger.ignorePatterns],
            trigger.debounceSeconds ?? config.defaults.debounceSeconds,
            { useDefaultIgnores: trigger.useDefaultIgnores },
        );
        (ok ? result.registered : result.failed).push(trigger.id);
    }

    for (const trigger of config.triggers.schedules) {
        const ok = registry.addScheduleTrigger(trigger.id, trigger.repoPath, callback, trigger.times, {
            timezone: trigger.timezone,
        });
        (ok ? result.registered : result.failed).push(trigger.id);
    }

    return result;
}

/** Value of `--config <path>` or `--config=<path>`, if present. */
export function parseConfigFlag(argv: string[]): string | undefined {
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--config') return argv[i + 1];
        if (arg?.startsWith('--config=')) return arg.slice('--config='.length);
    }
    return undefined;
}

/**
 * Handle the `watch` command.
 * Builds a registry from the config file and keeps running until SIGINT/SIGTERM.
 * Returns `true` when the command was recognized and handled.
 */
export async function handleWatchCli(argv: string[]): Promise<boolean> {
    if (argv[0] !== 'watch') return false;

    let config: CommitWatchConfig;
    try {
        config = await readConfig(parseConfigFlag(argv));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[commitwatch] ${message}`);
        process.exitCode = 1;
        return true;
    }

    const registry = new TriggerRegistry();
    const { registered, failed } = registerConfiguredTriggers(registry, config, createReportingCallback());

    for (const id of failed) {
        console.error(`[commitwatch] Trigger '${id}' could not be started.`);
    }

    if (registered.length === 0) {
        console.error('[commitwatch] No triggers are running. Check the trigger list in your config file.');
        registry.clearAll();
        process.exitCode = 1;
        return true;
    }

    registry.start();
    const status = registry.getStatus();
    console.log(
        `[commitwatch] Watching ${status.activeWatchers} path(s) with ${status.scheduleTriggers} schedule(s). Press Ctrl+C to stop.`,
    );

    const shutdown = (signal: NodeJS.Signals): void => {
        registry.clearAll();
        registry.stop();
        void registry.closed().then(async () => {
            await logThought(`[Watch] Received ${signal}; all triggers stopped.`);
            process.exit(0);
        });
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
    return true;
}
