import * as fs from 'fs/promises';
import * as path from 'path';

export interface FileTriggerConfig {
    id: string;
    repoPath: string;
    ignorePatterns: string[];
    /** Quiet period in seconds. Falls back to `defaults.debounceSeconds`. */
    debounceSeconds?: number;
    useDefaultIgnores?: boolean;
}

export interface ScheduleTriggerConfig {
    id: string;
    repoPath: string;
    /** Wall-clock times of day, `HH:MM`. */
    times: string[];
    timezone?: string;
}

export interface CommitWatchConfig {
    defaults: {
        debounceSeconds: number;
        /** Patterns applied to every file trigger, ahead of its own. */
        ignorePatterns: string[];
    };
    triggers: {
        files: FileTriggerConfig[];
        schedules: ScheduleTriggerConfig[];
    };
}

export const DEFAULT_CONFIG_FILE = 'commitwatch.json';

function createDefaultConfig(): CommitWatchConfig {
    return {
        defaults: {
            debounceSeconds: 5,
            ignorePatterns: ['node_modules/', '*.log'],
        },
        triggers: {
            files: [],
            schedules: [],
        },
    };
}

export const DEFAULT_CONFIG: Readonly<CommitWatchConfig> = createDefaultConfig();

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.COMMITWATCH_CONFIG_PATH) {
        return path.resolve(process.env.COMMITWATCH_CONFIG_PATH);
    }
    return path.resolve(DEFAULT_CONFIG_FILE);
}

export async function readConfig(overridePath?: string): Promise<CommitWatchConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return createDefaultConfig();
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to read config file at ${targetPath}: ${message}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(rawData);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse config file at ${targetPath}: ${message}`);
    }
    return mergeWithDefaults(parsed);
}

// ── Validation ───────────────────────────────────────────────────────────────

function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
    return value instanceof Error && 'code' in value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
    return typeof value === 'string' && value.trim().length > 0;
}

function stringList(value: unknown): string[] | null {
    if (!Array.isArray(value)) return null;
    return value.filter((item): item is string => typeof item === 'string');
}

function parseFileTrigger(value: unknown, index: number): FileTriggerConfig | null {
    if (!isRecord(value) || !isNonEmptyString(value.id) || !isNonEmptyString(value.repoPath)) {
        console.warn(`[Config] Skipping file trigger #${index}: 'id' and 'repoPath' are required.`);
        return null;
    }

    const entry: FileTriggerConfig = {
        id: value.id,
        repoPath: value.repoPath,
        ignorePatterns: stringList(value.ignorePatterns) ?? [],
    };
    if (typeof value.debounceSeconds === 'number' && Number.isFinite(value.debounceSeconds) && value.debounceSeconds >= 0) {
        entry.debounceSeconds = value.debounceSeconds;
    }
    if (typeof value.useDefaultIgnores === 'boolean') {
        entry.useDefaultIgnores = value.useDefaultIgnores;
    }
    return entry;
}

function parseScheduleTrigger(value: unknown, index: number): ScheduleTriggerConfig | null {
    const times = isRecord(value) ? stringList(value.times) : null;
    if (!isRecord(value) || !isNonEmptyString(value.id) || !isNonEmptyString(value.repoPath) || !times || times.length === 0) {
        console.warn(`[Config] Skipping schedule trigger #${index}: 'id', 'repoPath' and 'times' are required.`);
        return null;
    }

    const entry: ScheduleTriggerConfig = { id: value.id, repoPath: value.repoPath, times };
    if (isNonEmptyString(value.timezone)) {
        entry.timezone = value.timezone;
    }
    return entry;
}

function mergeWithDefaults(loaded: unknown): CommitWatchConfig {
    const config = createDefaultConfig();
    if (!isRecord(loaded)) return config;

    if (isRecord(loaded.defaults)) {
        const { debounceSeconds, ignorePatterns } = loaded.defaults;
        if (typeof debounceSeconds === 'number' && Number.isFinite(debounceSeconds) && debounceSeconds >= 0) {
            config.defaults.debounceSeconds = debounceSeconds;
        }
        config.defaults.ignorePatterns = stringList(ignorePatterns) ?? config.defaults.ignorePatterns;
    }

    if (isRecord(loaded.triggers)) {
        const files = Array.isArray(loaded.triggers.files) ? loaded.triggers.files : [];
        const schedules = Array.isArray(loaded.triggers.schedules) ? loaded.triggers.schedules : [];

        config.triggers.files = files
            .map((value, index) => parseFileTrigger(value, index))
            .filter((entry): entry is FileTriggerConfig => entry !== null);
        config.triggers.schedules = schedules
            .map((value, index) => parseScheduleTrigger(value, index))
            .filter((entry): entry is ScheduleTriggerConfig => entry !== null);
    }

    return config;
}
