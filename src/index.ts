export { PathFilter, DEFAULT_IGNORE_PATTERNS, normalizeRelativePath } from './services/path-filter.js';
export { DebounceBuffer } from './services/debounce-buffer.js';
export type { DebounceBufferOptions } from './services/debounce-buffer.js';
export { FileWatcher, DEFAULT_DEBOUNCE_SECONDS, MAX_DEBOUNCE_SECONDS } from './services/file-watcher.js';
export type { FileWatcherOptions } from './services/file-watcher.js';
export { subscribeWithChokidar } from './services/watch-subscription.js';
export { ScheduleTrigger, timeToCronExpression } from './services/schedule-trigger.js';
export { TriggerRegistry, withTriggerRegistry } from './services/trigger-registry.js';
export type {
    FileTriggerOptions,
    FileTriggerRecord,
    ScheduleOptions,
    ScheduleTriggerRecord,
    TriggerRecord,
    TriggerRegistryOptions,
} from './services/trigger-registry.js';
export { summarizeChangeSet, formatChangeSummary, categorizePath } from './services/change-summary.js';
export type { ChangeSummary, ChangeType } from './services/change-summary.js';
export { readConfig, getConfigPath, DEFAULT_CONFIG } from './config/json-config.js';
export type { CommitWatchConfig, FileTriggerConfig, ScheduleTriggerConfig } from './config/json-config.js';
export type * from './types/file-watcher.js';
export type * from './types/scheduler.js';
export type * from './types/trigger.js';
