import { watch } from 'chokidar';
import type { ChangeKind, WatchSubscriber } from '../types/file-watcher.js';

const EVENT_KINDS: ReadonlyArray<readonly ['add' | 'change' | 'unlink', ChangeKind]> = [
    ['add', 'created'],
    ['change', 'modified'],
    ['unlink', 'deleted'],
];

/**
 * Default subscriber: a recursive chokidar watcher on `root`.
 *
 * Only file events are forwarded; directory add/remove shows up through the
 * files inside it.
 */
export const subscribeWithChokidar: WatchSubscriber = (root, handlers) => {
    const watcher = watch(root, {
        persistent: true,
        ignoreInitial: true,
        awaitWriteFinish: {
            stabilityThreshold: 300,
            pollInterval: 100,
        },
    });

    for (const [eventName, kind] of EVENT_KINDS) {
        watcher.on(eventName, (filePath: string) => {
            handlers.onChange(filePath, kind);
        });
    }

    watcher.on('error', (err: unknown) => {
        handlers.onError(err);
    });

    return {
        close: () => watcher.close(),
    };
};
