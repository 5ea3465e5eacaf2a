import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { subscribeWithChokidar } from '../../src/services/watch-subscription.js';
import type { ChangeKind, WatchSubscription } from '../../src/types/file-watcher.js';

describe('subscribeWithChokidar', () => {
    let root = '';
    let subscription: WatchSubscription | null = null;

    beforeEach(async () => {
        root = await mkdtemp(path.join(os.tmpdir(), 'commitwatch-chokidar-'));
    });

    afterEach(async () => {
        await subscription?.close();
        subscription = null;
        await rm(root, { recursive: true, force: true });
    });

    it('reports a new file as created with its absolute path', async () => {
        const seen: Array<[string, ChangeKind]> = [];
        const onError = vi.fn();
        subscription = subscribeWithChokidar(root, {
            onChange: (filePath, kind) => {
                seen.push([filePath, kind]);
            },
            onError,
        });

        // Give chokidar time to finish its initial scan before writing.
        await new Promise((resolve) => setTimeout(resolve, 300));
        await writeFile(path.join(root, 'note.txt'), 'hello', 'utf8');

        await vi.waitFor(
            () => {
                expect(seen).toContainEqual([path.join(root, 'note.txt'), 'created']);
            },
            { timeout: 4000, interval: 50 },
        );
        expect(onError).not.toHaveBeenCalled();
    });

    it('close resolves and releases the watcher', async () => {
        const handle = subscribeWithChokidar(root, { onChange: vi.fn(), onError: vi.fn() });

        await expect(handle.close()).resolves.toBeUndefined();
    });
});
