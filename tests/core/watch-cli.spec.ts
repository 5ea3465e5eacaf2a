import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { CommitWatchConfig } from '../../src/config/json-config.js';
import { TriggerRegistry } from '../../src/services/trigger-registry.js';
import { FakeWatchHub } from '../helpers/fake-watch.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

import {
  createReportingCallback,
  handleWatchCli,
  parseConfigFlag,
  registerConfiguredTriggers,
} from '../../src/core/watch-cli.js';

describe('watch CLI', () => {
  let tempDir = '';
  let errors: string[];

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'commitwatch-watch-cli-'));
    process.exitCode = undefined;
    errors = [];
    vi.spyOn(console, 'error').mockImplementation((...args) => errors.push(args.join(' ')));
  });

  afterEach(async () => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it('parses the --config flag in both forms', () => {
    expect(parseConfigFlag(['watch', '--config', 'a.json'])).toBe('a.json');
    expect(parseConfigFlag(['watch', '--config=b.json'])).toBe('b.json');
    expect(parseConfigFlag(['watch'])).toBeUndefined();
  });

  it('prints a summary line and one line per change', async () => {
    const lines: string[] = [];
    const callback = createReportingCallback((line) => lines.push(line));

    await callback('/repo', [
      { path: 'src/a.ts', kind: 'created', detectedAt: '2026-05-01T12:00:00.000Z' },
      { path: 'old.md', kind: 'deleted', detectedAt: '2026-05-01T12:00:00.000Z' },
    ]);

    expect(lines).toEqual([
      '[commitwatch] /repo: 2 change(s) [mixed]: +1 ~0 -1 (docs: 1, source: 1)',
      '  created  src/a.ts',
      '  deleted  old.md',
    ]);
  });

  it('registers configured triggers with merged ignore patterns', () => {
    vi.useFakeTimers();
    const hub = new FakeWatchHub();
    const registry = new TriggerRegistry({ subscribe: hub.subscribe });
    const callback = vi.fn();
    const config: CommitWatchConfig = {
      defaults: { debounceSeconds: 2, ignorePatterns: ['*.log'] },
      triggers: {
        files: [
          { id: 'notes', repoPath: tempDir, ignorePatterns: ['drafts/'] },
          { id: 'gone', repoPath: path.join(tempDir, 'missing'), ignorePatterns: [] },
        ],
        schedules: [],
      },
    };

    const result = registerConfiguredTriggers(registry, config, callback);

    expect(result).toEqual({ registered: ['notes'], failed: ['gone'] });

    const subscription = hub.latest();
    subscription.emit('debug.log');
    subscription.emit('drafts/idea.md');
    subscription.emit('todo.md');
    vi.advanceTimersByTime(1999);
    expect(callback).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(callback.mock.calls[0]?.[1].map((entry: { path: string }) => entry.path)).toEqual(['todo.md']);

    registry.clearAll();
  });

  it('ignores other commands', async () => {
    expect(await handleWatchCli(['logs'])).toBe(false);
    expect(await handleWatchCli([])).toBe(false);
  });

  it('fails when the config file cannot be parsed', async () => {
    const configPath = path.join(tempDir, 'commitwatch.json');
    await writeFile(configPath, '{ nope', 'utf8');

    expect(await handleWatchCli(['watch', '--config', configPath])).toBe(true);
    expect(process.exitCode).toBe(1);
    expect(errors[0]).toMatch(/^\[commitwatch\] Failed to parse config file at /);
  });

  it('fails when no trigger could be started', async () => {
    const configPath = path.join(tempDir, 'commitwatch.json');
    await writeFile(
      configPath,
      JSON.stringify({ triggers: { files: [{ id: 'gone', repoPath: path.join(tempDir, 'missing') }] } }),
      'utf8',
    );

    expect(await handleWatchCli(['watch', '--config', configPath])).toBe(true);
    expect(process.exitCode).toBe(1);
    expect(errors).toContain("[commitwatch] Trigger 'gone' could not be started.");
    expect(errors).toContain('[commitwatch] No triggers are running. Check the trigger list in your config file.');
  });
});
