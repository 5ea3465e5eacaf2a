#!/usr/bin/env node
import { handleHelpCli, handleUnknownCommand } from './core/cli.js';
import { handleLogsCli } from './core/logs-cli.js';
import { handleWatchCli } from './core/watch-cli.js';

async function main(argv: string[]): Promise<void> {
    if (handleHelpCli(argv)) return;
    if (handleUnknownCommand(argv)) return;
    if (await handleLogsCli(argv)) return;
    await handleWatchCli(argv);
}

main(process.argv.slice(2)).catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[commitwatch] ${message}`);
    process.exit(1);
});
