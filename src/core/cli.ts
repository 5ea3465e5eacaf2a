// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: commitwatch <command> [options]

Commands:
  watch               Start every trigger from the config file and report commit signals
  logs                Print today's log file

Options:
  --config <path>     Config file for 'watch' (default: ./commitwatch.json or $COMMITWATCH_CONFIG_PATH)
  --follow, -f        Keep printing new log lines (logs only)
  --help, -h          Show this help message

Examples:
  commitwatch watch
  commitwatch watch --config ./repos.json
  commitwatch logs --follow
`.trim();

const KNOWN_COMMANDS = new Set(['watch', 'logs']);

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags, or a bare invocation.
 * Returns `true` when help was printed.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (argv.length > 0 && !argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Reject a first argument that is neither a known command nor a flag.
 * Returns `true` after printing the error and setting exit code 1.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  if (argv.length === 0) return false;

  const command = argv[0] ?? '';
  if (KNOWN_COMMANDS.has(command) || command.startsWith('-')) {
    return false;
  }

  console.error(`[commitwatch] Unknown command: '${command}'`);
  console.error(`Run 'commitwatch --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}
