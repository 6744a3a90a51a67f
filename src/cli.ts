#!/usr/bin/env node

/**
 * CLI entrypoint for the stdio MCP server.
 *
 * - Parse CLI flags and load configuration.
 * - Start the server over stdio (the MCP transport).
 * - Provide stable `--help` and `--version` output.
 */
import { loadConfig, parseConfigArgs } from './config.js';
import { logger } from './logger.js';
import { runStdioServer } from './server.js';
import { describeError } from './thread/errors.js';

const VERSION = '0.1.0';

function printHelp(): void {
  process.stdout.write(
    [
      'outline-chat-mcp (stdio MCP server)',
      '',
      'Usage:',
      '  outline-chat-mcp [--root <dir>] [--threads <dir>] [--config <file>]',
      '',
      'Options:',
      '  --root     Root directory (default: cwd)',
      '  --threads  Threads directory relative to root (default: .outline-chat)',
      '  --config   JSON config file relative to root (default: outline-chat.json)',
      '  --help     Show help',
      '',
    ].join('\n')
  );
}

function argsContainHelp(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

function argsContainVersion(argv: string[]): boolean {
  return argv.includes('--version') || argv.includes('-v');
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argsContainHelp(argv)) {
    printHelp();
    return;
  }

  if (argsContainVersion(argv)) {
    process.stdout.write(`outline-chat-mcp ${VERSION}\n`);
    return;
  }

  const config = await loadConfig(parseConfigArgs(argv, process.cwd()));
  await runStdioServer(config);
}

try {
  await main();
} catch (error) {
  logger.fatal({ err: error }, 'server failed to start');
  process.stderr.write(`${describeError(error)}\n`);
  process.exitCode = 1;
}
