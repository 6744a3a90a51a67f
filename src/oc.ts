#!/usr/bin/env node

/**
 * `outline-chat` - local CLI for outline-chat threads.
 *
 * This CLI sits alongside the stdio server; both share the same thread API so
 * behavior stays in sync.
 *
 * This module is imported by tests, so it must NOT auto-run when imported.
 * The bottom-of-file "isMain" guard ensures that.
 */

import { readFileSync } from 'node:fs';
import { readFile as readFileAsync } from 'node:fs/promises';
import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig, type ConfigSources, type OutlineChatConfig } from './config.js';
import {
  appendHeading,
  createThread,
  getThread,
  listThreads,
  previewMessages,
  respondInThread,
} from './thread/api.js';
import { DEFAULT_CONFIG_FILE, DEFAULT_THREADS_DIR } from './thread/constants.js';
import { describeError } from './thread/errors.js';
import { OpenAiCompatibleTransport } from './transport/openai.js';
import type { Transport } from './transport/types.js';

export interface OcIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
  /** Builds the transport for `thread respond`. */
  createTransport?: (config: OutlineChatConfig) => Transport;
}

function helpText(defaultRoot: string): string {
  return [
    'outline-chat — branching LLM conversations in outline files',
    '',
    'Usage:',
    '  outline-chat [--root <dir>] [--threads <dir>] [--config <file>] <cmd>',
    '',
    'Thread:',
    '  outline-chat thread list [--query <text>]',
    '  outline-chat thread get <threadId> [--no-bodies]',
    '  outline-chat thread new [--region <text>|--region-stdin|--region-file <path>] [--mode <name>]',
    '  outline-chat thread heading <threadId> [--if-match <etag>]',
    '  outline-chat thread messages <threadId> [--line <n>]',
    '  outline-chat thread respond <threadId> [--line <n>] [--if-match <etag>] [--stream]',
    '',
    'Notes:',
    `  Defaults: --root=${defaultRoot} --threads=${DEFAULT_THREADS_DIR} --config=${DEFAULT_CONFIG_FILE}`,
    '  --line is 1-based and may point anywhere inside a heading; it defaults to the last heading.',
    '  --stream echoes the reply to stderr as it arrives.',
    '  Output: JSON to stdout; errors to stderr.',
    '',
  ].join('\n');
}

function writeHelp(io: OcIo, defaultRoot: string): void {
  io.stdout.write(helpText(defaultRoot));
}

function writeJson(io: OcIo, value: unknown): void {
  io.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Consume a boolean flag from argv.
 */
function takeFlag(argv: string[], flag: string): boolean {
  const index = argv.indexOf(flag);
  if (index === -1) return false;
  argv.splice(index, 1);
  return true;
}

/**
 * Consume a `--flag value` or `--flag=value` option from argv.
 *
 * Returns undefined when absent. Throws if present but missing a value.
 */
function takeOption(argv: string[], flag: string): string | undefined {
  const indexEq = argv.findIndex((arg) => arg.startsWith(`${flag}=`));
  if (indexEq !== -1) {
    const value = argv[indexEq]?.slice(flag.length + 1);
    argv.splice(indexEq, 1);
    if (!value) throw new Error(`Missing value for ${flag}`);
    return value;
  }

  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  argv.splice(index, 2);
  if (!value || value.startsWith('--')) throw new Error(`Missing value for ${flag}`);
  return value;
}

function assertNoUnknownFlags(argv: string[]): void {
  const unknown = argv.find((arg) => arg.startsWith('--'));
  if (unknown) throw new Error(`Unknown option: ${unknown}`);
}

function parseLine(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const line = Number(value);
  if (!Number.isInteger(line) || line < 1) throw new Error(`Invalid --line: ${JSON.stringify(value)}`);
  return line;
}

/**
 * Read region input flags. At most one source may be given.
 */
async function takeRegionArgs(argv: string[], defaultRoot: string): Promise<{ region?: string; fileName?: string }> {
  const regionStdin = takeFlag(argv, '--region-stdin');
  const regionFile = takeOption(argv, '--region-file');
  const regionInline = takeOption(argv, '--region');

  const selected = [regionStdin, regionFile !== undefined, regionInline !== undefined].filter(Boolean).length;
  if (selected > 1) {
    throw new Error('Region flags are mutually exclusive: use only one of --region, --region-file, --region-stdin');
  }

  if (regionInline !== undefined) return { region: regionInline };
  if (regionFile !== undefined) {
    const absolute = resolvePath(defaultRoot, regionFile);
    return { region: await readFileAsync(absolute, 'utf8'), fileName: absolute };
  }
  if (regionStdin) return { region: readFileSync(0, 'utf8') };
  return {};
}

function takeConfigSources(argv: string[], defaultRoot: string, env: NodeJS.ProcessEnv): ConfigSources {
  const rootArg = takeOption(argv, '--root');
  return {
    rootDir: rootArg ? resolvePath(defaultRoot, rootArg) : defaultRoot,
    threadsDir: takeOption(argv, '--threads'),
    configFile: takeOption(argv, '--config'),
    env,
  };
}

/**
 * Execute `outline-chat thread ...` commands.
 */
async function handleThreadCommand(
  config: OutlineChatConfig,
  argv: string[],
  io: OcIo,
  defaultRoot: string
): Promise<number> {
  const sub = argv.shift();

  if (sub === 'list') {
    const query = takeOption(argv, '--query');
    assertNoUnknownFlags(argv);
    writeJson(io, { threads: await listThreads(config, { query }) });
    return 0;
  }

  if (sub === 'get') {
    const threadId = argv.shift();
    const includeBodies = !takeFlag(argv, '--no-bodies');
    assertNoUnknownFlags(argv);
    if (!threadId) throw new Error('Missing <threadId>');
    writeJson(io, await getThread(config, { threadId, includeBodies }));
    return 0;
  }

  if (sub === 'new') {
    const { region, fileName } = await takeRegionArgs(argv, defaultRoot);
    const mode = takeOption(argv, '--mode');
    assertNoUnknownFlags(argv);
    writeJson(io, await createThread(config, { region, fileName, mode }));
    return 0;
  }

  if (sub === 'heading') {
    const threadId = argv.shift();
    const ifMatch = takeOption(argv, '--if-match');
    assertNoUnknownFlags(argv);
    if (!threadId) throw new Error('Missing <threadId>');
    writeJson(io, await appendHeading(config, { threadId, ifMatch }));
    return 0;
  }

  if (sub === 'messages') {
    const threadId = argv.shift();
    const line = parseLine(takeOption(argv, '--line'));
    assertNoUnknownFlags(argv);
    if (!threadId) throw new Error('Missing <threadId>');
    writeJson(io, await previewMessages(config, { threadId, line }));
    return 0;
  }

  if (sub === 'respond') {
    const threadId = argv.shift();
    const line = parseLine(takeOption(argv, '--line'));
    const ifMatch = takeOption(argv, '--if-match');
    const stream = takeFlag(argv, '--stream');
    assertNoUnknownFlags(argv);
    if (!threadId) throw new Error('Missing <threadId>');
    const createTransport =
      io.createTransport ?? ((current: OutlineChatConfig) => new OpenAiCompatibleTransport(current.transport));
    const result = await respondInThread(config, {
      threadId,
      line,
      ifMatch,
      transport: createTransport(config),
      onText: stream ? (text) => io.stderr.write(text) : undefined,
    });
    if (stream) io.stderr.write('\n');
    writeJson(io, result);
    return 0;
  }

  throw new Error(`Unknown thread command: ${sub ?? '(missing)'}`);
}

/**
 * Run the CLI with a provided argv array (excluding `node` and script path).
 *
 * Returns an exit code, but does not call `process.exit()`.
 */
export async function runOcCli(
  args: string[],
  io: OcIo = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  const argv = [...args];
  const defaultRoot = process.cwd();

  try {
    if (takeFlag(argv, '--help') || takeFlag(argv, '-h') || argv.length === 0) {
      writeHelp(io, defaultRoot);
      return 0;
    }

    const sources = takeConfigSources(argv, defaultRoot, io.env ?? process.env);
    const cmd = argv.shift();
    if (!cmd || cmd === 'help') {
      writeHelp(io, defaultRoot);
      return 0;
    }

    if (cmd === 'thread') {
      const config = await loadConfig(sources);
      return await handleThreadCommand(config, argv, io, defaultRoot);
    }

    throw new Error(`Unknown command: ${cmd}`);
  } catch (error) {
    io.stderr.write(`${describeError(error)}\n`);
    return 1;
  }
}

const isMain = resolvePath(process.argv[1] ?? '') === fileURLToPath(import.meta.url);
if (isMain) {
  const exitCode = await runOcCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}
