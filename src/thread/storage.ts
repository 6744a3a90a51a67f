import { createHash, randomUUID } from 'node:crypto';
import { constants } from 'node:fs';
import { access, link, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import type { OutlineChatConfig } from '../config.js';
import { THREAD_FILE_EXTENSION, THREAD_FILE_PREFIX } from './constants.js';
import { ConfigurationError } from './errors.js';
import { assertSafeId } from './id.js';

export { assertSafeId } from './id.js';

/**
 * Filesystem helpers for thread storage.
 *
 * Responsibilities:
 * - Normalize and validate ids and paths.
 * - Ensure all reads/writes stay within `config.rootDir`.
 * - Provide content hashing (etag) and atomic writes.
 */
export interface ReadThreadFileResult {
  absolutePath: string;
  text: string;
  etag: string;
}

/**
 * Hex-encoded SHA-256 digest, used as the document etag.
 */
export function sha256Hex(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Enforce that `absolutePath` does not escape `rootDir`.
 *
 * This is a lexical guard only; symlinks under `rootDir` are not resolved.
 */
function assertPathWithinRoot(rootDir: string, absolutePath: string): void {
  const rel = relative(rootDir, absolutePath);
  if (rel === '' || rel === '.') return;

  // On Windows, `path.relative()` can return an absolute path if drives differ.
  if (isAbsolute(rel)) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }

  const parts = rel.split(sep);
  if (parts.includes('..')) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }
}

export function resolveThreadsDir(config: OutlineChatConfig): string {
  const rootDir = resolve(config.rootDir);
  const threadsDir = resolve(rootDir, config.threadsDir);
  assertPathWithinRoot(rootDir, threadsDir);
  return threadsDir;
}

export function resolveThreadPath(config: OutlineChatConfig, threadId: string): string {
  assertSafeId('threadId', threadId);
  const threadsDir = resolveThreadsDir(config);
  const absolutePath = resolve(threadsDir, `${threadId}${THREAD_FILE_EXTENSION}`);
  assertPathWithinRoot(resolve(config.rootDir), absolutePath);
  return absolutePath;
}

/**
 * Create the threads directory if needed and check that it is writable.
 */
export async function ensureWritableThreadsDir(config: OutlineChatConfig): Promise<string> {
  const threadsDir = resolveThreadsDir(config);
  try {
    await mkdir(threadsDir, { recursive: true });
    await access(threadsDir, constants.W_OK);
  } catch (error) {
    throw new ConfigurationError(`Threads directory is not writable: ${threadsDir}`, error);
  }
  return threadsDir;
}

/**
 * Thread id for a creation time: fixed prefix plus a UTC timestamp down to
 * the millisecond (`chat-20261019T141503123`).
 */
export function threadIdForDate(date: Date): string {
  const pad = (value: number, width = 2): string => String(value).padStart(width, '0');
  const stamp =
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    pad(date.getUTCMilliseconds(), 3);
  return `${THREAD_FILE_PREFIX}${stamp}`;
}

export async function readThreadFile(
  config: OutlineChatConfig,
  threadId: string
): Promise<ReadThreadFileResult> {
  const absolutePath = resolveThreadPath(config, threadId);
  const text = await readFile(absolutePath, 'utf8');
  return { absolutePath, text, etag: sha256Hex(text) };
}

/**
 * Write a file via a temporary path and atomic rename.
 */
export async function writeFileAtomic(absolutePath: string, text: string): Promise<void> {
  const dir = dirname(absolutePath);
  await mkdir(dir, { recursive: true });
  const tmpPath = `${absolutePath}.tmp.${randomUUID()}`;
  await writeFile(tmpPath, text, 'utf8');
  await rename(tmpPath, absolutePath);
}

/**
 * Write a file via a temporary path, but fail if the destination already exists.
 *
 * The temp file is `link()`ed into place (EEXIST if taken) and then removed,
 * so a failed create leaves no thread file behind.
 */
export async function writeFileAtomicExclusive(absolutePath: string, text: string): Promise<void> {
  const dir = dirname(absolutePath);
  await mkdir(dir, { recursive: true });

  const tmpPath = `${absolutePath}.tmp.${randomUUID()}`;
  await writeFile(tmpPath, text, 'utf8');
  try {
    await link(tmpPath, absolutePath);
  } finally {
    await rm(tmpPath, { force: true });
  }
}
