import { access, readdir, readFile } from 'node:fs/promises';
import { basename, relative } from 'node:path';
import type { OutlineChatConfig } from '../config.js';
import { logger } from '../logger.js';
import type { Transport } from '../transport/types.js';
import { THREAD_FILE_EXTENSION } from './constants.js';
import { appendTopLevelHeading, buildThreadText } from './edit.js';
import { collectAncestors, extractEntry } from './entry.js';
import { buildMessages } from './messages.js';
import type { DocumentNode, Message, ParsedOutline } from './model.js';
import { findLastNode, findNodeAtLine, parseOutline } from './parse.js';
import { quoteRegion, resolveRegionFilters, resolveSourceContext } from './quote.js';
import { respond, type ResponseHandle } from './respond.js';
import { withThreadSession } from './session.js';
import {
  assertSafeId,
  ensureWritableThreadsDir,
  readThreadFile,
  resolveThreadPath,
  resolveThreadsDir,
  sha256Hex,
  threadIdForDate,
  writeFileAtomicExclusive,
} from './storage.js';
import { buildOutlineView, type OutlineViewNode } from './view.js';

/**
 * Public API for thread operations.
 *
 * This module is the boundary between:
 * - filesystem storage (`storage.ts`)
 * - outline parsing and conversation building (`parse.ts`, `entry.ts`, `messages.ts`)
 * - document edits (`edit.ts`, `respond.ts`)
 *
 * Concurrency model:
 * - Mutating operations accept `ifMatch` (etag) for optimistic concurrency.
 * - The etag is a SHA-256 of the full document content.
 * - Edits to one thread from this process share a session (`session.ts`), so
 *   overlapping responses each keep their own reply.
 */
export interface ThreadSummary {
  threadId: string;
  title: string;
  path: string;
  headings: number;
}

export interface ListThreadsOptions {
  query?: string;
}

const TITLE_MAX_LENGTH = 80;

function normalizeQuery(query: string | undefined): string | undefined {
  const q = query?.trim();
  return q ? q.toLowerCase() : undefined;
}

/**
 * First non-blank line of the opening message, used as the thread title.
 */
function extractTitle(outline: ParsedOutline): string | undefined {
  const first = outline.roots[0];
  if (!first) return undefined;
  const line = extractEntry(first)
    .body.split('\n')
    .map((part) => part.trim())
    .find(Boolean);
  if (!line) return undefined;
  return line.length > TITLE_MAX_LENGTH ? `${line.slice(0, TITLE_MAX_LENGTH - 1)}…` : line;
}

/**
 * Enforce optimistic concurrency when an `ifMatch` etag is provided.
 */
function requireIfMatch(currentEtag: string, ifMatch: string | undefined): void {
  if (!ifMatch) return;
  if (ifMatch !== currentEtag) {
    throw new Error(`CONFLICT: etag mismatch (current=${currentEtag}, ifMatch=${ifMatch})`);
  }
}

/**
 * Pick the node a 1-based line points into, or the last node when omitted
 * (a cursor at the end of the file).
 */
function selectNode(outline: ParsedOutline, line: number | undefined): DocumentNode {
  if (line === undefined) return findLastNode(outline);
  return findNodeAtLine(outline, line - 1);
}

/**
 * List thread files within `config.threadsDir`, oldest first.
 */
export async function listThreads(
  config: OutlineChatConfig,
  options: ListThreadsOptions
): Promise<ThreadSummary[]> {
  const threadsDir = resolveThreadsDir(config);
  try {
    await access(threadsDir);
  } catch {
    return [];
  }

  const query = normalizeQuery(options.query);
  const entries = await readdir(threadsDir, { withFileTypes: true });
  const summaries: ThreadSummary[] = [];

  for (const entry of entries) {
    if (!entry.isFile()) continue;
    if (!entry.name.endsWith(THREAD_FILE_EXTENSION)) continue;
    const threadId = basename(entry.name, THREAD_FILE_EXTENSION);
    try {
      assertSafeId('threadId', threadId);
    } catch {
      continue;
    }

    const absolutePath = resolveThreadPath(config, threadId);
    const outline = parseOutline(await readFile(absolutePath, 'utf8'));
    const title = extractTitle(outline) ?? threadId;

    if (query) {
      const haystack = `${threadId}\n${title}`.toLowerCase();
      if (!haystack.includes(query)) continue;
    }

    summaries.push({
      threadId,
      title,
      path: relative(config.rootDir, absolutePath),
      headings: outline.nodes.length,
    });
  }

  summaries.sort((a, b) => a.threadId.localeCompare(b.threadId));
  return summaries;
}

export interface GetThreadOptions {
  threadId: string;
  includeBodies?: boolean;
}

export interface ThreadView {
  threadId: string;
  title: string;
  path: string;
  outline: OutlineViewNode[];
}

export async function getThread(
  config: OutlineChatConfig,
  options: GetThreadOptions
): Promise<{ thread: ThreadView; etag: string }> {
  const { absolutePath, text, etag } = await readThreadFile(config, options.threadId);
  const outline = parseOutline(text);
  return {
    thread: {
      threadId: options.threadId,
      title: extractTitle(outline) ?? options.threadId,
      path: relative(config.rootDir, absolutePath),
      outline: buildOutlineView(outline.roots, { includeBody: options.includeBodies ?? true }),
    },
    etag,
  };
}

export interface CreateThreadOptions {
  /** Selected text that opens the thread. */
  region?: string;
  /** Mode name of the region's source (`python`, ...). */
  mode?: string;
  /** File the region came from; used to infer the mode. */
  fileName?: string;
  /** Creation time; decides the thread id. */
  now?: Date;
}

export type CreateThreadResult = {
  threadId: string;
  path: string;
  etag: string;
  /** 1-based line where the user continues typing. */
  line: number;
};

/**
 * Create a new thread file with one top-level user heading.
 *
 * The storage directory is checked first; the file is created exclusively,
 * so a failure leaves nothing behind.
 */
export async function createThread(
  config: OutlineChatConfig,
  options: CreateThreadOptions = {}
): Promise<CreateThreadResult> {
  await ensureWritableThreadsDir(config);

  const threadId = threadIdForDate(options.now ?? new Date());
  const absolutePath = resolveThreadPath(config, threadId);

  let quoted: string | undefined;
  if (options.region !== undefined) {
    const source = resolveSourceContext({ mode: options.mode, fileName: options.fileName });
    quoted = quoteRegion(options.region, source, resolveRegionFilters(config.regionFilters));
  }
  const text = buildThreadText(config.roles.userName, quoted);

  try {
    await writeFileAtomicExclusive(absolutePath, text);
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'EEXIST') throw new Error(`Thread already exists: ${threadId}`);
    throw error;
  }

  logger.info({ threadId, seeded: quoted !== undefined }, 'thread created');
  return {
    threadId,
    path: relative(config.rootDir, absolutePath),
    etag: sha256Hex(text),
    line: text.split('\n').length,
  };
}

export interface AppendHeadingOptions {
  threadId: string;
  ifMatch?: string;
}

/**
 * Append a new top-level user heading to an existing thread.
 */
export async function appendHeading(
  config: OutlineChatConfig,
  options: AppendHeadingOptions
): Promise<{ line: number; etag: string }> {
  const absolutePath = resolveThreadPath(config, options.threadId);
  return withThreadSession(
    absolutePath,
    () => readThreadFile(config, options.threadId),
    async (session) => {
      requireIfMatch(session.etag, options.ifMatch);
      const { buffer } = session;
      const { newText, line } = appendTopLevelHeading(buffer.text, config.roles.userName);
      buffer.insert(buffer.length, newText.slice(buffer.length));
      return { line: line + 1, etag: await session.save() };
    }
  );
}

export interface PreviewMessagesOptions {
  threadId: string;
  /** 1-based line inside the target node; defaults to the last node. */
  line?: number;
}

/**
 * Build the conversation for a node without calling a transport.
 */
export async function previewMessages(
  config: OutlineChatConfig,
  options: PreviewMessagesOptions
): Promise<{ heading: string; line: number; messages: Message[]; etag: string }> {
  const { text, etag } = await readThreadFile(config, options.threadId);
  const node = selectNode(parseOutline(text), options.line);
  return {
    heading: node.heading,
    line: node.line + 1,
    messages: buildMessages(collectAncestors(node), config.roles),
    etag,
  };
}

export interface RespondInThreadOptions {
  threadId: string;
  /** 1-based line inside the target node; defaults to the last node. */
  line?: number;
  ifMatch?: string;
  transport: Transport;
  /** Receives each streamed fragment as it lands in the document. */
  onText?: (text: string) => void;
}

export type RespondInThreadResult = {
  reply: string;
  /** 1-based line of the new assistant heading. */
  aiLine: number;
  /** 1-based line of the reserved user heading, after streaming. */
  userLine: number;
  etag: string;
};

/**
 * Respond at a node and persist the thread once the transport settles.
 *
 * `line` refers to the file as last saved. The document is written whether
 * or not the transport succeeds; on failure the created headings stay and the
 * `TransportError` is rethrown.
 */
export async function respondInThread(
  config: OutlineChatConfig,
  options: RespondInThreadOptions
): Promise<RespondInThreadResult> {
  const absolutePath = resolveThreadPath(config, options.threadId);
  return withThreadSession(
    absolutePath,
    () => readThreadFile(config, options.threadId),
    async (session) => {
      requireIfMatch(session.etag, options.ifMatch);
      const { buffer } = session;
      const node = session.locate(options.line);
      const log = logger.child({ threadId: options.threadId, line: node.line + 1 });

      const before = buffer.text;
      let handle: ResponseHandle;
      try {
        handle = respond(buffer, node, config.roles, options.transport, { onText: options.onText });
      } catch (error) {
        log.error({ err: error }, 'response failed to start');
        if (buffer.text !== before) await session.save();
        throw error;
      }
      log.info({ messages: handle.messages.length }, 'response started');

      // Inside the heading line, so inserts at line starts never land on it.
      const anchor = buffer.createMarker(buffer.offsetOfLine(handle.aiNode.line) + 1);
      try {
        try {
          await handle.completion;
        } catch (error) {
          log.error({ err: error }, 'response failed');
          await session.save();
          throw error;
        }

        const aiLine = buffer.lineAt(anchor.offset);
        const aiNode = buffer.outline().nodes.find((candidate) => candidate.line === aiLine);
        const siblings = aiNode?.parent?.children ?? [];
        const userNode = aiNode ? siblings[siblings.indexOf(aiNode) + 1] : undefined;
        const reply = aiNode ? extractEntry(aiNode).body : '';

        const etag = await session.save();
        log.info('response finished');
        return {
          reply,
          aiLine: aiLine + 1,
          userLine: (userNode?.line ?? aiLine + 3) + 1,
          etag,
        };
      } finally {
        anchor.release();
      }
    }
  );
}
