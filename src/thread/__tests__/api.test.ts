import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { OutlineChatConfig } from '../../config.js';
import type { Transport } from '../../transport/types.js';
import {
  appendHeading,
  createThread,
  getThread,
  listThreads,
  previewMessages,
  respondInThread,
} from '../api.js';
import { ConfigurationError, StructuralError, TransportError } from '../errors.js';
import { DEFAULT_REGION_FILTERS } from '../quote.js';

const CREATED_AT = new Date(Date.UTC(2026, 9, 19, 14, 15, 3, 123));
const THREAD_ID = 'chat-20261019T141503123';

let rootDir: string;
let config: OutlineChatConfig;

function threadPath(threadId: string): string {
  return join(rootDir, '.outline-chat', `${threadId}.org`);
}

function replyWith(...fragments: string[]): Transport {
  return {
    async send(_messages, marker) {
      for (const fragment of fragments) {
        await Promise.resolve();
        marker.insert(fragment);
      }
    },
  };
}

beforeEach(async () => {
  rootDir = await mkdtemp(join(tmpdir(), 'outline-chat-'));
  config = {
    rootDir,
    threadsDir: '.outline-chat',
    roles: { userName: 'User', aiName: 'AI', promptPreamble: 'Be brief.' },
    regionFilters: [...DEFAULT_REGION_FILTERS],
    transport: { baseUrl: 'http://localhost:1', model: 'test-model' },
  };
});

afterEach(async () => {
  await rm(rootDir, { recursive: true, force: true });
});

describe('createThread', () => {
  it('writes a timestamped file with one user heading', async () => {
    const created = await createThread(config, { now: CREATED_AT });

    expect(created.threadId).toBe(THREAD_ID);
    expect(created.path).toBe(join('.outline-chat', `${THREAD_ID}.org`));
    expect(created.line).toBe(3);
    expect(await readFile(threadPath(THREAD_ID), 'utf8')).toBe('* User\n\n');
  });

  it('seeds the thread with a quoted region', async () => {
    await createThread(config, { now: CREATED_AT, region: 'print(1)', fileName: 'script.py' });
    expect(await readFile(threadPath(THREAD_ID), 'utf8')).toBe(
      '* User\n\n#+begin_src python\nprint(1)\n#+end_src\n'
    );
  });

  it('uses the configured filters', async () => {
    config.regionFilters = ['enclose-in-code-block'];
    await createThread(config, { now: CREATED_AT, region: 'x', mode: 'sh' });
    expect(await readFile(threadPath(THREAD_ID), 'utf8')).toBe('* User\n\n#+begin_src sh\nx#+end_src\n');
  });

  it('refuses to overwrite an existing thread', async () => {
    await createThread(config, { now: CREATED_AT, region: 'first' });
    await expect(createThread(config, { now: CREATED_AT })).rejects.toThrow(`Thread already exists: ${THREAD_ID}`);
    expect(await readFile(threadPath(THREAD_ID), 'utf8')).toBe('* User\n\nfirst\n');
    expect(await readdir(join(rootDir, '.outline-chat'))).toEqual([`${THREAD_ID}.org`]);
  });

  it('reports an unusable threads directory as a configuration error', async () => {
    await writeFile(join(rootDir, 'blocker'), 'not a directory');
    config.threadsDir = 'blocker/threads';
    await expect(createThread(config, { now: CREATED_AT })).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('listThreads / getThread', () => {
  it('lists threads titled by their opening message', async () => {
    await createThread(config, { now: CREATED_AT, region: 'What is 2+2?' });
    await createThread(config, { now: new Date(Date.UTC(2026, 9, 19, 15, 0, 0, 0)) });

    const threads = await listThreads(config, {});
    expect(threads).toEqual([
      { threadId: THREAD_ID, title: 'What is 2+2?', path: join('.outline-chat', `${THREAD_ID}.org`), headings: 1 },
      {
        threadId: 'chat-20261019T150000000',
        title: 'chat-20261019T150000000',
        path: join('.outline-chat', 'chat-20261019T150000000.org'),
        headings: 1,
      },
    ]);
    expect((await listThreads(config, { query: '2+2' })).map((thread) => thread.threadId)).toEqual([THREAD_ID]);
  });

  it('returns an empty list before any thread exists', async () => {
    expect(await listThreads(config, {})).toEqual([]);
  });

  it('returns the outline with bodies', async () => {
    await createThread(config, { now: CREATED_AT, region: 'What is 2+2?' });
    await respondInThread(config, { threadId: THREAD_ID, transport: replyWith('Four.') });

    const { thread } = await getThread(config, { threadId: THREAD_ID });
    expect(thread.outline).toEqual([
      {
        heading: 'User',
        level: 1,
        line: 1,
        body: 'What is 2+2?',
        children: [
          { heading: 'AI', level: 2, line: 4, body: 'Four.', children: [] },
          { heading: 'User', level: 2, line: 7, body: '', children: [] },
        ],
      },
    ]);
  });
});

describe('appendHeading', () => {
  it('appends a top-level user heading at the end', async () => {
    const created = await createThread(config, { now: CREATED_AT, region: 'Hello' });
    const result = await appendHeading(config, { threadId: THREAD_ID, ifMatch: created.etag });

    expect(result.line).toBe(4);
    expect(await readFile(threadPath(THREAD_ID), 'utf8')).toBe('* User\n\nHello\n* User\n\n');
  });

  it('rejects a stale etag', async () => {
    await createThread(config, { now: CREATED_AT });
    await expect(appendHeading(config, { threadId: THREAD_ID, ifMatch: 'stale' })).rejects.toThrow(/^CONFLICT/);
  });
});

describe('previewMessages', () => {
  it('builds the conversation for the node at a line', async () => {
    await createThread(config, { now: CREATED_AT, region: 'Hello' });
    const preview = await previewMessages(config, { threadId: THREAD_ID, line: 3 });

    expect(preview.heading).toBe('User');
    expect(preview.line).toBe(1);
    expect(preview.messages).toEqual([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'Hello' },
    ]);
  });

  it('fails on a document without headings', async () => {
    await createThread(config, { now: CREATED_AT });
    await writeFile(threadPath(THREAD_ID), 'no headings here\n');
    await expect(previewMessages(config, { threadId: THREAD_ID })).rejects.toBeInstanceOf(StructuralError);
  });
});

describe('respondInThread', () => {
  it('streams the reply into the file and reserves the next turn', async () => {
    await createThread(config, { now: CREATED_AT, region: 'What is 2+2?' });
    const streamed: string[] = [];

    const result = await respondInThread(config, {
      threadId: THREAD_ID,
      transport: replyWith('Fo', 'ur.'),
      onText: (text) => streamed.push(text),
    });

    expect(streamed).toEqual(['Fo', 'ur.']);
    expect(result.reply).toBe('Four.');
    expect(result.aiLine).toBe(4);
    expect(result.userLine).toBe(7);
    expect(await readFile(threadPath(THREAD_ID), 'utf8')).toBe(
      '* User\n\nWhat is 2+2?\n** AI\n\nFour.\n** User\n\n'
    );
  });

  it('keeps the empty headings when the transport fails', async () => {
    await createThread(config, { now: CREATED_AT, region: 'What is 2+2?' });
    const transport: Transport = {
      send: async () => {
        throw new Error('connection reset');
      },
    };

    await expect(respondInThread(config, { threadId: THREAD_ID, transport })).rejects.toBeInstanceOf(TransportError);
    expect(await readFile(threadPath(THREAD_ID), 'utf8')).toBe(
      '* User\n\nWhat is 2+2?\n** AI\n\n\n** User\n\n'
    );
  });

  it('does not call the transport for a line outside any heading', async () => {
    await createThread(config, { now: CREATED_AT });
    let sent = false;
    const transport: Transport = {
      send() {
        sent = true;
      },
    };

    await expect(respondInThread(config, { threadId: THREAD_ID, line: 9, transport })).rejects.toBeInstanceOf(
      StructuralError
    );
    expect(sent).toBe(false);
    expect(await readFile(threadPath(THREAD_ID), 'utf8')).toBe('* User\n\n');
  });

  it('keeps every reply when responses overlap', async () => {
    await createThread(config, { now: CREATED_AT });
    await writeFile(threadPath(THREAD_ID), '* User\n\nA\n* User\n\nB\n');
    const delayed = (reply: string, ms: number): Transport => ({
      async send(_messages, marker) {
        await new Promise((resolve) => setTimeout(resolve, ms));
        marker.insert(reply);
      },
    });

    const [first, second] = await Promise.all([
      respondInThread(config, { threadId: THREAD_ID, line: 1, transport: delayed('reply-A', 20) }),
      respondInThread(config, { threadId: THREAD_ID, line: 4, transport: delayed('reply-B', 40) }),
    ]);

    expect(await readFile(threadPath(THREAD_ID), 'utf8')).toBe(
      '* User\n\nA\n** AI\n\nreply-A\n** User\n\n* User\n\nB\n** AI\n\nreply-B\n** User\n\n'
    );
    expect(first).toMatchObject({ reply: 'reply-A', aiLine: 4, userLine: 7 });
    expect(second).toMatchObject({ reply: 'reply-B', aiLine: 12, userLine: 15 });
  });

  it('keeps a heading appended while a reply streams', async () => {
    await createThread(config, { now: CREATED_AT, region: 'Hello' });

    const [responded, appended] = await Promise.all([
      respondInThread(config, {
        threadId: THREAD_ID,
        transport: {
          async send(_messages, marker) {
            await new Promise((resolve) => setTimeout(resolve, 20));
            marker.insert('Hi');
          },
        },
      }),
      appendHeading(config, { threadId: THREAD_ID }),
    ]);

    expect(appended.line).toBe(8);
    expect(responded.reply).toBe('Hi');
    expect(await readFile(threadPath(THREAD_ID), 'utf8')).toBe('* User\n\nHello\n** AI\n\nHi\n** User\n\n* User\n\n');
  });
});
