import { describe, expect, it } from 'vitest';

import { createLogger } from '../../logger.js';
import { DocumentBuffer } from '../../thread/buffer.js';
import { extractDeltaContent, OpenAiCompatibleTransport } from '../openai.js';

interface FetchCall {
  url: string;
  init?: RequestInit;
}

function stubFetch(calls: FetchCall[], response: () => Response): typeof fetch {
  return async (input, init) => {
    calls.push({ url: String(input), init });
    return response();
  };
}

const silent = createLogger('silent');
const messages = [
  { role: 'system', content: 'P' },
  { role: 'user', content: 'Hello' },
] as const;

describe('OpenAiCompatibleTransport', () => {
  it('streams content deltas through the marker', async () => {
    const sse = [
      'data: {"choices":[{"delta":{"role":"assistant"}}]}',
      '',
      'data: {"choices":[{"delta":{"content":"Hello"}}]}',
      '',
      'data: not-json',
      '',
      'data: {"choices":[{"delta":{"content":" world"}}]}',
      '',
      'data: [DONE]',
      '',
    ].join('\n');
    const calls: FetchCall[] = [];
    const transport = new OpenAiCompatibleTransport(
      { baseUrl: 'http://llm.test/v1/', model: 'test-model', apiKey: 'test-key' },
      { fetch: stubFetch(calls, () => new Response(sse, { status: 200 })), logger: silent }
    );
    const buffer = new DocumentBuffer('* User\n\nHello\n** AI\n\n');
    const marker = buffer.createMarker(buffer.length);

    await transport.send(messages, marker);

    expect(buffer.text).toBe('* User\n\nHello\n** AI\n\nHello world');
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('http://llm.test/v1/chat/completions');
    expect(calls[0]?.init?.headers).toEqual({
      'Content-Type': 'application/json',
      Accept: 'text/event-stream',
      Authorization: 'Bearer test-key',
    });
    expect(JSON.parse(String(calls[0]?.init?.body))).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'P' },
        { role: 'user', content: 'Hello' },
      ],
      stream: true,
    });
  });

  it('stops reading at [DONE] and cancels the response body', async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('data: {"choices":[{"delta":{"content":"a"}}]}\n\ndata: [DONE]\n\n'));
      },
      cancel() {
        cancelled = true;
      },
    });
    const transport = new OpenAiCompatibleTransport(
      { baseUrl: 'http://llm.test/v1', model: 'test-model' },
      { fetch: stubFetch([], () => new Response(body)), logger: silent }
    );
    const buffer = new DocumentBuffer('');

    await transport.send(messages, buffer.createMarker(0));

    expect(buffer.text).toBe('a');
    expect(cancelled).toBe(true);
  });

  it('reads a final data line without a trailing newline', async () => {
    const sse = 'data: {"choices":[{"delta":{"content":"one"}}]}\n\ndata: {"choices":[{"delta":{"content":" two"}}]}';
    const transport = new OpenAiCompatibleTransport(
      { baseUrl: 'http://llm.test/v1', model: 'test-model' },
      { fetch: stubFetch([], () => new Response(sse)), logger: silent }
    );
    const buffer = new DocumentBuffer('');

    await transport.send(messages, buffer.createMarker(0));

    expect(buffer.text).toBe('one two');
  });

  it('rejects on a non-2xx response', async () => {
    const transport = new OpenAiCompatibleTransport(
      { baseUrl: 'http://llm.test/v1', model: 'test-model' },
      { fetch: stubFetch([], () => new Response('nope', { status: 401 })), logger: silent }
    );
    const buffer = new DocumentBuffer('');
    await expect(transport.send(messages, buffer.createMarker(0))).rejects.toThrow(
      'Chat completions (stream) failed (401): nope'
    );
    expect(buffer.text).toBe('');
  });

  it('requires an http(s) base URL', () => {
    expect(() => new OpenAiCompatibleTransport({ baseUrl: 'ftp://x', model: 'm' }, { logger: silent })).toThrow(
      'Transport baseUrl must start with http:// or https://'
    );
  });
});

describe('extractDeltaContent', () => {
  it('reads delta or message content and ignores anything else', () => {
    expect(extractDeltaContent({ choices: [{ delta: { content: 'a' } }] })).toBe('a');
    expect(extractDeltaContent({ choices: [{ message: { content: 'b' } }] })).toBe('b');
    expect(extractDeltaContent({ choices: [] })).toBe('');
    expect(extractDeltaContent('text')).toBe('');
  });
});
