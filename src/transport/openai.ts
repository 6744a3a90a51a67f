import type { Logger } from 'pino';
import type { TransportConfig } from '../config.js';
import { logger as rootLogger } from '../logger.js';
import type { InsertionMarker } from '../thread/buffer.js';
import type { Message } from '../thread/model.js';
import type { Transport } from './types.js';

export interface OpenAiCompatibleTransportOptions {
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * Pull the text delta out of one `data:` payload. Returns an empty string for
 * payloads without content (role announcements, finish markers).
 */
export function extractDeltaContent(payload: unknown): string {
  if (typeof payload !== 'object' || payload === null || !('choices' in payload)) return '';
  const choices = payload.choices;
  if (!Array.isArray(choices)) return '';
  const choice: unknown = choices[0];
  if (typeof choice !== 'object' || choice === null) return '';
  const delta = 'delta' in choice ? choice.delta : 'message' in choice ? choice.message : undefined;
  if (typeof delta !== 'object' || delta === null || !('content' in delta)) return '';
  return typeof delta.content === 'string' ? delta.content : '';
}

/**
 * Streams chat completions from an OpenAI-compatible `/chat/completions`
 * endpoint and writes each content delta through the marker.
 */
export class OpenAiCompatibleTransport implements Transport {
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;

  constructor(
    private readonly config: TransportConfig,
    options: OpenAiCompatibleTransportOptions = {}
  ) {
    if (!/^https?:\/\//i.test(config.baseUrl)) {
      throw new Error('Transport baseUrl must start with http:// or https://');
    }
    this.fetchImpl = options.fetch ?? fetch;
    this.log = (options.logger ?? rootLogger).child({ transport: 'openai-compatible', model: config.model });
  }

  async send(messages: readonly Message[], marker: InsertionMarker): Promise<void> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    const resp = await this.fetchImpl(url, {
      method: 'POST',
      headers: this.buildHeaders(),
      body: JSON.stringify({ model: this.config.model, messages, stream: true }),
    });
    if (!resp.ok || !resp.body) {
      const text = !resp.ok ? await resp.text().catch(() => '') : '';
      this.log.error({ status: resp.status }, 'chat completions request failed');
      throw new Error(`Chat completions (stream) failed (${resp.status}): ${text}`);
    }

    const reader = resp.body.getReader();
    const decoder = new TextDecoder();
    let pending = '';
    try {
      while (true) {
        const { value, done } = await reader.read();
        pending += done ? decoder.decode() : decoder.decode(value, { stream: true });
        const lines = pending.split('\n');
        pending = done ? '' : (lines.pop() ?? '');
        for (const line of lines) {
          if (this.consumeLine(line, marker)) {
            this.log.debug('stream finished');
            return;
          }
        }
        if (done) break;
      }
      this.log.debug('stream closed without [DONE]');
    } finally {
      await reader.cancel();
      reader.releaseLock();
    }
  }

  /**
   * Handle one SSE line. Returns true on the `[DONE]` sentinel.
   */
  private consumeLine(rawLine: string, marker: InsertionMarker): boolean {
    const line = rawLine.trim();
    if (!line.startsWith('data:')) return false;
    const payload = line.slice(5).trim();
    if (!payload) return false;
    if (payload === '[DONE]') return true;

    let data: unknown;
    try {
      data = JSON.parse(payload);
    } catch {
      this.log.warn({ payload }, 'skipping malformed stream line');
      return false;
    }
    const content = extractDeltaContent(data);
    if (content) marker.insert(content);
    return false;
  }

  private buildHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Accept: 'text/event-stream',
      ...(this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {}),
    };
  }
}
