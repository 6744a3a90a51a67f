import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { runOcCli, type OcIo } from '../oc.js';
import type { Transport } from '../transport/types.js';

let rootDir: string;

beforeEach(async () => {
  rootDir = await mkdtemp(join(tmpdir(), 'outline-chat-cli-'));
});

afterEach(async () => {
  await rm(rootDir, { recursive: true, force: true });
});

function capture(transport?: Transport): { io: OcIo; stdout: () => string; stderr: () => string } {
  const out: string[] = [];
  const err: string[] = [];
  const sink = (target: string[]) =>
    new Writable({
      write(chunk, _encoding, callback) {
        target.push(String(chunk));
        callback();
      },
    });
  return {
    io: {
      stdout: sink(out),
      stderr: sink(err),
      env: {},
      createTransport: transport ? () => transport : undefined,
    },
    stdout: () => out.join(''),
    stderr: () => err.join(''),
  };
}

function parseJson(text: string): Record<string, unknown> {
  const value: unknown = JSON.parse(text);
  if (typeof value !== 'object' || value === null) throw new Error('expected a JSON object');
  return Object.fromEntries(Object.entries(value));
}

describe('outline-chat CLI', () => {
  it('creates a thread, previews it and responds', async () => {
    const created = capture();
    expect(await runOcCli(['--root', rootDir, 'thread', 'new', '--region', 'Hello'], created.io)).toBe(0);
    const { threadId } = parseJson(created.stdout());
    expect(threadId).toMatch(/^chat-\d{8}T\d{9}$/);
    if (typeof threadId !== 'string') throw new Error('missing threadId');

    const preview = capture();
    expect(await runOcCli(['--root', rootDir, 'thread', 'messages', threadId], preview.io)).toBe(0);
    expect(parseJson(preview.stdout()).messages).toEqual([
      { role: 'system', content: 'You are a helpful assistant.' },
      { role: 'user', content: 'Hello' },
    ]);

    const transport: Transport = {
      send(_messages, marker) {
        marker.insert('Hi!');
      },
    };
    const responded = capture(transport);
    expect(await runOcCli(['--root', rootDir, 'thread', 'respond', threadId, '--stream'], responded.io)).toBe(0);
    expect(parseJson(responded.stdout()).reply).toBe('Hi!');
    expect(responded.stderr()).toBe('Hi!\n');

    const file = await readFile(join(rootDir, '.outline-chat', `${threadId}.org`), 'utf8');
    expect(file).toBe('* User\n\nHello\n** AI\n\nHi!\n** User\n\n');
  });

  it('reports errors on stderr with a non-zero exit code', async () => {
    const unknown = capture();
    expect(await runOcCli(['--root', rootDir, 'nope'], unknown.io)).toBe(1);
    expect(unknown.stderr()).toBe('Unknown command: nope\n');

    const badLine = capture();
    expect(await runOcCli(['--root', rootDir, 'thread', 'messages', 'chat-1', '--line', '0'], badLine.io)).toBe(1);
    expect(badLine.stderr()).toBe('Invalid --line: "0"\n');
  });

  it('prints help without arguments', async () => {
    const help = capture();
    expect(await runOcCli([], help.io)).toBe(0);
    expect(help.stdout()).toContain('outline-chat thread respond <threadId>');
  });
});
