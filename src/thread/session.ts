import { DocumentBuffer } from './buffer.js';
import { StructuralError } from './errors.js';
import type { DocumentNode } from './model.js';
import { findLastNode, findNodeAtLine } from './parse.js';
import { sha256Hex, writeFileAtomic } from './storage.js';

interface AppliedInsert {
  offset: number;
  length: number;
}

/**
 * In-memory document shared by every operation that edits one thread while
 * a response is streaming into it.
 *
 * Concurrent responses insert into the same buffer, so each reply's marker
 * tracks the others' edits. Saves are chained and always write the whole
 * current text.
 */
export class ThreadSession {
  readonly buffer: DocumentBuffer;
  #savedText: string;
  #etag: string;
  /** Inserts applied to `buffer` since `#savedText` was read or written. */
  readonly #inserts: AppliedInsert[] = [];
  #writes: Promise<unknown> = Promise.resolve();

  constructor(
    readonly absolutePath: string,
    text: string,
    etag: string
  ) {
    this.#savedText = text;
    this.#etag = etag;
    this.buffer = new DocumentBuffer(text, {
      onInsert: (event) => {
        this.#inserts.push({ offset: event.offset, length: event.text.length });
      },
    });
  }

  /** Etag of the text last read from or written to disk. */
  get etag(): string {
    return this.#etag;
  }

  /**
   * Find the node a 1-based line of the saved file points into (the last node
   * when omitted) and return the same node in the live buffer.
   */
  locate(line: number | undefined): DocumentNode {
    const saved = new DocumentBuffer(this.#savedText);
    const outline = saved.outline();
    const target = line === undefined ? findLastNode(outline) : findNodeAtLine(outline, line - 1);

    let offset = saved.offsetOfLine(target.line);
    for (const insert of this.#inserts) {
      if (insert.offset <= offset) offset += insert.length;
    }

    const liveLine = this.buffer.lineAt(offset);
    const live = this.buffer.outline().nodes.find((node) => node.line === liveLine);
    if (!live) throw new StructuralError(`Heading "${target.heading}" moved while the thread was being edited`);
    return live;
  }

  /**
   * Write the current text after any earlier save. Resolves with the etag of
   * what was written.
   */
  save(): Promise<string> {
    const write = this.#writes.then(async () => {
      const text = this.buffer.text;
      const applied = this.#inserts.length;
      await writeFileAtomic(this.absolutePath, text);
      this.#savedText = text;
      this.#etag = sha256Hex(text);
      this.#inserts.splice(0, applied);
      return this.#etag;
    });
    // A failed save is reported to its caller; later saves still run.
    this.#writes = write.catch(() => undefined);
    return write;
  }
}

interface SessionEntry {
  session: Promise<ThreadSession>;
  users: number;
}

const sessions = new Map<string, SessionEntry>();

/**
 * Run `fn` against the thread's shared session, loading it on first use.
 * The session is dropped once no operation holds it.
 */
export async function withThreadSession<T>(
  absolutePath: string,
  load: () => Promise<{ text: string; etag: string }>,
  fn: (session: ThreadSession) => Promise<T>
): Promise<T> {
  let entry = sessions.get(absolutePath);
  if (!entry) {
    entry = {
      session: load().then(({ text, etag }) => new ThreadSession(absolutePath, text, etag)),
      users: 0,
    };
    sessions.set(absolutePath, entry);
  }

  entry.users += 1;
  try {
    return await fn(await entry.session);
  } finally {
    entry.users -= 1;
    if (entry.users === 0 && sessions.get(absolutePath) === entry) sessions.delete(absolutePath);
  }
}
