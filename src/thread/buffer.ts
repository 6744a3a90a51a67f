import { StructuralError } from './errors.js';
import type { ParsedOutline } from './model.js';
import { parseOutline } from './parse.js';

/**
 * Mutable document text with position markers that survive insertion.
 *
 * Marker rules:
 * - Text inserted strictly before a marker shifts it forward.
 * - Text inserted exactly at a marker's offset by the buffer leaves it in place.
 * - Text inserted through the marker itself advances it past that text, so
 *   successive fragments append in order.
 *
 * Text written through a marker never opens a heading: a `*` at the start of
 * a line (after nothing but commas) gets a `,` prefix, as Org escapes it.
 */
export interface InsertEvent {
  offset: number;
  text: string;
  /** Set when the text arrived through a marker. */
  marker?: InsertionMarker;
}

export interface DocumentBufferOptions {
  onInsert?: (event: InsertEvent) => void;
}

export interface InsertionMarkerOptions {
  /** Receives each fragment written through this marker, after escaping. */
  onInsert?: (text: string) => void;
}

/**
 * Comma-escape every `*` that would start a heading line. `linePrefix` is the
 * text already on the line the fragment continues.
 *
 * `escapeHeadingStars('ok\n* a', '')` => `ok\n,* a`
 */
export function escapeHeadingStars(text: string, linePrefix: string): string {
  let atLineStart = /^,*$/.test(linePrefix);
  let escaped = '';
  for (const char of text) {
    if (char === '*' && atLineStart) {
      escaped += ',*';
      atLineStart = false;
      continue;
    }
    escaped += char;
    if (char === '\n') atLineStart = true;
    else if (char !== ',') atLineStart = false;
  }
  return escaped;
}

export class InsertionMarker {
  #offset: number;
  #buffer: DocumentBuffer | undefined;
  readonly #onInsert: ((text: string) => void) | undefined;

  constructor(buffer: DocumentBuffer, offset: number, options: InsertionMarkerOptions = {}) {
    this.#buffer = buffer;
    this.#offset = offset;
    this.#onInsert = options.onInsert;
  }

  /** Live offset into the buffer text. */
  get offset(): number {
    return this.#offset;
  }

  get released(): boolean {
    return this.#buffer === undefined;
  }

  /**
   * Append text at the marker's live position and move past it.
   */
  insert(text: string): void {
    const buffer = this.#buffer;
    if (!buffer) throw new StructuralError('Insertion marker has been released');
    const written = buffer.insertThrough(this, text);
    this.#onInsert?.(written);
  }

  /** Detach from the buffer; further inserts throw. */
  release(): void {
    this.#buffer?.detach(this);
    this.#buffer = undefined;
  }

  /** @internal */
  shift(delta: number): void {
    this.#offset += delta;
  }
}

export class DocumentBuffer {
  #text: string;
  readonly #markers = new Set<InsertionMarker>();
  readonly #onInsert: ((event: InsertEvent) => void) | undefined;

  constructor(text: string, options: DocumentBufferOptions = {}) {
    this.#text = text;
    this.#onInsert = options.onInsert;
  }

  get text(): string {
    return this.#text;
  }

  get length(): number {
    return this.#text.length;
  }

  /** Parse the current text. */
  outline(): ParsedOutline {
    return parseOutline(this.#text);
  }

  /**
   * Offset of the first character of a 0-based line. `lineCount` maps to the
   * end of the text.
   */
  offsetOfLine(line: number): number {
    if (line === 0) return 0;
    let seen = 0;
    for (let index = 0; index < this.#text.length; index += 1) {
      if (this.#text[index] !== '\n') continue;
      seen += 1;
      if (seen === line) return index + 1;
    }
    if (seen + 1 === line && !this.#text.endsWith('\n')) return this.#text.length;
    throw new StructuralError(`Line ${line + 1} is outside the document`);
  }

  /** 0-based line containing `offset`. */
  lineAt(offset: number): number {
    this.assertOffset(offset);
    let line = 0;
    for (let index = 0; index < offset; index += 1) {
      if (this.#text[index] === '\n') line += 1;
    }
    return line;
  }

  createMarker(offset: number, options: InsertionMarkerOptions = {}): InsertionMarker {
    this.assertOffset(offset);
    const marker = new InsertionMarker(this, offset, options);
    this.#markers.add(marker);
    return marker;
  }

  /**
   * Insert text at an offset. Markers at the same offset stay before the text.
   */
  insert(offset: number, text: string): void {
    this.assertOffset(offset);
    this.splice(offset, text);
    for (const marker of this.#markers) {
      if (marker.offset > offset) marker.shift(text.length);
    }
    this.#onInsert?.({ offset, text });
  }

  /**
   * Returns the text as written, after escaping.
   * @internal
   */
  insertThrough(source: InsertionMarker, text: string): string {
    const offset = source.offset;
    const lineStart = this.#text.lastIndexOf('\n', offset - 1) + 1;
    const written = escapeHeadingStars(text, offset === 0 ? '' : this.#text.slice(lineStart, offset));
    this.splice(offset, written);
    for (const marker of this.#markers) {
      if (marker === source || marker.offset > offset) marker.shift(written.length);
    }
    this.#onInsert?.({ offset, text: written, marker: source });
    return written;
  }

  /** @internal */
  detach(marker: InsertionMarker): void {
    this.#markers.delete(marker);
  }

  private splice(offset: number, text: string): void {
    this.#text = `${this.#text.slice(0, offset)}${text}${this.#text.slice(offset)}`;
  }

  private assertOffset(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.#text.length) {
      throw new StructuralError(`Offset ${offset} is outside the document`);
    }
  }
}
