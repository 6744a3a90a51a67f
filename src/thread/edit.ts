import { splitLines } from './parse.js';

export interface AppendHeadingResult {
  newText: string;
  /** 0-based line of the appended heading. */
  line: number;
}

export function detectEol(text: string): '\n' | '\r\n' {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

export function sanitizeHeadingTitle(title: string): string {
  const normalized = title.replace(/\r?\n/g, ' ').trim();
  if (!normalized) throw new Error('Heading title must be non-empty');
  return normalized;
}

/**
 * Append a top-level heading and its blank line at the end of the document.
 *
 * Existing text is never modified, only extended; a missing final newline is
 * added first so the heading starts its own line.
 */
export function appendTopLevelHeading(text: string, title: string): AppendHeadingResult {
  const safeTitle = sanitizeHeadingTitle(title);
  const eol = detectEol(text);
  const separator = text === '' || text.endsWith('\n') ? '' : eol;
  return {
    newText: `${text}${separator}* ${safeTitle}${eol}${eol}`,
    line: splitLines(text).length,
  };
}

/**
 * Initial text of a new thread: one top-level heading, optionally followed by
 * an already-quoted region as the first message.
 */
export function buildThreadText(userName: string, quotedRegion?: string): string {
  const { newText } = appendTopLevelHeading('', userName);
  return quotedRegion === undefined ? newText : `${newText}${quotedRegion}`;
}
