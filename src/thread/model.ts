/**
 * Parsed representation of an outline-chat thread document.
 *
 * Notes:
 * - Line numbers are 0-based to match typical array indexing in JS/TS.
 * - Nodes are snapshots of the text they were parsed from; re-parse after edits.
 */
export interface DocumentNode {
  /** Heading depth (number of leading `*`). */
  level: number;
  /** Display title: keywords, priority cookie and tags stripped. */
  heading: string;
  /** Heading text after the stars, as written (trimmed). */
  rawHeading: string;
  /** Lines strictly between the heading line and the first child heading (or subtree end). */
  rawBody: string[];
  /** 0-based line index of the heading. */
  line: number;
  /** Inclusive last line of the node's subtree. */
  endLine: number;
  children: DocumentNode[];
  /** Non-owning back-reference; absent for top-level headings. */
  parent?: DocumentNode;
}

export interface ParsedOutline {
  /** Lines before the first heading (file keywords, free text). */
  preamble: string[];
  /** Top-level headings, in document order. */
  roots: DocumentNode[];
  /** Every heading in document order. */
  nodes: DocumentNode[];
  /** Number of lines the outline was parsed from. */
  lineCount: number;
}

/** One `(heading, body)` pair of the ancestor chain. */
export interface Entry {
  heading: string;
  body: string;
}

/** Root-first chain of entries ending at the node traversal started from. */
export type AncestorChain = readonly Entry[];

export type MessageRole = 'system' | 'user' | 'assistant';

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
}

export interface RoleConfiguration {
  userName: string;
  aiName: string;
  promptPreamble: string;
}
