import { PROPERTIES_END_RE, PROPERTIES_START_RE } from './constants.js';
import type { AncestorChain, DocumentNode, Entry } from './model.js';

/**
 * Remove one metadata block from body lines.
 *
 * The block runs from the first `:PROPERTIES:` line through the *last* `:END:`
 * line after it (the outermost span). Without a start line, or without any
 * `:END:` after it, the lines are returned unchanged.
 */
export function stripMetadataBlock(lines: readonly string[]): string[] {
  const start = lines.findIndex((line) => PROPERTIES_START_RE.test(line));
  if (start === -1) return [...lines];

  let end = -1;
  for (let index = lines.length - 1; index > start; index -= 1) {
    if (PROPERTIES_END_RE.test(lines[index] ?? '')) {
      end = index;
      break;
    }
  }
  if (end === -1) return [...lines];

  return [...lines.slice(0, start), ...lines.slice(end + 1)];
}

/**
 * Return the display heading and conversational body of a node.
 *
 * The first remaining body line is always dropped: the writer places a blank
 * line right after every heading, and it is not part of the message.
 */
export function extractEntry(node: DocumentNode): Entry {
  const body = stripMetadataBlock(node.rawBody).slice(1).join('\n');
  return { heading: node.heading, body };
}

/**
 * Walk from `node` to its top-level ancestor and return the entries root-first.
 *
 * Only `parent` links are followed; the tree is not touched.
 */
export function collectAncestors(node: DocumentNode): AncestorChain {
  const chain: Entry[] = [];
  let current: DocumentNode | undefined = node;
  while (current) {
    chain.unshift(extractEntry(current));
    current = current.parent;
  }
  return chain;
}
