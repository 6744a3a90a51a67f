import { HEADING_KEYWORDS } from './constants.js';
import { StructuralError } from './errors.js';
import type { DocumentNode, ParsedOutline } from './model.js';

/**
 * Outline parser for thread documents.
 *
 * The parser is intentionally "format-aware" rather than a general Org parser.
 * It only recognizes headings (`*`, `**`, ...); every other line belongs to the
 * body of the nearest heading above it, or to the preamble.
 */

const HEADING_RE = /^(\*+)\s+(.*)$/;
const PRIORITY_COOKIE_RE = /^\[#[A-Za-z0-9]\]\s*/;
const TAGS_RE = /\s+(:[\w@#%:]+:)\s*$/;

/**
 * Split text into lines, ignoring the empty string after a trailing newline.
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r?\n/);
  if (text.endsWith('\n') && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Parse a heading line into its level and raw title.
 *
 * Returns `undefined` if the line is not a heading.
 */
export function parseHeadingLine(line: string): { level: number; rawHeading: string } | undefined {
  const match = line.match(HEADING_RE);
  if (!match) return undefined;
  return { level: match[1]?.length ?? 1, rawHeading: (match[2] ?? '').trim() };
}

/**
 * Strip heading decoration: a leading keyword, a priority cookie, and a
 * trailing tag list.
 *
 * `TODO [#A] Call back :work:` => `Call back`
 */
export function stripHeadingDecoration(rawHeading: string): string {
  let title = rawHeading.trim();

  for (const keyword of HEADING_KEYWORDS) {
    if (title === keyword) return '';
    if (title.startsWith(`${keyword} `)) {
      title = title.slice(keyword.length).trimStart();
      break;
    }
  }

  title = title.replace(PRIORITY_COOKIE_RE, '');
  title = title.replace(TAGS_RE, '');
  if (/^:[\w@#%:]+:$/.test(title)) return '';
  return title.trim();
}

/**
 * Close nodes when we see a heading at the same or shallower level.
 *
 * This computes `endLine` for each node so subtrees can be addressed by range.
 */
function closeNodesAtBoundary(stack: DocumentNode[], boundaryLine: number, level: number): void {
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (!top) break;
    if (top.level < level) break;
    top.endLine = boundaryLine - 1;
    stack.pop();
  }
}

/**
 * Parse a thread document into a heading tree.
 *
 * Behavior highlights:
 * - Heading depth decides nesting; a skipped level nests under the nearest
 *   shallower heading.
 * - `rawBody` stops at the first child heading, so descendants are never part
 *   of their parent's body.
 */
export function parseOutline(text: string): ParsedOutline {
  const lines = splitLines(text);
  const preamble: string[] = [];
  const roots: DocumentNode[] = [];
  const nodes: DocumentNode[] = [];
  const stack: DocumentNode[] = [];
  let bodyOwner: DocumentNode | undefined;

  for (let lineIndex = 0; lineIndex < lines.length; lineIndex += 1) {
    const line = lines[lineIndex] ?? '';
    const heading = parseHeadingLine(line);

    if (!heading) {
      if (bodyOwner) bodyOwner.rawBody.push(line);
      else if (nodes.length === 0) preamble.push(line);
      continue;
    }

    closeNodesAtBoundary(stack, lineIndex, heading.level);

    const node: DocumentNode = {
      level: heading.level,
      heading: stripHeadingDecoration(heading.rawHeading),
      rawHeading: heading.rawHeading,
      rawBody: [],
      line: lineIndex,
      endLine: lines.length - 1,
      children: [],
    };

    const parent = stack[stack.length - 1];
    if (parent) {
      node.parent = parent;
      parent.children.push(node);
    } else {
      roots.push(node);
    }

    stack.push(node);
    nodes.push(node);
    bodyOwner = node;
  }

  closeNodesAtBoundary(stack, lines.length, 1);

  return { preamble, roots, nodes, lineCount: lines.length };
}

/**
 * Find the innermost node whose heading or body contains `line` (0-based).
 *
 * Throws `StructuralError` when the line precedes the first heading or lies
 * outside the document.
 */
export function findNodeAtLine(outline: ParsedOutline, line: number): DocumentNode {
  if (!Number.isInteger(line) || line < 0 || line >= outline.lineCount) {
    throw new StructuralError(`Line ${line + 1} is outside the document`);
  }

  let found: DocumentNode | undefined;
  for (const node of outline.nodes) {
    if (node.line > line) break;
    if (node.endLine >= line) found = node;
  }
  if (!found) throw new StructuralError(`No heading contains line ${line + 1}`);
  return found;
}

/**
 * The node a cursor at the end of the document would be in.
 */
export function findLastNode(outline: ParsedOutline): DocumentNode {
  const last = outline.nodes[outline.nodes.length - 1];
  if (!last) throw new StructuralError('Document has no headings');
  return last;
}
