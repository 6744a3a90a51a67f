import type { Transport } from '../transport/types.js';
import type { DocumentBuffer, InsertionMarker } from './buffer.js';
import { detectEol } from './edit.js';
import { collectAncestors } from './entry.js';
import { StructuralError, TransportError } from './errors.js';
import { buildMessages } from './messages.js';
import type { DocumentNode, Message, RoleConfiguration } from './model.js';

export interface ResponseHandle {
  /** Conversation handed to the transport. */
  messages: Message[];
  /** The new assistant node, parsed right after creation. */
  aiNode: DocumentNode;
  /** The reserved next-turn node. */
  userNode: DocumentNode;
  /** Anchored at the start of the assistant body; released once `completion` settles. */
  marker: InsertionMarker;
  /**
   * Settles with the transport's own promise (at once if `send` returned
   * nothing). Rejects with `TransportError`.
   */
  completion: Promise<void>;
}

export interface RespondOptions {
  /** Receives each streamed fragment as it lands in the document. */
  onText?: (text: string) => void;
}

/**
 * Re-locate `node` in the buffer's current text so stale or foreign nodes are
 * rejected before anything is written.
 */
function requireLiveNode(buffer: DocumentBuffer, node: DocumentNode): DocumentNode {
  const live = buffer.outline().nodes.find((candidate) => candidate.line === node.line);
  if (
    !live ||
    live.level !== node.level ||
    live.rawHeading !== node.rawHeading ||
    live.endLine !== node.endLine
  ) {
    throw new StructuralError(`Node "${node.heading}" is not part of this document`);
  }
  return live;
}

function findChildAt(buffer: DocumentBuffer, parentLine: number, line: number): DocumentNode {
  const parent = buffer.outline().nodes.find((node) => node.line === parentLine);
  const child = parent?.children.find((node) => node.line === line);
  if (!child) throw new StructuralError(`Expected a new heading at line ${line + 1}`);
  return child;
}

/**
 * Generate a reply under `currentNode`.
 *
 * Both new headings are written before the transport is called:
 * - an `aiName` child at the end of `currentNode`'s subtree, one level deeper
 * - a `userName` sibling after it, reserving the next turn
 *
 * The marker is created between them before the `userName` heading is
 * inserted, so streamed text stays inside the assistant body.
 */
export function respond(
  buffer: DocumentBuffer,
  currentNode: DocumentNode,
  roles: RoleConfiguration,
  transport: Transport,
  options: RespondOptions = {}
): ResponseHandle {
  const node = requireLiveNode(buffer, currentNode);
  const messages = buildMessages(collectAncestors(node), roles);

  const stars = '*'.repeat(node.level + 1);
  const subtreeEnd = buffer.offsetOfLine(node.endLine + 1);
  const eol = detectEol(buffer.text);
  const separator = subtreeEnd > 0 && buffer.text[subtreeEnd - 1] !== '\n' ? eol : '';
  const aiHeadingOffset = subtreeEnd + separator.length;
  const aiText = `${separator}${stars} ${roles.aiName}${eol}${eol}`;

  buffer.insert(subtreeEnd, aiText);
  const marker = buffer.createMarker(subtreeEnd + aiText.length, { onInsert: options.onText });
  buffer.insert(marker.offset, `${eol}${stars} ${roles.userName}${eol}${eol}`);

  const aiLine = buffer.lineAt(aiHeadingOffset);
  const aiNode = findChildAt(buffer, node.line, aiLine);
  const userNode = findChildAt(buffer, node.line, aiLine + 3);

  let sent: void | Promise<void>;
  try {
    sent = transport.send(messages, marker);
  } catch (error) {
    marker.release();
    throw new TransportError('Transport failed to start', error);
  }

  const completion = Promise.resolve(sent).then(
    () => {
      marker.release();
    },
    (error: unknown) => {
      marker.release();
      throw new TransportError('Transport failed while streaming', error);
    }
  );
  // An unawaited `completion` must not become an unhandled rejection.
  void completion.catch(() => undefined);

  return { messages, aiNode, userNode, marker, completion };
}
