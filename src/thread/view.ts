import { extractEntry } from './entry.js';
import type { DocumentNode } from './model.js';

/**
 * View helpers for thread outlines.
 *
 * `DocumentNode` carries parent links and raw line data for editing; tool and
 * CLI output gets a stable JSON shape instead. Uses explicit stacks to avoid
 * recursion depth issues on deep threads.
 */
export type OutlineViewNode = {
  heading: string;
  level: number;
  /** 1-based line of the heading, as shown in editors. */
  line: number;
  body?: string;
  children: OutlineViewNode[];
};

export function buildOutlineView(
  roots: DocumentNode[],
  options: { includeBody: boolean }
): OutlineViewNode[] {
  const out: OutlineViewNode[] = [];
  const stack: { node: DocumentNode; outArray: OutlineViewNode[] }[] = [];

  for (let index = roots.length - 1; index >= 0; index -= 1) {
    const node = roots[index];
    if (!node) continue;
    stack.push({ node, outArray: out });
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) continue;

    const node = frame.node;
    const view: OutlineViewNode = {
      heading: node.heading,
      level: node.level,
      line: node.line + 1,
      children: [],
    };
    if (options.includeBody) view.body = extractEntry(node).body;

    frame.outArray.push(view);

    for (let index = node.children.length - 1; index >= 0; index -= 1) {
      const child = node.children[index];
      if (!child) continue;
      stack.push({ node: child, outArray: view.children });
    }
  }

  return out;
}
