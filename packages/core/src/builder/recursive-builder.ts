/**
 * Recursive-descent forest construction over a lookahead sequence.
 *
 *   build(cursor, minDepth):
 *     while cursor.peek() and peek().depth >= minDepth:
 *       item = cursor.advance()
 *       node.children = build(cursor, item.depth + 1)
 *
 * Each pending call is a frame on an explicit work stack instead of the call
 * stack; a right-leaning listing is as deep as it is long.
 */

import type { LookaheadSequence } from '../sequence/lookahead.js';
import type { ParsedItem, TreeNode } from '../types.js';
import { createNode } from './node.js';
import type { MutableTreeNode } from './node.js';

/** One pending `build(cursor, minDepth)` call */
interface Frame {
  /** Items shallower than this end the frame */
  minDepth: number;

  /** Sibling list this frame fills */
  siblings: MutableTreeNode[];

  /** Stored depth of nodes created by this frame */
  nodeDepth: number;
}

/** Callbacks fired while building */
export interface RecursiveBuilderHooks {
  /** A node was placed; `count` is the number of nodes placed so far */
  onNode?: (node: TreeNode, count: number) => void;
}

/**
 * Consume items from the cursor and return the sibling nodes at `minDepth`
 * and below. Stops at the first item shallower than `minDepth`, leaving it
 * unconsumed. Returned siblings are stored at depth `minDepth`; their
 * descendants clamp to `parent.depth + 1`.
 */
export function buildRecursive(
  cursor: LookaheadSequence<ParsedItem>,
  minDepth = 0,
  hooks: RecursiveBuilderHooks = {}
): TreeNode[] {
  const top: Frame = { minDepth, siblings: [], nodeDepth: minDepth };
  const frames: Frame[] = [top];
  let placed = 0;

  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    const next = cursor.peek();

    if (!frame || next === undefined || next.depth < frame.minDepth) {
      frames.pop();
      continue;
    }

    const item = cursor.advance();
    const node = createNode(item.name, frame.nodeDepth);
    frame.siblings.push(node);

    placed++;
    hooks.onNode?.(node, placed);

    frames.push({
      minDepth: item.depth + 1,
      siblings: node.children,
      nodeDepth: frame.nodeDepth + 1,
    });
  }

  return top.siblings;
}
