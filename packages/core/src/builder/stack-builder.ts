/**
 * StackForestBuilder - incremental forest construction.
 *
 * Places each item as soon as it is read, keeping the open ancestor chain on
 * a cursor stack. Suited to populating a live view line by line.
 *
 * Items that skip levels attach to the deepest open ancestor; the stored
 * depth clamps to `parent.depth + 1` while the cursor keeps the parsed depth,
 * so later siblings are placed exactly as the listing drew them.
 */

import { BuilderFinishedError } from '../errors.js';
import type { Forest, ParsedItem, TreeNode } from '../types.js';
import { createNode } from './node.js';
import type { MutableTreeNode } from './node.js';

/** Callbacks fired while building */
export interface StackBuilderHooks {
  /** A node received its first child and is now a folder */
  onFolder?: (node: TreeNode) => void;

  /** A node was placed; `count` is the number of nodes placed so far */
  onNode?: (node: TreeNode, count: number) => void;
}

/** One open ancestor: the node and the parsed depth it was read at */
interface CursorEntry {
  node: MutableTreeNode;
  depth: number;
}

export class StackForestBuilder {
  private readonly roots: MutableTreeNode[] = [];
  private readonly cursor: CursorEntry[] = [];
  private readonly hooks: StackBuilderHooks;
  private placed = 0;
  private finished = false;

  constructor(hooks: StackBuilderHooks = {}) {
    this.hooks = hooks;
  }

  /** Number of nodes placed so far */
  get size(): number {
    return this.placed;
  }

  /** Number of currently open ancestors */
  get openDepth(): number {
    return this.cursor.length;
  }

  /**
   * Place one item and return its node.
   * Throws BuilderFinishedError after finish().
   */
  insert(item: ParsedItem): TreeNode {
    if (this.finished) {
      throw new BuilderFinishedError();
    }

    let top = this.cursor[this.cursor.length - 1];
    while (top && top.depth >= item.depth) {
      this.cursor.pop();
      top = this.cursor[this.cursor.length - 1];
    }

    const parent = top?.node;
    const node = createNode(item.name, parent ? parent.depth + 1 : 0);

    if (parent) {
      parent.children.push(node);
      if (parent.children.length === 1) {
        this.hooks.onFolder?.(parent);
      }
    } else {
      this.roots.push(node);
    }

    this.cursor.push({ node, depth: item.depth });
    this.placed++;
    this.hooks.onNode?.(node, this.placed);

    return node;
  }

  /**
   * Place every item of a sequence, in order.
   */
  insertAll(items: Iterable<ParsedItem>): void {
    for (const item of items) {
      this.insert(item);
    }
  }

  /**
   * Hand out the forest. No further inserts are accepted.
   */
  finish(): Forest {
    this.finished = true;
    this.cursor.length = 0;
    return this.roots;
  }
}
