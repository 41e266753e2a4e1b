/**
 * Tree node helpers.
 *
 * Folder/file classification is structural: a node is a folder iff it has
 * children. The listing format never says so explicitly, so it is derived on
 * read and never stored.
 */

import type { Forest, TreeNode } from '../types.js';

/** Node shape used while a builder still owns it */
export interface MutableTreeNode {
  name: string;
  depth: number;
  children: MutableTreeNode[];
}

export function createNode(name: string, depth: number): MutableTreeNode {
  return { name, depth, children: [] };
}

/** Whether a node has at least one child. */
export function isFolder(node: TreeNode): boolean {
  return node.children.length > 0;
}

/**
 * Visit every node in pre-order (parents before children, siblings in line
 * order). Iterative, so arbitrarily deep forests are safe.
 */
export function walkForest(
  forest: Forest,
  visit: (node: TreeNode, parent: TreeNode | undefined) => void
): void {
  const stack: Array<{ node: TreeNode; parent: TreeNode | undefined }> = [];
  for (let i = forest.length - 1; i >= 0; i--) {
    const root = forest[i];
    if (root) stack.push({ node: root, parent: undefined });
  }

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;

    visit(entry.node, entry.parent);

    const children = entry.node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) stack.push({ node: child, parent: entry.node });
    }
  }
}

/** Total number of nodes in a forest */
export function countNodes(forest: Forest): number {
  let count = 0;
  walkForest(forest, () => {
    count++;
  });
  return count;
}
