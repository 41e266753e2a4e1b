/**
 * Flat forest encoding.
 *
 * A built forest leaves the worker once, as parallel arrays in pre-order.
 * Structured cloning of a flat encoding costs no recursion, however deep the
 * tree is, and inflation on the receiving side is a single linear pass.
 */

import type { FlatForest, Forest, TreeNode } from '../types.js';
import { createNode, walkForest } from './node.js';
import type { MutableTreeNode } from './node.js';

/**
 * Encode a forest as parallel arrays.
 */
export function flattenForest(forest: Forest): FlatForest {
  const flat: FlatForest = { names: [], depths: [], parents: [] };
  const indexOf = new Map<TreeNode, number>();

  walkForest(forest, (node, parent) => {
    indexOf.set(node, flat.names.length);
    flat.names.push(node.name);
    flat.depths.push(node.depth);
    flat.parents.push(parent ? (indexOf.get(parent) ?? -1) : -1);
  });

  return flat;
}

/**
 * Rebuild a forest from its flat encoding.
 * Throws when a parent index does not point at an earlier node.
 */
export function inflateForest(flat: FlatForest): Forest {
  const { names, depths, parents } = flat;
  if (names.length !== depths.length || names.length !== parents.length) {
    throw new Error(
      `Malformed flat forest: ${names.length} names, ${depths.length} depths, ${parents.length} parents`
    );
  }

  const nodes: MutableTreeNode[] = [];
  const roots: MutableTreeNode[] = [];

  for (let i = 0; i < names.length; i++) {
    const node = createNode(names[i] ?? '', depths[i] ?? 0);
    const parentIndex = parents[i] ?? -1;

    if (parentIndex === -1) {
      roots.push(node);
    } else {
      const parent = parentIndex < i ? nodes[parentIndex] : undefined;
      if (!parent) {
        throw new Error(`Malformed flat forest: node ${i} has invalid parent ${parentIndex}`);
      }
      parent.children.push(node);
    }

    nodes.push(node);
  }

  return roots;
}
