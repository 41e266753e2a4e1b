/**
 * Text and JSON presentation of a loaded forest.
 *
 * Rendering goes through the materializer, so only levels that are shown
 * are ever exposed.
 */

import { isFolder, walkForest } from '@arbor/core';
import type { ExposedNode, Forest, IncrementalMaterializer, TreeNode } from '@arbor/core';
import { iconFor } from './icons.js';
import type { IconSet } from './icons.js';

/** Marker appended to folders left collapsed */
export const COLLAPSED_MARKER = '▸';

export interface RenderOptions {
  icons: IconSet;

  /** Levels shown below the roots. Default: all. */
  maxDepth?: number;
}

/** Node in `--json` output; children present only when expanded */
export interface JsonNode {
  name: string;
  type: 'folder' | 'file';
  children?: JsonNode[];
}

export interface ForestStats {
  roots: number;
  nodes: number;
  folders: number;
  files: number;
  maxDepth: number;
}

/**
 * Render the forest as indented `icon name` lines, two spaces per level.
 */
export function renderTree(materializer: IncrementalMaterializer, options: RenderOptions): string[] {
  const maxDepth = options.maxDepth ?? Infinity;
  const lines: string[] = [];
  const stack: Array<{ handle: ExposedNode; level: number }> = [];

  pushReversed(stack, materializer.roots(), 0);

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;

    const { handle, level } = entry;
    const collapsed = handle.expandable && level >= maxDepth;
    const marker = collapsed ? ` ${COLLAPSED_MARKER}` : '';
    lines.push(`${'  '.repeat(level)}${iconFor(handle.node, options.icons)} ${handle.node.name}${marker}`);

    if (handle.expandable && !collapsed) {
      pushReversed(stack, materializer.expand(handle), level + 1);
    }
  }

  return lines;
}

/**
 * The same view as renderTree, as nested objects.
 */
export function toJsonTree(materializer: IncrementalMaterializer, maxDepth = Infinity): JsonNode[] {
  const roots: JsonNode[] = [];
  const stack: Array<{ handle: ExposedNode; level: number; siblings: JsonNode[] }> = [];

  for (const handle of [...materializer.roots()].reverse()) {
    stack.push({ handle, level: 0, siblings: roots });
  }

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;

    const { handle, level, siblings } = entry;
    const json: JsonNode = { name: handle.node.name, type: handle.expandable ? 'folder' : 'file' };
    siblings.push(json);

    if (handle.expandable && level < maxDepth) {
      const children: JsonNode[] = [];
      json.children = children;
      for (const child of [...materializer.expand(handle)].reverse()) {
        stack.push({ handle: child, level: level + 1, siblings: children });
      }
    }
  }

  return roots;
}

/**
 * Slash-joined paths of every node whose name contains `query`, ignoring
 * case, in listing order.
 */
export function findMatches(forest: Forest, query: string): string[] {
  const needle = query.toLowerCase();
  if (needle === '') {
    return [];
  }

  const paths = new Map<TreeNode, string>();
  const matches: string[] = [];

  walkForest(forest, (node, parent) => {
    const parentPath = parent ? paths.get(parent) : undefined;
    const path = parentPath === undefined ? node.name : `${parentPath}/${node.name}`;
    if (isFolder(node)) {
      paths.set(node, path);
    }
    if (node.name.toLowerCase().includes(needle)) {
      matches.push(path);
    }
  });

  return matches;
}

export function computeStats(forest: Forest): ForestStats {
  const stats: ForestStats = { roots: forest.length, nodes: 0, folders: 0, files: 0, maxDepth: 0 };

  walkForest(forest, (node) => {
    stats.nodes++;
    if (isFolder(node)) {
      stats.folders++;
    } else {
      stats.files++;
    }
    stats.maxDepth = Math.max(stats.maxDepth, node.depth);
  });

  return stats;
}

function pushReversed(
  stack: Array<{ handle: ExposedNode; level: number }>,
  handles: readonly ExposedNode[],
  level: number
): void {
  for (let i = handles.length - 1; i >= 0; i--) {
    const handle = handles[i];
    if (handle) stack.push({ handle, level });
  }
}
