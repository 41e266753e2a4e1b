/**
 * Forest builder strategy switch.
 *
 * The stack and recursive builders are interchangeable algorithms behind one
 * contract: the same items always yield the same forest.
 */

import { LookaheadSequence } from '../sequence/lookahead.js';
import type { BuildStrategy, Forest, ParsedItem, TreeNode } from '../types.js';
import { buildRecursive } from './recursive-builder.js';
import { StackForestBuilder } from './stack-builder.js';

/** Options for buildForest */
export interface BuildForestOptions {
  /** Default: 'recursive' */
  strategy?: BuildStrategy;

  /** A node was placed; `count` is the number of nodes placed so far */
  onNode?: (node: TreeNode, count: number) => void;
}

/** All available strategies */
export const BUILD_STRATEGIES: readonly BuildStrategy[] = ['stack', 'recursive'];

type ForestBuildFn = (items: Iterable<ParsedItem>, options: BuildForestOptions) => Forest;

const BUILDERS: Record<BuildStrategy, ForestBuildFn> = {
  stack: (items, options) => {
    const builder = new StackForestBuilder({ onNode: options.onNode });
    builder.insertAll(items);
    return builder.finish();
  },
  recursive: (items, options) =>
    buildRecursive(new LookaheadSequence(items), 0, { onNode: options.onNode }),
};

/**
 * Build a forest from ordered items with the chosen strategy.
 */
export function buildForest(items: Iterable<ParsedItem>, options: BuildForestOptions = {}): Forest {
  return BUILDERS[options.strategy ?? 'recursive'](items, options);
}

/** Narrow an arbitrary string to a BuildStrategy */
export function isBuildStrategy(value: unknown): value is BuildStrategy {
  return typeof value === 'string' && BUILD_STRATEGIES.some((s) => s === value);
}
