/**
 * IncrementalMaterializer - lazy, level-at-a-time view of a built forest.
 *
 * Roots are exposed first; a node's children are handed out only when the
 * consumer asks for them, so subtrees that are never opened cost nothing.
 * The id table is owned by the consumer's primary line of control: call
 * roots() and expand() only from there.
 *
 * Usage:
 *   const view = new IncrementalMaterializer(forest);
 *   for (const root of view.roots()) {
 *     if (root.expandable) view.expand(root);
 *   }
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { isFolder } from '../builder/node.js';
import { ProgressReporter } from '../progress/progress-reporter.js';
import type { Forest, ProgressObserver, TreeNode } from '../types.js';

/** A node handed to the consumer */
export interface ExposedNode {
  /** Stable id, unique within this materializer */
  readonly id: string;

  /** The underlying node */
  readonly node: TreeNode;

  /** Whether expand() would return children */
  readonly expandable: boolean;
}

/** Options for IncrementalMaterializer */
export interface MaterializerOptions {
  /** Receives 'populating' progress while roots are first exposed */
  onProgress?: ProgressObserver;

  /** Minimum roots between progress reports */
  progressStep?: number;

  logger?: Logger;
}

export class IncrementalMaterializer {
  private readonly forest: Forest;
  private readonly options: MaterializerOptions;
  private readonly logger: Logger;
  private readonly nodeMap: Map<string, TreeNode> = new Map();
  private readonly expansions: Map<string, readonly ExposedNode[]> = new Map();
  private rootHandles: readonly ExposedNode[] | null = null;
  private nextId = 1;

  constructor(forest: Forest, options: MaterializerOptions = {}) {
    this.forest = forest;
    this.options = options;
    this.logger = (options.logger ?? pino({ enabled: false })).child({
      component: 'materializer',
    });
  }

  /** Number of nodes handed out so far */
  get exposedCount(): number {
    return this.nodeMap.size;
  }

  /** Number of roots in the underlying forest */
  get rootCount(): number {
    return this.forest.length;
  }

  /**
   * The forest roots. Exposed on first call; later calls return the same
   * handles.
   */
  roots(): readonly ExposedNode[] {
    if (this.rootHandles) {
      return this.rootHandles;
    }

    const reporter = new ProgressReporter('populating', this.forest.length, this.options.onProgress, {
      step: this.options.progressStep,
      logger: this.logger,
    });

    const handles: ExposedNode[] = [];
    for (const root of this.forest) {
      handles.push(this.expose(root));
      reporter.update(handles.length);
    }
    reporter.complete();

    this.rootHandles = handles;
    this.logger.debug({ roots: handles.length }, 'Roots exposed');
    return handles;
  }

  /**
   * Children of a previously exposed node. The first call exposes them;
   * later calls return the same sequence. Leaves and unknown ids yield an
   * empty sequence.
   */
  expand(target: ExposedNode | string): readonly ExposedNode[] {
    const id = typeof target === 'string' ? target : target.id;

    const cached = this.expansions.get(id);
    if (cached) {
      return cached;
    }

    const node = this.nodeMap.get(id);
    if (!node) {
      this.logger.debug({ id }, 'Expand requested for unknown node');
      return [];
    }

    const children = node.children.map((child) => this.expose(child));
    this.expansions.set(id, children);
    return children;
  }

  /** Whether a node's children have been exposed */
  isExpanded(target: ExposedNode | string): boolean {
    return this.expansions.has(typeof target === 'string' ? target : target.id);
  }

  /** Look up an exposed node by id */
  getNode(id: string): TreeNode | undefined {
    return this.nodeMap.get(id);
  }

  private expose(node: TreeNode): ExposedNode {
    const id = `n${this.nextId++}`;
    this.nodeMap.set(id, node);
    return { id, node, expandable: isFolder(node) };
  }
}
