/**
 * TreeLoader - runs a listing through all three phases.
 *
 * Lifecycle of one load:
 * 1. Parsing and building run in a BuildRunner, off the caller's path
 * 2. The flat forest is handed back once and inflated here
 * 3. Populating: roots are exposed through a fresh IncrementalMaterializer
 *
 * Every load is tagged with a generation. Starting a new load cancels the
 * one in flight, and a result from an older generation is dropped, never
 * applied.
 */

import { EventEmitter } from 'node:events';
import pino from 'pino';
import type { Logger } from 'pino';
import { inflateForest } from '../builder/flat-forest.js';
import { IncrementalMaterializer } from '../materializer/materializer.js';
import type { BuildStats, BuildStrategy, Forest, ProgressEvent } from '../types.js';
import { WorkerBuildRunner } from './runners.js';
import type { BuildRunner, BuildTask, BuildTaskResult } from './runners.js';

/** A listing that was loaded and applied */
export interface LoadedTree {
  status: 'loaded';
  generation: number;
  forest: Forest;
  materializer: IncrementalMaterializer;
  stats: BuildStats;
}

/** Result of TreeLoader.load() */
export type LoadResult =
  | LoadedTree
  | { status: 'no-root'; generation: number }
  | { status: 'superseded'; generation: number };

/** Events emitted by the TreeLoader */
export interface TreeLoaderEvents {
  /** Progress of the current generation */
  progress: (event: ProgressEvent, generation: number) => void;
  /** A new forest replaced the previous one */
  loaded: (tree: LoadedTree) => void;
  /** The listing held no tree */
  noRoot: (generation: number) => void;
  /** A stale result was dropped */
  superseded: (generation: number) => void;
  /** The build failed */
  failed: (error: Error, generation: number) => void;
}

/**
 * Typed event emitter interface for the loader.
 */
export interface TypedTreeLoaderEmitter {
  on<K extends keyof TreeLoaderEvents>(event: K, listener: TreeLoaderEvents[K]): this;
  off<K extends keyof TreeLoaderEvents>(event: K, listener: TreeLoaderEvents[K]): this;
  emit<K extends keyof TreeLoaderEvents>(
    event: K,
    ...args: Parameters<TreeLoaderEvents[K]>
  ): boolean;
}

/** Options for the TreeLoader */
export interface TreeLoaderOptions {
  /** Default: WorkerBuildRunner */
  runner?: BuildRunner;

  /** Default: 'recursive' */
  strategy?: BuildStrategy;

  /** Minimum items between progress reports */
  progressStep?: number;

  logger?: Logger;
}

export class TreeLoader extends EventEmitter implements TypedTreeLoaderEmitter {
  private readonly runner: BuildRunner;
  private readonly strategy: BuildStrategy;
  private readonly progressStep: number | undefined;
  private readonly logger: Logger;
  private generation = 0;
  private activeTask: BuildTask | null = null;
  private _current: LoadedTree | null = null;

  constructor(options: TreeLoaderOptions = {}) {
    super();
    const logger = options.logger ?? pino({ enabled: false });
    this.logger = logger.child({ component: 'tree-loader' });
    this.runner = options.runner ?? new WorkerBuildRunner({ logger });
    this.strategy = options.strategy ?? 'recursive';
    this.progressStep = options.progressStep;
  }

  /** The most recently applied tree, if any */
  get current(): LoadedTree | null {
    return this._current;
  }

  /** Generation of the most recent load request */
  get currentGeneration(): number {
    return this.generation;
  }

  /** Whether a build is in flight */
  get isLoading(): boolean {
    return this.activeTask !== null;
  }

  /**
   * Load a decoded listing. Supersedes any load still in flight.
   */
  async load(lines: readonly string[]): Promise<LoadResult> {
    this.activeTask?.cancel();
    const generation = ++this.generation;

    this.logger.info({ generation, lines: lines.length, strategy: this.strategy }, 'Load started');

    const task = this.runner.start(
      { lines: [...lines], strategy: this.strategy, progressStep: this.progressStep },
      (event) => {
        if (generation === this.generation) {
          this.emit('progress', event, generation);
        }
      }
    );
    this.activeTask = task;

    let outcome: BuildTaskResult;
    try {
      outcome = await task.result;
    } catch (err) {
      if (generation !== this.generation) {
        return this.supersede(generation);
      }
      this.activeTask = null;
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error({ err: error, generation }, 'Build failed');
      this.emit('failed', error, generation);
      throw error;
    }

    if (generation !== this.generation || outcome.status === 'cancelled') {
      return this.supersede(generation);
    }
    this.activeTask = null;

    if (outcome.status === 'no-root') {
      this.logger.info({ generation }, 'No tree structure found');
      this.emit('noRoot', generation);
      return { status: 'no-root', generation };
    }

    const forest = inflateForest(outcome.forest);
    const materializer = new IncrementalMaterializer(forest, {
      onProgress: (event) => this.emit('progress', event, generation),
      progressStep: this.progressStep,
      logger: this.logger,
    });
    materializer.roots();

    const tree: LoadedTree = {
      status: 'loaded',
      generation,
      forest,
      materializer,
      stats: outcome.stats,
    };
    this._current = tree;

    this.logger.info({ generation, ...outcome.stats }, 'Load finished');
    this.emit('loaded', tree);
    return tree;
  }

  /**
   * Cancel the load in flight, if any. Its result will never be applied.
   */
  cancel(): void {
    if (!this.activeTask) return;
    this.activeTask.cancel();
    this.activeTask = null;
    this.generation++;
  }

  private supersede(generation: number): LoadResult {
    this.logger.info({ generation, current: this.generation }, 'Dropping superseded build result');
    this.emit('superseded', generation);
    return { status: 'superseded', generation };
  }
}
