/**
 * Core Types
 *
 * Data model shared by the parser, the builders, the materializer and the
 * loader. Nodes are plain objects so a forest can cross a worker boundary.
 */

import type { PROGRESS_PHASES } from './constants.js';

/** One parsed listing line. */
export interface ParsedItem {
  /** Tree depth (number of indentation levels) */
  depth: number;

  /** Entry name with indentation and connector glyphs removed */
  name: string;
}

/**
 * Result of parsing a single line. `name` is absent for spacer lines, which
 * carry no entry and are not an error.
 */
export interface LineParseResult {
  depth: number;
  name?: string;
}

/** A node of the reconstructed hierarchy. Immutable once building completes. */
export interface TreeNode {
  readonly name: string;
  readonly depth: number;
  readonly children: readonly TreeNode[];
}

/** Ordered roots produced by one parse/build pass */
export type Forest = readonly TreeNode[];

/** Forest builder strategies; both produce identical forests */
export type BuildStrategy = 'stack' | 'recursive';

/** A pipeline phase that reports progress */
export type ProgressPhase = (typeof PROGRESS_PHASES)[number];

/** A single progress report */
export interface ProgressEvent {
  phase: ProgressPhase;
  done: number;
  total: number;
}

/** Receives progress reports. Delivery is best-effort. */
export type ProgressObserver = (event: ProgressEvent) => void;

/**
 * Forest encoded as parallel arrays in pre-order.
 * `parents[i]` is the index of node i's parent, or -1 for a root.
 */
export interface FlatForest {
  names: string[];
  depths: number[];
  parents: number[];
}

/** Counters collected while building */
export interface BuildStats {
  /** Lines examined after the banner, root line included */
  linesScanned: number;

  /** Items that became nodes */
  itemCount: number;

  /** Spacer, blank and footer lines that produced no item */
  skippedLines: number;

  /** Number of forest roots */
  rootCount: number;
}

/** Forest built from a listing */
export interface BuildSuccess {
  status: 'built';
  forest: Forest;
  stats: BuildStats;
}

/** Nothing but banner or blank lines (or no lines at all) */
export interface NoRootFound {
  status: 'no-root';
}

/** Result of building a forest from raw lines */
export type BuildOutcome = BuildSuccess | NoRootFound;
