/**
 * Build Job
 *
 * Phases 1 and 2 of a load: scan the listing into items, then build the
 * forest. Pure and synchronous, so it runs unchanged inside a worker thread
 * or inline. The worker side talks to the loader through BuildWorkerMessage.
 */

import type { Logger } from 'pino';
import { flattenForest } from '../builder/flat-forest.js';
import { buildForest, isBuildStrategy } from '../builder/forest-builder.js';
import { scanListing } from '../parser/listing.js';
import { ProgressReporter } from '../progress/progress-reporter.js';
import type {
  BuildOutcome,
  BuildStats,
  BuildStrategy,
  FlatForest,
  NoRootFound,
  ProgressEvent,
  ProgressObserver,
} from '../types.js';

/** Options for buildListing */
export interface BuildListingOptions {
  /** Default: 'recursive' */
  strategy?: BuildStrategy;
  onProgress?: ProgressObserver;
  progressStep?: number;
  logger?: Logger;
}

/** Input handed to a build runner */
export interface BuildRequest {
  lines: string[];
  strategy: BuildStrategy;
  progressStep?: number;
}

/** Forest built by a runner, in transfer encoding */
export interface FlatBuildSuccess {
  status: 'built';
  forest: FlatForest;
  stats: BuildStats;
}

/** What a build job hands back */
export type BuildJobResult = FlatBuildSuccess | NoRootFound;

/** Messages posted from the build worker to the loader */
export type BuildWorkerMessage =
  | { type: 'progress'; event: ProgressEvent }
  | { type: 'result'; result: BuildJobResult }
  | { type: 'error'; message: string };

/**
 * Scan and build a listing in one call.
 *
 * Returns `{ status: 'no-root' }` for an empty listing or one holding only
 * banner and blank lines.
 */
export function buildListing(lines: readonly string[], options: BuildListingOptions = {}): BuildOutcome {
  const reporterOptions = { step: options.progressStep, logger: options.logger };

  const scanned = scanListing(lines, { ...reporterOptions, onProgress: options.onProgress });
  if (!scanned) {
    return { status: 'no-root' };
  }

  const reporter = new ProgressReporter(
    'building',
    scanned.items.length,
    options.onProgress,
    reporterOptions
  );

  const forest = buildForest(scanned.items, {
    strategy: options.strategy,
    onNode: (_node, count) => reporter.update(count),
  });
  reporter.complete();

  return {
    status: 'built',
    forest,
    stats: {
      linesScanned: scanned.linesScanned,
      itemCount: scanned.items.length,
      skippedLines: scanned.skippedLines,
      rootCount: forest.length,
    },
  };
}

/**
 * Run one build request, posting progress and the final result.
 */
export function runBuildJob(
  request: BuildRequest,
  post: (message: BuildWorkerMessage) => void
): BuildJobResult {
  const outcome = buildListing(request.lines, {
    strategy: request.strategy,
    progressStep: request.progressStep,
    onProgress: (event) => post({ type: 'progress', event }),
  });

  const result: BuildJobResult =
    outcome.status === 'built'
      ? { status: 'built', forest: flattenForest(outcome.forest), stats: outcome.stats }
      : outcome;

  post({ type: 'result', result });
  return result;
}

/**
 * Validate data received as a build request.
 */
export function isBuildRequest(value: unknown): value is BuildRequest {
  if (typeof value !== 'object' || value === null) return false;
  if (!('lines' in value) || !Array.isArray(value.lines)) return false;
  if (!value.lines.every((line: unknown) => typeof line === 'string')) return false;
  if (!('strategy' in value) || !isBuildStrategy(value.strategy)) return false;
  if ('progressStep' in value && value.progressStep !== undefined && typeof value.progressStep !== 'number') {
    return false;
  }
  return true;
}

/**
 * Validate a message received from the build worker.
 */
export function isBuildWorkerMessage(value: unknown): value is BuildWorkerMessage {
  if (typeof value !== 'object' || value === null || !('type' in value)) return false;

  switch (value.type) {
    case 'progress':
      return 'event' in value && typeof value.event === 'object' && value.event !== null;
    case 'result':
      return (
        'result' in value &&
        typeof value.result === 'object' &&
        value.result !== null &&
        'status' in value.result &&
        (value.result.status === 'built' || value.result.status === 'no-root')
      );
    case 'error':
      return 'message' in value && typeof value.message === 'string';
    default:
      return false;
  }
}
