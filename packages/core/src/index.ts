/**
 * @arbor/core - connector-glyph listing parser
 *
 * Reconstructs the hierarchy drawn by `tree`-style listings and exposes it
 * lazily, one level at a time.
 *
 * @example
 * ```ts
 * import { TreeLoader, InlineBuildRunner } from '@arbor/core';
 *
 * const loader = new TreeLoader({ runner: new InlineBuildRunner() });
 * const result = await loader.load(['C:.', '├── a.txt', '└── docs', '    └── b.txt']);
 * if (result.status === 'loaded') {
 *   const [root] = result.materializer.roots();
 * }
 * ```
 */

// Types
export type {
  ParsedItem,
  LineParseResult,
  TreeNode,
  Forest,
  BuildStrategy,
  ProgressPhase,
  ProgressEvent,
  ProgressObserver,
  FlatForest,
  BuildStats,
  BuildSuccess,
  NoRootFound,
  BuildOutcome,
} from './types.js';

// Errors
export { ExhaustedError, BuilderFinishedError, WorkerBuildError } from './errors.js';

// Parsing
export { parseLine } from './parser/line-parser.js';
export { scanListing, findRootIndex, isBannerLine, isFooterLine } from './parser/listing.js';
export type { ScannedListing, ScanListingOptions } from './parser/listing.js';
export { LookaheadSequence } from './sequence/lookahead.js';

// Building
export { isFolder, walkForest, countNodes } from './builder/node.js';
export { StackForestBuilder } from './builder/stack-builder.js';
export type { StackBuilderHooks } from './builder/stack-builder.js';
export { buildRecursive } from './builder/recursive-builder.js';
export type { RecursiveBuilderHooks } from './builder/recursive-builder.js';
export { buildForest, isBuildStrategy, BUILD_STRATEGIES } from './builder/forest-builder.js';
export type { BuildForestOptions } from './builder/forest-builder.js';
export { flattenForest, inflateForest } from './builder/flat-forest.js';

// Materializing
export { IncrementalMaterializer } from './materializer/materializer.js';
export type { ExposedNode, MaterializerOptions } from './materializer/materializer.js';

// Progress
export { ProgressReporter, defaultProgressStep } from './progress/progress-reporter.js';
export type { ProgressReporterOptions } from './progress/progress-reporter.js';

// Loading
export { buildListing, runBuildJob, isBuildRequest, isBuildWorkerMessage } from './loader/build-job.js';
export type {
  BuildListingOptions,
  BuildRequest,
  BuildJobResult,
  FlatBuildSuccess,
  BuildWorkerMessage,
} from './loader/build-job.js';
export { InlineBuildRunner, WorkerBuildRunner } from './loader/runners.js';
export type {
  BuildRunner,
  BuildTask,
  BuildTaskResult,
  BuildCancelled,
  WorkerBuildRunnerOptions,
} from './loader/runners.js';
export { TreeLoader } from './loader/tree-loader.js';
export type {
  LoadedTree,
  LoadResult,
  TreeLoaderEvents,
  TypedTreeLoaderEmitter,
  TreeLoaderOptions,
} from './loader/tree-loader.js';

// Constants
export {
  INDENT_UNIT_WIDTH,
  CONNECTOR_GLYPHS,
  CONTINUATION_GLYPHS,
  SPACER_GLYPHS,
  CONNECTOR_PREFIXES,
  BANNER_PATTERNS,
  FOOTER_PATTERNS,
  PROGRESS_PHASES,
} from './constants.js';
