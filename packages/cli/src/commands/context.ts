/**
 * Shared command plumbing: the context every handler runs in, and loading a
 * listing file through the full pipeline.
 */

import { InlineBuildRunner, TreeLoader, WorkerBuildRunner, isBuildStrategy } from '@arbor/core';
import type { BuildRunner, BuildStrategy, LoadedTree } from '@arbor/core';
import type { Logger } from 'pino';
import { loadConfig } from '../config-loader.js';
import type { ArborConfig } from '../config-loader.js';
import { readEnvSettings } from '../env.js';
import type { EnvSettings } from '../env.js';
import { createLogger } from '../logger.js';
import { consoleIO, formatProgress } from '../ui.js';
import type { CommandIO } from '../ui.js';
import { readListingFile } from '../utils/read-listing.js';

export interface CommandContext {
  io: CommandIO;
  env: EnvSettings;
  logger: Logger;

  /** Overrides the runner chosen from ARBOR_INLINE */
  runner?: BuildRunner;
}

/** Options shared by commands that read a listing */
export interface ListingOptions {
  /** Config file path; overrides ARBOR_CONFIG_PATH */
  config?: string;

  /** Builder strategy; overrides ARBOR_STRATEGY and the config file */
  strategy?: string;

  /** Print phase progress to stderr */
  progress?: boolean;
}

/** A listing loaded and ready to present, or the exit code to stop with */
export type ListingLoad =
  | { status: 'loaded'; tree: LoadedTree; config: ArborConfig; encoding: string }
  | { status: 'stopped'; exitCode: number };

export function createCommandContext(): CommandContext {
  const env = readEnvSettings();
  return { io: consoleIO, env, logger: createLogger(env.logLevel) };
}

/**
 * Run a handler body, reporting any thrown error and mapping it to exit
 * code 1.
 */
export async function execute(io: CommandIO, task: () => Promise<number>): Promise<number> {
  try {
    return await task();
  } catch (error) {
    io.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

/**
 * Read, decode and load a listing file. Conditions with a user-facing
 * message (bad config, empty file, undecodable bytes, no tree) stop with an
 * exit code; anything else throws.
 */
export async function loadListing(
  filePath: string,
  options: ListingOptions,
  context: CommandContext
): Promise<ListingLoad> {
  const { io, env, logger } = context;

  const configPath = options.config ?? env.configPath;
  const configResult = loadConfig(configPath);
  if (!configResult.success) {
    io.error(`Invalid configuration in ${configPath}`);
    for (const e of configResult.errors) {
      io.error(`  ${e.field}: ${e.message}`);
    }
    return { status: 'stopped', exitCode: 1 };
  }
  const config = configResult.config;

  let strategy: BuildStrategy = env.strategy ?? config.strategy;
  if (options.strategy !== undefined) {
    if (!isBuildStrategy(options.strategy)) {
      io.error(`Unknown strategy: ${options.strategy} (expected stack or recursive)`);
      return { status: 'stopped', exitCode: 1 };
    }
    strategy = options.strategy;
  }

  const read = await readListingFile(filePath, config.encodings);
  if (read.status === 'empty') {
    io.notice('File is empty');
    return { status: 'stopped', exitCode: 0 };
  }
  if (read.status === 'decode-failed') {
    io.error(`Could not decode ${filePath} (tried ${read.tried.join(', ')})`);
    return { status: 'stopped', exitCode: 1 };
  }
  logger.debug({ filePath, encoding: read.encoding, lines: read.lines.length }, 'Listing decoded');

  const runner =
    context.runner ?? (env.inline ? new InlineBuildRunner() : new WorkerBuildRunner({ logger }));
  const loader = new TreeLoader({
    runner,
    strategy,
    progressStep: env.progressStep ?? config.progressStep,
    logger,
  });
  if (options.progress) {
    loader.on('progress', (event) => io.progress(formatProgress(event)));
  }

  const result = await loader.load(read.lines);
  switch (result.status) {
    case 'loaded':
      return { status: 'loaded', tree: result, config, encoding: read.encoding };
    case 'no-root':
      io.notice('No tree structure found.');
      return { status: 'stopped', exitCode: 0 };
    case 'superseded':
      throw new Error('Load was superseded before it finished');
  }
}
