/**
 * arbor stats <file>
 */

import { Command } from 'commander';
import { computeStats } from '../render.js';
import { formatStats } from '../ui.js';
import { createCommandContext, execute, loadListing } from './context.js';
import type { CommandContext, ListingOptions } from './context.js';

export async function runStats(filePath: string, options: ListingOptions, context: CommandContext): Promise<number> {
  return execute(context.io, async () => {
    const load = await loadListing(filePath, options, context);
    if (load.status === 'stopped') {
      return load.exitCode;
    }

    const { stats } = load.tree;
    const lines = [
      ...formatStats(computeStats(load.tree.forest)),
      `Lines:     ${stats.linesScanned} (${stats.skippedLines} skipped)`,
      `Encoding:  ${load.encoding}`,
    ];
    for (const line of lines) {
      context.io.out(line);
    }
    return 0;
  });
}

export function registerStatsCommand(program: Command): void {
  program
    .command('stats <file>')
    .description('Summarise the hierarchy of a tree listing')
    .option('-c, --config <path>', 'Config file (default: ./arbor.yaml)')
    .option('--progress', 'Print phase progress to stderr')
    .action(async (file: string, options: ListingOptions) => {
      process.exitCode = await runStats(file, options, createCommandContext());
    });
}
