/**
 * arbor find <file> <query>
 */

import { Command } from 'commander';
import { findMatches } from '../render.js';
import { createCommandContext, execute, loadListing } from './context.js';
import type { CommandContext, ListingOptions } from './context.js';

export async function runFind(
  filePath: string,
  query: string,
  options: ListingOptions,
  context: CommandContext
): Promise<number> {
  return execute(context.io, async () => {
    const load = await loadListing(filePath, options, context);
    if (load.status === 'stopped') {
      return load.exitCode;
    }

    const matches = findMatches(load.tree.forest, query);
    if (matches.length === 0) {
      context.io.notice(`No entries match "${query}"`);
      return 0;
    }

    for (const match of matches) {
      context.io.out(match);
    }
    return 0;
  });
}

export function registerFindCommand(program: Command): void {
  program
    .command('find <file> <query>')
    .description('List paths of entries whose name contains the query (case-insensitive)')
    .option('-c, --config <path>', 'Config file (default: ./arbor.yaml)')
    .option('--progress', 'Print phase progress to stderr')
    .action(async (file: string, query: string, options: ListingOptions) => {
      process.exitCode = await runFind(file, query, options, createCommandContext());
    });
}
