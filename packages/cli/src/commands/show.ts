/**
 * arbor show <file>
 */

import { Command, InvalidArgumentError } from 'commander';
import { renderTree, toJsonTree } from '../render.js';
import { createCommandContext, execute, loadListing } from './context.js';
import type { CommandContext, ListingOptions } from './context.js';

export interface ShowOptions extends ListingOptions {
  /** Levels shown below the roots */
  depth?: number;
  json?: boolean;
}

export function parseDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 0) {
    throw new InvalidArgumentError('Depth must be a non-negative integer.');
  }
  return depth;
}

export async function runShow(filePath: string, options: ShowOptions, context: CommandContext): Promise<number> {
  return execute(context.io, async () => {
    const load = await loadListing(filePath, options, context);
    if (load.status === 'stopped') {
      return load.exitCode;
    }

    const { materializer } = load.tree;
    if (options.json) {
      context.io.out(JSON.stringify(toJsonTree(materializer, options.depth), null, 2));
      return 0;
    }

    for (const line of renderTree(materializer, { icons: load.config, maxDepth: options.depth })) {
      context.io.out(line);
    }
    return 0;
  });
}

export function registerShowCommand(program: Command): void {
  program
    .command('show <file>')
    .description('Print the hierarchy of a tree listing')
    .option('-d, --depth <n>', 'Levels to show below the roots', parseDepth)
    .option('-s, --strategy <strategy>', 'Forest builder: stack or recursive')
    .option('-c, --config <path>', 'Config file (default: ./arbor.yaml)')
    .option('--json', 'Print the tree as JSON')
    .option('--progress', 'Print phase progress to stderr')
    .action(async (file: string, options: ShowOptions) => {
      process.exitCode = await runShow(file, options, createCommandContext());
    });
}
