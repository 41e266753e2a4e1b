/**
 * arbor init-config [path]
 */

import { existsSync, writeFileSync } from 'node:fs';
import { Command } from 'commander';
import { formatDefaultConfig } from '../config-loader.js';
import { createCommandContext, execute } from './context.js';
import type { CommandContext } from './context.js';

export interface InitConfigOptions {
  force?: boolean;
}

export async function runInitConfig(
  filePath: string | undefined,
  options: InitConfigOptions,
  context: CommandContext
): Promise<number> {
  return execute(context.io, async () => {
    const target = filePath ?? context.env.configPath;
    if (existsSync(target) && !options.force) {
      context.io.error(`${target} already exists (use --force to overwrite)`);
      return 1;
    }

    writeFileSync(target, formatDefaultConfig(), 'utf-8');
    context.logger.info({ target }, 'Default configuration written');
    context.io.notice(`Wrote default configuration to ${target}`);
    return 0;
  });
}

export function registerInitConfigCommand(program: Command): void {
  program
    .command('init-config [path]')
    .description('Write the default configuration file')
    .option('-f, --force', 'Overwrite an existing file')
    .action(async (file: string | undefined, options: InitConfigOptions) => {
      process.exitCode = await runInitConfig(file, options, createCommandContext());
    });
}
