#!/usr/bin/env tsx

/**
 * arbor - browse directory hierarchies saved from the `tree` command
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { registerFindCommand } from './commands/find.js';
import { registerInitConfigCommand } from './commands/init-config.js';
import { registerShowCommand } from './commands/show.js';
import { registerStatsCommand } from './commands/stats.js';

const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
const version =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const program = new Command();

program
  .name('arbor')
  .description('Reconstruct and browse directory trees from tree-command listings')
  .version(version);

registerShowCommand(program);
registerFindCommand(program);
registerStatsCommand(program);
registerInitConfigCommand(program);

await program.parseAsync();
