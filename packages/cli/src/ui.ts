import chalk from 'chalk';
import { PROGRESS_PHASES } from '@arbor/core';
import type { ProgressEvent, ProgressPhase } from '@arbor/core';
import type { ForestStats } from './render.js';

/** Where a command writes. Handlers emit plain text; colour is added here. */
export interface CommandIO {
  /** Command output (stdout) */
  out(line: string): void;

  /** Informational notice such as "File is empty" (stdout) */
  notice(message: string): void;

  /** Failure (stderr) */
  error(message: string): void;

  /** Progress line (stderr) */
  progress(line: string): void;
}

export const consoleIO: CommandIO = {
  out: (line) => console.log(line),
  notice: (message) => console.log(chalk.yellow(message)),
  error: (message) => console.error(chalk.red(`Error: ${message}`)),
  progress: (line) => console.error(chalk.dim(line)),
};

export const PHASE_LABELS: Record<ProgressPhase, string> = {
  parsing: 'Reading and Parsing lines',
  building: 'Building Tree Structure',
  populating: 'Initializing Root Nodes',
};

/**
 * "Phase 1/3: Reading and Parsing lines... 120/400"
 */
export function formatProgress(event: ProgressEvent): string {
  const index = PROGRESS_PHASES.indexOf(event.phase) + 1;
  return `Phase ${index}/${PROGRESS_PHASES.length}: ${PHASE_LABELS[event.phase]}... ${event.done}/${event.total}`;
}

export function formatStats(stats: ForestStats): string[] {
  return [
    `Roots:     ${stats.roots}`,
    `Nodes:     ${stats.nodes}`,
    `Folders:   ${stats.folders}`,
    `Files:     ${stats.files}`,
    `Max depth: ${stats.maxDepth}`,
  ];
}
