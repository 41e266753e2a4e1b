/**
 * Listing Scanner
 *
 * Phase 1 of the pipeline: skips the banner, takes the first remaining line
 * as the root and turns every later line into a ParsedItem.
 *
 * Expected input (banner and footer optional):
 *   Folder PATH listing for volume OS
 *   Volume serial number is 0000-0000
 *   C:.
 *   ├───docs
 *   │       readme.txt
 *   └───src
 */

import { BANNER_PATTERNS, FOOTER_PATTERNS } from '../constants.js';
import { ProgressReporter } from '../progress/progress-reporter.js';
import type { ProgressReporterOptions } from '../progress/progress-reporter.js';
import type { ParsedItem, ProgressObserver } from '../types.js';
import { parseLine } from './line-parser.js';

/** Items collected from a listing */
export interface ScannedListing {
  /** Root item first (depth 0), then every entry in line order */
  items: ParsedItem[];

  /** Lines examined, root line included */
  linesScanned: number;

  /** Lines that produced no item */
  skippedLines: number;
}

/** Options for scanListing */
export interface ScanListingOptions extends ProgressReporterOptions {
  onProgress?: ProgressObserver;
}

/**
 * Whether a line is a banner printed before the top path.
 */
export function isBannerLine(line: string): boolean {
  return BANNER_PATTERNS.some((pattern) => pattern.test(line));
}

/**
 * Whether a line is a footer with no entry in it.
 */
export function isFooterLine(line: string): boolean {
  const trimmed = line.trim();
  return FOOTER_PATTERNS.some((pattern) => pattern.test(trimmed));
}

/**
 * Index of the root line: the first line that is neither a banner nor blank.
 * Returns -1 when there is none.
 */
export function findRootIndex(lines: readonly string[]): number {
  return lines.findIndex((line) => line.trim() !== '' && !isBannerLine(line));
}

/**
 * Scan a listing into ordered items.
 *
 * The root line is kept verbatim (trailing whitespace removed) at depth 0;
 * every later item sits one level below its parsed depth, since connectors
 * under the top path start at column 0.
 *
 * Returns undefined when no root line exists.
 */
export function scanListing(
  lines: readonly string[],
  options: ScanListingOptions = {}
): ScannedListing | undefined {
  const rootIndex = findRootIndex(lines);
  const rootLine = rootIndex === -1 ? undefined : lines[rootIndex];
  if (rootLine === undefined) {
    return undefined;
  }

  const total = lines.length - rootIndex;
  const reporter = new ProgressReporter('parsing', total, options.onProgress, options);

  const items: ParsedItem[] = [{ depth: 0, name: rootLine.trimEnd() }];
  let skippedLines = 0;
  reporter.update(1);

  for (let i = rootIndex + 1; i < lines.length; i++) {
    const line = lines[i] ?? '';
    reporter.update(i - rootIndex + 1);

    if (line.trim() === '' || isFooterLine(line)) {
      skippedLines++;
      continue;
    }

    const parsed = parseLine(line);
    if (parsed.name === undefined) {
      skippedLines++;
      continue;
    }

    items.push({ depth: parsed.depth + 1, name: parsed.name });
  }

  reporter.complete();

  return { items, linesScanned: total, skippedLines };
}
