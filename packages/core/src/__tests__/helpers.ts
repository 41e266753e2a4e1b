import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { ParsedItem } from '../types.js';

export interface MockLogger {
  logger: Logger;
  info: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
}

/** Logger whose child() returns itself, so calls from any component land on the same spies */
export function createMockLogger(): MockLogger {
  const info = vi.fn();
  const debug = vi.fn();
  const warn = vi.fn();
  const error = vi.fn();
  const logger: Logger = { info, debug, warn, error, child: () => logger } as unknown as Logger;
  return { logger, info, debug, warn, error };
}

/**
 * Deterministic pseudo-random generator (mulberry32).
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Random item sequence: depth 0 first, then each depth at most one deeper
 * than the previous, occasionally jumping several levels.
 */
export function randomItems(seed: number, count: number): ParsedItem[] {
  const random = seededRandom(seed);
  const items: ParsedItem[] = [{ depth: 0, name: 'root' }];
  let depth = 0;

  for (let i = 1; i < count; i++) {
    const roll = random();
    if (roll < 0.4) {
      depth += 1;
    } else if (roll < 0.5) {
      depth += 2 + Math.floor(random() * 3);
    } else if (roll < 0.8) {
      depth = Math.floor(random() * (depth + 1));
    }
    items.push({ depth, name: `item-${i}` });
  }

  return items;
}
