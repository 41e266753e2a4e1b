/**
 * Line Parser
 *
 * Converts one listing line into a depth and a bare name. Depth is inferred
 * from 4-character indentation units rather than by counting spaces, since
 * `tree` output mixes glyph widths and sometimes compresses two levels into
 * a single unit. Never throws: malformed lines degrade to a best guess.
 *
 * Unit handling:
 *   "│   " / "|   " / "    "  spacer, one level
 *   "│  │"                    compressed, one level, rescan from the inner bar
 *   "│ └─" / " abc"           embedded connector or name, one level, stop
 *   "├── " / "+---"           connector, stop without counting a level
 */

import {
  CONNECTOR_GLYPHS,
  CONNECTOR_PREFIXES,
  CONTINUATION_GLYPHS,
  DASH_GLYPH,
  INDENT_UNIT_WIDTH,
  SPACER_GLYPHS,
} from '../constants.js';
import type { LineParseResult } from '../types.js';

const CONNECTORS: ReadonlySet<string> = new Set(CONNECTOR_GLYPHS);
const CONTINUATIONS: ReadonlySet<string> = new Set(CONTINUATION_GLYPHS);
const SPACERS: ReadonlySet<string> = new Set(SPACER_GLYPHS);

// One stray dash left where no connector matched
const LONE_DASH = new RegExp(`^${DASH_GLYPH} ?`);

// Windows writes "├───name": the dash run continues past a spaceless connector
const DASH_RUN = new RegExp(`^${DASH_GLYPH}+ ?`);

/** How a single indentation unit ended */
interface UnitScan {
  /** Characters consumed by the unit */
  width: number;

  /** 'spacer' and 'compressed' continue scanning; 'name' stops it */
  kind: 'spacer' | 'compressed' | 'name';
}

/**
 * Parse a listing line into its depth and name.
 *
 * Returns `{ depth }` without a name for spacer lines (blank, or only a
 * continuation glyph).
 *
 * @example
 * ```ts
 * parseLine('│   ├── index.ts'); // { depth: 1, name: 'index.ts' }
 * parseLine('│');                // { depth: 0 }
 * ```
 */
export function parseLine(line: string): LineParseResult {
  const text = line.trimEnd();
  const { depth, offset } = scanIndentation(text);
  const name = extractName(text.slice(offset));

  return name === undefined ? { depth } : { depth, name };
}

/**
 * Consume indentation units from the start of the line.
 */
function scanIndentation(text: string): { depth: number; offset: number } {
  let depth = 0;
  let offset = 0;

  while (offset + INDENT_UNIT_WIDTH <= text.length) {
    const first = text.charAt(offset);

    // A connector marks the item's own depth, already counted
    if (CONNECTORS.has(first) || !SPACERS.has(first)) {
      break;
    }

    const unit = scanUnit(text, offset);
    depth += 1;
    offset += unit.width;

    if (unit.kind === 'name') {
      break;
    }
  }

  return { depth, offset };
}

/**
 * Examine one unit that starts with a spacer.
 */
function scanUnit(text: string, offset: number): UnitScan {
  for (let i = 0; i < INDENT_UNIT_WIDTH; i++) {
    const char = text.charAt(offset + i);

    if (SPACERS.has(char)) {
      if (i > 0 && CONTINUATIONS.has(char)) {
        return { width: i, kind: 'compressed' };
      }
      continue;
    }

    // Connector or ordinary character inside the unit: the name starts here
    return { width: i, kind: 'name' };
  }

  return { width: INDENT_UNIT_WIDTH, kind: 'spacer' };
}

/**
 * Strip the connector from what is left after indentation.
 * Returns undefined when the remainder is a spacer.
 */
function extractName(rest: string): string | undefined {
  const stripped = rest.trim();
  if (stripped === '' || CONTINUATIONS.has(stripped)) {
    return undefined;
  }

  const prefix = CONNECTOR_PREFIXES.find((p) => rest.startsWith(p));
  if (prefix === undefined && CONTINUATIONS.has(rest.charAt(0))) {
    return undefined;
  }

  if (prefix === undefined) {
    return rest.replace(LONE_DASH, '');
  }

  const name = rest.slice(prefix.length);
  return prefix.endsWith(DASH_GLYPH) ? name.replace(DASH_RUN, '') : name;
}
