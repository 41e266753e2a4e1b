/**
 * Listing Format Constants
 *
 * Glyphs, prefixes and banner patterns of the connector-glyph listing format
 * written by `tree` (Unicode box drawing) and `tree /A` (ASCII).
 */

/** Width of one indentation unit, in characters */
export const INDENT_UNIT_WIDTH = 4;

/** Branch connectors: mark where an item's own name begins */
export const CONNECTOR_GLYPHS = ['├', '└', '+', '\\'] as const;

/** Continuation glyphs: an ancestor branch still open at this column */
export const CONTINUATION_GLYPHS = ['│', '|'] as const;

/** Characters that may fill an indentation unit */
export const SPACER_GLYPHS = [...CONTINUATION_GLYPHS, ' '] as const;

/** Horizontal box-drawing dash (U+2500) */
export const DASH_GLYPH = '─';

/**
 * Connector prefixes stripped from the start of a name, in priority order.
 * Four-character forms come first so they win over their shorter prefixes.
 */
export const CONNECTOR_PREFIXES = [
  '├── ',
  '└── ',
  '├──',
  '└──',
  '+---',
  '\\---',
  '└─ ',
  '├─ ',
  '└─',
  '├─',
] as const;

/** Banner lines printed before the top path (English and Simplified Chinese consoles) */
export const BANNER_PATTERNS: readonly RegExp[] = [
  /PATH.*(?:listing|列表)|(?:listing|列表).*PATH/,
  /Volume serial number/i,
  /卷序列号/,
];

/** Footer lines printed when a listing has no folders below the top path */
export const FOOTER_PATTERNS: readonly RegExp[] = [
  /^No subfolders exist\s*$/i,
  /^没有子文件夹\s*$/,
];

/** Progress phases, in pipeline order */
export const PROGRESS_PHASES = ['parsing', 'building', 'populating'] as const;

/** Number of progress updates per phase when no explicit step is configured */
export const DEFAULT_PROGRESS_UPDATES = 100;
