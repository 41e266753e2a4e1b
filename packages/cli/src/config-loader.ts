/**
 * Arbor Configuration Loader
 *
 * Loads display and decoding settings from a YAML file. Keys are kebab-case;
 * anything left out takes its value from DEFAULT_CONFIG. A missing file is
 * not an error.
 *
 * @module config-loader
 */

import { readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { isBuildStrategy } from '@arbor/core';
import type { BuildStrategy } from '@arbor/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Resolved configuration */
export interface ArborConfig {
  /** Icon for leaves with no extension mapping */
  fileIcon: string;

  /** Icon for nodes with children */
  folderIcon: string;

  /** Icons by lower-case extension, dot included (".md") */
  extensionIcons: Record<string, string>;

  /** Decoding fallbacks, tried in order */
  encodings: string[];

  strategy: BuildStrategy;

  /** Items between progress reports. Unset: 1% of each phase. */
  progressStep?: number;
}

/** A single validation error */
export interface ConfigValidationError {
  field: string;
  message: string;
}

/** Result of loading configuration */
export type ConfigLoadResult =
  | { success: true; config: ArborConfig }
  | { success: false; errors: ConfigValidationError[] };

export const DEFAULT_CONFIG: ArborConfig = {
  fileIcon: '📄',
  folderIcon: '📂',
  extensionIcons: {
    '.md': '📝',
    '.txt': '📝',
    '.json': '🔧',
    '.yaml': '🔧',
    '.yml': '🔧',
    '.png': '🖼️',
    '.jpg': '🖼️',
    '.zip': '📦',
  },
  encodings: ['utf-8', 'gbk'],
  strategy: 'recursive',
};

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readIcon(
  raw: Record<string, unknown>,
  key: string,
  fallback: string,
  errors: ConfigValidationError[]
): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    errors.push({ field: key, message: `"${key}" must be a non-empty string` });
    return fallback;
  }
  return value;
}

function readExtensionIcons(raw: Record<string, unknown>, errors: ConfigValidationError[]): Record<string, string> {
  const value = raw['extension-icons'];
  if (value === undefined) return { ...DEFAULT_CONFIG.extensionIcons };
  if (!isRecord(value)) {
    errors.push({ field: 'extension-icons', message: '"extension-icons" must be a mapping of extension to icon' });
    return { ...DEFAULT_CONFIG.extensionIcons };
  }

  const icons: Record<string, string> = {};
  for (const [ext, icon] of Object.entries(value)) {
    if (typeof icon !== 'string' || icon === '') {
      errors.push({ field: `extension-icons.${ext}`, message: 'Icon must be a non-empty string' });
      continue;
    }
    const key = ext.toLowerCase();
    icons[key.startsWith('.') ? key : `.${key}`] = icon;
  }
  return icons;
}

function readEncodings(raw: Record<string, unknown>, errors: ConfigValidationError[]): string[] {
  const value = raw['encodings'];
  if (value === undefined) return [...DEFAULT_CONFIG.encodings];
  if (!Array.isArray(value) || value.length === 0) {
    errors.push({ field: 'encodings', message: '"encodings" must be a non-empty list' });
    return [...DEFAULT_CONFIG.encodings];
  }

  const encodings: string[] = [];
  value.forEach((entry: unknown, i) => {
    if (typeof entry !== 'string' || !isSupportedEncoding(entry)) {
      errors.push({ field: `encodings[${i}]`, message: `Unsupported encoding: ${String(entry)}` });
      return;
    }
    encodings.push(entry);
  });
  return encodings;
}

/**
 * Whether the runtime can decode the named encoding.
 */
export function isSupportedEncoding(label: string): boolean {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
}

function transformConfig(raw: Record<string, unknown>, errors: ConfigValidationError[]): ArborConfig {
  const config: ArborConfig = {
    fileIcon: readIcon(raw, 'file-icon', DEFAULT_CONFIG.fileIcon, errors),
    folderIcon: readIcon(raw, 'folder-icon', DEFAULT_CONFIG.folderIcon, errors),
    extensionIcons: readExtensionIcons(raw, errors),
    encodings: readEncodings(raw, errors),
    strategy: DEFAULT_CONFIG.strategy,
  };

  const strategy = raw['strategy'];
  if (strategy !== undefined) {
    if (isBuildStrategy(strategy)) {
      config.strategy = strategy;
    } else {
      errors.push({ field: 'strategy', message: `Invalid strategy: ${String(strategy)} (expected stack or recursive)` });
    }
  }

  const step = raw['progress-step'];
  if (step !== undefined && step !== null) {
    if (typeof step === 'number' && Number.isInteger(step) && step >= 1) {
      config.progressStep = step;
    } else {
      errors.push({ field: 'progress-step', message: '"progress-step" must be a positive integer' });
    }
  }

  return config;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Load configuration from a YAML string. Empty content yields the defaults.
 */
export function loadConfigFromString(yamlContent: string): ConfigLoadResult {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (err) {
    return {
      success: false,
      errors: [{ field: 'yaml', message: `Failed to parse YAML: ${err instanceof Error ? err.message : String(err)}` }],
    };
  }

  if (parsed === undefined || parsed === null) {
    return { success: true, config: cloneDefaults() };
  }
  if (!isRecord(parsed)) {
    return {
      success: false,
      errors: [{ field: 'yaml', message: 'YAML content is not a mapping' }],
    };
  }

  const errors: ConfigValidationError[] = [];
  const config = transformConfig(parsed, errors);

  if (errors.length > 0) {
    return { success: false, errors };
  }
  return { success: true, config };
}

/**
 * Load configuration from a YAML file. A file that does not exist yields
 * the defaults.
 */
export function loadConfig(filePath: string): ConfigLoadResult {
  let rawYaml: string;
  try {
    rawYaml = readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      return { success: true, config: cloneDefaults() };
    }
    return {
      success: false,
      errors: [{ field: 'filePath', message: `Failed to read config file: ${err instanceof Error ? err.message : String(err)}` }],
    };
  }

  return loadConfigFromString(rawYaml);
}

/**
 * The default configuration as YAML, for `arbor init-config`.
 */
export function formatDefaultConfig(): string {
  return yaml.dump({
    'file-icon': DEFAULT_CONFIG.fileIcon,
    'folder-icon': DEFAULT_CONFIG.folderIcon,
    'extension-icons': DEFAULT_CONFIG.extensionIcons,
    encodings: DEFAULT_CONFIG.encodings,
    strategy: DEFAULT_CONFIG.strategy,
  });
}

function cloneDefaults(): ArborConfig {
  return {
    ...DEFAULT_CONFIG,
    extensionIcons: { ...DEFAULT_CONFIG.extensionIcons },
    encodings: [...DEFAULT_CONFIG.encodings],
  };
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
