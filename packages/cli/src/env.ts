/**
 * Environment settings for the arbor CLI.
 *
 * Environment variables:
 * - ARBOR_LOG_LEVEL: pino level for diagnostics on stderr (default: warn)
 * - ARBOR_CONFIG_PATH: YAML config file (default: ./arbor.yaml)
 * - ARBOR_STRATEGY: forest builder, stack or recursive (default: from config)
 * - ARBOR_PROGRESS_STEP: items between progress reports (default: from config)
 * - ARBOR_INLINE: build on the main thread instead of a worker (default: false)
 */

import type { BuildStrategy } from '@arbor/core';
import { isBuildStrategy } from '@arbor/core';

/** Default config file, relative to the working directory */
export const DEFAULT_CONFIG_PATH = 'arbor.yaml';

/** Settings taken from the environment */
export interface EnvSettings {
  logLevel: string;
  configPath: string;
  strategy?: BuildStrategy;
  progressStep?: number;
  inline: boolean;
}

function getEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 1 ? undefined : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value === 'true' || value === '1';
}

/**
 * Read CLI settings from the environment. Unset or invalid values fall
 * through to the config file.
 */
export function readEnvSettings(): EnvSettings {
  const strategy = process.env['ARBOR_STRATEGY'];

  return {
    logLevel: getEnv('ARBOR_LOG_LEVEL', 'warn'),
    configPath: getEnv('ARBOR_CONFIG_PATH', DEFAULT_CONFIG_PATH),
    strategy: isBuildStrategy(strategy) ? strategy : undefined,
    progressStep: getEnvNumber('ARBOR_PROGRESS_STEP'),
    inline: getEnvBoolean('ARBOR_INLINE', false),
  };
}
