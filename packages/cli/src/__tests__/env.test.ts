import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DEFAULT_CONFIG_PATH, readEnvSettings } from '../env.js';

describe('readEnvSettings', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env['ARBOR_LOG_LEVEL'];
    delete process.env['ARBOR_CONFIG_PATH'];
    delete process.env['ARBOR_STRATEGY'];
    delete process.env['ARBOR_PROGRESS_STEP'];
    delete process.env['ARBOR_INLINE'];
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should return defaults when nothing is set', () => {
    expect(readEnvSettings()).toEqual({
      logLevel: 'warn',
      configPath: DEFAULT_CONFIG_PATH,
      strategy: undefined,
      progressStep: undefined,
      inline: false,
    });
  });

  it('should read every variable', () => {
    process.env['ARBOR_LOG_LEVEL'] = 'debug';
    process.env['ARBOR_CONFIG_PATH'] = '/etc/arbor.yaml';
    process.env['ARBOR_STRATEGY'] = 'stack';
    process.env['ARBOR_PROGRESS_STEP'] = '250';
    process.env['ARBOR_INLINE'] = '1';

    expect(readEnvSettings()).toEqual({
      logLevel: 'debug',
      configPath: '/etc/arbor.yaml',
      strategy: 'stack',
      progressStep: 250,
      inline: true,
    });
  });

  it('should ignore invalid strategy and step values', () => {
    process.env['ARBOR_STRATEGY'] = 'queue';
    process.env['ARBOR_PROGRESS_STEP'] = '0';

    const settings = readEnvSettings();
    expect(settings.strategy).toBeUndefined();
    expect(settings.progressStep).toBeUndefined();
  });
});
