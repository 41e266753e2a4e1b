import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_CONFIG,
  formatDefaultConfig,
  isSupportedEncoding,
  loadConfig,
  loadConfigFromString,
} from '../config-loader.js';

describe('Config loader', () => {
  describe('loadConfigFromString', () => {
    it('should return defaults for empty content', () => {
      expect(loadConfigFromString('')).toEqual({ success: true, config: DEFAULT_CONFIG });
    });

    it('should read every setting', () => {
      const result = loadConfigFromString(
        [
          'file-icon: F',
          'folder-icon: D',
          'extension-icons:',
          '  TS: T',
          '  .md: M',
          'encodings: [gbk]',
          'strategy: stack',
          'progress-step: 50',
        ].join('\n')
      );

      expect(result).toEqual({
        success: true,
        config: {
          fileIcon: 'F',
          folderIcon: 'D',
          extensionIcons: { '.ts': 'T', '.md': 'M' },
          encodings: ['gbk'],
          strategy: 'stack',
          progressStep: 50,
        },
      });
    });

    it('should keep defaults for keys left out', () => {
      const result = loadConfigFromString('folder-icon: D');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.config.folderIcon).toBe('D');
      expect(result.config.fileIcon).toBe(DEFAULT_CONFIG.fileIcon);
      expect(result.config.encodings).toEqual(['utf-8', 'gbk']);
    });

    it('should collect every validation error', () => {
      const result = loadConfigFromString('encodings: [utf-8, klingon]\nstrategy: queue\nprogress-step: 0');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.errors.map((e) => e.field)).toEqual(['encodings[1]', 'strategy', 'progress-step']);
      expect(result.errors[1]?.message).toBe('Invalid strategy: queue (expected stack or recursive)');
    });

    it('should reject malformed YAML', () => {
      const result = loadConfigFromString('file-icon: [unclosed');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.errors[0]?.field).toBe('yaml');
      expect(result.errors[0]?.message).toMatch(/^Failed to parse YAML/);
    });

    it('should reject a document that is not a mapping', () => {
      expect(loadConfigFromString('- a\n- b')).toEqual({
        success: false,
        errors: [{ field: 'yaml', message: 'YAML content is not a mapping' }],
      });
    });
  });

  describe('loadConfig', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'arbor-config-test-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should return defaults when the file does not exist', () => {
      expect(loadConfig(path.join(tmpDir, 'arbor.yaml'))).toEqual({ success: true, config: DEFAULT_CONFIG });
    });

    it('should load a file from disk', () => {
      const file = path.join(tmpDir, 'arbor.yaml');
      fs.writeFileSync(file, 'strategy: stack\n');

      const result = loadConfig(file);
      expect(result.success && result.config.strategy).toBe('stack');
    });

    it('should report unreadable paths', () => {
      const result = loadConfig(tmpDir);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.errors[0]?.field).toBe('filePath');
    });
  });

  describe('formatDefaultConfig', () => {
    it('should load back to the defaults', () => {
      expect(loadConfigFromString(formatDefaultConfig())).toEqual({ success: true, config: DEFAULT_CONFIG });
    });
  });

  describe('isSupportedEncoding', () => {
    it('should know the decoder labels of the runtime', () => {
      expect(isSupportedEncoding('utf-8')).toBe(true);
      expect(isSupportedEncoding('gbk')).toBe(true);
      expect(isSupportedEncoding('klingon')).toBe(false);
    });
  });
});
