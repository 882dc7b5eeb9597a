import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { clearConfigCache, loadConfigFile, parseConfigText } from '../../src/utils/config-loader.js';
import { ConfigError } from '../../src/analyzers/errors.js';

describe('config-loader', () => {
  describe('parseConfigText', () => {
    it('should map snake_case sections onto detector options', () => {
      const config = parseConfigText(
        [
          'LongMethod:',
          '  max_lines: 40',
          '  max_complexity: 8',
          'MagicNumbers:',
          '  whitelist: [0, 1, 100]',
          'FeatureEnvy:',
          '  enabled: false',
          '  foreign_access_ratio: 1.5',
          'report:',
          '  format: txt',
        ].join('\n')
      );

      expect(config.detectors.LongMethod).toEqual({ enabled: true, maxLines: 40, maxComplexity: 8 });
      expect(config.detectors.MagicNumbers).toEqual({
        enabled: true,
        minOccurrences: 3,
        whitelist: [0, 1, 100],
        minValue: 2,
        maxValue: 1000,
      });
      expect(config.detectors.FeatureEnvy.enabled).toBe(false);
      expect(config.detectors.FeatureEnvy.foreignAccessRatio).toBe(1.5);
      expect(config.detectors.FeatureEnvy.minForeignAccesses).toBe(2);
      expect(config.report.format).toBe('txt');
    });

    it('should return defaults for an empty document', () => {
      const config = parseConfigText('');

      expect(config.detectors.GodClass).toEqual({ enabled: true, maxFields: 15, maxMethods: 20, maxLines: 200 });
      expect(config.detectors.DuplicatedCode).toEqual({ enabled: true, minSimilarity: 0.8, minChunkSize: 3 });
      expect(config.report.format).toBe('json');
    });

    it('should reject unknown keys', () => {
      expect(() => parseConfigText('LongMethod:\n  max_line: 3\n', 'custom.yaml')).toThrow(
        /Validation failed for custom\.yaml/
      );
    });

    it('should reject values outside their domain', () => {
      expect(() => parseConfigText('DuplicatedCode:\n  min_similarity: 2\n')).toThrow(/DuplicatedCode\.minSimilarity/);
    });

    it('should reject an unknown report format', () => {
      expect(() => parseConfigText('report:\n  format: xml\n')).toThrow(ConfigError);
    });

    it('should reject malformed YAML', () => {
      expect(() => parseConfigText('LongMethod: [unclosed\n')).toThrow(/Malformed YAML/);
    });
  });

  describe('loadConfigFile', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'smell-config-'));
    });

    afterEach(async () => {
      clearConfigCache();
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should return defaults when the file does not exist', () => {
      const config = loadConfigFile(path.join(tempDir, 'missing.yaml'));

      expect(config.source).toBeUndefined();
      expect(config.detectors.LargeParameterList.maxParameters).toBe(5);
    });

    it('should read and cache a configuration file', async () => {
      const configPath = path.join(tempDir, 'smellscope.yaml');
      await fs.writeFile(configPath, 'LargeParameterList:\n  max_parameters: 3\n', 'utf-8');

      const first = loadConfigFile(configPath);
      expect(first.source).toBe(path.resolve(configPath));
      expect(first.detectors.LargeParameterList.maxParameters).toBe(3);

      await fs.writeFile(configPath, 'LargeParameterList:\n  max_parameters: 9\n', 'utf-8');
      expect(loadConfigFile(configPath)).toBe(first);

      clearConfigCache();
      expect(loadConfigFile(configPath).detectors.LargeParameterList.maxParameters).toBe(9);
    });

    it('should only accept YAML files', async () => {
      const configPath = path.join(tempDir, 'config.json');
      await fs.writeFile(configPath, '{}', 'utf-8');

      expect(() => loadConfigFile(configPath)).toThrow(ConfigError);
    });
  });
});
