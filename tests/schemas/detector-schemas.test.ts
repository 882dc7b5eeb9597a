/**
 * Tests for detector option and configuration file schemas
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_IGNORED_TARGETS,
  FeatureEnvyOptionsSchema,
  LongMethodOptionsSchema,
  MagicNumbersOptionsSchema,
  SmellDetectorConfigSchema,
} from '../../src/schemas/detector-schemas.js';
import { ConfigFileSchema, MagicNumbersSectionSchema } from '../../src/schemas/yaml-schemas.js';

describe('detector option schemas', () => {
  it('should fill in defaults for an empty object', () => {
    const config = SmellDetectorConfigSchema.parse({});

    expect(config.LongMethod).toEqual({ enabled: true, maxLines: 30, maxComplexity: 10 });
    expect(config.LargeParameterList).toEqual({ enabled: true, maxParameters: 5 });
    expect(config.MagicNumbers.whitelist).toEqual([0, 1, -1]);
    expect(config.FeatureEnvy.ignoredTargets).toEqual([...DEFAULT_IGNORED_TARGETS]);
  });

  it('should reject negative and fractional thresholds', () => {
    expect(LongMethodOptionsSchema.safeParse({ maxLines: -1 }).success).toBe(false);
    expect(LongMethodOptionsSchema.safeParse({ maxComplexity: 2.5 }).success).toBe(false);
    expect(LongMethodOptionsSchema.safeParse({ maxLines: 0 }).success).toBe(true);
  });

  it('should reject unknown option keys', () => {
    const result = LongMethodOptionsSchema.safeParse({ maxLine: 10 });
    expect(result.success).toBe(false);
  });

  it('should require minValue <= maxValue', () => {
    const result = MagicNumbersOptionsSchema.safeParse({ minValue: 10, maxValue: 5 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['minValue']);
      expect(result.error.issues[0].message).toBe('minValue must be <= maxValue');
    }
  });

  it('should require at least one occurrence', () => {
    expect(MagicNumbersOptionsSchema.safeParse({ minOccurrences: 0 }).success).toBe(false);
  });

  it('should accept fractional envy ratios', () => {
    expect(FeatureEnvyOptionsSchema.parse({ foreignAccessRatio: 1.5 }).foreignAccessRatio).toBe(1.5);
  });
});

describe('ConfigFileSchema', () => {
  it('should map snake_case keys to option names', () => {
    expect(MagicNumbersSectionSchema.parse({ min_occurrences: 2, max_value: 50 })).toEqual({
      enabled: undefined,
      minOccurrences: 2,
      whitelist: undefined,
      minValue: undefined,
      maxValue: 50,
    });
  });

  it('should reject unknown sections', () => {
    expect(ConfigFileSchema.safeParse({ LongMethods: {} }).success).toBe(false);
  });

  it('should accept known report formats only', () => {
    expect(ConfigFileSchema.safeParse({ report: { format: 'txt' } }).success).toBe(true);
    expect(ConfigFileSchema.safeParse({ report: { format: 'html' } }).success).toBe(false);
  });
});
