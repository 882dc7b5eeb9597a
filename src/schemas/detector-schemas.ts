/**
 * Zod validation schemas for detector options
 * Every field has a default, so `{}` parses to the stock configuration.
 */

import { z } from 'zod';

const threshold = (defaultValue: number) => z.number().int().nonnegative().default(defaultValue);

export const DEFAULT_IGNORED_TARGETS: readonly string[] = Object.freeze([
  'console',
  'Math',
  'JSON',
  'Object',
  'Array',
  'Number',
  'String',
  'Boolean',
  'Date',
  'Promise',
  'Reflect',
  'Symbol',
  'process',
]);

export const LongMethodOptionsSchema = z
  .object({
    enabled: z.boolean().default(true),
    maxLines: threshold(30),
    maxComplexity: threshold(10),
  })
  .strict();

export const GodClassOptionsSchema = z
  .object({
    enabled: z.boolean().default(true),
    maxFields: threshold(15),
    maxMethods: threshold(20),
    maxLines: threshold(200),
  })
  .strict();

export const LargeParameterListOptionsSchema = z
  .object({
    enabled: z.boolean().default(true),
    maxParameters: threshold(5),
  })
  .strict();

export const MagicNumbersOptionsSchema = z
  .object({
    enabled: z.boolean().default(true),
    minOccurrences: z.number().int().min(1).default(3),
    whitelist: z.array(z.number().finite()).default([0, 1, -1]),
    minValue: z.number().finite().default(2),
    maxValue: z.number().finite().default(1000),
  })
  .strict()
  .refine(data => data.minValue <= data.maxValue, {
    message: 'minValue must be <= maxValue',
    path: ['minValue'],
  });

export const DuplicatedCodeOptionsSchema = z
  .object({
    enabled: z.boolean().default(true),
    minSimilarity: z.number().min(0).max(1).default(0.8),
    minChunkSize: z.number().int().min(1).default(3),
  })
  .strict();

export const FeatureEnvyOptionsSchema = z
  .object({
    enabled: z.boolean().default(true),
    minForeignAccesses: threshold(2),
    foreignAccessRatio: z.number().finite().nonnegative().default(0.5),
    ignoredTargets: z.array(z.string().min(1)).default([...DEFAULT_IGNORED_TARGETS]),
  })
  .strict();

/**
 * Whole engine configuration, one section per detector
 */
export const SmellDetectorConfigSchema = z
  .object({
    LongMethod: LongMethodOptionsSchema.default({}),
    GodClass: GodClassOptionsSchema.default({}),
    LargeParameterList: LargeParameterListOptionsSchema.default({}),
    MagicNumbers: MagicNumbersOptionsSchema.default({}),
    DuplicatedCode: DuplicatedCodeOptionsSchema.default({}),
    FeatureEnvy: FeatureEnvyOptionsSchema.default({}),
  })
  .strict();

export type LongMethodOptions = z.infer<typeof LongMethodOptionsSchema>;
export type GodClassOptions = z.infer<typeof GodClassOptionsSchema>;
export type LargeParameterListOptions = z.infer<typeof LargeParameterListOptionsSchema>;
export type MagicNumbersOptions = z.infer<typeof MagicNumbersOptionsSchema>;
export type DuplicatedCodeOptions = z.infer<typeof DuplicatedCodeOptionsSchema>;
export type FeatureEnvyOptions = z.infer<typeof FeatureEnvyOptionsSchema>;
export type SmellDetectorConfig = z.infer<typeof SmellDetectorConfigSchema>;

export type LongMethodOptionsInput = z.input<typeof LongMethodOptionsSchema>;
export type GodClassOptionsInput = z.input<typeof GodClassOptionsSchema>;
export type LargeParameterListOptionsInput = z.input<typeof LargeParameterListOptionsSchema>;
export type MagicNumbersOptionsInput = z.input<typeof MagicNumbersOptionsSchema>;
export type DuplicatedCodeOptionsInput = z.input<typeof DuplicatedCodeOptionsSchema>;
export type FeatureEnvyOptionsInput = z.input<typeof FeatureEnvyOptionsSchema>;
export type SmellDetectorConfigInput = z.input<typeof SmellDetectorConfigSchema>;
