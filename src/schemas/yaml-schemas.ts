/**
 * Zod validation schemas for YAML configuration files
 * Sections are named after the detectors; keys are snake_case and map onto
 * the camelCase detector options. Value ranges are checked by the detector schemas.
 */

import { z } from 'zod';

export const REPORT_FORMATS = ['json', 'txt'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const LongMethodSectionSchema = z
  .object({
    enabled: z.boolean().optional(),
    max_lines: z.number().optional(),
    max_complexity: z.number().optional(),
  })
  .strict()
  .transform(section => ({
    enabled: section.enabled,
    maxLines: section.max_lines,
    maxComplexity: section.max_complexity,
  }));

export const GodClassSectionSchema = z
  .object({
    enabled: z.boolean().optional(),
    max_fields: z.number().optional(),
    max_methods: z.number().optional(),
    max_lines: z.number().optional(),
  })
  .strict()
  .transform(section => ({
    enabled: section.enabled,
    maxFields: section.max_fields,
    maxMethods: section.max_methods,
    maxLines: section.max_lines,
  }));

export const LargeParameterListSectionSchema = z
  .object({
    enabled: z.boolean().optional(),
    max_parameters: z.number().optional(),
  })
  .strict()
  .transform(section => ({
    enabled: section.enabled,
    maxParameters: section.max_parameters,
  }));

export const MagicNumbersSectionSchema = z
  .object({
    enabled: z.boolean().optional(),
    min_occurrences: z.number().optional(),
    whitelist: z.array(z.number()).optional(),
    min_value: z.number().optional(),
    max_value: z.number().optional(),
  })
  .strict()
  .transform(section => ({
    enabled: section.enabled,
    minOccurrences: section.min_occurrences,
    whitelist: section.whitelist,
    minValue: section.min_value,
    maxValue: section.max_value,
  }));

export const DuplicatedCodeSectionSchema = z
  .object({
    enabled: z.boolean().optional(),
    min_similarity: z.number().optional(),
    min_chunk_size: z.number().optional(),
  })
  .strict()
  .transform(section => ({
    enabled: section.enabled,
    minSimilarity: section.min_similarity,
    minChunkSize: section.min_chunk_size,
  }));

export const FeatureEnvySectionSchema = z
  .object({
    enabled: z.boolean().optional(),
    min_foreign_accesses: z.number().optional(),
    foreign_access_ratio: z.number().optional(),
    ignored_targets: z.array(z.string()).optional(),
  })
  .strict()
  .transform(section => ({
    enabled: section.enabled,
    minForeignAccesses: section.min_foreign_accesses,
    foreignAccessRatio: section.foreign_access_ratio,
    ignoredTargets: section.ignored_targets,
  }));

export const ReportSectionSchema = z
  .object({
    format: z.enum(REPORT_FORMATS).optional(),
  })
  .strict();

/**
 * Schema for smellscope.yaml
 */
export const ConfigFileSchema = z
  .object({
    LongMethod: LongMethodSectionSchema.optional(),
    GodClass: GodClassSectionSchema.optional(),
    LargeParameterList: LargeParameterListSectionSchema.optional(),
    MagicNumbers: MagicNumbersSectionSchema.optional(),
    DuplicatedCode: DuplicatedCodeSectionSchema.optional(),
    FeatureEnvy: FeatureEnvySectionSchema.optional(),
    report: ReportSectionSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
