/**
 * Base Smell Detector
 *
 * Abstract base class for all smell detectors
 */

import type { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { SourceRange, SourceUnit } from '../ast/types.js';
import type { SmellDetector, CodeSmell, SmellType, SmellSeverity } from './types.js';

interface DetectorOptions {
  readonly enabled: boolean;
}

/**
 * Validate raw detector options against their schema.
 * Throws ConfigError listing every issue; values are never clamped.
 */
export function parseDetectorOptions<S extends z.ZodTypeAny>(schema: S, input: unknown, type: SmellType): z.infer<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid ${type} options`,
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      { detector: type }
    );
  }
  return result.data;
}

export abstract class BaseSmellDetector<TOptions extends DetectorOptions> implements SmellDetector {
  constructor(
    public readonly type: SmellType,
    public readonly options: Readonly<TOptions>
  ) {}

  get enabled(): boolean {
    return this.options.enabled;
  }

  /**
   * Detect smells in a source unit
   */
  detect(unit: SourceUnit): CodeSmell[] {
    if (!this.enabled) return [];
    return this.scan(unit);
  }

  protected abstract scan(unit: SourceUnit): CodeSmell[];

  /**
   * Create a code smell object
   */
  protected createSmell(
    unit: SourceUnit,
    range: SourceRange,
    message: string,
    suggestion: string,
    severity: SmellSeverity,
    metrics: Record<string, number> = {},
    related: readonly SourceRange[] = []
  ): CodeSmell {
    return Object.freeze({
      type: this.type,
      severity,
      filePath: unit.filePath,
      startLine: range.startLine,
      endLine: range.endLine,
      message,
      suggestion,
      metrics: Object.freeze({ ...metrics }),
      related: Object.freeze(related.map(r => Object.freeze({ startLine: r.startLine, endLine: r.endLine }))),
    });
  }
}
