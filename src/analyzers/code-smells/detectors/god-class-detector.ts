/**
 * God Class Detector
 *
 * Detects classes with too many fields, too many methods, or too many lines
 */

import { BaseSmellDetector, parseDetectorOptions } from '../base-smell-detector.js';
import { SmellType, SmellSeverity, type CodeSmell } from '../types.js';
import type { SourceUnit } from '../../ast/types.js';
import {
  GodClassOptionsSchema,
  type GodClassOptions,
  type GodClassOptionsInput,
} from '../../../schemas/detector-schemas.js';

/**
 * measured/threshold, where a zero threshold makes any positive value infinitely large
 */
function ratio(measured: number, threshold: number): number {
  if (threshold > 0) return measured / threshold;
  return measured > 0 ? Number.POSITIVE_INFINITY : 0;
}

export class GodClassDetector extends BaseSmellDetector<GodClassOptions> {
  constructor(options: GodClassOptionsInput = {}) {
    super(SmellType.GOD_CLASS, parseDetectorOptions(GodClassOptionsSchema, options, SmellType.GOD_CLASS));
  }

  protected scan(unit: SourceUnit): CodeSmell[] {
    const { maxFields, maxMethods, maxLines } = this.options;
    const smells: CodeSmell[] = [];

    for (const cls of unit.classes) {
      const fieldCount = cls.fields.length;
      const methodCount = cls.methods.length;
      const lineCount = cls.endLine - cls.startLine;

      const exceeded: string[] = [];
      if (fieldCount > maxFields) exceeded.push(`${fieldCount} fields (threshold: ${maxFields})`);
      if (methodCount > maxMethods) exceeded.push(`${methodCount} methods (threshold: ${maxMethods})`);
      if (lineCount > maxLines) exceeded.push(`${lineCount} lines (threshold: ${maxLines})`);
      if (exceeded.length === 0) continue;

      const worst = Math.max(ratio(fieldCount, maxFields), ratio(methodCount, maxMethods), ratio(lineCount, maxLines));

      smells.push(
        this.createSmell(
          unit,
          cls,
          `Class '${cls.name}' is a god class: ${exceeded.join(', ')}`,
          'Split this class by responsibility. Group related fields with the methods that use them and extract them into separate classes.',
          worst > 1.5 ? SmellSeverity.HIGH : SmellSeverity.MEDIUM,
          { fieldCount, maxFields, methodCount, maxMethods, lineCount, maxLines }
        )
      );
    }

    return smells;
  }
}
