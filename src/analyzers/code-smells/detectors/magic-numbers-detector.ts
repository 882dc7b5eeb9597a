/**
 * Magic Numbers Detector
 *
 * Detects numeric literals repeated across a source unit that should be named constants.
 * Literals that are already the whole initializer of a constant are skipped.
 */

import { BaseSmellDetector, parseDetectorOptions } from '../base-smell-detector.js';
import { SmellType, SmellSeverity, type CodeSmell } from '../types.js';
import type { LiteralOccurrence, SourceUnit } from '../../ast/types.js';
import {
  MagicNumbersOptionsSchema,
  type MagicNumbersOptions,
  type MagicNumbersOptionsInput,
} from '../../../schemas/detector-schemas.js';

export class MagicNumbersDetector extends BaseSmellDetector<MagicNumbersOptions> {
  private whitelist: ReadonlySet<number>;

  constructor(options: MagicNumbersOptionsInput = {}) {
    super(SmellType.MAGIC_NUMBERS, parseDetectorOptions(MagicNumbersOptionsSchema, options, SmellType.MAGIC_NUMBERS));
    this.whitelist = new Set(this.options.whitelist);
  }

  protected scan(unit: SourceUnit): CodeSmell[] {
    const { minOccurrences, minValue, maxValue } = this.options;

    // Map iteration order is first-occurrence order
    const groups = new Map<number, LiteralOccurrence[]>();
    for (const literal of unit.literals) {
      if (literal.inConstantDefinition) continue;
      if (literal.value < minValue || literal.value > maxValue) continue;
      if (this.whitelist.has(literal.value)) continue;

      const group = groups.get(literal.value);
      if (group) {
        group.push(literal);
      } else {
        groups.set(literal.value, [literal]);
      }
    }

    const smells: CodeSmell[] = [];
    for (const [value, occurrences] of groups) {
      if (occurrences.length < minOccurrences) continue;

      const lines = occurrences.map(o => o.line);
      smells.push(
        this.createSmell(
          unit,
          { startLine: Math.min(...lines), endLine: Math.max(...lines) },
          `Magic number ${value} appears ${occurrences.length} times (lines ${lines.join(', ')})`,
          `Extract ${value} into a named constant that explains its meaning.`,
          SmellSeverity.MEDIUM,
          { value, occurrences: occurrences.length, minOccurrences },
          lines.map(line => ({ startLine: line, endLine: line }))
        )
      );
    }

    return smells;
  }
}
