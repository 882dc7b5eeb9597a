/**
 * Long Method Detector
 *
 * Detects functions/methods that exceed a line-count or cyclomatic complexity threshold
 */

import { BaseSmellDetector, parseDetectorOptions } from '../base-smell-detector.js';
import { SmellType, SmellSeverity, type CodeSmell } from '../types.js';
import { allFunctions } from '../../ast/parser.js';
import type { SourceUnit } from '../../ast/types.js';
import { calculateComplexity } from '../../metrics/complexity-calculator.js';
import {
  LongMethodOptionsSchema,
  type LongMethodOptions,
  type LongMethodOptionsInput,
} from '../../../schemas/detector-schemas.js';

export class LongMethodDetector extends BaseSmellDetector<LongMethodOptions> {
  constructor(options: LongMethodOptionsInput = {}) {
    super(SmellType.LONG_METHOD, parseDetectorOptions(LongMethodOptionsSchema, options, SmellType.LONG_METHOD));
  }

  protected scan(unit: SourceUnit): CodeSmell[] {
    const { maxLines, maxComplexity } = this.options;
    const smells: CodeSmell[] = [];

    for (const func of allFunctions(unit)) {
      const lines = func.endLine - func.startLine;
      const complexity = calculateComplexity(func.body);
      const tooLong = lines > maxLines;
      const tooComplex = complexity > maxComplexity;
      if (!tooLong && !tooComplex) continue;

      const reasons: string[] = [];
      if (tooLong) reasons.push(`too long (${lines} lines, threshold: ${maxLines})`);
      if (tooComplex) reasons.push(`too complex (complexity: ${complexity}, threshold: ${maxComplexity})`);

      const severity =
        lines > 1.5 * maxLines || complexity > 1.5 * maxComplexity ? SmellSeverity.HIGH : SmellSeverity.MEDIUM;

      smells.push(
        this.createSmell(
          unit,
          func,
          `${func.kind === 'function' || func.kind === 'arrow' ? 'Function' : 'Method'} '${func.qualifiedName}' is ${reasons.join(' and ')}`,
          tooComplex
            ? 'Extract conditional branches and loops into well-named helpers to reduce the number of paths.'
            : `Break this function into smaller, focused functions. Aim for functions under ${maxLines} lines.`,
          severity,
          { lines, maxLines, complexity, maxComplexity }
        )
      );
    }

    return smells;
  }
}
