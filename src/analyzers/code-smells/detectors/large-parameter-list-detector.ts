/**
 * Large Parameter List Detector
 *
 * Detects functions with too many parameters. The implicit receiver is not counted.
 */

import { BaseSmellDetector, parseDetectorOptions } from '../base-smell-detector.js';
import { SmellType, SmellSeverity, type CodeSmell } from '../types.js';
import { allFunctions } from '../../ast/parser.js';
import type { SourceUnit } from '../../ast/types.js';
import {
  LargeParameterListOptionsSchema,
  type LargeParameterListOptions,
  type LargeParameterListOptionsInput,
} from '../../../schemas/detector-schemas.js';

export class LargeParameterListDetector extends BaseSmellDetector<LargeParameterListOptions> {
  constructor(options: LargeParameterListOptionsInput = {}) {
    super(
      SmellType.LARGE_PARAMETER_LIST,
      parseDetectorOptions(LargeParameterListOptionsSchema, options, SmellType.LARGE_PARAMETER_LIST)
    );
  }

  protected scan(unit: SourceUnit): CodeSmell[] {
    const { maxParameters } = this.options;
    const smells: CodeSmell[] = [];

    for (const func of allFunctions(unit)) {
      const [first] = func.parameters;
      const paramCount = func.parameters.length - (first?.isReceiver ? 1 : 0);
      if (paramCount <= maxParameters) continue;

      smells.push(
        this.createSmell(
          unit,
          func,
          `Function '${func.qualifiedName}' has ${paramCount} parameters (threshold: ${maxParameters})`,
          'Group related parameters into an options object or introduce a parameter object.',
          paramCount > 2 * maxParameters ? SmellSeverity.HIGH : SmellSeverity.MEDIUM,
          { paramCount, maxParameters }
        )
      );
    }

    return smells;
  }
}
