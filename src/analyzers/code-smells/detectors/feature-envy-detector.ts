/**
 * Feature Envy Detector
 *
 * Detects methods that read another object's state more than their own.
 * Access origins are classified once when the source model is built.
 */

import { BaseSmellDetector, parseDetectorOptions } from '../base-smell-detector.js';
import { SmellType, SmellSeverity, type CodeSmell } from '../types.js';
import { allFunctions } from '../../ast/parser.js';
import type { FunctionDef, SourceUnit } from '../../ast/types.js';
import {
  FeatureEnvyOptionsSchema,
  type FeatureEnvyOptions,
  type FeatureEnvyOptionsInput,
} from '../../../schemas/detector-schemas.js';

export interface AccessProfile {
  readonly selfCount: number;
  /** Foreign access counts by target, in first-seen order */
  readonly foreign: ReadonlyMap<string, number>;
}

export class FeatureEnvyDetector extends BaseSmellDetector<FeatureEnvyOptions> {
  private ignoredTargets: ReadonlySet<string>;

  constructor(options: FeatureEnvyOptionsInput = {}) {
    super(SmellType.FEATURE_ENVY, parseDetectorOptions(FeatureEnvyOptionsSchema, options, SmellType.FEATURE_ENVY));
    this.ignoredTargets = new Set(this.options.ignoredTargets);
  }

  /**
   * Self access count and foreign access groups of one function
   */
  profile(func: FunctionDef): AccessProfile {
    let selfCount = 0;
    const foreign = new Map<string, number>();

    for (const access of func.accesses) {
      if (access.origin.kind === 'self') {
        selfCount++;
      } else if (!this.ignoredTargets.has(access.origin.target)) {
        foreign.set(access.origin.target, (foreign.get(access.origin.target) ?? 0) + 1);
      }
    }

    return { selfCount, foreign };
  }

  protected scan(unit: SourceUnit): CodeSmell[] {
    const { minForeignAccesses, foreignAccessRatio } = this.options;
    const smells: CodeSmell[] = [];

    for (const func of allFunctions(unit)) {
      if (func.ownerClassId === undefined) continue;

      const { selfCount, foreign } = this.profile(func);
      for (const [target, foreignCount] of foreign) {
        const ratio = foreignCount / Math.max(selfCount, 1);
        if (foreignCount < minForeignAccesses || ratio < foreignAccessRatio) continue;

        smells.push(
          this.createSmell(
            unit,
            func,
            `Method '${func.qualifiedName}' accesses '${target}' ${foreignCount} times but its own state ${selfCount} times`,
            `Consider moving this logic closer to '${target}', or asking '${target}' to do the work.`,
            SmellSeverity.MEDIUM,
            { foreignCount, selfCount, ratio, minForeignAccesses, foreignAccessRatio }
          )
        );
      }
    }

    return smells;
  }
}
