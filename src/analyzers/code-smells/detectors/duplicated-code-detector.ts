/**
 * Duplicated Code Detector
 *
 * Pairwise comparison of function bodies on normalized tokens and on the
 * shape of their statement sequences.
 */

import { BaseSmellDetector, parseDetectorOptions } from '../base-smell-detector.js';
import { SmellType, SmellSeverity, type CodeSmell } from '../types.js';
import { normalizeTokens, setJaccard, structuralSimilarity, tagSequence } from '../similarity.js';
import { allFunctions } from '../../ast/parser.js';
import type { FunctionDef, SourceUnit, StatementKind } from '../../ast/types.js';
import { flattenStatements } from '../../metrics/complexity-calculator.js';
import {
  DuplicatedCodeOptionsSchema,
  type DuplicatedCodeOptions,
  type DuplicatedCodeOptionsInput,
} from '../../../schemas/detector-schemas.js';

interface Candidate {
  readonly func: FunctionDef;
  readonly tokens: string[];
  readonly tags: StatementKind[];
}

export interface PairSimilarity {
  readonly tokenSimilarity: number;
  readonly structuralSimilarity: number;
  readonly similarity: number;
}

export class DuplicatedCodeDetector extends BaseSmellDetector<DuplicatedCodeOptions> {
  constructor(options: DuplicatedCodeOptionsInput = {}) {
    super(SmellType.DUPLICATED_CODE, parseDetectorOptions(DuplicatedCodeOptionsSchema, options, SmellType.DUPLICATED_CODE));
  }

  /**
   * Similarity of two functions, independent of any threshold
   */
  compare(a: FunctionDef, b: FunctionDef): PairSimilarity {
    return scorePair(toCandidate(a), toCandidate(b));
  }

  protected scan(unit: SourceUnit): CodeSmell[] {
    const { minSimilarity, minChunkSize } = this.options;

    // allFunctions is in source order, so i < j canonicalizes each pair
    const candidates = allFunctions(unit)
      .map(toCandidate)
      .filter(candidate => candidate.tags.length >= minChunkSize);

    const smells: CodeSmell[] = [];
    for (let i = 0; i < candidates.length; i++) {
      for (let j = i + 1; j < candidates.length; j++) {
        const first = candidates[i];
        const second = candidates[j];
        if (!first || !second) continue;

        const shorterSpan = Math.min(span(first.func), span(second.func));
        if (shorterSpan < minChunkSize) continue;

        const score = scorePair(first, second);
        if (score.similarity < minSimilarity) continue;

        smells.push(
          this.createSmell(
            unit,
            first.func,
            `Function '${first.func.qualifiedName}' duplicates '${second.func.qualifiedName}' ` +
              `(lines ${second.func.startLine}-${second.func.endLine}) with ${Math.round(score.similarity * 100)}% similarity`,
            'Extract the shared logic into a single function and call it from both places.',
            SmellSeverity.MEDIUM,
            { ...score, minSimilarity },
            [second.func]
          )
        );
      }
    }

    return smells;
  }
}

function span(func: FunctionDef): number {
  return func.endLine - func.startLine + 1;
}

function toCandidate(func: FunctionDef): Candidate {
  return {
    func,
    tokens: normalizeTokens(func.tokens),
    tags: tagSequence(flattenStatements(func.body)),
  };
}

function scorePair(a: Candidate, b: Candidate): PairSimilarity {
  const tokenSimilarity = setJaccard(a.tokens, b.tokens);
  const structural = structuralSimilarity(a.tags, b.tags);
  return {
    tokenSimilarity,
    structuralSimilarity: structural,
    similarity: Math.max(tokenSimilarity, structural),
  };
}
