/**
 * Similarity measure tests
 */

import { describe, it, expect } from 'vitest';
import {
  editDistance,
  editRatio,
  normalizeTokens,
  setJaccard,
  structuralSimilarity,
} from '../../../src/analyzers/code-smells/similarity.js';
import { SourceModelBuilder } from '../../../src/analyzers/ast/parser.js';

describe('similarity', () => {
  describe('normalizeTokens', () => {
    it('should replace identifiers and literals with placeholders', () => {
      const unit = new SourceModelBuilder().build(
        'function f(a: number) {\n  return label(a.size, 1, "x", true);\n}'
      );

      expect(normalizeTokens(unit.functions[0].tokens)).toEqual([
        '{',
        'return',
        '$call',
        '(',
        '$name',
        '.',
        '$member',
        ',',
        '$number',
        ',',
        '$string',
        ',',
        '$boolean',
        ')',
        ';',
        '}',
      ]);
    });

    it('should normalize renamed code identically', () => {
      const builder = new SourceModelBuilder();
      const first = builder.build('function f() {\n  x = 5;\n}').functions[0];
      const second = builder.build('function g() {\n  y = 7;\n}').functions[0];

      expect(normalizeTokens(first.tokens)).toEqual(normalizeTokens(second.tokens));
    });
  });

  describe('setJaccard', () => {
    it('should ignore repetition', () => {
      expect(setJaccard(['a', 'a', 'b'], ['b', 'c'])).toBeCloseTo(1 / 3);
      expect(setJaccard(['a', 'a', 'b'], ['a', 'b', 'b'])).toBe(1);
    });

    it('should be 1 for two empty sequences and 0 for disjoint ones', () => {
      expect(setJaccard([], [])).toBe(1);
      expect(setJaccard(['a'], ['b'])).toBe(0);
    });
  });

  describe('editDistance', () => {
    it('should compute the Levenshtein distance', () => {
      expect(editDistance([...'kitten'], [...'sitting'])).toBe(3);
      expect(editDistance([], ['a', 'b'])).toBe(2);
      expect(editDistance(['a'], ['a'])).toBe(0);
    });

    it('should derive a ratio from the longer length', () => {
      expect(editRatio([...'kitten'], [...'sitting'])).toBeCloseTo(1 - 3 / 7);
      expect(editRatio([], [])).toBe(1);
    });
  });

  describe('structuralSimilarity', () => {
    it('should use the tag-set Jaccard for equal lengths', () => {
      expect(structuralSimilarity(['If', 'Return'], ['Return', 'If'])).toBe(1);
      expect(structuralSimilarity(['If', 'Return'], ['Assign', 'Return'])).toBeCloseTo(1 / 3);
    });

    it('should take the higher of Jaccard and edit ratio for unequal lengths', () => {
      expect(structuralSimilarity(['If', 'Return'], ['Assign', 'Return', 'Call'])).toBeCloseTo(1 / 3);
      expect(structuralSimilarity(['Assign', 'Return'], ['Assign', 'Assign', 'Return'])).toBe(1);
    });
  });
});
