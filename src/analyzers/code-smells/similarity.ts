/**
 * Similarity Measures
 *
 * Normalization and scoring used by the duplicated-code matcher.
 */

import type { LexicalToken, Statement, StatementKind } from '../ast/types.js';

/**
 * Replace identifiers and literal values with role placeholders so that
 * `x = 5` and `y = 7` normalize to the same sequence. Keywords and
 * punctuation pass through verbatim.
 */
export function normalizeToken(token: LexicalToken): string {
  switch (token.category) {
    case 'identifier':
      return `$${token.role ?? 'name'}`;
    case 'number':
      return '$number';
    case 'string':
      return '$string';
    case 'template':
      return '$template';
    case 'regex':
      return '$regex';
    case 'boolean':
      return '$boolean';
    case 'jsx-text':
      return '$text';
    case 'nested':
      return '$nested';
    case 'keyword':
    case 'punctuation':
      return token.text;
  }
}

export function normalizeTokens(tokens: ReadonlyArray<LexicalToken>): string[] {
  return tokens.map(normalizeToken);
}

export function tagSequence(statements: ReadonlyArray<Statement>): StatementKind[] {
  return statements.map(statement => statement.kind);
}

/**
 * Jaccard over the distinct items of each sequence
 */
export function setJaccard<T>(a: ReadonlyArray<T>, b: ReadonlyArray<T>): number {
  const setA = new Set(a);
  const setB = new Set(b);
  if (setA.size === 0 && setB.size === 0) return 1;

  let intersection = 0;
  for (const item of setA) {
    if (setB.has(item)) intersection++;
  }
  return intersection / (setA.size + setB.size - intersection);
}

/**
 * Levenshtein distance between two sequences
 */
export function editDistance<T>(a: ReadonlyArray<T>, b: ReadonlyArray<T>): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1);
      const deletion = (previous[j] ?? 0) + 1;
      const insertion = (current[j - 1] ?? 0) + 1;
      current.push(Math.min(substitution, deletion, insertion));
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
}

/**
 * 1 - editDistance / longer length, in [0, 1]
 */
export function editRatio<T>(a: ReadonlyArray<T>, b: ReadonlyArray<T>): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - editDistance(a, b) / longest;
}

/**
 * Tag-set Jaccard; when the sequences differ in length the edit ratio may lift it
 */
export function structuralSimilarity(a: ReadonlyArray<StatementKind>, b: ReadonlyArray<StatementKind>): number {
  const jaccard = setJaccard(a, b);
  return a.length === b.length ? jaccard : Math.max(jaccard, editRatio(a, b));
}
