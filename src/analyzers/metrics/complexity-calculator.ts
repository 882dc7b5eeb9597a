/**
 * Cyclomatic Complexity Calculator
 *
 * McCabe complexity over the statement model: 1 + number of decision points.
 */

import type { Statement } from '../ast/types.js';

/**
 * Decision points contributed by the statement itself, excluding children
 */
function ownDecisionPoints(statement: Statement): number {
  const expressionPoints = statement.logicalOperators + statement.conditionalExpressions;

  switch (statement.kind) {
    case 'If':
    case 'For':
    case 'While':
      return expressionPoints + 1;
    case 'Switch':
      return expressionPoints + statement.cases.filter(c => !c.isDefault).length;
    case 'Try':
      return expressionPoints + (statement.handler ? 1 : 0);
    case 'Block':
    case 'Assign':
    case 'Call':
    case 'Expression':
    case 'Return':
    case 'Throw':
    case 'Break':
    case 'Continue':
    case 'Declaration':
    case 'Other':
      return expressionPoints;
  }
}

/**
 * Direct children of a statement in source order, inline callbacks first
 */
export function childStatements(statement: Statement): ReadonlyArray<Statement> {
  switch (statement.kind) {
    case 'If':
      return [...statement.inline, ...statement.then, ...statement.else];
    case 'For':
    case 'While':
    case 'Block':
      return [...statement.inline, ...statement.body];
    case 'Switch':
      return [...statement.inline, ...statement.cases.flatMap(c => c.body)];
    case 'Try':
      return [...statement.block, ...(statement.handler ?? []), ...(statement.finalizer ?? [])];
    case 'Assign':
    case 'Call':
    case 'Expression':
    case 'Return':
    case 'Throw':
    case 'Break':
    case 'Continue':
    case 'Declaration':
    case 'Other':
      return statement.inline;
  }
}

/**
 * Pre-order flattening of a statement sequence
 */
export function flattenStatements(statements: ReadonlyArray<Statement>): Statement[] {
  const flat: Statement[] = [];
  const visit = (statement: Statement): void => {
    flat.push(statement);
    childStatements(statement).forEach(visit);
  };
  statements.forEach(visit);
  return flat;
}

export function countDecisionPoints(statements: ReadonlyArray<Statement>): number {
  return flattenStatements(statements).reduce((sum, statement) => sum + ownDecisionPoints(statement), 0);
}

/**
 * Cyclomatic complexity of a function body; always >= 1
 */
export function calculateComplexity(statements: ReadonlyArray<Statement>): number {
  return 1 + countDecisionPoints(statements);
}
