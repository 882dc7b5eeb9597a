/**
 * Metrics Module
 */

export { calculateComplexity, countDecisionPoints, childStatements, flattenStatements } from './complexity-calculator.js';
