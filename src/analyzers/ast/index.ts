/**
 * AST Analysis Module
 *
 * Builds the structural source model from TypeScript and JavaScript via ts-morph.
 */

export { SourceModelBuilder, allFunctions, getSourceModelBuilder, resetSourceModelBuilder } from './parser.js';

export type * from './types.js';
