/**
 * Code Smell Detector Types
 */

import type { SourceRange, SourceUnit } from '../ast/types.js';
import type { SmellDetectorConfig } from '../../schemas/detector-schemas.js';
import type { ParseError } from '../errors.js';

/**
 * Type of code smell. Values double as detector names in configuration.
 */
export enum SmellType {
  LONG_METHOD = 'LongMethod',
  GOD_CLASS = 'GodClass',
  LARGE_PARAMETER_LIST = 'LargeParameterList',
  MAGIC_NUMBERS = 'MagicNumbers',
  DUPLICATED_CODE = 'DuplicatedCode',
  FEATURE_ENVY = 'FeatureEnvy',
}

/**
 * Canonical detector order, used for selection and to break line ties
 */
export const SMELL_TYPE_ORDER: readonly SmellType[] = Object.freeze([
  SmellType.LONG_METHOD,
  SmellType.GOD_CLASS,
  SmellType.LARGE_PARAMETER_LIST,
  SmellType.MAGIC_NUMBERS,
  SmellType.DUPLICATED_CODE,
  SmellType.FEATURE_ENVY,
]);

/**
 * Severity of code smell
 */
export enum SmellSeverity {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
}

/**
 * Code smell detection result
 */
export interface CodeSmell extends SourceRange {
  readonly type: SmellType;
  readonly severity: SmellSeverity;
  readonly filePath: string;
  readonly message: string;
  readonly suggestion: string;
  /** Numeric evidence behind the finding and its severity */
  readonly metrics: Readonly<Record<string, number>>;
  /** Secondary locations, e.g. the other half of a duplicate pair */
  readonly related: ReadonlyArray<SourceRange>;
}

/**
 * Detector selection applied on top of the `enabled` flags
 */
export interface DetectorSelection {
  readonly only?: readonly string[];
  readonly exclude?: readonly string[];
}

/**
 * Analysis options
 */
export interface CodeSmellAnalysisOptions extends DetectorSelection {
  readonly ignorePatterns?: readonly string[];
}

/**
 * A source file that could not be analyzed
 */
export interface ParseFailure {
  readonly filePath: string;
  readonly line: number;
  readonly column: number;
  readonly message: string;
}

/**
 * Analysis result
 */
export interface CodeSmellAnalysisResult {
  readonly smells: ReadonlyArray<CodeSmell>;
  readonly summary: CodeSmellSummary;
  readonly parseErrors: ReadonlyArray<ParseFailure>;
  readonly activeDetectors: ReadonlyArray<SmellType>;
  readonly config: SmellDetectorConfig;
  readonly timestamp: Date;
}

/**
 * Summary statistics
 */
export interface CodeSmellSummary {
  readonly totalSmells: number;
  readonly smellsByType: Readonly<Record<SmellType, number>>;
  readonly smellsBySeverity: Readonly<Record<SmellSeverity, number>>;
  readonly filesAnalyzed: number;
  readonly filesWithSmells: number;
  readonly averageSmellsPerFile: number;
  readonly codeHealthScore: number; // 0-100
}

/**
 * Base detector interface. Detection is a pure function of the unit.
 */
export interface SmellDetector {
  readonly type: SmellType;
  readonly enabled: boolean;
  detect(unit: SourceUnit): CodeSmell[];
}

export function toParseFailure(error: ParseError): ParseFailure {
  return Object.freeze({
    filePath: error.filePath,
    line: error.line,
    column: error.column,
    message: error.message,
  });
}
