/**
 * Code Smell Analyzer Module
 */

export {
  CodeSmellAnalyzer,
  resolveConfig,
  selectDetectors,
  createDetector,
  sortSmells,
  findSourceFiles,
  calculateHealthScore,
  DEFAULT_SOURCE_PATTERN,
  type CodeSmellAnalyzerOptions,
} from './code-smell-analyzer.js';
export { BaseSmellDetector, parseDetectorOptions } from './base-smell-detector.js';
export {
  normalizeToken,
  normalizeTokens,
  tagSequence,
  setJaccard,
  editDistance,
  editRatio,
  structuralSimilarity,
} from './similarity.js';

// Detectors
export { LongMethodDetector } from './detectors/long-method-detector.js';
export { GodClassDetector } from './detectors/god-class-detector.js';
export { LargeParameterListDetector } from './detectors/large-parameter-list-detector.js';
export { MagicNumbersDetector } from './detectors/magic-numbers-detector.js';
export { DuplicatedCodeDetector, type PairSimilarity } from './detectors/duplicated-code-detector.js';
export { FeatureEnvyDetector, type AccessProfile } from './detectors/feature-envy-detector.js';

// Types
export {
  SmellType,
  SmellSeverity,
  SMELL_TYPE_ORDER,
  type CodeSmell,
  type DetectorSelection,
  type CodeSmellAnalysisOptions,
  type CodeSmellAnalysisResult,
  type CodeSmellSummary,
  type ParseFailure,
  type SmellDetector,
} from './types.js';
