/**
 * Code Smell Analyzer
 *
 * Main orchestrator for code smell detection: builds the source model once
 * per file, runs the selected detectors over it and merges their findings.
 */

import { readFile } from 'fs/promises';
import { glob } from 'glob';
import {
  SmellType,
  SmellSeverity,
  SMELL_TYPE_ORDER,
  toParseFailure,
  type CodeSmell,
  type CodeSmellAnalysisOptions,
  type CodeSmellAnalysisResult,
  type CodeSmellSummary,
  type DetectorSelection,
  type ParseFailure,
  type SmellDetector,
} from './types.js';
import { LongMethodDetector } from './detectors/long-method-detector.js';
import { GodClassDetector } from './detectors/god-class-detector.js';
import { LargeParameterListDetector } from './detectors/large-parameter-list-detector.js';
import { MagicNumbersDetector } from './detectors/magic-numbers-detector.js';
import { DuplicatedCodeDetector } from './detectors/duplicated-code-detector.js';
import { FeatureEnvyDetector } from './detectors/feature-envy-detector.js';
import { SourceModelBuilder, getSourceModelBuilder } from '../ast/parser.js';
import type { SourceUnit } from '../ast/types.js';
import { ConfigError, ParseError } from '../errors.js';
import { NoopLogger, type Logger } from '../../utils/analysis-logger.js';
import {
  SmellDetectorConfigSchema,
  type SmellDetectorConfig,
  type SmellDetectorConfigInput,
} from '../../schemas/detector-schemas.js';

export const DEFAULT_SOURCE_PATTERN = '**/*.{ts,tsx,js,jsx,mts,cts}';

const DEFAULT_IGNORE_PATTERNS = ['**/node_modules/**', '**/dist/**', '**/build/**', '**/.git/**', '**/*.d.ts'];

export interface CodeSmellAnalyzerOptions extends DetectorSelection {
  readonly config?: SmellDetectorConfigInput;
  readonly logger?: Logger;
  readonly builder?: SourceModelBuilder;
}

/**
 * Validate a (partial) engine configuration and fill in defaults
 */
export function resolveConfig(input: SmellDetectorConfigInput = {}): SmellDetectorConfig {
  const result = SmellDetectorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      'Invalid detector configuration',
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

function isSmellType(name: string): name is SmellType {
  return SMELL_TYPE_ORDER.some(type => type === name);
}

/**
 * Enabled detector kinds in canonical order, narrowed by `only` and then by `exclude`
 */
export function selectDetectors(config: SmellDetectorConfig, selection: DetectorSelection = {}): SmellType[] {
  const requested = [...(selection.only ?? []), ...(selection.exclude ?? [])];
  const unknown = requested.filter(name => !isSmellType(name));
  if (unknown.length > 0) {
    throw new ConfigError(
      'Unknown detector name',
      unknown.map(name => `${name}: expected one of ${SMELL_TYPE_ORDER.join(', ')}`)
    );
  }

  const only = selection.only;
  const exclude = selection.exclude ?? [];
  return SMELL_TYPE_ORDER.filter(type => config[type].enabled)
    .filter(type => only === undefined || only.includes(type))
    .filter(type => !exclude.includes(type));
}

/**
 * Instantiate the detector for one kind with its section of the configuration
 */
export function createDetector(type: SmellType, config: SmellDetectorConfig): SmellDetector {
  switch (type) {
    case SmellType.LONG_METHOD:
      return new LongMethodDetector(config.LongMethod);
    case SmellType.GOD_CLASS:
      return new GodClassDetector(config.GodClass);
    case SmellType.LARGE_PARAMETER_LIST:
      return new LargeParameterListDetector(config.LargeParameterList);
    case SmellType.MAGIC_NUMBERS:
      return new MagicNumbersDetector(config.MagicNumbers);
    case SmellType.DUPLICATED_CODE:
      return new DuplicatedCodeDetector(config.DuplicatedCode);
    case SmellType.FEATURE_ENVY:
      return new FeatureEnvyDetector(config.FeatureEnvy);
  }
}

/**
 * Order findings by start line, then by detector kind. The sort is stable,
 * so findings tied on both keep their detector's emission order.
 */
export function sortSmells(smells: readonly CodeSmell[]): CodeSmell[] {
  const rank = (smell: CodeSmell): number => SMELL_TYPE_ORDER.indexOf(smell.type);
  return [...smells].sort((a, b) => a.startLine - b.startLine || rank(a) - rank(b));
}

export class CodeSmellAnalyzer {
  readonly config: SmellDetectorConfig;
  readonly activeDetectors: ReadonlyArray<SmellType>;
  private detectors: SmellDetector[];
  private builder: SourceModelBuilder;
  private logger: Logger;

  constructor(options: CodeSmellAnalyzerOptions = {}) {
    this.config = resolveConfig(options.config);
    this.activeDetectors = Object.freeze(selectDetectors(this.config, options));
    this.detectors = this.activeDetectors.map(type => createDetector(type, this.config));
    this.builder = options.builder ?? getSourceModelBuilder();
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Run the active detectors over an already built unit
   */
  analyzeUnit(unit: SourceUnit): CodeSmell[] {
    return sortSmells(this.detectors.flatMap(detector => detector.detect(unit)));
  }

  /**
   * Analyze source text. Throws ParseError when the text does not parse.
   */
  analyzeSource(text: string, filePath: string = 'source.ts'): CodeSmell[] {
    return this.analyzeUnit(this.builder.build(text, filePath));
  }

  /**
   * Analyze single file
   */
  async analyzeFile(filePath: string): Promise<CodeSmell[]> {
    const text = await readFile(filePath, 'utf-8');
    return this.analyzeSource(text, filePath);
  }

  /**
   * Analyze files one after another. Files that fail to parse are reported in
   * `parseErrors` and do not stop the run.
   */
  async analyzeFiles(files: readonly string[]): Promise<CodeSmellAnalysisResult> {
    const timestamp = new Date();
    const allSmells: CodeSmell[] = [];
    const parseErrors: ParseFailure[] = [];
    const filesWithSmells = new Set<string>();

    this.logger.debug('Running detectors', { detectors: [...this.activeDetectors], files: files.length });

    for (const file of files) {
      this.logger.debug(`Analyzing ${file}`);
      try {
        const smells = await this.analyzeFile(file);
        if (smells.length > 0) {
          allSmells.push(...smells);
          filesWithSmells.add(file);
        }
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        this.logger.warn(`Skipping ${file}: ${error.message}`);
        parseErrors.push(toParseFailure(error));
      }
    }

    const summary = this.calculateSummary(allSmells, files.length - parseErrors.length, filesWithSmells.size);

    return Object.freeze({
      smells: Object.freeze(allSmells),
      summary: Object.freeze(summary),
      parseErrors: Object.freeze(parseErrors),
      activeDetectors: this.activeDetectors,
      config: this.config,
      timestamp,
    });
  }

  /**
   * Analyze directory for code smells
   */
  async analyzeDirectory(
    directory: string,
    pattern: string = DEFAULT_SOURCE_PATTERN,
    options: Pick<CodeSmellAnalysisOptions, 'ignorePatterns'> = {}
  ): Promise<CodeSmellAnalysisResult> {
    const files = await findSourceFiles(directory, pattern, options.ignorePatterns);
    return this.analyzeFiles(files);
  }

  /**
   * Calculate summary statistics
   */
  private calculateSummary(smells: readonly CodeSmell[], totalFiles: number, filesWithSmells: number): CodeSmellSummary {
    const smellsByType: Record<SmellType, number> = {
      [SmellType.LONG_METHOD]: 0,
      [SmellType.GOD_CLASS]: 0,
      [SmellType.LARGE_PARAMETER_LIST]: 0,
      [SmellType.MAGIC_NUMBERS]: 0,
      [SmellType.DUPLICATED_CODE]: 0,
      [SmellType.FEATURE_ENVY]: 0,
    };
    const smellsBySeverity: Record<SmellSeverity, number> = {
      [SmellSeverity.LOW]: 0,
      [SmellSeverity.MEDIUM]: 0,
      [SmellSeverity.HIGH]: 0,
    };
    for (const smell of smells) {
      smellsByType[smell.type]++;
      smellsBySeverity[smell.severity]++;
    }

    return {
      totalSmells: smells.length,
      smellsByType: Object.freeze(smellsByType),
      smellsBySeverity: Object.freeze(smellsBySeverity),
      filesAnalyzed: totalFiles,
      filesWithSmells,
      averageSmellsPerFile: totalFiles > 0 ? smells.length / totalFiles : 0,
      codeHealthScore: calculateHealthScore(smells, totalFiles),
    };
  }
}

/**
 * Source files under a directory, sorted for deterministic output
 */
export async function findSourceFiles(
  directory: string,
  pattern: string = DEFAULT_SOURCE_PATTERN,
  ignorePatterns: readonly string[] = []
): Promise<string[]> {
  const files = await glob(pattern, {
    cwd: directory,
    absolute: true,
    nodir: true,
    ignore: [...DEFAULT_IGNORE_PATTERNS, ...ignorePatterns],
  });
  return files.sort();
}

/**
 * Calculate code health score (0-100)
 */
export function calculateHealthScore(smells: readonly CodeSmell[], totalFiles: number): number {
  if (totalFiles === 0) return 100;

  // Weighted penalties by severity
  const severityWeights: Record<SmellSeverity, number> = {
    [SmellSeverity.LOW]: 1,
    [SmellSeverity.MEDIUM]: 3,
    [SmellSeverity.HIGH]: 7,
  };

  const totalPenalty = smells.reduce((sum, smell) => sum + severityWeights[smell.severity], 0);
  const penaltyPerFile = totalPenalty / totalFiles;

  return Math.round(Math.max(0, 100 - Math.min(100, penaltyPerFile * 2)));
}
