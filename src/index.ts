/**
 * smellscope public API
 */

export * from './analyzers/code-smells/index.js';
export * from './analyzers/ast/index.js';
export { calculateComplexity, countDecisionPoints, childStatements, flattenStatements } from './analyzers/metrics/index.js';
export { AnalysisError, ParseError, ConfigError } from './analyzers/errors.js';
export {
  DEFAULT_IGNORED_TARGETS,
  SmellDetectorConfigSchema,
  type SmellDetectorConfig,
  type SmellDetectorConfigInput,
  type LongMethodOptions,
  type GodClassOptions,
  type LargeParameterListOptions,
  type MagicNumbersOptions,
  type DuplicatedCodeOptions,
  type FeatureEnvyOptions,
} from './schemas/detector-schemas.js';
export { REPORT_FORMATS, type ReportFormat } from './schemas/yaml-schemas.js';
export { loadConfigFile, parseConfigText, clearConfigCache, DEFAULT_CONFIG_FILE, type LoadedConfig } from './utils/config-loader.js';
export { ConsoleLogger, NoopLogger, LogLevel, createLogger, type Logger } from './utils/analysis-logger.js';
export {
  generateReport,
  renderJsonReport,
  renderTextReport,
  renderReport,
  saveReport,
  type SmellReport,
} from './reports/report-generator.js';
export { printSummary } from './reports/console-summary.js';
export { runScan, createScanCommand, type ScanOptions, type ScanIO } from './commands/scan.js';
