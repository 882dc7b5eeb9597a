import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'fs';
import { stat } from 'fs/promises';
import { resolve } from 'path';
import { CodeSmellAnalyzer, findSourceFiles } from '../analyzers/code-smells/code-smell-analyzer.js';
import { SMELL_TYPE_ORDER } from '../analyzers/code-smells/types.js';
import { AnalysisError } from '../analyzers/errors.js';
import { createLogger, type Logger } from '../utils/analysis-logger.js';
import { DEFAULT_CONFIG_FILE, loadConfigFile } from '../utils/config-loader.js';
import { extractErrorMessage } from '../utils/error-handler.js';
import { generateReport, saveReport } from '../reports/report-generator.js';
import { printSummary } from '../reports/console-summary.js';
import { REPORT_FORMATS, type ReportFormat } from '../schemas/yaml-schemas.js';

export const DEFAULT_OUTPUT_FILE = 'output/report.json';

export interface ScanOptions {
  config?: string;
  output?: string;
  format?: string;
  only?: string;
  exclude?: string;
  verbose?: boolean;
}

export interface ScanIO {
  out: (line: string) => void;
  err: (line: string) => void;
  logger?: Logger;
}

const defaultIO: ScanIO = {
  out: line => console.log(line),
  err: line => console.error(line),
};

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0);
}

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some(format => format === value);
}

/**
 * Run one scan and return the process exit code
 */
export async function runScan(target: string, options: ScanOptions = {}, io: ScanIO = defaultIO): Promise<number> {
  const fail = (message: string): number => {
    io.err(chalk.red(`Error: ${message}`));
    return 1;
  };

  const targetPath = resolve(target);
  if (!existsSync(targetPath)) {
    return fail(`Target not found: ${target}`);
  }

  const logger = io.logger ?? createLogger({ verbose: options.verbose });

  let analyzer: CodeSmellAnalyzer;
  let format: ReportFormat;
  try {
    const config = loadConfigFile(options.config ?? DEFAULT_CONFIG_FILE);
    const requestedFormat = options.format ?? config.report.format;
    if (!isReportFormat(requestedFormat)) {
      return fail(`Unknown report format '${requestedFormat}'. Expected one of: ${REPORT_FORMATS.join(', ')}`);
    }
    format = requestedFormat;
    analyzer = new CodeSmellAnalyzer({
      config: config.detectors,
      only: splitList(options.only),
      exclude: splitList(options.exclude),
      logger,
    });
  } catch (error) {
    if (error instanceof AnalysisError) return fail(error.message);
    throw error;
  }

  const files = (await stat(targetPath)).isFile() ? [targetPath] : await findSourceFiles(targetPath);
  if (files.length === 0) {
    return fail(`No source files found in ${target}`);
  }

  const result = await analyzer.analyzeFiles(files);
  const report = generateReport(result);
  const outputPath = options.output ?? DEFAULT_OUTPUT_FILE;

  try {
    await saveReport(report, outputPath, format);
  } catch (error) {
    return fail(`Failed to write report to ${outputPath}: ${extractErrorMessage(error)}`);
  }

  printSummary(report, io.out);
  io.out(chalk.gray(`Report saved to ${outputPath}`));
  return 0;
}

/**
 * Create the scan command
 *
 * Scans a file or directory for code smells and writes a report
 */
export function createScanCommand(): Command {
  const scanCommand = new Command('scan');

  scanCommand
    .description('Detect code smells in a source file or directory')
    .argument('<target>', 'File or directory to analyze')
    .option('-c, --config <file>', 'YAML configuration file', DEFAULT_CONFIG_FILE)
    .option('-o, --output <file>', 'Report output path', DEFAULT_OUTPUT_FILE)
    .option('-f, --format <format>', `Report format (${REPORT_FORMATS.join('|')})`)
    .option('--only <detectors>', `Comma-separated detectors to run (${SMELL_TYPE_ORDER.join(', ')})`)
    .option('--exclude <detectors>', 'Comma-separated detectors to skip')
    .option('-v, --verbose', 'Enable debug logging')
    .action(async (target: string, options: ScanOptions) => {
      const exitCode = await runScan(target, options);
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });

  return scanCommand;
}
