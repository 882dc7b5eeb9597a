/**
 * Report Generator
 *
 * Turns an analysis result into a serializable report and renders it as
 * JSON or plain text.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import {
  SMELL_TYPE_ORDER,
  SmellSeverity,
  type CodeSmell,
  type CodeSmellAnalysisResult,
  type ParseFailure,
  type SmellType,
} from '../analyzers/code-smells/types.js';
import type { SmellDetectorConfig } from '../schemas/detector-schemas.js';
import type { ReportFormat } from '../schemas/yaml-schemas.js';

export interface SmellReport {
  readonly metadata: {
    readonly generatedAt: string;
    readonly totalFilesAnalyzed: number;
    readonly totalSmellsFound: number;
    readonly activeDetectors: ReadonlyArray<SmellType>;
    readonly configUsed: SmellDetectorConfig;
    readonly parseErrors: ReadonlyArray<ParseFailure>;
  };
  readonly summary: {
    readonly smellsByType: Readonly<Record<SmellType, number>>;
    readonly smellsByFile: Readonly<Record<string, number>>;
    readonly severityBreakdown: Readonly<Record<SmellSeverity, number>>;
    readonly codeHealthScore: number;
  };
  readonly smells: ReadonlyArray<CodeSmell>;
}

const RULE = '='.repeat(80);
const DIVIDER = '-'.repeat(80);

const SEVERITY_ORDER: readonly SmellSeverity[] = [SmellSeverity.HIGH, SmellSeverity.MEDIUM, SmellSeverity.LOW];

export function generateReport(result: CodeSmellAnalysisResult): SmellReport {
  const smellsByFile: Record<string, number> = {};
  for (const smell of result.smells) {
    smellsByFile[smell.filePath] = (smellsByFile[smell.filePath] ?? 0) + 1;
  }

  return {
    metadata: {
      generatedAt: result.timestamp.toISOString(),
      totalFilesAnalyzed: result.summary.filesAnalyzed,
      totalSmellsFound: result.summary.totalSmells,
      activeDetectors: result.activeDetectors,
      configUsed: result.config,
      parseErrors: result.parseErrors,
    },
    summary: {
      smellsByType: result.summary.smellsByType,
      smellsByFile,
      severityBreakdown: result.summary.smellsBySeverity,
      codeHealthScore: result.summary.codeHealthScore,
    },
    smells: result.smells,
  };
}

export function renderJsonReport(report: SmellReport): string {
  return JSON.stringify(report, null, 2);
}

function formatRange(range: { startLine: number; endLine: number }): string {
  return range.startLine === range.endLine ? `${range.startLine}` : `${range.startLine}-${range.endLine}`;
}

function formatMetric(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

function renderSmell(smell: CodeSmell): string[] {
  const lines = [
    `[${smell.severity}] ${smell.type}`,
    `  Location: ${smell.filePath}:${formatRange(smell)}`,
    `  Message: ${smell.message}`,
    `  Suggestion: ${smell.suggestion}`,
  ];

  const metrics = Object.entries(smell.metrics);
  if (metrics.length > 0) {
    lines.push(`  Metrics: ${metrics.map(([name, value]) => `${name}=${formatMetric(value)}`).join(', ')}`);
  }
  if (smell.related.length > 0) {
    lines.push(`  Related: ${smell.related.map(formatRange).join(', ')}`);
  }
  return lines;
}

export function renderTextReport(report: SmellReport): string {
  const { metadata, summary } = report;
  const lines: string[] = [
    RULE,
    'CODE SMELL DETECTION REPORT',
    RULE,
    `Generated: ${metadata.generatedAt}`,
    `Files analyzed: ${metadata.totalFilesAnalyzed}`,
    `Total smells: ${metadata.totalSmellsFound}`,
    `Code health score: ${summary.codeHealthScore}/100`,
    '',
    'Smells by type:',
    ...SMELL_TYPE_ORDER.map(type => `  ${type}: ${summary.smellsByType[type]}`),
    '',
    'Severity breakdown:',
    ...SEVERITY_ORDER.map(severity => `  ${severity}: ${summary.severityBreakdown[severity]}`),
  ];

  if (metadata.parseErrors.length > 0) {
    lines.push('', 'Files that could not be parsed:');
    lines.push(...metadata.parseErrors.map(failure => `  ${failure.message}`));
  }

  lines.push('', DIVIDER);
  if (report.smells.length === 0) {
    lines.push('No code smells found.');
  } else {
    for (const smell of report.smells) {
      lines.push(...renderSmell(smell), '');
    }
    lines.pop();
  }
  lines.push(RULE);

  return lines.join('\n') + '\n';
}

export function renderReport(report: SmellReport, format: ReportFormat): string {
  return format === 'txt' ? renderTextReport(report) : renderJsonReport(report);
}

/**
 * Write the rendered report, creating parent directories as needed
 */
export async function saveReport(report: SmellReport, outputPath: string, format: ReportFormat): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, renderReport(report, format), 'utf-8');
}
