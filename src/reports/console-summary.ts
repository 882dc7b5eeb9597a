/**
 * Colored console summary of a smell report
 */

import chalk from 'chalk';
import { SMELL_TYPE_ORDER, SmellSeverity } from '../analyzers/code-smells/types.js';
import type { SmellReport } from './report-generator.js';

const severityColor = (severity: SmellSeverity): ((text: string) => string) => {
  switch (severity) {
    case SmellSeverity.HIGH:
      return chalk.red;
    case SmellSeverity.MEDIUM:
      return chalk.yellow;
    case SmellSeverity.LOW:
      return chalk.gray;
  }
};

export function printSummary(report: SmellReport, write: (line: string) => void = console.log): void {
  const { metadata, summary } = report;

  write('');
  write(chalk.bold.blue('Code Smell Summary'));
  write(chalk.gray('─'.repeat(60)));
  write(`  Files analyzed:      ${chalk.cyan(String(metadata.totalFilesAnalyzed))}`);
  write(`  Smells found:        ${chalk.cyan(String(metadata.totalSmellsFound))}`);

  const score = summary.codeHealthScore;
  const scoreColor = score >= 80 ? chalk.green : score >= 50 ? chalk.yellow : chalk.red;
  write(`  Code health score:   ${scoreColor(`${score}/100`)}`);

  if (metadata.parseErrors.length > 0) {
    write(`  Unparseable files:   ${chalk.red(String(metadata.parseErrors.length))}`);
  }
  write('');

  if (metadata.totalSmellsFound === 0) {
    write(chalk.green('No code smells found.'));
    write('');
    return;
  }

  write(chalk.bold('By type:'));
  for (const type of SMELL_TYPE_ORDER) {
    const count = summary.smellsByType[type];
    if (count > 0) write(`  ${type.padEnd(20)} ${count}`);
  }
  write('');

  write(chalk.bold('By severity:'));
  for (const severity of [SmellSeverity.HIGH, SmellSeverity.MEDIUM, SmellSeverity.LOW]) {
    write(`  ${severityColor(severity)(severity.padEnd(20))} ${summary.severityBreakdown[severity]}`);
  }
  write('');
}
