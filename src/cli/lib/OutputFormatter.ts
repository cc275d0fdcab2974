/**
 * Output Formatter
 *
 * Consistent output for CLI commands, as colored text or JSON.
 */

import chalk from 'chalk';
import type { CopyPlan, PreviewResult } from '../../core/domain.js';
import { summarizeFilter } from '../../core/domain.js';
import type { TransportReport } from '../../core/TransportService.js';
import type { AddressKind } from '../../core/AddressResolver.js';
import { formatBytes } from '../../filtering/sizeParser.js';

type ChalkFn = chalk.Chalk;

export function getKindColor(kind: AddressKind): ChalkFn {
  switch (kind) {
    case 'remote':
      return chalk.cyan;
    case 'cloud':
      return chalk.magenta;
    default:
      return chalk.white;
  }
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function formatPreview(plan: CopyPlan, result: PreviewResult): string {
  const lines = [
    `${chalk.bold('Source:')} ${plan.source}`,
    `${chalk.bold('Filter:')} ${summarizeFilter(plan.filterConfig)}`,
    '',
  ];

  if (result.files.length === 0) {
    lines.push(chalk.gray('  (no matching files)'));
  }
  for (const file of result.files) {
    lines.push(`  ${formatBytes(file.size).padStart(10)}  ${file.path}`);
  }

  lines.push('', `${chalk.bold('Total:')} ${formatBytes(result.totalBytes)} (${result.totalBytes} bytes)`);
  return lines.join('\n');
}

export function formatReport(plan: CopyPlan, report: TransportReport): string {
  const free = report.freeBytes < 0 ? 'unknown' : formatBytes(report.freeBytes);
  return [
    `${chalk.gray('Route:')}       ${plan.source} -> ${plan.destination}`,
    `${chalk.gray('Backend:')}     ${report.backend}`,
    `${chalk.gray('Previewed:')}   ${formatBytes(report.totalBytes)}`,
    `${chalk.gray('Free space:')}  ${free}`,
    `${chalk.gray('Created dir:')} ${report.createdDestination ? 'yes' : 'no'}`,
    `${chalk.gray('Resume:')}      ${report.resume ? 'yes' : 'no'}`,
    `${chalk.gray('Verify:')}      ${report.verify ? 'yes' : 'no'}`,
  ].join('\n');
}

export class OutputFormatter {
  constructor(private readonly jsonMode: boolean = false) {}

  /**
   * Output data (text or JSON based on mode)
   */
  output(textOutput: string, jsonData: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson(jsonData));
    } else {
      console.log(textOutput);
    }
  }

  error(message: string, details?: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: false, error: message, details }));
    } else {
      console.error(chalk.red('✖') + ' ' + message);
      if (details) {
        console.error(chalk.gray(JSON.stringify(details, null, 2)));
      }
    }
  }
}
