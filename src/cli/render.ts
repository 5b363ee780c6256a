/**
 * Terminal rendering of tool results
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { BucketSpec, Period, ProjectNode, TimeRecord } from '../types/index.js';
import type { Report } from '../services/report/aggregator.js';
import { flattenReport } from '../services/report/aggregator.js';
import { recordDuration } from '../services/records/store.js';
import { formatDate, formatDateTime, formatDuration, formatMonth } from '../utils/format.js';

export interface BarRow {
  label: string;
  seconds: number;
}

// No colors from cli-table3 itself; chalk decides
const TABLE_STYLE = { head: [], border: [] };

function indentName(name: string, depth: number): string {
  return depth === 0 ? chalk.green(name) : `${'  '.repeat(depth - 1)}└─ ${name}`;
}

function indentLabel(name: string, depth: number): string {
  return depth === 0 ? name : `${'  '.repeat(depth - 1)}└─ ${name}`;
}

export function formatPeriod(period: Period): string {
  return `${formatDateTime(period.start)} - ${formatDateTime(period.end)}`;
}

/**
 * Column label for a bucket
 */
export function bucketLabel(bucket: Period, spec: BucketSpec | null): string {
  if (!spec) return 'Time';
  if (spec.kind === 'fixed') return formatDateTime(bucket.start);
  return spec.unit === 'month' ? formatMonth(bucket.start) : formatDate(bucket.start);
}

export function renderRecords(records: TimeRecord[], now: Date): string {
  const withNotes = records.some((r) => r.note);
  const head = ['ID', 'Project', 'Start', 'End', 'Duration'];
  if (withNotes) head.push('Note');

  const table = new Table({ head, style: TABLE_STYLE });
  for (const record of records) {
    const row = [
      String(record.id),
      record.projectPath,
      formatDateTime(record.start),
      record.end ? formatDateTime(record.end) : chalk.red('In progress'),
      record.end ? formatDuration(recordDuration(record, now)) : '',
    ];
    if (withNotes) row.push(record.note ?? '');
    table.push(row);
  }
  return table.toString();
}

export function renderProjectTree(tree: ProjectNode[]): string {
  const lines: string[] = [];
  const visit = (node: ProjectNode, depth: number): void => {
    lines.push(indentName(node.name, depth));
    for (const child of node.children) visit(child, depth + 1);
  };
  for (const root of tree) visit(root, 0);
  return lines.join('\n');
}

/**
 * Project tree with time spent, one row per project
 */
export function renderStats(report: Report): string {
  const table = new Table({
    head: ['Project', 'Time spent'],
    colAligns: ['left', 'right'],
    style: TABLE_STYLE,
  });

  for (const { depth, node } of flattenReport(report)) {
    table.push([indentName(node.name, depth), formatDuration(node.total)]);
  }
  table.push([chalk.bold('Total'), chalk.bold(formatDuration(report.total))]);

  return table.toString();
}

function cell(seconds: number): string {
  return seconds > 0 ? formatDuration(seconds) : '-';
}

/**
 * One column per bucket plus a total column
 */
export function renderReport(report: Report): string {
  const labels = report.buckets.map((bucket) => bucketLabel(bucket, report.bucket));
  const table = new Table({
    head: ['Project', ...labels, 'Total'],
    colAligns: ['left', ...labels.map((): 'right' => 'right'), 'right'],
    style: TABLE_STYLE,
  });

  for (const { depth, node } of flattenReport(report)) {
    table.push([indentName(node.name, depth), ...node.totalBuckets.map(cell), formatDuration(node.total)]);
  }
  table.push([
    chalk.bold('Total'),
    ...report.bucketTotals.map(cell),
    chalk.bold(formatDuration(report.total)),
  ]);

  return table.toString();
}

/**
 * Horizontal bars scaled to the largest value
 */
export function renderBars(rows: BarRow[], width: number): string {
  const max = Math.max(0, ...rows.map((row) => row.seconds));
  const labelWidth = Math.max(0, ...rows.map((row) => row.label.length));

  return rows
    .map((row) => {
      const length = max > 0 ? Math.round((row.seconds / max) * width) : 0;
      const bar = chalk.cyan('█'.repeat(length));
      return `${row.label.padEnd(labelWidth)} ${bar}${' '.repeat(width - length)} ${formatDuration(row.seconds)}`;
    })
    .join('\n');
}

export function statsBars(report: Report): BarRow[] {
  return flattenReport(report).map(({ depth, node }) => ({
    label: indentLabel(node.name, depth),
    seconds: node.total,
  }));
}

export function bucketBars(report: Report): BarRow[] {
  return report.buckets.map((bucket, i) => ({
    label: bucketLabel(bucket, report.bucket),
    seconds: report.bucketTotals[i] ?? 0,
  }));
}
