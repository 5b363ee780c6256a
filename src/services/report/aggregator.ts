/**
 * Time aggregation over the project hierarchy
 *
 * Records are clipped to the period (open records run until `now`), split
 * across buckets, then rolled up so every node carries its own time and the
 * time of its whole subtree.
 */

import { buildProjectTree } from '../projects/store.js';
import { overlapSeconds, splitPeriod } from '../time/calendar.js';
import { TimeTreeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { BucketSpec, Period, Project, ProjectNode, TimeRecord } from '../../types/index.js';

export interface ReportNode {
  id: number;
  name: string;
  path: string;
  own: number; // Seconds on this project itself
  total: number; // Seconds on this project and its descendants
  ownBuckets: number[];
  totalBuckets: number[];
  children: ReportNode[];
}

export interface Report {
  period: Period;
  bucket: BucketSpec | null;
  buckets: Period[];
  roots: ReportNode[];
  total: number;
  bucketTotals: number[];
  recordCount: number;
}

export interface ReportOptions {
  now: Date;
  bucket?: BucketSpec | null | undefined;
  project?: string | undefined; // Restrict to this subtree
}

export interface ReportRow {
  depth: number;
  node: ReportNode;
}

function zeros(length: number): number[] {
  return new Array<number>(length).fill(0);
}

function addInto(target: number[], values: number[]): void {
  values.forEach((value, i) => {
    target[i] = (target[i] ?? 0) + value;
  });
}

/**
 * Seconds of a record falling in each bucket
 */
export function distributeRecord(record: TimeRecord, buckets: Period[], now: Date): number[] {
  const end = record.end ?? now;
  if (end.getTime() <= record.start.getTime()) {
    return zeros(buckets.length);
  }
  return buckets.map((bucket) => overlapSeconds(record.start, end, bucket));
}

function rollUp(node: ProjectNode, own: Map<number, number[]>, width: number): ReportNode {
  const ownBuckets = own.get(node.id) ?? zeros(width);
  const totalBuckets = [...ownBuckets];
  const children: ReportNode[] = [];

  for (const child of node.children) {
    const rolled = rollUp(child, own, width);
    addInto(totalBuckets, rolled.totalBuckets);
    if (rolled.total > 0) children.push(rolled);
  }

  return {
    id: node.id,
    name: node.name,
    path: node.path,
    own: ownBuckets.reduce((a, b) => a + b, 0),
    total: totalBuckets.reduce((a, b) => a + b, 0),
    ownBuckets,
    totalBuckets,
    children,
  };
}

function findNode(nodes: ProjectNode[], path: string): ProjectNode | undefined {
  for (const node of nodes) {
    if (node.path === path) return node;
    const found = findNode(node.children, path);
    if (found) return found;
  }
  return undefined;
}

function collectIds(node: ProjectNode): number[] {
  return [node.id, ...node.children.flatMap(collectIds)];
}

/**
 * Build a report for the period
 *
 * Projects whose subtree has no time are left out.
 */
export function buildReport(
  projects: Project[],
  records: TimeRecord[],
  period: Period,
  options: ReportOptions
): Report {
  const bucket = options.bucket ?? null;
  const buckets = bucket ? splitPeriod(period, bucket) : [period];
  const width = buckets.length;

  let forest = buildProjectTree(projects);
  let included: Set<number> | null = null;
  if (options.project !== undefined) {
    const node = findNode(forest, options.project);
    if (!node) {
      throw new TimeTreeError(`Unknown project: ${options.project}`, 'NOT_FOUND');
    }
    forest = [node];
    included = new Set(collectIds(node));
  }

  const own = new Map<number, number[]>();
  let recordCount = 0;
  for (const record of records) {
    if (included && !included.has(record.projectId)) continue;
    const parts = distributeRecord(record, buckets, options.now);
    if (parts.every((s) => s === 0)) continue;
    recordCount++;
    const current = own.get(record.projectId) ?? zeros(width);
    addInto(current, parts);
    own.set(record.projectId, current);
  }

  const roots = forest.map((node) => rollUp(node, own, width)).filter((node) => node.total > 0);
  const bucketTotals = zeros(width);
  for (const root of roots) addInto(bucketTotals, root.totalBuckets);
  const total = bucketTotals.reduce((a, b) => a + b, 0);

  logger.debug(`Report over ${width} bucket(s): ${roots.length} root(s), ${total}s total`);

  return {
    period,
    bucket,
    buckets,
    roots,
    total,
    bucketTotals,
    recordCount,
  };
}

/**
 * Depth-first rows for tabular display
 */
export function flattenReport(report: Report): ReportRow[] {
  const rows: ReportRow[] = [];
  const visit = (node: ReportNode, depth: number): void => {
    rows.push({ depth, node });
    for (const child of node.children) visit(child, depth + 1);
  };
  for (const root of report.roots) visit(root, 0);
  return rows;
}
