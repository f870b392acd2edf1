/**
 * Line-delimited JSON files and batch artifacts
 */

import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { logger } from '../logger.js';
import { PARTITION_SLUGS, type BatchResult } from '../processing/batchDriver.js';

function ensureParentDir(filename: string): void {
  const dir = path.dirname(filename);
  if (dir && !fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function toJsonl(items: readonly unknown[]): string {
  return items.map(item => JSON.stringify(item) + '\n').join('');
}

/**
 * Stream the lines of a file without loading it whole
 */
export async function* readJsonlLines(filename: string): AsyncGenerator<string> {
  const rl = readline.createInterface({
    input: fs.createReadStream(filename, { encoding: 'utf-8' }),
    crlfDelay: Infinity,
  });
  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    rl.close();
  }
}

export function writeJsonl(filename: string, items: readonly unknown[]): void {
  ensureParentDir(filename);
  fs.writeFileSync(filename, toJsonl(items), 'utf-8');
  logger.info('Output', `Saved ${items.length} records → ${filename}`);
}

export function appendJsonl(filename: string, items: readonly unknown[]): void {
  ensureParentDir(filename);
  fs.appendFileSync(filename, toJsonl(items), 'utf-8');
}

export function fileTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function partitionSlug(status: string): string {
  return PARTITION_SLUGS[status] ?? status.toLowerCase().replace(/[^a-z0-9]+/g, '_');
}

// Full-output file names: the scrape pipeline's, and the standalone process command's
export const FINAL_PREFIX = 'grades_final_with_status';
export const PROCESSED_PREFIX = 'grades_processed';

export interface ArtifactPaths {
  final: string;
  partitions: Record<string, string>;
  summary: string;
}

/**
 * Full output, one file per status partition, and the summary
 */
export function writeBatchArtifacts(
  result: BatchResult,
  dir: string,
  timestamp: string = fileTimestamp(),
  finalPrefix: string = FINAL_PREFIX
): ArtifactPaths {
  const paths: ArtifactPaths = {
    final: path.join(dir, `${finalPrefix}_${timestamp}.jsonl`),
    partitions: {},
    summary: path.join(dir, `summary_${timestamp}.json`),
  };

  writeJsonl(paths.final, result.records);

  for (const [status, records] of Object.entries(result.partitions)) {
    const file = path.join(dir, `grades_${partitionSlug(status)}_${timestamp}.jsonl`);
    writeJsonl(file, records);
    paths.partitions[status] = file;
  }

  ensureParentDir(paths.summary);
  fs.writeFileSync(paths.summary, JSON.stringify(result.summary, null, 2) + '\n', 'utf-8');

  return paths;
}

/**
 * Newest `<prefix>*.jsonl` in dir; timestamped names sort chronologically
 */
export function findLatestFile(dir: string, prefix: string): string | null {
  if (!fs.existsSync(dir)) return null;
  const matches = fs
    .readdirSync(dir)
    .filter(name => name.startsWith(prefix) && name.endsWith('.jsonl'))
    .sort()
    .reverse();
  return matches.length > 0 ? path.join(dir, matches[0]) : null;
}
