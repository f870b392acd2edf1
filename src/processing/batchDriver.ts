/**
 * Batch Driver
 *
 * raw JSONL lines -> dedupe -> status and/or GWA -> partitions + summary.
 * Records are processed independently; output keeps arrival order.
 */

import { logger } from '../logger.js';
import {
  ENROLLMENT_STATUSES,
  type EnrichedStudentRecord,
  type ProcessingMode,
  type StudentRecord,
} from '../types.js';
import { resolveDuplicates, type DuplicateEvent } from './duplicateResolver.js';
import { classifyStatus } from './statusClassifier.js';
import { aggregateGwa, isHonorStudent, toGwaFields } from './gwaAggregator.js';
import { roundTo } from './gradeNormalizer.js';
import { parseStudentLine } from './recordSchema.js';

export const UNCLASSIFIED = 'Unclassified';
export const UNKNOWN_YEAR = 'Unknown';

// Artifact name for each partition
export const PARTITION_SLUGS: Record<string, string> = {
  'Regular': 'regular',
  'Irregular': 'irregular',
  'Grades Pending': 'pending',
  'No valid grades': 'no_valid_grades',
  [UNCLASSIFIED]: 'unclassified',
};

export interface BatchOptions {
  mode?: ProcessingMode;
  onDuplicate?: (event: DuplicateEvent) => void;
}

export interface YearGwaStats {
  students: number;       // students in this year with a GWA
  averageGwa: number;
  honors: number;
}

export interface BatchSummary {
  totalStudents: number;
  malformedLines: number;
  duplicatesRemoved: number;
  statusCounts: Record<string, number>;
  yearCounts: Record<string, number>;
  yearGwa: Record<string, YearGwaStats>;
  studentsWithGwa: number;
  overallAverageGwa: number | null;
  honorStudents: number;
}

export interface BatchResult {
  records: EnrichedStudentRecord[];
  partitions: Record<string, EnrichedStudentRecord[]>;
  summary: BatchSummary;
}

function logDuplicate(event: DuplicateEvent): void {
  logger.info(
    'Duplicates',
    `Duplicate '${event.subject_code}' in ${event.student_id} → removed ${event.count_removed} entries`,
    event
  );
}

/**
 * Dedupe one student's subjects and attach derived fields
 */
export function enrichStudent(
  student: StudentRecord,
  mode: ProcessingMode = 'both',
  onDuplicate: (event: DuplicateEvent) => void = logDuplicate
): EnrichedStudentRecord {
  const studentId = student.student_id || 'Unknown';
  const name = student.name || 'No name';
  const grades = resolveDuplicates(student.grades, { studentId, onCollapse: onDuplicate });
  const record: EnrichedStudentRecord = { ...student, grades };

  if (mode !== 'gwa') {
    const { status, reasons } = classifyStatus(grades);
    record.enrollment_status = status;

    if (status === 'Grades Pending') {
      logger.warn('Status', `GRADES PENDING: ${studentId} - ${name} | ${reasons.length} blanks`, reasons);
    } else if (status === 'Irregular') {
      logger.warn('Status', `IRREGULAR: ${studentId} - ${name} | ${reasons.length} failing/incomplete grades`, reasons);
    } else {
      logger.info('Status', `REGULAR: ${studentId} - ${name}`);
    }
  }

  if (mode !== 'status') {
    const fields = toGwaFields(aggregateGwa(grades));
    Object.assign(record, fields);

    if (mode === 'gwa' && record.enrollment_status === undefined && fields.gwa === null) {
      record.enrollment_status = 'No valid grades';
    }

    logger.debug(
      'GWA',
      `${studentId} | ${name.padEnd(25)} | GWA: ${String(fields.gwa ?? 'N/A').padEnd(6)} | Units: ${fields.total_units_completed} | Subjects: ${fields.total_valid_subjects}`
    );
    if (isHonorStudent(fields.gwa)) {
      logger.info('GWA', `HONOR STUDENT: ${name} - GWA ${fields.gwa}`);
    }
  }

  return record;
}

export function partitionKey(record: EnrichedStudentRecord): string {
  return record.enrollment_status ?? UNCLASSIFIED;
}

/**
 * Stable partition by enrollment status. Every status label is present,
 * even when empty; "Unclassified" only when some record has no status.
 */
export function partitionByStatus(
  records: readonly EnrichedStudentRecord[]
): Record<string, EnrichedStudentRecord[]> {
  const partitions = new Map<string, EnrichedStudentRecord[]>(
    ENROLLMENT_STATUSES.map((status): [string, EnrichedStudentRecord[]] => [status, []])
  );
  for (const record of records) {
    const key = partitionKey(record);
    const bucket = partitions.get(key);
    if (bucket) {
      bucket.push(record);
    } else {
      partitions.set(key, [record]);
    }
  }
  return Object.fromEntries(partitions);
}

function yearOf(record: EnrichedStudentRecord): string {
  const year = record.year_level.trim();
  return year === '' ? UNKNOWN_YEAR : year;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

// Year levels are free text, so tallies live in Maps until the summary is built
export function summarize(
  records: readonly EnrichedStudentRecord[],
  counters: { malformedLines?: number; duplicatesRemoved?: number } = {}
): BatchSummary {
  const statusCounts = new Map<string, number>(ENROLLMENT_STATUSES.map((status): [string, number] => [status, 0]));
  const yearCounts = new Map<string, number>();
  const yearTotals = new Map<string, { students: number; gwaSum: number; honors: number }>();
  let gwaSum = 0;
  let studentsWithGwa = 0;
  let honorStudents = 0;

  for (const record of records) {
    increment(statusCounts, partitionKey(record));

    const year = yearOf(record);
    increment(yearCounts, year);

    const gwa = record.gwa;
    if (typeof gwa !== 'number') continue;

    let totals = yearTotals.get(year);
    if (!totals) {
      totals = { students: 0, gwaSum: 0, honors: 0 };
      yearTotals.set(year, totals);
    }
    totals.students++;
    totals.gwaSum += gwa;
    gwaSum += gwa;
    studentsWithGwa++;
    if (isHonorStudent(gwa)) {
      totals.honors++;
      honorStudents++;
    }
  }

  const yearGwa = new Map<string, YearGwaStats>();
  const byYear = [...yearTotals].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [year, totals] of byYear) {
    yearGwa.set(year, {
      students: totals.students,
      averageGwa: roundTo(totals.gwaSum / totals.students, 3),
      honors: totals.honors,
    });
  }

  return {
    totalStudents: records.length,
    malformedLines: counters.malformedLines ?? 0,
    duplicatesRemoved: counters.duplicatesRemoved ?? 0,
    statusCounts: Object.fromEntries(statusCounts),
    yearCounts: Object.fromEntries(yearCounts),
    yearGwa: Object.fromEntries(yearGwa),
    studentsWithGwa,
    overallAverageGwa: studentsWithGwa > 0 ? roundTo(gwaSum / studentsWithGwa, 3) : null,
    honorStudents,
  };
}

/**
 * Accumulates records one at a time; used by both the sync and async entry points
 */
export class BatchAccumulator {
  private records: EnrichedStudentRecord[] = [];
  private malformedLines = 0;
  private duplicatesRemoved = 0;
  private lineNumber = 0;
  private readonly mode: ProcessingMode;
  private readonly onDuplicate: (event: DuplicateEvent) => void;

  constructor(options: BatchOptions = {}) {
    this.mode = options.mode ?? 'both';
    const forward = options.onDuplicate ?? logDuplicate;
    this.onDuplicate = event => {
      this.duplicatesRemoved += event.count_removed;
      forward(event);
    };
  }

  addLine(line: string): void {
    this.lineNumber++;
    const trimmed = line.trim();
    if (trimmed === '') return;

    const parsed = parseStudentLine(trimmed);
    if (!parsed.ok) {
      this.malformedLines++;
      logger.warn('Batch', `Skipping malformed record on line ${this.lineNumber}: ${parsed.error}`);
      return;
    }
    this.addRecord(parsed.record);
  }

  addRecord(student: StudentRecord): void {
    this.records.push(enrichStudent(student, this.mode, this.onDuplicate));
  }

  result(): BatchResult {
    const records = [...this.records];
    return {
      records,
      partitions: partitionByStatus(records),
      summary: summarize(records, {
        malformedLines: this.malformedLines,
        duplicatesRemoved: this.duplicatesRemoved,
      }),
    };
  }
}

export function processBatch(lines: Iterable<string>, options: BatchOptions = {}): BatchResult {
  const batch = new BatchAccumulator(options);
  for (const line of lines) {
    batch.addLine(line);
  }
  return batch.result();
}

export async function processBatchStream(
  lines: AsyncIterable<string>,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const batch = new BatchAccumulator(options);
  for await (const line of lines) {
    batch.addLine(line);
  }
  return batch.result();
}

/**
 * Process records already in memory (scrape pipeline output)
 */
export function processStudents(
  students: readonly StudentRecord[],
  options: BatchOptions = {}
): BatchResult {
  const batch = new BatchAccumulator(options);
  for (const student of students) {
    batch.addRecord(student);
  }
  return batch.result();
}
