/**
 * Department Pipeline
 *
 * roster → transcripts (bounded worker pool) → raw JSONL → batch driver → artifacts
 */

import * as path from 'path';
import pLimit from 'p-limit';
import type { ScraperConfig } from './config.js';
import type { RecordsDatabase } from './db/database.js';
import { errorMessage } from './errors.js';
import type { PortalSession } from './httpAuth.js';
import { appendJsonl, fileTimestamp, writeBatchArtifacts, writeJsonl, type ArtifactPaths } from './io/jsonl.js';
import { logger } from './logger.js';
import { processStudents, type BatchResult } from './processing/batchDriver.js';
import { fetchEnrollment } from './scrapers/enrollment.js';
import { fetchTranscript } from './scrapers/transcript.js';
import type { Department, ProcessingMode, StudentInfo, StudentRecord, SubjectRecord } from './types.js';
import { sleep } from './utils/retry.js';

export interface DepartmentOptions {
  mode?: ProcessingMode;
  database?: RecordsDatabase | null;
  /** Overrides the roster/transcript fetchers; used by tests */
  fetchers?: Partial<PipelineFetchers>;
}

export interface PipelineFetchers {
  enrollment: (session: PortalSession, config: ScraperConfig, programId: string) => Promise<StudentInfo[]>;
  transcript: (session: PortalSession, config: ScraperConfig, encodedId: string, studentId: string) => Promise<SubjectRecord[]>;
}

export interface DepartmentResult {
  department: Department;
  batch: BatchResult;
  studentsWithoutGrades: number;
  artifacts: ArtifactPaths | null;
}

const DEFAULT_FETCHERS: PipelineFetchers = {
  enrollment: fetchEnrollment,
  transcript: fetchTranscript,
};

export function toRawRecord(info: StudentInfo, grades: SubjectRecord[]): StudentRecord {
  return {
    student_id: info.student_id,
    name: info.name,
    course: info.course,
    year_level: info.year_level,
    total_subjects: grades.length,
    grades,
  };
}

/**
 * Fetch every student's transcript through a bounded pool.
 * Results come back in roster order whatever order the workers finish in.
 */
export async function scrapeTranscripts(
  session: PortalSession,
  config: ScraperConfig,
  students: readonly StudentInfo[],
  options: {
    label: string;
    liveOutputFile?: string;
    transcript?: PipelineFetchers['transcript'];
  }
): Promise<StudentRecord[]> {
  const fetchOne = options.transcript ?? DEFAULT_FETCHERS.transcript;
  const limit = pLimit(config.maxWorkers);
  const total = students.length;
  let processed = 0;

  const tasks = students.map((info, index) =>
    limit(async () => {
      let grades: SubjectRecord[] = [];
      if (info.encoded_id) {
        try {
          grades = await fetchOne(session, config, info.encoded_id, info.student_id);
        } catch (err) {
          logger.error('Transcript', `All retries failed for ${info.student_id}: ${errorMessage(err)}`);
        }
      }

      const record = toRawRecord(info, grades);
      if (options.liveOutputFile) {
        appendJsonl(options.liveOutputFile, [record]);
      }

      processed++;
      const symbol = grades.length > 0 ? '✓' : '✗';
      logger.progress(options.label, processed, total, `${symbol} ${info.student_id.padEnd(12)} | ${info.name.padEnd(30)}`, `${grades.length} subjects`);

      // Pause after every full round of workers
      if ((index + 1) % config.maxWorkers === 0 && config.requestDelayMs > 0) {
        await sleep(config.requestDelayMs);
      }

      return record;
    })
  );

  return Promise.all(tasks);
}

export async function processDepartment(
  session: PortalSession,
  config: ScraperConfig,
  department: Department,
  options: DepartmentOptions = {}
): Promise<DepartmentResult> {
  const fetchers = { ...DEFAULT_FETCHERS, ...options.fetchers };
  const database = options.database ?? null;
  const dir = path.join(config.outputDir, department.folder);
  const ts = fileTimestamp();

  logger.info('Pipeline', `${'='.repeat(20)} ${department.name} (${department.programId}) ${'='.repeat(20)}`);
  const runId = database?.startScrapeRun(department.name) ?? null;

  try {
    let roster: StudentInfo[] = [];
    try {
      roster = await fetchers.enrollment(session, config, department.programId);
    } catch (err) {
      logger.warn('Pipeline', `Enrollment fetch failed for ${department.name}: ${errorMessage(err)}`);
    }

    if (roster.length === 0) {
      logger.warn('Pipeline', `No students found for ${department.name}. Skipping.`);
      if (runId !== null) database?.endScrapeRun(runId, 'completed', 0);
      return { department, batch: processStudents([], { mode: options.mode }), studentsWithoutGrades: 0, artifacts: null };
    }

    writeJsonl(path.join(dir, `enrollment_${ts}.jsonl`), roster);

    const withLink = roster.filter(info => info.encoded_id);
    if (withLink.length < roster.length) {
      logger.warn('Pipeline', `${roster.length - withLink.length} roster rows have no transcript link`);
    }
    logger.info('Pipeline', `Processing ${withLink.length} students in ${department.name} with ${config.maxWorkers} parallel workers`);

    const rawRecords = await scrapeTranscripts(session, config, withLink, {
      label: department.folder,
      liveOutputFile: path.join(dir, `live_output_${ts}.jsonl`),
      transcript: fetchers.transcript,
    });
    writeJsonl(path.join(dir, `grades_complete_${ts}.jsonl`), rawRecords);

    logger.info('Pipeline', `Post-processing ${department.name}...`);
    const batch = processStudents(rawRecords, { mode: options.mode });
    const artifacts = writeBatchArtifacts(batch, dir, ts);

    if (database && runId !== null) {
      database.saveStudents(department.name, batch.records);
      database.endScrapeRun(runId, 'completed', batch.records.length);
    }

    return {
      department,
      batch,
      studentsWithoutGrades: rawRecords.filter(r => r.grades.length === 0).length,
      artifacts,
    };
  } catch (err) {
    if (runId !== null) database?.endScrapeRun(runId, 'failed', 0, errorMessage(err));
    throw err;
  }
}
