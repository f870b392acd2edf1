#!/usr/bin/env node

/**
 * Transcript Scraper - Main Entry Point
 *
 * Usage:
 *   transcript-scraper scrape                      # every configured department
 *   transcript-scraper scrape --dept civil         # departments matching "civil"
 *   transcript-scraper process grades.jsonl        # post-process an existing file
 *   transcript-scraper process --mode gwa          # newest grades_final_with_status_*.jsonl, GWA only,
 *                                                  # written as grades_processed_*.jsonl
 */

import { config as loadEnv } from 'dotenv';
import { Command, InvalidArgumentError } from 'commander';
import * as path from 'path';
import { loadConfig, loadDepartments, requireCredentials, type ScraperConfig } from './config.js';
import { RecordsDatabase } from './db/database.js';
import { errorMessage } from './errors.js';
import { login } from './httpAuth.js';
import {
  FINAL_PREFIX,
  PROCESSED_PREFIX,
  fileTimestamp,
  findLatestFile,
  readJsonlLines,
  writeBatchArtifacts,
} from './io/jsonl.js';
import { logger, LogLevel } from './logger.js';
import { processDepartment } from './pipeline.js';
import { processBatchStream, summarize, type BatchSummary } from './processing/batchDriver.js';
import { isProcessingMode, type EnrichedStudentRecord, type ProcessingMode } from './types.js';

loadEnv({ override: true });

function parseMode(value: string): ProcessingMode {
  if (!isProcessingMode(value)) {
    throw new InvalidArgumentError('Expected one of: status, gwa, both');
  }
  return value;
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer');
  }
  return parsed;
}

function parseNonNegativeInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer');
  }
  return parsed;
}

function summaryTable(summary: BatchSummary): Record<string, number | string> {
  const gwaByYear = new Map(Object.entries(summary.yearGwa));
  const rows: Array<[string, number | string]> = [['Total students', summary.totalStudents]];
  rows.push(...Object.entries(summary.statusCounts));
  for (const [year, count] of Object.entries(summary.yearCounts)) {
    const gwa = gwaByYear.get(year);
    rows.push([year, gwa ? `${count} (avg GWA ${gwa.averageGwa.toFixed(3)})` : count]);
  }
  rows.push(
    ['With computed GWA', summary.studentsWithGwa],
    ['Overall average GWA', summary.overallAverageGwa === null ? 'N/A' : summary.overallAverageGwa.toFixed(3)],
    ['Honor students', summary.honorStudents],
    ['Duplicates removed', summary.duplicatesRemoved],
    ['Malformed lines', summary.malformedLines]
  );
  return Object.fromEntries(rows);
}

const program = new Command();

program
  .name('transcript-scraper')
  .description('Student-records scraper with transcript cleaning, status classification and GWA')
  .version('1.0.0')
  .option('-v, --verbose', 'Debug logging');

program.hook('preAction', () => {
  if (program.opts<{ verbose?: boolean }>().verbose) {
    logger.setMinLevel(LogLevel.DEBUG);
  }
});

program
  .command('scrape')
  .description('Log in, scrape rosters and transcripts, and post-process every department')
  .option('-d, --dept <name>', 'Only departments whose name or folder contains this text')
  .option('--concurrent <n>', 'Parallel transcript workers', parsePositiveInt)
  .option('--delay <ms>', 'Pause between worker rounds in ms', parseNonNegativeInt)
  .option('-o, --output <dir>', 'Output directory')
  .option('--db <path>', 'Also store results in this SQLite database')
  .option('-m, --mode <mode>', 'status, gwa or both', parseMode, 'both')
  .action(async (opts: { dept?: string; concurrent?: number; delay?: number; output?: string; db?: string; mode: ProcessingMode }) => {
    const base = loadConfig();
    const config: ScraperConfig = {
      ...base,
      maxWorkers: opts.concurrent ?? base.maxWorkers,
      requestDelayMs: opts.delay ?? base.requestDelayMs,
      outputDir: opts.output ?? base.outputDir,
      databasePath: opts.db ?? base.databasePath,
    };
    if (config.debug) logger.setMinLevel(LogLevel.DEBUG);
    await runScrape(config, opts.mode, opts.dept);
  });

program
  .command('process')
  .description('Dedupe, classify and compute GWA for a JSONL file of student records')
  .argument('[input]', 'Input .jsonl file (default: newest grades_final_with_status_*.jsonl here)')
  .option('-o, --output <dir>', 'Output directory', '.')
  .option('-m, --mode <mode>', 'status, gwa or both', parseMode, 'both')
  .action(async (input: string | undefined, opts: { output: string; mode: ProcessingMode }) => {
    if (loadConfig().debug) logger.setMinLevel(LogLevel.DEBUG);
    await runProcess(input, opts.output, opts.mode);
  });

async function runScrape(config: ScraperConfig, mode: ProcessingMode, deptFilter?: string): Promise<void> {
  const startTime = Date.now();
  logger.startSession('scrape');
  logger.info('Main', 'Multi-department grades scraper starting...');

  const credentials = requireCredentials(config);
  const needle = deptFilter?.toLowerCase();
  const departments = loadDepartments(config.departmentsFile).filter(
    d => !needle || d.name.toLowerCase().includes(needle) || d.folder.toLowerCase().includes(needle)
  );
  if (departments.length === 0) {
    logger.warn('Main', `No departments match "${deptFilter}"`);
    return;
  }

  const database = config.databasePath ? new RecordsDatabase(config.databasePath) : null;

  try {
    database?.initialize();
    const session = await login(config, credentials);

    const allRecords: EnrichedStudentRecord[] = [];
    let duplicatesRemoved = 0;

    for (const department of departments) {
      const result = await processDepartment(session, config, department, { mode, database });
      allRecords.push(...result.batch.records);
      duplicatesRemoved += result.batch.summary.duplicatesRemoved;

      logger.summary(`${department.name} COMPLETED`, {
        ...summaryTable(result.batch.summary),
        'No grades retrieved': result.studentsWithoutGrades,
        'Files saved to': path.join(config.outputDir, department.folder),
      });
      logger.flush();
    }

    // Recomputed over the merged records, in department order
    const merged = summarize(allRecords, { duplicatesRemoved });
    const elapsed = ((Date.now() - startTime) / 60000).toFixed(2);

    logger.summary('ALL DEPARTMENTS PROCESSED', {
      ...summaryTable(merged),
      'Total time (min)': elapsed,
      'Output folder': config.outputDir,
      'Log file': logger.sessionFile ?? '-',
    });

    if (database) {
      const stats = database.getStats();
      logger.info('Database', `${stats.students} students, ${stats.subjects} subjects stored in ${config.databasePath}`);
    }
  } finally {
    database?.close();
    logger.flush();
  }
}

async function runProcess(input: string | undefined, outputDir: string, mode: ProcessingMode): Promise<void> {
  logger.startSession('process');

  const inputFile =
    input ??
    findLatestFile('.', `${FINAL_PREFIX}_`) ??
    findLatestFile('.', 'grades_complete_');

  if (!inputFile) {
    throw new Error("No input given and no 'grades_final_with_status_*.jsonl' file in the current directory");
  }
  if (!inputFile.endsWith('.jsonl')) {
    throw new Error('Input file must be a .jsonl file');
  }

  logger.info('Main', `Processing ${inputFile} (mode: ${mode})`);
  const result = await processBatchStream(readJsonlLines(inputFile), { mode });
  const artifacts = writeBatchArtifacts(result, outputDir, fileTimestamp(), PROCESSED_PREFIX);

  logger.summary('POST-PROCESSING COMPLETED', {
    ...summaryTable(result.summary),
    'Input': inputFile,
    'Output': artifacts.final,
    'Log file': logger.sessionFile ?? '-',
  });
  logger.flush();
}

program.parseAsync().catch((err: unknown) => {
  logger.error('Main', `Fatal error: ${errorMessage(err)}`);
  if (err instanceof Error && err.stack) {
    logger.debug('Main', err.stack);
  }
  logger.flush();
  process.exit(1);
});
