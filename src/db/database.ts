/**
 * Database Module
 * Keeps processed student records and scrape run history in SQLite
 */

import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { logger } from '../logger.js';
import type { EnrichedStudentRecord } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export type RunStatus = 'running' | 'completed' | 'failed';

export interface StoredStudent {
  student_id: string;
  department: string;
  name: string;
  course: string;
  year_level: string;
  enrollment_status: string | null;
  gwa: number | null;
  total_units_completed: number | null;
  total_valid_subjects: number | null;
  total_grade_points: number | null;
  honor_tier: string | null;
}

export interface ScrapeRun {
  id: number;
  department: string;
  started_at: string;
  finished_at: string | null;
  status: RunStatus;
  students: number;
  error: string | null;
}

export interface DatabaseStats {
  students: number;
  subjects: number;
  runs: number;
  byStatus: Record<string, number>;
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export class RecordsDatabase {
  private db: Database.Database;

  constructor(dbPath: string = 'grades.db') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
  }

  /**
   * Initialize database with schema
   */
  initialize(): void {
    const schemaPath = join(__dirname, 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    this.db.exec(schema);
    logger.debug('Database', 'Database initialized');
  }

  startScrapeRun(department: string): number {
    const result = this.db
      .prepare<[string]>(`INSERT INTO scrape_runs (department) VALUES (?)`)
      .run(department);
    return Number(result.lastInsertRowid);
  }

  endScrapeRun(runId: number, status: Exclude<RunStatus, 'running'>, students: number, error?: string): void {
    this.db
      .prepare<[string, number, string | null, number]>(`
        UPDATE scrape_runs
        SET finished_at = CURRENT_TIMESTAMP, status = ?, students = ?, error = ?
        WHERE id = ?
      `)
      .run(status, students, error ?? null, runId);
  }

  getScrapeRuns(department?: string): ScrapeRun[] {
    if (department) {
      return this.db
        .prepare<[string], ScrapeRun>(`SELECT * FROM scrape_runs WHERE department = ? ORDER BY id`)
        .all(department);
    }
    return this.db.prepare<[], ScrapeRun>(`SELECT * FROM scrape_runs ORDER BY id`).all();
  }

  /**
   * Replace a department's students with a fresh batch
   */
  saveStudents(department: string, records: readonly EnrichedStudentRecord[]): void {
    const clearStudents = this.db.prepare<[string]>(`DELETE FROM students WHERE department = ?`);
    const clearSubjects = this.db.prepare<[string]>(`DELETE FROM subject_grades WHERE department = ?`);

    const studentStmt = this.db.prepare<
      [string, string, string, string, string, string | null, number | null, number | null, number | null, number | null, string | null]
    >(`
      INSERT OR REPLACE INTO students
      (student_id, department, name, course, year_level, enrollment_status, gwa,
       total_units_completed, total_valid_subjects, total_grade_points, honor_tier, scraped_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, CURRENT_TIMESTAMP)
    `);

    const subjectStmt = this.db.prepare<[string, string, number, string, string, string, string]>(`
      INSERT OR REPLACE INTO subject_grades
      (student_id, department, position, subject_code, subject_description, subject_unit, grade)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    const transaction = this.db.transaction((batch: readonly EnrichedStudentRecord[]) => {
      clearStudents.run(department);
      clearSubjects.run(department);

      for (const record of batch) {
        studentStmt.run(
          record.student_id,
          department,
          record.name,
          record.course,
          record.year_level,
          stringOrNull(record.enrollment_status),
          numberOrNull(record.gwa),
          numberOrNull(record.total_units_completed),
          numberOrNull(record.total_valid_subjects),
          numberOrNull(record.total_grade_points),
          stringOrNull(record.honor_tier)
        );

        record.grades.forEach((subject, position) => {
          subjectStmt.run(
            record.student_id,
            department,
            position,
            subject.subject_code,
            subject.subject_description,
            subject.subject_unit,
            subject.grade
          );
        });
      }
    });

    transaction(records);
    logger.info('Database', `Saved ${records.length} students for ${department}`);
  }

  getStudents(filter: { department?: string; status?: string } = {}): StoredStudent[] {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.department) {
      clauses.push('department = ?');
      params.push(filter.department);
    }
    if (filter.status) {
      clauses.push('enrollment_status = ?');
      params.push(filter.status);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

    return this.db
      .prepare<string[], StoredStudent>(`
        SELECT student_id, department, name, course, year_level, enrollment_status, gwa,
               total_units_completed, total_valid_subjects, total_grade_points, honor_tier
        FROM students ${where}
        ORDER BY rowid
      `)
      .all(...params);
  }

  /**
   * Get statistics
   */
  getStats(): DatabaseStats {
    const count = (sql: string) => this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;

    const byStatus: Record<string, number> = {};
    const rows = this.db
      .prepare<[], { status: string | null; count: number }>(`
        SELECT enrollment_status AS status, COUNT(*) AS count
        FROM students GROUP BY enrollment_status
      `)
      .all();
    for (const row of rows) {
      byStatus[row.status ?? 'Unclassified'] = row.count;
    }

    return {
      students: count('SELECT COUNT(*) AS count FROM students'),
      subjects: count('SELECT COUNT(*) AS count FROM subject_grades'),
      runs: count('SELECT COUNT(*) AS count FROM scrape_runs'),
      byStatus,
    };
  }

  /**
   * Close database
   */
  close(): void {
    this.db.close();
  }
}
