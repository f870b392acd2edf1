/**
 * Transcript Table Parser
 *
 * The grade history table (#tblhistory) comes in two column layouts:
 * - standard: No. | Code | Description | Units | ... | Grade (col 8)
 * - indexed:  rows whose first cell is the "1." marker carry an extra
 *             academic-year column, shifting everything one to the right
 */

import * as cheerio from 'cheerio';
import type { SubjectRecord } from '../types.js';

export type TranscriptLayout = 'standard' | 'indexed';

export interface ColumnMap {
  code: number;
  description: number;
  unit: number;
  grade: number;
}

export const TRANSCRIPT_LAYOUTS: Record<TranscriptLayout, ColumnMap> = {
  standard: { code: 1, description: 2, unit: 3, grade: 8 },
  indexed: { code: 2, description: 3, unit: 4, grade: 9 },
};

const INDEXED_MARKER = '1.';
const MIN_CELLS = 8;
const SEPARATOR_FIRST_CELLS = new Set(['', 'Year', 'Semester', 'Term']);
const SEPARATOR_SECOND_CELLS = new Set(['Midterm', 'Final', 'Re-Exam', 'ACADEMICYEAR', 'COURSE']);

export function detectLayout(cells: readonly string[]): TranscriptLayout {
  return cells[0] === INDEXED_MARKER ? 'indexed' : 'standard';
}

/**
 * Header, term-separator and short rows carry no subject
 */
export function isSubjectRow(cells: readonly string[]): boolean {
  if (cells.length < MIN_CELLS) return false;
  if (SEPARATOR_FIRST_CELLS.has(cells[0])) return false;
  if (SEPARATOR_SECOND_CELLS.has(cells[1])) return false;
  return cells[1] !== '';
}

export function rowToSubject(cells: readonly string[], layout: TranscriptLayout = detectLayout(cells)): SubjectRecord {
  const columns = TRANSCRIPT_LAYOUTS[layout];
  const at = (index: number) => cells[index] ?? '';
  return {
    subject_code: at(columns.code),
    subject_description: at(columns.description),
    subject_unit: at(columns.unit),
    grade: at(columns.grade),
  };
}

export function parseTranscriptHTML(html: string): SubjectRecord[] {
  const $ = cheerio.load(html);
  let table = $('table#tblhistory').first();
  if (table.length === 0) {
    table = $('table').first();
  }
  if (table.length === 0) return [];

  const subjects: SubjectRecord[] = [];

  // Skip header row
  table.find('tr').slice(1).each((_, row) => {
    const cells = $(row)
      .find('td, th')
      .map((_, cell) => $(cell).text().trim())
      .get();

    if (!isSubjectRow(cells)) return;
    subjects.push(rowToSubject(cells));
  });

  return subjects;
}
