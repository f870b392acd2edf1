/**
 * Enrollment Roster Parser
 *
 * The roster endpoint is a DataTables feed. Each row is keyed by column index
 * and every cell is an HTML fragment:
 *   "3" student id | "4" name | "7" course | "8" year level | "11" <a data-idno="...">
 */

import * as cheerio from 'cheerio';
import type { StudentInfo } from '../types.js';
import { categorizeYearLevel } from './yearLevel.js';

export const ROSTER_COLUMNS = {
  STUDENT_ID: '3',
  NAME: '4',
  COURSE: '7',
  YEAR_LEVEL: '8',
  LINK: '11',
} as const;

type RosterRow = Record<string, unknown> | unknown[];

function cellHtml(row: RosterRow, column: string): string {
  const value = Array.isArray(row) ? row[Number(column)] : row[column];
  if (value === null || value === undefined) return '';
  return String(value);
}

function cellText(html: string): string {
  return cheerio.load(html, null, false).root().text().trim();
}

export function extractStudentInfo(row: RosterRow): StudentInfo {
  const yearLevelRaw = cellText(cellHtml(row, ROSTER_COLUMNS.YEAR_LEVEL));
  const $link = cheerio.load(cellHtml(row, ROSTER_COLUMNS.LINK), null, false);
  const encodedId = $link('a').first().attr('data-idno')?.trim();

  return {
    student_id: cellText(cellHtml(row, ROSTER_COLUMNS.STUDENT_ID)),
    name: cellText(cellHtml(row, ROSTER_COLUMNS.NAME)),
    course: cellText(cellHtml(row, ROSTER_COLUMNS.COURSE)),
    year_level_raw: yearLevelRaw,
    year_level: categorizeYearLevel(yearLevelRaw),
    encoded_id: encodedId ? encodedId : null,
  };
}

function isRosterRow(value: unknown): value is RosterRow {
  return typeof value === 'object' && value !== null;
}

/**
 * Rows of a roster response body ({ data: [...] }); anything else is an empty roster
 */
export function parseRosterResponse(body: unknown): RosterRow[] {
  if (!isRosterRow(body) || Array.isArray(body)) return [];
  const data = body.data;
  return Array.isArray(data) ? data.filter(isRosterRow) : [];
}
