/**
 * Wire schema for one line-delimited student record
 */

import { z } from 'zod';
import { isEnrollmentStatus, type StudentRecord } from '../types.js';

// Upstream cells are text, but any JSON value can show up in hand-edited files.
// Lists and objects keep their JSON form, so they never parse as a grade or unit.
function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

const textField = z.unknown().transform(cellText);

export const SubjectRecordSchema = z.object({
  subject_code: textField,
  subject_description: textField,
  subject_unit: textField,
  grade: textField,
});

export const StudentRecordSchema = z
  .object({
    student_id: textField,
    name: textField,
    course: textField,
    year_level: textField,
    grades: z.array(SubjectRecordSchema).default([]),
  })
  .passthrough();

export type ParsedStudentRecord = z.infer<typeof StudentRecordSchema>;

export type ParseResult =
  | { ok: true; record: StudentRecord }
  | { ok: false; error: string };

export function toStudentRecord(parsed: ParsedStudentRecord): StudentRecord {
  const { student_id, name, course, year_level, grades, enrollment_status, ...extra } = parsed;
  const record: StudentRecord = { ...extra, student_id, name, course, year_level, grades };
  if (isEnrollmentStatus(enrollment_status)) {
    record.enrollment_status = enrollment_status;
  }
  return record;
}

/**
 * Validate an already-decoded value as a student record
 */
export function parseStudentRecord(value: unknown): ParseResult {
  const result = StudentRecordSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { ok: false, error: `${where}${issue?.message ?? 'invalid record'}` };
  }
  return { ok: true, record: toStudentRecord(result.data) };
}

/**
 * Decode and validate one JSONL line
 */
export function parseStudentLine(line: string): ParseResult {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : 'invalid JSON' };
  }
  return parseStudentRecord(value);
}
