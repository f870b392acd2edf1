/**
 * Grade Record Normalizer
 * Coerces the textual fields of a transcript row into usable values.
 */

import type { SubjectRecord } from '../types.js';

export const MIN_GRADE = 1.0;
export const MAX_GRADE = 5.0;

// Plain decimal notation only: "1.25", "3", ".5", "2e0". No hex, no "Infinity".
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function toText(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

/**
 * Parse a real number, or null when the text is not a finite decimal
 */
export function parseDecimal(value: unknown): number | null {
  const text = toText(value).trim();
  if (!DECIMAL_PATTERN.test(text)) return null;
  const num = Number(text);
  return Number.isFinite(num) ? num : null;
}

/**
 * Deduplication key for a subject: trimmed, uppercased code.
 * Blank codes have no key and are never grouped.
 */
export function subjectKey(subject: Pick<SubjectRecord, 'subject_code'>): string | null {
  const key = toText(subject.subject_code).trim().toUpperCase();
  return key === '' ? null : key;
}

/**
 * Credit units: "(3)" -> 3. Anything that does not coerce to a
 * non-negative number counts as 0 units.
 */
export function parseUnits(value: unknown): number {
  const units = parseDecimal(toText(value).replace(/[()]/g, ''));
  if (units === null || units < 0) return 0;
  return units;
}

/**
 * Numeric grade in [1.0, 5.0], or null for blanks, sentinel tokens and out-of-range values
 */
export function parseCountableGrade(value: unknown): number | null {
  const grade = parseDecimal(value);
  if (grade === null || grade < MIN_GRADE || grade > MAX_GRADE) return null;
  return grade;
}

export function isCountableGrade(value: unknown): boolean {
  return parseCountableGrade(value) !== null;
}

/**
 * Build a SubjectRecord from loosely typed row data
 */
export function normalizeSubject(raw: Partial<Record<keyof SubjectRecord, unknown>>): SubjectRecord {
  return {
    subject_code: toText(raw.subject_code),
    subject_description: toText(raw.subject_description),
    subject_unit: toText(raw.subject_unit),
    grade: toText(raw.grade),
  };
}

/**
 * Round to a fixed number of decimals, judged on the exact binary value.
 * Exact halves go to the even neighbour.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

  const exact = value.toFixed(100);
  const dot = exact.indexOf('.');
  const isHalf = new RegExp(`^\\d{${decimals}}50*$`).test(exact.slice(dot + 1));
  if (!isHalf) return Number(value.toFixed(decimals));

  // toFixed moves halves away from zero; truncating instead keeps an even last digit
  const kept = exact.slice(0, dot + 1 + decimals);
  const lastDigit = Number(decimals > 0 ? kept[kept.length - 1] : exact[dot - 1]);
  return lastDigit % 2 === 0 ? Number(kept) : Number(value.toFixed(decimals));
}
