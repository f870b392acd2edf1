/**
 * GWA Aggregator
 *
 * Credit-weighted average over numerically valid grades only.
 * Scale runs 1.0 (best) to 5.0 (failing): lower is better.
 */

import type { GwaFields, HonorTier, SubjectRecord } from '../types.js';
import { parseCountableGrade, parseUnits, roundTo } from './gradeNormalizer.js';

export interface AggregateResult {
  gwa: number | null;
  total_units: number;
  total_grade_points: number;
  valid_subject_count: number;
}

export const HONORS_CUTOFF = 2.0;

// Upper bounds, checked in order
const HONOR_TIERS: Array<{ max: number; label: HonorTier }> = [
  { max: 1.5, label: 'With Honors (Possible Summa/Magna)' },
  { max: 1.75, label: 'With High Honors' },
  { max: HONORS_CUTOFF, label: 'With Honors' },
];

export function aggregateGwa(subjects: readonly SubjectRecord[]): AggregateResult {
  let totalUnits = 0;
  let totalGradePoints = 0;
  let validSubjects = 0;

  for (const subject of subjects) {
    const grade = parseCountableGrade(subject.grade);
    if (grade === null) continue;

    const units = parseUnits(subject.subject_unit);
    totalUnits += units;
    totalGradePoints += grade * units;
    validSubjects++;
  }

  return {
    gwa: totalUnits > 0 ? roundTo(totalGradePoints / totalUnits, 3) : null,
    total_units: totalUnits,
    total_grade_points: totalGradePoints,
    valid_subject_count: validSubjects,
  };
}

export function honorTier(gwa: number | null): HonorTier | null {
  if (gwa === null) return null;
  return HONOR_TIERS.find(tier => gwa <= tier.max)?.label ?? null;
}

export function isHonorStudent(gwa: number | null | undefined): boolean {
  return typeof gwa === 'number' && gwa <= HONORS_CUTOFF;
}

/**
 * Derived record fields, rounded the way they are written out
 */
export function toGwaFields(result: AggregateResult): GwaFields {
  return {
    gwa: result.gwa,
    total_units_completed: roundTo(result.total_units, 1),
    total_valid_subjects: result.valid_subject_count,
    total_grade_points: roundTo(result.total_grade_points, 3),
    honor_tier: honorTier(result.gwa),
  };
}
