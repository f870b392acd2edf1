/**
 * Enrollment Status Classifier
 *
 * Precedence, first match wins:
 *   1. any blank grade          -> "Grades Pending"
 *   2. any failing/sentinel one -> "Irregular"
 *   3. otherwise                -> "Regular"
 * A single blank grade outranks any number of failing grades.
 */

import type { EnrollmentStatus, SubjectRecord } from '../types.js';

// Exact match after trimming; letter codes are case-sensitive.
export const IRREGULAR_GRADES: ReadonlySet<string> = new Set(['5', '5.0', '5.00', 'INC', 'W', 'D/F']);

export interface Classification {
  status: Extract<EnrollmentStatus, 'Regular' | 'Irregular' | 'Grades Pending'>;
  reasons: string[];
}

export function classifyStatus(subjects: readonly SubjectRecord[]): Classification {
  const pendingReasons: string[] = [];
  const irregularReasons: string[] = [];

  subjects.forEach((subject, i) => {
    const grade = subject.grade.trim();
    if (grade === '') {
      pendingReasons.push(`index ${i}: blank grade`);
    } else if (IRREGULAR_GRADES.has(grade)) {
      irregularReasons.push(`index ${i}: '${grade}'`);
    }
  });

  if (pendingReasons.length > 0) {
    return { status: 'Grades Pending', reasons: pendingReasons };
  }
  if (irregularReasons.length > 0) {
    return { status: 'Irregular', reasons: irregularReasons };
  }
  return { status: 'Regular', reasons: [] };
}
