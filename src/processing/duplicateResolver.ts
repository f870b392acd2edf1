/**
 * Duplicate Resolver
 *
 * A transcript can list the same subject more than once (e.g. a retake row
 * appended after the original). Only the last occurrence of each subject code
 * is kept; blank codes are never grouped.
 */

import type { SubjectRecord } from '../types.js';
import { subjectKey } from './gradeNormalizer.js';

export interface DuplicateEvent {
  subject_code: string;
  student_id: string;
  count_removed: number;
}

export interface ResolveOptions {
  studentId?: string;
  /** Called once per collapsed subject code, in order of first appearance */
  onCollapse?: (event: DuplicateEvent) => void;
}

/**
 * Group positions by subject key, in order of first appearance
 */
export function findDuplicateGroups(subjects: readonly SubjectRecord[]): Map<string, number[]> {
  const seen = new Map<string, number[]>();
  subjects.forEach((subject, index) => {
    const key = subjectKey(subject);
    if (key === null) return;
    const indices = seen.get(key);
    if (indices) {
      indices.push(index);
    } else {
      seen.set(key, [index]);
    }
  });

  for (const [key, indices] of seen) {
    if (indices.length < 2) seen.delete(key);
  }
  return seen;
}

/**
 * Keep the last entry of every duplicated subject code.
 * Returns a new array; surviving entries keep their relative order.
 */
export function resolveDuplicates(
  subjects: readonly SubjectRecord[],
  options: ResolveOptions = {}
): SubjectRecord[] {
  const { studentId = 'Unknown', onCollapse } = options;
  const toRemove = new Set<number>();

  for (const [code, indices] of findDuplicateGroups(subjects)) {
    const earlier = indices.slice(0, -1);
    earlier.forEach(i => toRemove.add(i));
    onCollapse?.({ subject_code: code, student_id: studentId, count_removed: earlier.length });
  }

  return subjects.filter((_, i) => !toRemove.has(i));
}
