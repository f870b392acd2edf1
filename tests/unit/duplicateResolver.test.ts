import { describe, it, expect } from 'vitest';
import {
  findDuplicateGroups,
  resolveDuplicates,
  type DuplicateEvent,
} from '../../src/processing/duplicateResolver.js';
import type { SubjectRecord } from '../../src/types.js';

function subject(code: string, grade: string, unit = '3'): SubjectRecord {
  return { subject_code: code, subject_description: `${code} desc`, subject_unit: unit, grade };
}

const mathFirst = subject('MATH1', '3.0');
const engFirst = subject('ENG1', '2.5');
const blankA = subject('', '1.5');
const mathRetake = subject('math1 ', '2.0');
const cs = subject('CS1', '1.75');
const blankB = subject('', '2.25');
const engRetake = subject('ENG1', '1.5');
const mathLast = subject('MATH1', '1.25');

const transcript = [mathFirst, engFirst, blankA, mathRetake, cs, blankB, engRetake, mathLast];

describe('resolveDuplicates', () => {
  it('keeps only the last occurrence of each subject code', () => {
    const resolved = resolveDuplicates(transcript);
    expect(resolved).toEqual([blankA, cs, blankB, engRetake, mathLast]);
  });

  it('keeps the second entry when a code repeats', () => {
    const resolved = resolveDuplicates([subject('CS101', '3.0', '(3)'), subject('CS101', '1.0')]);
    expect(resolved).toHaveLength(1);
    expect(resolved[0].grade).toBe('1.0');
  });

  it('preserves the relative order of surviving entries', () => {
    const resolved = resolveDuplicates(transcript);
    const positions = resolved.map(s => transcript.indexOf(s));
    expect(positions).toEqual([...positions].sort((a, b) => a - b));
  });

  it('is idempotent', () => {
    const once = resolveDuplicates(transcript);
    expect(resolveDuplicates(once)).toEqual(once);
  });

  it('never groups blank codes', () => {
    const blanks = [subject('', '1.0'), subject(' ', '2.0'), subject('', '')];
    expect(resolveDuplicates(blanks)).toEqual(blanks);
  });

  it('returns an empty list for an empty transcript', () => {
    expect(resolveDuplicates([])).toEqual([]);
  });

  it('does not modify the input list', () => {
    const input = [...transcript];
    resolveDuplicates(input);
    expect(input).toEqual(transcript);
  });

  it('reports one event per collapsed code', () => {
    const events: DuplicateEvent[] = [];
    resolveDuplicates(transcript, { studentId: '2021-00042', onCollapse: e => events.push(e) });
    expect(events).toEqual([
      { subject_code: 'MATH1', student_id: '2021-00042', count_removed: 2 },
      { subject_code: 'ENG1', student_id: '2021-00042', count_removed: 1 },
    ]);
  });
});

describe('findDuplicateGroups', () => {
  it('lists positions of repeated codes only', () => {
    const groups = findDuplicateGroups(transcript);
    expect([...groups.entries()]).toEqual([
      ['MATH1', [0, 3, 7]],
      ['ENG1', [1, 6]],
    ]);
  });
});
