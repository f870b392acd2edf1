import { describe, it, expect } from 'vitest';
import { aggregateGwa, honorTier, isHonorStudent, toGwaFields } from '../../src/processing/gwaAggregator.js';
import { resolveDuplicates } from '../../src/processing/duplicateResolver.js';
import type { SubjectRecord } from '../../src/types.js';

function subject(grade: string, unit: string): SubjectRecord {
  return { subject_code: `S${grade}${unit}`, subject_description: '', subject_unit: unit, grade };
}

describe('aggregateGwa', () => {
  it('weights grades by credit units', () => {
    expect(aggregateGwa([subject('1.5', '3'), subject('2.0', '3')])).toEqual({
      gwa: 1.75,
      total_units: 6,
      total_grade_points: 10.5,
      valid_subject_count: 2,
    });
  });

  it('rounds the average to three decimals', () => {
    const result = aggregateGwa([subject('1.25', '3'), subject('2.0', '3'), subject('1.5', '1')]);
    expect(result.gwa).toBe(1.607);
    expect(result.total_units).toBe(7);
    expect(result.total_grade_points).toBe(11.25);
  });

  it('rounds an exact half to the even neighbour', () => {
    const result = aggregateGwa([subject('1.0', '3'), subject('1.25', '1')]);
    expect(result.total_grade_points).toBe(4.25);
    expect(result.gwa).toBe(1.062);
  });

  it('ignores blanks, sentinel tokens and out-of-range grades', () => {
    const result = aggregateGwa([
      subject('', '3'),
      subject('INC', '3'),
      subject('W', '3'),
      subject('0.75', '3'),
      subject('6', '3'),
      subject('2.5', '(2)'),
    ]);
    expect(result).toEqual({ gwa: 2.5, total_units: 2, total_grade_points: 5, valid_subject_count: 1 });
  });

  it('counts failing numeric grades', () => {
    expect(aggregateGwa([subject('5.0', '3'), subject('1.0', '3')]).gwa).toBe(3);
  });

  it('has no GWA when the valid subjects carry no units', () => {
    expect(aggregateGwa([subject('1.5', '0'), subject('2.0', 'abc')])).toEqual({
      gwa: null,
      total_units: 0,
      total_grade_points: 0,
      valid_subject_count: 2,
    });
  });

  it('scores only the surviving entry of a duplicated code', () => {
    const resolved = resolveDuplicates([
      { subject_code: 'CS101', subject_description: '', subject_unit: '(3)', grade: '3.0' },
      { subject_code: 'CS101', subject_description: '', subject_unit: '3', grade: '1.0' },
    ]);
    expect(aggregateGwa(resolved).gwa).toBe(1);
  });

  it('stays within the grade scale', () => {
    const grades = ['1.0', '1.25', '2.75', '3.0', '5.0', '4.5'];
    const units = ['3', '(2)', '1', '5', '0.5', '4'];
    const result = aggregateGwa(grades.map((g, i) => subject(g, units[i])));
    expect(result.gwa).not.toBeNull();
    expect(result.gwa ?? 0).toBeGreaterThanOrEqual(1);
    expect(result.gwa ?? 0).toBeLessThanOrEqual(5);
  });

  it('has no GWA for an empty transcript', () => {
    expect(aggregateGwa([]).gwa).toBeNull();
  });
});

describe('honorTier', () => {
  it('maps GWA onto tiers at the boundaries', () => {
    expect(honorTier(1.0)).toBe('With Honors (Possible Summa/Magna)');
    expect(honorTier(1.5)).toBe('With Honors (Possible Summa/Magna)');
    expect(honorTier(1.501)).toBe('With High Honors');
    expect(honorTier(1.75)).toBe('With High Honors');
    expect(honorTier(1.751)).toBe('With Honors');
    expect(honorTier(2.0)).toBe('With Honors');
    expect(honorTier(2.001)).toBeNull();
    expect(honorTier(null)).toBeNull();
  });
});

describe('isHonorStudent', () => {
  it('is true up to a GWA of 2.0', () => {
    expect(isHonorStudent(2.0)).toBe(true);
    expect(isHonorStudent(2.25)).toBe(false);
    expect(isHonorStudent(null)).toBe(false);
    expect(isHonorStudent(undefined)).toBe(false);
  });
});

describe('toGwaFields', () => {
  it('rounds units to one decimal and grade points to three', () => {
    expect(
      toGwaFields({ gwa: 1.333, total_units: 7.25, total_grade_points: 9.6667, valid_subject_count: 3 })
    ).toEqual({
      gwa: 1.333,
      total_units_completed: 7.2,
      total_valid_subjects: 3,
      total_grade_points: 9.667,
      honor_tier: 'With Honors (Possible Summa/Magna)',
    });
  });

  it('has no tier without a GWA', () => {
    expect(toGwaFields({ gwa: null, total_units: 0, total_grade_points: 0, valid_subject_count: 0 })).toEqual({
      gwa: null,
      total_units_completed: 0,
      total_valid_subjects: 0,
      total_grade_points: 0,
      honor_tier: null,
    });
  });
});
