import { describe, it, expect } from 'vitest';
import { extractStudentInfo, parseRosterResponse } from '../../src/parsers/enrollmentParser.js';
import { categorizeYearLevel } from '../../src/parsers/yearLevel.js';

describe('extractStudentInfo', () => {
  it('reads cell text and the transcript link from a keyed row', () => {
    const row = {
      '3': '<span class="badge">2021-0001</span>',
      '4': ' Reyes, Ana ',
      '7': '<b>BSCE</b>',
      '8': '2nd yr',
      '11': '<a href="#" class="view" data-idno="enc-001">View</a>',
    };
    expect(extractStudentInfo(row)).toEqual({
      student_id: '2021-0001',
      name: 'Reyes, Ana',
      course: 'BSCE',
      year_level_raw: '2nd yr',
      year_level: '2nd Year',
      encoded_id: 'enc-001',
    });
  });

  it('reads array rows by position', () => {
    const row = ['', '', '', '2020-0009', 'Cruz, Ben', '', '', 'BSARCH', 'Fifth Year', '', '', ''];
    expect(extractStudentInfo(row)).toEqual({
      student_id: '2020-0009',
      name: 'Cruz, Ben',
      course: 'BSARCH',
      year_level_raw: 'Fifth Year',
      year_level: '5th Year',
      encoded_id: null,
    });
  });
});

describe('parseRosterResponse', () => {
  it('returns the object rows of the data list', () => {
    const rows = parseRosterResponse({ data: [{ '3': 'a' }, 'junk', null, ['x']] });
    expect(rows).toEqual([{ '3': 'a' }, ['x']]);
  });

  it('treats unexpected bodies as an empty roster', () => {
    expect(parseRosterResponse(null)).toEqual([]);
    expect(parseRosterResponse([1, 2])).toEqual([]);
    expect(parseRosterResponse({ data: 'none' })).toEqual([]);
  });
});

describe('categorizeYearLevel', () => {
  it('recognises ordinal, word and numeric forms', () => {
    expect(categorizeYearLevel('1st Year')).toBe('1st Year');
    expect(categorizeYearLevel('First Year')).toBe('1st Year');
    expect(categorizeYearLevel('3 yr')).toBe('3rd Year');
    expect(categorizeYearLevel('BSCE 4th')).toBe('4th Year');
  });

  it('falls back to Unknown', () => {
    expect(categorizeYearLevel('')).toBe('Unknown');
    expect(categorizeYearLevel(null)).toBe('Unknown');
    expect(categorizeYearLevel('Graduate')).toBe('Unknown');
  });
});
