import { describe, it, expect } from 'vitest';
import {
  detectLayout,
  isSubjectRow,
  parseTranscriptHTML,
  rowToSubject,
} from '../../src/parsers/transcriptParser.js';

function row(cells: string[]): string {
  return `<tr>${cells.map(c => `<td>${c}</td>`).join('')}</tr>`;
}

const history = `
  <div>
    <table id="tblhistory">
      <tr><th>No.</th><th>Code</th><th>Description</th><th>Units</th><th></th><th></th><th></th><th></th><th>Grade</th></tr>
      <tr><td colspan="9">First Semester, 2023-2024</td></tr>
      ${row(['Year', '2023-2024', '', '', '', '', '', '', ''])}
      ${row(['1', 'MATH101', 'Calculus I', '3', '', '', '', '', '1.25'])}
      ${row(['1.', '2023-2024', 'CS101', 'Intro to Computing', '(3)', '', '', '', '', '2.0'])}
      ${row(['2', 'Midterm', '', '', '', '', '', '', ''])}
      ${row(['3', ' PE1 ', 'Physical Education', '2', '', '', '', '', ''])}
      ${row(['4', '', 'No code', '3', '', '', '', '', '1.0'])}
    </table>
  </div>`;

describe('parseTranscriptHTML', () => {
  it('reads subjects from both column layouts', () => {
    expect(parseTranscriptHTML(history)).toEqual([
      { subject_code: 'MATH101', subject_description: 'Calculus I', subject_unit: '3', grade: '1.25' },
      { subject_code: 'CS101', subject_description: 'Intro to Computing', subject_unit: '(3)', grade: '2.0' },
      { subject_code: 'PE1', subject_description: 'Physical Education', subject_unit: '2', grade: '' },
    ]);
  });

  it('falls back to the first table', () => {
    const html = `<table><tr><th>h</th></tr>${row(['1', 'ENG1', 'English', '3', '', '', '', '', '2.5'])}</table>`;
    expect(parseTranscriptHTML(html)).toEqual([
      { subject_code: 'ENG1', subject_description: 'English', subject_unit: '3', grade: '2.5' },
    ]);
  });

  it('returns nothing without a table', () => {
    expect(parseTranscriptHTML('<p>No records found</p>')).toEqual([]);
  });
});

describe('row helpers', () => {
  it('detects the indexed layout from the first cell', () => {
    expect(detectLayout(['1.', 'x'])).toBe('indexed');
    expect(detectLayout(['1', 'x'])).toBe('standard');
  });

  it('rejects short and separator rows', () => {
    expect(isSubjectRow(['1', 'MATH1', 'x', '3'])).toBe(false);
    expect(isSubjectRow(['Semester', 'MATH1', '', '', '', '', '', ''])).toBe(false);
    expect(isSubjectRow(['1', 'ACADEMICYEAR', '', '', '', '', '', ''])).toBe(false);
    expect(isSubjectRow(['1', 'MATH1', '', '', '', '', '', ''])).toBe(true);
  });

  it('fills missing cells with blanks', () => {
    expect(rowToSubject(['1', 'MATH1', 'Calc', '3', '', '', '', ''])).toEqual({
      subject_code: 'MATH1',
      subject_description: 'Calc',
      subject_unit: '3',
      grade: '',
    });
  });
});
