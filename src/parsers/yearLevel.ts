/**
 * Year Level Parser
 * Maps the roster's free-form year text onto a fixed set of labels
 *
 * Seen on rosters: "1st Year", "First Year", "2nd yr", "3 yr", "BSCE 4th"
 */

export const YEAR_LEVELS = ['1st Year', '2nd Year', '3rd Year', '4th Year', '5th Year'] as const;

const YEAR_TOKENS: Array<{ label: (typeof YEAR_LEVELS)[number]; tokens: string[] }> = [
  { label: '1st Year', tokens: ['1st', 'first', '1 '] },
  { label: '2nd Year', tokens: ['2nd', 'second', '2 '] },
  { label: '3rd Year', tokens: ['3rd', 'third', '3 '] },
  { label: '4th Year', tokens: ['4th', 'fourth', '4 '] },
  { label: '5th Year', tokens: ['5th', 'fifth', '5 '] },
];

export function categorizeYearLevel(yearText: string | null | undefined): string {
  if (!yearText) return 'Unknown';

  // "1 " only matches inside the text, since it is trimmed first
  const lower = yearText.toLowerCase().trim();
  for (const { label, tokens } of YEAR_TOKENS) {
    if (tokens.some(token => lower.includes(token))) return label;
  }
  return 'Unknown';
}
