/**
 * Transcript Scraper Type Definitions
 */

// ============ Transcript Types ============

export interface SubjectRecord {
  subject_code: string;         // "MATH101", may be blank
  subject_description: string;
  subject_unit: string;         // "3", "3.0" or "(3)"
  grade: string;                // "1.25", "", "INC", "W", "D/F"
}

export const ENROLLMENT_STATUSES = [
  'Regular',
  'Irregular',
  'Grades Pending',
  'No valid grades',
] as const;

export type EnrollmentStatus = (typeof ENROLLMENT_STATUSES)[number];

export function isEnrollmentStatus(value: unknown): value is EnrollmentStatus {
  return typeof value === 'string' && (ENROLLMENT_STATUSES as readonly string[]).includes(value);
}

export type HonorTier =
  | 'With Honors (Possible Summa/Magna)'
  | 'With High Honors'
  | 'With Honors';

// ============ Student Record Types ============

export interface StudentRecord {
  student_id: string;
  name: string;
  course: string;
  year_level: string;           // "1st Year" ... "5th Year", "Unknown"
  grades: SubjectRecord[];
  total_subjects?: number;
  enrollment_status?: EnrollmentStatus;
  [extra: string]: unknown;
}

export interface GwaFields {
  gwa: number | null;
  total_units_completed: number;
  total_valid_subjects: number;
  total_grade_points: number;
  honor_tier: HonorTier | null;
}

export type EnrichedStudentRecord = StudentRecord & Partial<GwaFields>;

// ============ Roster Types ============

export interface StudentInfo {
  student_id: string;
  name: string;
  course: string;
  year_level_raw: string;       // as shown on the roster, e.g. "2nd yr"
  year_level: string;
  encoded_id: string | null;    // data-idno of the transcript link
}

export interface Department {
  name: string;                 // "Civil Engineering"
  folder: string;               // "Civil_Engineering"
  programId: string;            // portal progid
}

// ============ Processing Options ============

export type ProcessingMode = 'status' | 'gwa' | 'both';

export const PROCESSING_MODES: readonly ProcessingMode[] = ['status', 'gwa', 'both'];

export function isProcessingMode(value: unknown): value is ProcessingMode {
  return typeof value === 'string' && (PROCESSING_MODES as readonly string[]).includes(value);
}
