export const CONSOLIDATED_SHEET = 'All Courses – Consolidated';
export const ENROLLMENTS_SHEET = 'Enrollments';
export const FALLBACK_SHEET_NAME = 'Course';
export const MAX_SHEET_NAME_LENGTH = 31;

export const MIN_COLUMN_WIDTH = 12;
export const MAX_COLUMN_WIDTH = 60;

export const DEFAULT_ACTIVITY_STATUS = 'Incomplete';

export const CONSOLIDATED_HEADERS = [
  'User ID',
  'Full Name',
  'Manager',
  'Email',
  'Course ID',
  'Course Name',
  'Last Access',
  'Role(s)',
  'Completion %',
  'Course Completion Status',
] as const;

export const COURSE_BASE_HEADERS = [
  'Course ID',
  'Course Name',
  'Course Shortname',
  'User ID',
  'Full Name',
  'Username',
  'Email',
  'Department',
  'Institution',
  'City',
  'Country',
  'Last Access',
  'Role(s)',
] as const;

export const COURSE_TRAILING_HEADERS = ['Completion %', 'Course Completion Status'] as const;

export const ENROLLMENT_HEADERS = [
  'User ID',
  'Full Name',
  'Username',
  'Email',
  'Course ID',
  'Course Name',
  'Course Shortname',
  'Role(s)',
  'Last Access',
] as const;

export const reportFileName = (stamp: string) => `Moodle_Completion_Report_${stamp}.xlsx`;
