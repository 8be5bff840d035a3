import { MoodleCourse } from '../../moodle/interfaces/moodle.interfaces';

export type CellValue = string | number;

/** Fila como bolsa clave/valor: las columnas se eligen al armar la hoja */
export type ReportRow = Record<string, CellValue>;

export interface CourseReport {
  course: MoodleCourse;
  activityColumns: string[];
  courseRows: ReportRow[];
  consolidatedRows: ReportRow[];
  enrollmentRows: ReportRow[];
  /** core_enrol_get_enrolled_users falló: el curso no aporta filas */
  usersFailed: boolean;
}

export interface CourseSheet {
  shortname: string;
  activityColumns: string[];
  rows: ReportRow[];
}

export interface CompletionReportData {
  consolidatedRows: ReportRow[];
  courseSheets: CourseSheet[];
  enrollmentRows: ReportRow[];
}

export interface ReportScope {
  courseId?: number;
  coursesFile?: string;
}

export interface ReportResult {
  filePath: string;
  courses: number;
  failedCourses: number;
  consolidatedRows: number;
  enrollmentRows: number;
}
