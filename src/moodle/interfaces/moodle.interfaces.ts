// Respuestas crudas del WS REST de Moodle (solo los campos que usa el reporte)

export interface MoodleCourse {
  id: number;
  fullname: string;
  shortname: string;
  categoryid?: number;
}

export interface MoodleCoursesResponse {
  courses?: MoodleCourse[];
}

export interface MoodleRole {
  roleid?: number;
  name?: string;
  shortname?: string;
}

export interface MoodleCustomField {
  type?: string;
  value?: string;
  name?: string;
  shortname?: string;
}

export interface MoodleUser {
  id: number;
  username?: string;
  fullname?: string;
  email?: string;
  department?: string;
  institution?: string;
  city?: string;
  country?: string;
  lastaccess?: number;
  roles?: MoodleRole[];
  customfields?: MoodleCustomField[];
}

export interface MoodleCourseModule {
  id: number;
  name: string;
  modname: string;
  uservisible?: boolean;
  deletioninprogress?: boolean;
}

export interface MoodleCourseSection {
  id?: number;
  name?: string;
  modules?: MoodleCourseModule[];
}

export interface MoodleCourseCompletionResponse {
  completionstatus?: {
    completed?: boolean;
  };
}

export interface MoodleActivityStatus {
  cmid: number;
  modname?: string;
  state?: number;
}

export interface MoodleActivitiesCompletionResponse {
  statuses?: MoodleActivityStatus[];
}

/** Error de WS: Moodle responde 200 con {exception, errorcode, message} */
export interface MoodleWsError {
  exception: string;
  errorcode?: string;
  message?: string;
}

// ===== Tipos de dominio =====

export interface CourseActivity {
  name: string;
  type: string;
}

export type CourseCompletionLabel = 'Completed' | 'Incomplete' | 'N/A';

export interface CourseCompletion {
  percentage: 0 | 100;
  label: CourseCompletionLabel;
}

export type ActivityCompletionLabel = 'Completed' | 'Failed' | 'Incomplete';
