import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import { setTimeout as sleep } from 'timers/promises';
import {
  MOODLE_BASE_URL,
  MOODLE_RETRY_COUNT,
  MOODLE_RETRY_DELAY_MS,
  MOODLE_TOKEN,
} from '../config/config.env';
import { MOODLE_HTTP, MOODLE_REST_PATH } from './moodle.constants';
import { MoodleWsException, isMoodleWsError } from './moodle.exception';
import {
  ActivityCompletionLabel,
  CourseActivity,
  CourseCompletion,
  MoodleActivitiesCompletionResponse,
  MoodleCourse,
  MoodleCourseCompletionResponse,
  MoodleCourseSection,
  MoodleCoursesResponse,
  MoodleUser,
  MoodleWsError,
} from './interfaces/moodle.interfaces';

export type MoodleParams = Record<string, string | number>;

@Injectable()
export class MoodleService {
  private readonly logger = new Logger(MoodleService.name);
  private readonly token: string;
  private readonly retryCount: number;
  private readonly retryDelayMs: number;

  constructor(
    config: ConfigService,
    @Inject(MOODLE_HTTP) private readonly http: AxiosInstance,
  ) {
    const baseUrl = config.get<string>(MOODLE_BASE_URL) ?? '';
    this.token = config.get<string>(MOODLE_TOKEN) ?? '';

    if (!baseUrl || !this.token) {
      throw new Error('Missing Moodle base URL or token (--url/--token or MOODLE_BASE_URL/MOODLE_TOKEN)');
    }

    this.retryCount = Math.max(1, config.get<number>(MOODLE_RETRY_COUNT) ?? 3);
    this.retryDelayMs = config.get<number>(MOODLE_RETRY_DELAY_MS) ?? 1500;
  }

  /**
   * Llama a cualquier wsfunction de Moodle REST (formato JSON) con reintentos.
   * Token y función van en el query string, los parámetros en el body.
   */
  async call<T>(wsfunction: string, params: MoodleParams = {}): Promise<T> {
    const body = new URLSearchParams(
      Object.entries(params).map(([k, v]): [string, string] => [k, String(v)]),
    );

    for (let attempt = 1; ; attempt++) {
      try {
        const { data } = await this.http.post<T | MoodleWsError>(MOODLE_REST_PATH, body, {
          params: {
            wstoken: this.token,
            wsfunction,
            moodlewsrestformat: 'json',
          },
        });

        // Si Moodle retorna error del WS, viene como {exception, errorcode,...}
        if (isMoodleWsError(data)) {
          throw new MoodleWsException(data);
        }
        return data;
      } catch (err) {
        if (attempt >= this.retryCount) throw err;
        this.logger.warn(
          `${wsfunction} failed (attempt ${attempt}/${this.retryCount}): ${describeError(err)}`,
        );
        await sleep(this.retryDelayMs * attempt);
      }
    }
  }

  // core_course_get_courses_by_field (todos los cursos)
  async getCourses(filter?: string[]): Promise<MoodleCourse[]> {
    const data = await this.call<MoodleCoursesResponse>('core_course_get_courses_by_field');
    const courses = data?.courses ?? [];
    if (!filter || filter.length === 0) return courses;

    const wanted = new Set(filter.map((entry) => entry.toLowerCase()));
    return courses.filter(
      (c) => wanted.has(String(c.id)) || wanted.has((c.fullname ?? '').toLowerCase()),
    );
  }

  // core_course_get_courses_by_field (field=id)
  async getCourseById(courseId: number): Promise<MoodleCourse[]> {
    const data = await this.call<MoodleCoursesResponse>('core_course_get_courses_by_field', {
      field: 'id',
      value: courseId,
    });
    return data?.courses ?? [];
  }

  // core_enrol_get_enrolled_users
  async getEnrolledUsers(courseId: number): Promise<MoodleUser[]> {
    const data = await this.call<MoodleUser[]>('core_enrol_get_enrolled_users', {
      courseid: courseId,
    });
    return Array.isArray(data) ? data : [];
  }

  /** core_course_get_contents → actividades visibles, en el orden del curso */
  async getCourseActivities(courseId: number): Promise<Map<number, CourseActivity>> {
    const sections = await this.call<MoodleCourseSection[]>('core_course_get_contents', {
      courseid: courseId,
    });

    const activities = new Map<number, CourseActivity>();
    for (const section of Array.isArray(sections) ? sections : []) {
      for (const mod of section.modules ?? []) {
        if (mod.uservisible === false || mod.deletioninprogress === true) continue;
        activities.set(mod.id, { name: mod.name, type: mod.modname });
      }
    }
    return activities;
  }

  /**
   * core_completion_get_course_completion_status.
   * Nunca lanza: un fallo se reporta como N/A, distinto de "Incomplete".
   */
  async getCourseCompletion(courseId: number, userId: number): Promise<CourseCompletion> {
    try {
      const data = await this.call<MoodleCourseCompletionResponse>(
        'core_completion_get_course_completion_status',
        { courseid: courseId, userid: userId },
      );
      if (data?.completionstatus) {
        return data.completionstatus.completed
          ? { percentage: 100, label: 'Completed' }
          : { percentage: 0, label: 'Incomplete' };
      }
    } catch (err) {
      this.logger.debug(
        `Course completion unavailable | course=${courseId} user=${userId}: ${describeError(err)}`,
      );
    }
    return { percentage: 0, label: 'N/A' };
  }

  // core_completion_get_activities_completion_status (fallo → mapa vacío)
  async getActivitiesCompletion(
    courseId: number,
    userId: number,
  ): Promise<Map<number, ActivityCompletionLabel>> {
    const out = new Map<number, ActivityCompletionLabel>();
    try {
      const data = await this.call<MoodleActivitiesCompletionResponse>(
        'core_completion_get_activities_completion_status',
        { courseid: courseId, userid: userId },
      );
      for (const s of data?.statuses ?? []) {
        out.set(s.cmid, activityLabel(s.state));
      }
    } catch (err) {
      this.logger.debug(
        `Activity completion unavailable | course=${courseId} user=${userId}: ${describeError(err)}`,
      );
    }
    return out;
  }
}

export function activityLabel(state: number | undefined): ActivityCompletionLabel {
  if (state === 1 || state === 2) return 'Completed';
  if (state === 3) return 'Failed';
  return 'Incomplete';
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
