import { Injectable, Logger } from '@nestjs/common';
import { MoodleService, describeError } from '../moodle/moodle.service';
import { MoodleCourse, MoodleUser } from '../moodle/interfaces/moodle.interfaces';
import { DEFAULT_ACTIVITY_STATUS } from './completion-report.constants';
import { CourseReport, ReportRow } from './interfaces/course-report.interface';
import {
  activityColumnName,
  lastAccessStr,
  roleNames,
  userProfile,
} from './utils/user-profile.util';

@Injectable()
export class CourseAggregatorService {
  private readonly logger = new Logger(CourseAggregatorService.name);

  constructor(private readonly moodle: MoodleService) {}

  /**
   * Arma todas las filas de un curso. Los usuarios se procesan en secuencia;
   * si falla la lista de matriculados el curso queda sin filas.
   */
  async aggregate(course: MoodleCourse): Promise<CourseReport> {
    const cid = course.id;
    const cname = course.fullname ?? '';
    const cshort = course.shortname ?? '';

    this.logger.log(`Processing course: ${cname} (ID=${cid})`);

    // 1) actividades → columnas "Tipo: nombre"
    const activities = await this.moodle.getCourseActivities(cid);
    const columns = [...activities].map(([cmid, meta]): [number, string] => [
      cmid,
      activityColumnName(meta.type, meta.name),
    ]);
    const activityColumns = columns.map(([, col]) => col);

    const report: CourseReport = {
      course,
      activityColumns,
      courseRows: [],
      consolidatedRows: [],
      enrollmentRows: [],
      usersFailed: false,
    };

    // 2) matriculados
    let users: MoodleUser[];
    try {
      users = await this.moodle.getEnrolledUsers(cid);
    } catch (err) {
      this.logger.error(`Failed to get users for course ${cname}: ${describeError(err)}`);
      return { ...report, usersFailed: true };
    }

    // 3) completion por usuario
    for (const u of users) {
      const profile = userProfile(u);
      const lastAccess = lastAccessStr(u);
      const roles = roleNames(u);

      const completion = await this.moodle.getCourseCompletion(cid, u.id);
      const activityMap = await this.moodle.getActivitiesCompletion(cid, u.id);

      const courseRow: ReportRow = {
        'Course ID': cid,
        'Course Name': cname,
        'Course Shortname': cshort,
        ...profile,
        'Course Completion Status': completion.label,
        'Completion %': completion.percentage,
      };
      for (const [cmid, col] of columns) {
        courseRow[col] = activityMap.get(cmid) ?? DEFAULT_ACTIVITY_STATUS;
      }
      report.courseRows.push(courseRow);

      report.consolidatedRows.push({
        'User ID': u.id,
        'Full Name': u.fullname ?? '',
        Manager: '',
        Email: u.email ?? '',
        'Course ID': cid,
        'Course Name': cname,
        'Last Access': lastAccess,
        'Role(s)': roles,
        'Completion %': completion.percentage,
        'Course Completion Status': completion.label,
      });

      report.enrollmentRows.push({
        'User ID': u.id,
        'Full Name': u.fullname ?? '',
        Username: u.username ?? '',
        Email: u.email ?? '',
        'Course ID': cid,
        'Course Name': cname,
        'Course Shortname': cshort,
        'Role(s)': roles,
        'Last Access': lastAccess,
      });
    }

    return report;
  }
}
