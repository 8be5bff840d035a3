import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import dayjs from 'dayjs';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { EMPTY, catchError, defer, from, lastValueFrom, mergeMap, tap, toArray } from 'rxjs';
import { REPORT_OUTPUT_DIR, REPORT_THREADS } from '../config/config.env';
import { MoodleService, describeError } from '../moodle/moodle.service';
import { MoodleCourse } from '../moodle/interfaces/moodle.interfaces';
import { reportFileName } from './completion-report.constants';
import { CourseAggregatorService } from './course-aggregator.service';
import {
  CompletionReportData,
  CourseReport,
  ReportResult,
  ReportScope,
} from './interfaces/course-report.interface';
import { WorkbookService } from './workbook.service';

@Injectable()
export class CompletionReportService {
  private readonly logger = new Logger(CompletionReportService.name);

  constructor(
    private readonly config: ConfigService,
    private readonly moodle: MoodleService,
    private readonly aggregator: CourseAggregatorService,
    private readonly workbook: WorkbookService,
  ) {}

  /** Orquesta el flujo: cursos → agregación en paralelo → libro xlsx */
  async run(scope: ReportScope = {}): Promise<ReportResult> {
    const courses = await this.resolveCourses(scope);
    const reports = await this.aggregateAll(courses);
    const data = this.assemble(reports);

    const outputDir = this.config.get<string>(REPORT_OUTPUT_DIR) ?? '.';
    const filePath = join(outputDir, reportFileName(dayjs().format('YYYYMMDD_HHmmss')));
    this.workbook.write(this.workbook.build(data), filePath);
    this.logger.log(`Report saved: ${filePath}`);

    return {
      filePath,
      courses: courses.length,
      failedCourses: courses.length - data.courseSheets.length,
      consolidatedRows: data.consolidatedRows.length,
      enrollmentRows: data.enrollmentRows.length,
    };
  }

  // Un fallo aquí no tiene recuperación: aborta la corrida
  async resolveCourses(scope: ReportScope): Promise<MoodleCourse[]> {
    if (scope.courseId) {
      const courses = await this.moodle.getCourseById(scope.courseId);
      this.logger.log(`Processing only course ID=${scope.courseId} (${courses.length} found)`);
      return courses;
    }

    const filter = scope.coursesFile ? await readCourseList(scope.coursesFile) : undefined;
    const courses = await this.moodle.getCourses(filter);
    this.logger.log(`Found ${courses.length} courses.`);
    return courses;
  }

  /**
   * Un worker por curso, como máximo `report.threads` a la vez. Los
   * resultados llegan en orden de finalización; un curso que falla se descarta.
   */
  aggregateAll(courses: MoodleCourse[]): Promise<CourseReport[]> {
    const threads = Math.max(1, this.config.get<number>(REPORT_THREADS) ?? 8);

    return lastValueFrom(
      from(courses).pipe(
        mergeMap(
          (course) =>
            defer(() => this.aggregator.aggregate(course)).pipe(
              tap((report) => {
                if (!report.usersFailed) {
                  this.logger.log(`Done: ${course.fullname} (${report.courseRows.length} user rows)`);
                }
              }),
              catchError((err: unknown) => {
                this.logger.error(`Error processing ${course.fullname}: ${describeError(err)}`);
                return EMPTY;
              }),
            ),
          threads,
        ),
        toArray(),
      ),
    );
  }

  assemble(reports: CourseReport[]): CompletionReportData {
    const data: CompletionReportData = {
      consolidatedRows: [],
      courseSheets: [],
      enrollmentRows: [],
    };

    for (const r of reports) {
      data.consolidatedRows.push(...r.consolidatedRows);
      data.enrollmentRows.push(...r.enrollmentRows);
      if (r.usersFailed) continue;
      data.courseSheets.push({
        shortname: r.course.shortname ?? `course_${r.course.id}`,
        activityColumns: r.activityColumns,
        rows: r.courseRows,
      });
    }

    data.courseSheets.sort((a, b) => {
      const x = a.shortname.toLowerCase();
      const y = b.shortname.toLowerCase();
      return x < y ? -1 : x > y ? 1 : 0;
    });
    return data;
  }
}

/** Archivo de texto: un id o nombre de curso por línea */
export async function readCourseList(path: string): Promise<string[]> {
  const content = await readFile(path, 'utf8');
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
