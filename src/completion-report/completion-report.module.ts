import { Module } from '@nestjs/common';
import { MoodleModule } from '../moodle/moodle.module';
import { CompletionReportService } from './completion-report.service';
import { CourseAggregatorService } from './course-aggregator.service';
import { WorkbookService } from './workbook.service';

@Module({
  imports: [MoodleModule],
  providers: [CompletionReportService, CourseAggregatorService, WorkbookService],
  exports: [CompletionReportService],
})
export class CompletionReportModule {}
