#!/usr/bin/env node
import 'reflect-metadata';
import 'dotenv/config';
import { LogLevel, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CliCommand, CliUsageError, USAGE, parseCliArgs } from './cli/parse-cli-args';
import { CompletionReportService } from './completion-report/completion-report.service';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

function logLevels(): LogLevel[] {
  const wanted = LOG_LEVELS.find((l) => l === process.env.LOG_LEVEL) ?? 'log';
  return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(wanted) + 1);
}

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    console.error(`${err.message}\n\n${USAGE}`);
    process.exitCode = 2;
    return;
  }

  if (command.help) {
    console.log(USAGE);
    return;
  }

  const { options } = command;
  const app = await NestFactory.createApplicationContext(AppModule.forRoot(options), {
    logger: logLevels(),
    abortOnError: false,
  });

  try {
    const result = await app.get(CompletionReportService).run({
      courseId: options.courseid,
      coursesFile: options.courses_file,
    });
    logger.log(
      `${result.courses} courses, ${result.consolidatedRows} consolidated rows, ${result.enrollmentRows} enrollments`,
    );
  } finally {
    await app.close();
  }
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exitCode = 1;
});
