import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { MoodleService } from './moodle.service';
import { MOODLE_HTTP } from './moodle.constants';
import { MOODLE_BASE_URL, MOODLE_TIMEOUT_MS } from '../config/config.env';

@Module({
  providers: [
    {
      provide: MOODLE_HTTP,
      inject: [ConfigService],
      // Instancia de axios con timeout global
      useFactory: (config: ConfigService) =>
        axios.create({
          baseURL: (config.get<string>(MOODLE_BASE_URL) ?? '').replace(/\/+$/, ''),
          timeout: config.get<number>(MOODLE_TIMEOUT_MS) ?? 60000,
        }),
    },
    MoodleService,
  ],
  exports: [MoodleService],
})
export class MoodleModule {}
