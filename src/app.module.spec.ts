import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { AppModule } from './app.module';
import { CliOptionsDto } from './cli/cli-options.dto';
import {
  MOODLE_BASE_URL,
  MOODLE_RETRY_COUNT,
  MOODLE_RETRY_DELAY_MS,
  MOODLE_TIMEOUT_MS,
  MOODLE_TOKEN,
  REPORT_OUTPUT_DIR,
  REPORT_THREADS,
} from './config/config.env';

describe('AppModule', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('layers the CLI flags over the environment without losing other settings', async () => {
    process.env.MOODLE_BASE_URL = 'https://env.lms.test';
    process.env.MOODLE_TOKEN = 'env-token';
    process.env.MOODLE_TIMEOUT_MS = '5000';
    process.env.MOODLE_RETRY_COUNT = '7';
    process.env.MOODLE_RETRY_DELAY_MS = '10';
    process.env.REPORT_THREADS = '4';
    process.env.REPORT_OUTPUT_DIR = '/tmp/reports';

    const options = new CliOptionsDto();
    options.url = 'https://lms.test';
    options.token = 'test-token';
    options.threads = 2;

    const moduleRef = await Test.createTestingModule({
      imports: [AppModule.forRoot(options)],
    }).compile();
    const config = moduleRef.get(ConfigService);

    expect(config.get(MOODLE_BASE_URL)).toBe('https://lms.test');
    expect(config.get(MOODLE_TOKEN)).toBe('test-token');
    expect(config.get(REPORT_THREADS)).toBe(2);
    expect(config.get(MOODLE_TIMEOUT_MS)).toBe(5000);
    expect(config.get(MOODLE_RETRY_COUNT)).toBe(7);
    expect(config.get(MOODLE_RETRY_DELAY_MS)).toBe(10);
    expect(config.get(REPORT_OUTPUT_DIR)).toBe('/tmp/reports');

    await moduleRef.close();
  });
});
