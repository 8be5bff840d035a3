const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export default () => ({
  moodle: {
    baseUrl: process.env.MOODLE_BASE_URL || '',
    token: process.env.MOODLE_TOKEN || '',
    timeoutMs: toInt(process.env.MOODLE_TIMEOUT_MS, 60000),
    retryCount: toInt(process.env.MOODLE_RETRY_COUNT, 3),
    retryDelayMs: toInt(process.env.MOODLE_RETRY_DELAY_MS, 1500),
  },
  report: {
    threads: toInt(process.env.REPORT_THREADS, 8),
    outputDir: process.env.REPORT_OUTPUT_DIR || '.',
  },
});

export const MOODLE_BASE_URL = 'moodle.baseUrl';
export const MOODLE_TOKEN = 'moodle.token';
export const MOODLE_TIMEOUT_MS = 'moodle.timeoutMs';
export const MOODLE_RETRY_COUNT = 'moodle.retryCount';
export const MOODLE_RETRY_DELAY_MS = 'moodle.retryDelayMs';
export const REPORT_THREADS = 'report.threads';
export const REPORT_OUTPUT_DIR = 'report.outputDir';
