import { CliUsageError, parseCliArgs } from './parse-cli-args';

describe('parseCliArgs', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    delete process.env.MOODLE_BASE_URL;
    delete process.env.MOODLE_TOKEN;
    delete process.env.REPORT_THREADS;
  });

  afterAll(() => {
    process.env = saved;
  });

  const problems = (argv: string[]): string[] => {
    try {
      parseCliArgs(argv);
    } catch (err) {
      if (err instanceof CliUsageError) return err.problems;
      throw err;
    }
    return [];
  };

  it('applies defaults and strips the trailing slash of the URL', () => {
    const command = parseCliArgs(['--url', 'https://lms.test/moodle/', '--token', 'test-token']);

    expect(command).toEqual({
      help: false,
      options: expect.objectContaining({
        url: 'https://lms.test/moodle',
        token: 'test-token',
        threads: 8,
        courseid: undefined,
        courses_file: undefined,
      }),
    });
  });

  it('reads the optional filters and pool width', () => {
    const command = parseCliArgs([
      '--url=http://localhost:8080',
      '--token=test-token',
      '--threads=3',
      '--courseid=42',
      '--courses_file=courses.txt',
    ]);

    expect(command.help).toBe(false);
    if (command.help) return;
    expect(command.options.threads).toBe(3);
    expect(command.options.courseid).toBe(42);
    expect(command.options.courses_file).toBe('courses.txt');
  });

  it('falls back to the environment for URL and token', () => {
    process.env.MOODLE_BASE_URL = 'https://env.lms.test';
    process.env.MOODLE_TOKEN = 'env-token';

    const command = parseCliArgs([]);

    expect(command.help).toBe(false);
    if (command.help) return;
    expect(command.options.url).toBe('https://env.lms.test');
    expect(command.options.token).toBe('env-token');
  });

  it('returns help without validating anything else', () => {
    expect(parseCliArgs(['-h'])).toEqual({ help: true });
  });

  it('requires url and token', () => {
    expect(problems([])).toEqual(
      expect.arrayContaining(['--url is required', '--token is required']),
    );
  });

  it('rejects a non-numeric or zero pool width', () => {
    expect(problems(['--url', 'https://lms.test', '--token', 't', '--threads', 'many'])).toContain(
      '--threads must be an integer',
    );
    expect(problems(['--url', 'https://lms.test', '--token', 't', '--threads', '0'])).toEqual([
      '--threads must be at least 1',
    ]);
  });

  it('rejects unknown flags', () => {
    expect(problems(['--url', 'https://lms.test', '--token', 't', '--verbose'])).toHaveLength(1);
  });
});
