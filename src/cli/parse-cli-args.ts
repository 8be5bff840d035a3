import { validateSync } from 'class-validator';
import { parseArgs } from 'util';
import { CliOptionsDto } from './cli-options.dto';

export const USAGE = `Usage: moodle-completion-report --url <base-url> --token <token> [options]

Options:
  --url <url>             Moodle base URL (required)
  --token <token>         Moodle web service token (required)
  --threads <n>           Max concurrent courses (default: 8)
  --courseid <id>         Only process this course ID
  --courses_file <path>   File with course IDs or names, one per line
  -h, --help              Show this help`;

export class CliUsageError extends Error {
  constructor(readonly problems: string[]) {
    super(problems.join('\n'));
    this.name = 'CliUsageError';
  }
}

export type CliCommand = { help: true } | { help: false; options: CliOptionsDto };

const toNumber = (value: string | undefined): number | undefined =>
  value === undefined ? undefined : Number(value);

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        url: { type: 'string' },
        token: { type: 'string' },
        threads: { type: 'string' },
        courseid: { type: 'string' },
        courses_file: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (err) {
    throw new CliUsageError([err instanceof Error ? err.message : String(err)]);
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const values = readFlags(argv);

  if (values.help) return { help: true };

  const options = new CliOptionsDto();
  options.url = (values.url ?? process.env.MOODLE_BASE_URL ?? '').replace(/\/+$/, '');
  options.token = values.token ?? process.env.MOODLE_TOKEN ?? '';
  options.threads = toNumber(values.threads ?? process.env.REPORT_THREADS) ?? 8;
  options.courseid = toNumber(values.courseid);
  options.courses_file = values.courses_file;

  const errors = validateSync(options);
  if (errors.length > 0) {
    throw new CliUsageError(
      errors.flatMap((e) => Object.values(e.constraints ?? {})),
    );
  }
  return { help: false, options };
}
