import { MoodleWsError } from './interfaces/moodle.interfaces';

export class MoodleWsException extends Error {
  readonly exception: string;
  readonly errorcode?: string;

  constructor(payload: MoodleWsError) {
    super(`Moodle exception: ${payload.message ?? ''} | ${payload.errorcode ?? ''}`);
    this.name = 'MoodleWsException';
    this.exception = payload.exception;
    this.errorcode = payload.errorcode;
  }
}

export function isMoodleWsError(data: unknown): data is MoodleWsError {
  return (
    typeof data === 'object' &&
    data !== null &&
    'exception' in data &&
    Boolean(data.exception)
  );
}
