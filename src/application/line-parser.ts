import { LineFormatError, ok, err } from '../domain/index.js';
import type { Result } from '../domain/index.js';

/**
 * Leading `YYYY-MM-DD(T| )HH:MM:SS(.fraction)?Z` prefix, then the message.
 * Docker's `timestamps` option writes exactly this shape with a
 * nanosecond fraction.
 */
const TIMESTAMP_PREFIX =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?[Zz]\s*([\s\S]*)$/;

/** CloudWatch refuses empty messages. */
export const EMPTY_MESSAGE = ' ';

export interface ParsedLine {
  readonly timestamp: number;
  readonly message: string;
  /** `'arrival'` when the line had no timestamp prefix. */
  readonly timestampSource: 'line' | 'arrival';
}

/**
 * Splits one raw line into a timestamp (epoch ms) and a message.
 *
 * A line without a timestamp prefix keeps its whole text as the message
 * and takes `receivedAt` as its timestamp. A prefix that names an
 * impossible date or time, or one before the epoch, is a LineFormatError.
 */
export function parseLogLine(
  line: string,
  receivedAt: number,
): Result<ParsedLine, LineFormatError> {
  const text = line.trim();
  const match = TIMESTAMP_PREFIX.exec(text);

  if (!match) {
    return ok({ timestamp: receivedAt, message: text || EMPTY_MESSAGE, timestampSource: 'arrival' });
  }

  const [, year, month, day, hour, minute, second, fraction, message] = match;
  const timestamp = toEpochMillis(
    Number(year),
    Number(month),
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    fraction ?? '',
  );

  if (timestamp === null) {
    return err(new LineFormatError(line, 'invalid date or time'));
  }
  if (timestamp < 0) {
    return err(new LineFormatError(line, 'timestamp before 1970-01-01'));
  }

  return ok({ timestamp, message: message || EMPTY_MESSAGE, timestampSource: 'line' });
}

/** Returns null when any component is out of range. Fraction is truncated to ms. */
function toEpochMillis(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  fraction: string,
): number | null {
  if (month < 1 || month > 12) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const millis = Number((fraction + '000').slice(0, 3));
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  // Date.UTC maps years 0-99 onto 1900-1999 and rolls day overflow into the next month.
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.getTime();
}
