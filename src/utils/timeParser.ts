import { ParseError } from '../errors';
import { type Outcome, failure, success } from '../types';

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Timezone-naive timestamp with one-second resolution.
 * Stored as seconds since 1970-01-01 00:00:00 on a UTC clock, so no
 * daylight-saving shifts ever apply to differences between two values.
 */
export class ParsedTime {
  private readonly date: Date;

  constructor(readonly epochSeconds: number) {
    this.date = new Date(epochSeconds * 1000);
  }

  /** 0-23 */
  get hour(): number {
    return this.date.getUTCHours();
  }

  /** Monday = 1 ... Sunday = 7 */
  get weekday(): number {
    const day = this.date.getUTCDay();
    return day === 0 ? 7 : day;
  }

  toString(): string {
    const pad = (n: number) => n.toString().padStart(2, '0');
    const d = this.date;
    return `${d.getUTCFullYear().toString().padStart(4, '0')}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
      `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
  }
}

export const parseTimestamp = (text: string): Outcome<ParsedTime, ParseError> => {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    return failure(new ParseError(text, 'expected YYYY-MM-DD HH:MM:SS'));
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (month < 1 || month > 12) return failure(new ParseError(text, 'month out of range'));
  if (hour > 23 || minute > 59 || second > 59) return failure(new ParseError(text, 'time out of range'));

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  // Date rolls Feb 30 over into March; a changed day means it never existed
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) {
    return failure(new ParseError(text, 'no such calendar day'));
  }

  return success(new ParsedTime(date.getTime() / 1000));
};

/** Signed `to - from` in whole seconds. */
export const durationSeconds = (from: ParsedTime, to: ParsedTime): number =>
  to.epochSeconds - from.epochSeconds;
