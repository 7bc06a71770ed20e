import { UTCDate } from '@date-fns/utc';
import { isValid, parse } from 'date-fns';
import { LocalDateTime } from '../models/Models';

/**
 * A recognised timestamp shape.
 * `pattern` locates the token; its first capture group (or the whole match)
 * is what `format` parses. Weekdays and zones stay outside the group.
 */
interface DateTimeFormat {
  pattern: RegExp;
  format: string;
}

/** Ordered: longer shapes come before their own prefixes. */
const DATETIME_FORMATS: readonly DateTimeFormat[] = [
  { pattern: /^\d+-[A-S][a-y]{2}-\d{4} \d+:\d{2}:\d{2}/, format: 'dd-MMM-yyyy HH:mm:ss' },
  { pattern: /^\d+-[A-S][a-y]{2}-\d{4} \d+:\d{2}/, format: 'dd-MMM-yyyy HH:mm' },
  { pattern: /^\d{4}-\d+-\d+ \d+:\d{2}:\d{2}/, format: 'yyyy-MM-dd HH:mm:ss' },
  {
    pattern: /^(\d{4}-\d+-\d+T\d+:\d{2}:\d{2})(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})/,
    format: "yyyy-MM-dd'T'HH:mm:ss",
  },
  { pattern: /^\d{4}-\d+-\d+ \d+:\d{2}/, format: 'yyyy-MM-dd HH:mm' },
  { pattern: /^\d{4}-[A-S][a-y]{2}-\d+ \d+:\d{2}:\d{2}/, format: 'yyyy-MMM-dd HH:mm:ss' },
  { pattern: /^\d{4}-[A-S][a-y]{2}-\d+ \d+:\d{2}/, format: 'yyyy-MMM-dd HH:mm' },
  {
    pattern: /^[F-W][a-u]{2} ([A-S][a-y]{2} +\d+ \d{2}:\d{2}:\d{2} \d{4})/,
    format: 'MMM dd HH:mm:ss yyyy',
  },
  {
    pattern: /^[F-W][a-u]{2}, (\d+ [A-S][a-y]{2} \d{4} \d{2}:\d{2}:\d{2}) \S+/,
    format: 'dd MMM yyyy HH:mm:ss',
  },
  { pattern: /^\d{4}-\d+-\d+/, format: 'yyyy-MM-dd' },
  { pattern: /^(\d+\/\d+\/\d{4} \d{2}:\d{2}:\d{2}) [+-]\d{4}/, format: 'dd/MM/yyyy HH:mm:ss' },
  { pattern: /^\d{2} [A-S][a-y]{2} \d{4}/, format: 'dd MMM yyyy' },
];

/**
 * Only y/M/d-bearing formats are listed, so the reference never leaks in.
 * A UTC reference makes `parse` build UTC dates, which have no DST gaps.
 */
const REFERENCE_DATE = new UTCDate(2000, 0, 1);

/**
 * Parses a whole string (surrounding whitespace allowed) as a timestamp.
 *
 * @returns The printed calendar fields, or `null` if no known format matches.
 */
export function parseDateTime(text: string): LocalDateTime | null {
  const value = text.trim();
  const match = matchDateTime(value);
  return match && match.length === value.length ? match.value : null;
}

/**
 * Reads a timestamp from the start of `line`.
 *
 * @returns The timestamp and the text after it, or `null` on a miss.
 */
export function readDateTime(line: string): { modified: LocalDateTime; rest: string } | null {
  const match = matchDateTime(line);
  return match ? { modified: match.value, rest: line.slice(match.length) } : null;
}

/** Interprets the calendar fields as UTC and returns epoch seconds. */
export function toEpochSeconds(value: LocalDateTime): number {
  return Date.UTC(
    value.year,
    value.month - 1,
    value.day,
    value.hour,
    value.minute,
    value.second,
  ) / 1000;
}

/** Calendar fields of a Unix timestamp, read in UTC. */
export function fromEpochSeconds(seconds: number): LocalDateTime {
  return toFields(new UTCDate(seconds * 1000));
}

/** `Date` whose getters return the same calendar fields in any time zone, for formatting. */
export function toCalendarDate(value: LocalDateTime): UTCDate {
  return new UTCDate(value.year, value.month - 1, value.day, value.hour, value.minute, value.second);
}

function matchDateTime(text: string): { value: LocalDateTime; length: number } | null {
  for (const { pattern, format } of DATETIME_FORMATS) {
    const match = pattern.exec(text);
    if (!match) {continue;}

    const token = (match[1] ?? match[0]).replace(/\s+/g, ' ');
    const value = toLocalDateTime(token, format);
    if (value) {return { value, length: match[0].length };}
  }
  return null;
}

function toLocalDateTime(token: string, format: string): LocalDateTime | null {
  const date = parse(token, format, REFERENCE_DATE);
  return isValid(date) ? toFields(date) : null;
}

function toFields(date: Date): LocalDateTime {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
  };
}
