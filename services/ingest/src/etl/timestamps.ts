import type { RawCellValue } from '../db/types';
import type { ParsedCell } from './cellParsers';

export const TIMESTAMP_FORMATS = [
  'iso-datetime',
  'iso-date',
  'datetime-space',
  'ymd-slash',
  'dmy-slash',
  'mdy-slash',
  'dmy-dash',
  'dmy-dot',
  'epoch-seconds',
  'epoch-millis'
] as const;

export type TimestampFormat = (typeof TIMESTAMP_FORMATS)[number];

export const DEFAULT_TIMESTAMP_FORMATS: TimestampFormat[] = [
  'iso-datetime',
  'iso-date',
  'datetime-space',
  'ymd-slash',
  'dmy-slash',
  'dmy-dash'
];

export function isTimestampFormat(value: string): value is TimestampFormat {
  return (TIMESTAMP_FORMATS as readonly string[]).includes(value);
}

type DateParts = {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
  millisecond?: number;
  offsetMinutes?: number;
};

const TIME_SUFFIX = '(?:[ T](\\d{1,2}):(\\d{2})(?::(\\d{2}))?)?';

const ISO_DATETIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_SPACE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})(?::(\d{2}))?$/;
const YMD_SLASH = new RegExp(`^(\\d{4})/(\\d{1,2})/(\\d{1,2})${TIME_SUFFIX}$`);
const DMY_SLASH = new RegExp(`^(\\d{1,2})/(\\d{1,2})/(\\d{4})${TIME_SUFFIX}$`);
const DMY_DASH = new RegExp(`^(\\d{1,2})-(\\d{1,2})-(\\d{4})${TIME_SUFFIX}$`);
const DMY_DOT = new RegExp(`^(\\d{1,2})\\.(\\d{1,2})\\.(\\d{4})${TIME_SUFFIX}$`);
const EPOCH_SECONDS = /^\d{9,10}$/;
const EPOCH_MILLIS = /^\d{12,13}$/;

function toInt(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number.parseInt(value, 10);
}

function parseOffset(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  if (value === 'Z') {
    return 0;
  }
  const sign = value.startsWith('-') ? -1 : 1;
  const digits = value.slice(1).replace(':', '');
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = Number.parseInt(digits.slice(2, 4), 10);
  return sign * (hours * 60 + minutes);
}

function fractionToMillis(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  return Number.parseInt(value.padEnd(3, '0').slice(0, 3), 10);
}

function matchParts(format: TimestampFormat, input: string): DateParts | null {
  let match: RegExpExecArray | null;
  switch (format) {
    case 'iso-datetime':
      match = ISO_DATETIME.exec(input);
      return match
        ? {
            year: Number(match[1]),
            month: Number(match[2]),
            day: Number(match[3]),
            hour: Number(match[4]),
            minute: Number(match[5]),
            second: toInt(match[6]),
            millisecond: fractionToMillis(match[7]),
            offsetMinutes: parseOffset(match[8])
          }
        : null;
    case 'iso-date':
      match = ISO_DATE.exec(input);
      return match ? { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) } : null;
    case 'datetime-space':
      match = DATETIME_SPACE.exec(input);
      return match
        ? {
            year: Number(match[1]),
            month: Number(match[2]),
            day: Number(match[3]),
            hour: Number(match[4]),
            minute: Number(match[5]),
            second: toInt(match[6])
          }
        : null;
    case 'ymd-slash':
      match = YMD_SLASH.exec(input);
      return match ? withTime({ year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) }, match) : null;
    case 'dmy-slash':
      match = DMY_SLASH.exec(input);
      return match ? withTime({ year: Number(match[3]), month: Number(match[2]), day: Number(match[1]) }, match) : null;
    case 'mdy-slash':
      match = DMY_SLASH.exec(input);
      return match ? withTime({ year: Number(match[3]), month: Number(match[1]), day: Number(match[2]) }, match) : null;
    case 'dmy-dash':
      match = DMY_DASH.exec(input);
      return match ? withTime({ year: Number(match[3]), month: Number(match[2]), day: Number(match[1]) }, match) : null;
    case 'dmy-dot':
      match = DMY_DOT.exec(input);
      return match ? withTime({ year: Number(match[3]), month: Number(match[2]), day: Number(match[1]) }, match) : null;
    case 'epoch-seconds':
    case 'epoch-millis':
      return null;
  }
}

function withTime(parts: DateParts, match: RegExpExecArray): DateParts {
  return {
    ...parts,
    hour: toInt(match[4]),
    minute: toInt(match[5]),
    second: toInt(match[6])
  };
}

function buildDate(parts: DateParts): Date | null {
  const hour = parts.hour ?? 0;
  const minute = parts.minute ?? 0;
  const second = parts.second ?? 0;
  if (parts.month < 1 || parts.month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const utc = Date.UTC(parts.year, parts.month - 1, parts.day, hour, minute, second, parts.millisecond ?? 0);
  const check = new Date(utc);
  // Rejects rollover such as 31/02.
  if (check.getUTCFullYear() !== parts.year || check.getUTCMonth() !== parts.month - 1 || check.getUTCDate() !== parts.day) {
    return null;
  }
  return new Date(utc - (parts.offsetMinutes ?? 0) * 60_000);
}

function parseEpoch(format: 'epoch-seconds' | 'epoch-millis', input: string): Date | null {
  const pattern = format === 'epoch-seconds' ? EPOCH_SECONDS : EPOCH_MILLIS;
  if (!pattern.test(input)) {
    return null;
  }
  const numeric = Number(input);
  return new Date(format === 'epoch-seconds' ? numeric * 1000 : numeric);
}

/**
 * Tries each accepted format in order. Values without an explicit offset are
 * read as UTC.
 */
export function parseTimestamp(value: RawCellValue | undefined, formats: readonly TimestampFormat[]): ParsedCell<Date> {
  const input = value?.trim() ?? '';
  if (!input) {
    return { ok: false, reason: 'timestamp is empty' };
  }

  for (const format of formats) {
    if (format === 'epoch-seconds' || format === 'epoch-millis') {
      const epoch = parseEpoch(format, input);
      if (epoch) {
        return { ok: true, value: epoch };
      }
      continue;
    }
    const parts = matchParts(format, input);
    const date = parts ? buildDate(parts) : null;
    if (date) {
      return { ok: true, value: date };
    }
  }

  return { ok: false, reason: `timestamp "${input}" does not match any accepted format` };
}
