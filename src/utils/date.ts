import { getConfig } from '../config/env';

interface DateParts {
  year: number;
  month: number;
  day: number;
}

/**
 * The zone to render in: `timeZone` when the runtime knows it, otherwise UTC
 */
export function resolveTimeZone(timeZone?: string): string {
  const tz = timeZone || 'UTC';
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz }).format(new Date());
    return tz;
  } catch {
    console.warn(`Invalid TIMEZONE "${tz}", falling back to UTC`);
    return 'UTC';
  }
}

function getDateParts(date: Date, timeZone: string): DateParts {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });

  const parts = formatter.formatToParts(date);
  const lookup = Object.fromEntries(parts.map((part) => [part.type, part.value]));
  return {
    year: Number(lookup.year),
    month: Number(lookup.month),
    day: Number(lookup.day),
  };
}

function formatDateParts(parts: DateParts): string {
  const month = String(parts.month).padStart(2, '0');
  const day = String(parts.day).padStart(2, '0');
  return `${parts.year}-${month}-${day}`;
}

/**
 * Parse a strict YYYY-MM-DD calendar date, rejecting impossible days like 2024-02-30
 */
export function parseIsoDate(dateStr: string): string | undefined {
  const match = dateStr.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return undefined;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }
  return formatDateParts({ year, month, day });
}

export type DeadlineParseResult =
  | { valid: true; deadline: string | null }
  | { valid: false };

/**
 * Interpret a deadline argument. Absent, blank and the literal "null" mean no deadline.
 */
export function parseDeadline(input: string | null | undefined): DeadlineParseResult {
  const trimmed = (input ?? '').trim();
  if (!trimmed || trimmed.toLowerCase() === 'null') {
    return { valid: true, deadline: null };
  }
  const deadline = parseIsoDate(trimmed);
  return deadline ? { valid: true, deadline } : { valid: false };
}

export function formatDateInTimeZone(date: Date, timeZone?: string): string {
  const tz = resolveTimeZone(timeZone || getConfig().TIMEZONE);
  return formatDateParts(getDateParts(date, tz));
}

export function formatTimeInTimeZone(date: Date, timeZone?: string): string {
  const tz = resolveTimeZone(timeZone || getConfig().TIMEZONE);
  const formatter = new Intl.DateTimeFormat('en-GB', {
    timeZone: tz,
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  const lookup = Object.fromEntries(formatter.formatToParts(date).map((part) => [part.type, part.value]));
  return `${lookup.hour}:${lookup.minute}:${lookup.second}`;
}
