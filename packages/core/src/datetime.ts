import type { Logger } from './logger';
import { LOG_SCOPE, resolveLogger } from './logger';

// Date-only, or date and time with optional fraction and zone.
const ISO_8601_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i;

const pad = (value: number): string => value.toString().padStart(2, '0');

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  // Day 0 of the following month is the last day of this one.
  return day <= new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function parseIsoDatetime(value: string): Date | undefined {
  const trimmed = value.trim();
  const match = ISO_8601_PATTERN.exec(trimmed);
  if (!match) {
    return undefined;
  }
  if (!isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
    return undefined;
  }
  const date = new Date(trimmed);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/** Renders `MM/DD/YY HH:MM:SS` in local time. */
export function formatLocalDatetime(date: Date): string {
  const month = pad(date.getMonth() + 1);
  const day = pad(date.getDate());
  const year = pad(date.getFullYear() % 100);
  const hours = pad(date.getHours());
  const minutes = pad(date.getMinutes());
  const seconds = pad(date.getSeconds());
  return `${month}/${day}/${year} ${hours}:${minutes}:${seconds}`;
}

export function formatDatetime(value: string | undefined, logger?: Logger): string | undefined {
  if (value === undefined) {
    return value;
  }
  const date = parseIsoDatetime(value);
  if (!date) {
    resolveLogger(logger).warn(`${LOG_SCOPE} could not parse datetime`, { value });
    return value;
  }
  return formatLocalDatetime(date);
}
