import { SchemaDefinitionError } from '../errors/SchemaErrors.js';

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const ISO_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/;

const ISO_DATE_PREFIX = /^\s*(\d{4})-(\d{2})-(\d{2})/;

/**
 * Lenient date/time parse: anything `Date` understands.
 * Returns `null` for unparseable input instead of an invalid Date.
 */
export function parseDateTime(text: string): Date | null {
  const trimmed = text.trim();
  if (trimmed === '') return null;
  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Parse text as a calendar date, returned as UTC midnight of that day.
 *
 * A leading `YYYY-MM-DD` wins over any time or zone that follows it, so
 * `2024-03-05T23:30:00-05:00` is the 5th of March. Impossible dates such as
 * `2023-02-30` are rejected rather than rolled over.
 */
export function parseCalendarDate(text: string): Date | null {
  const match = ISO_DATE_PREFIX.exec(text);
  if (match) {
    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    if (!isCalendarDate(year, month, day)) return null;
    if (parseDateTime(text) === null) return null;
    return utcDate(year, month, day);
  }

  const parsed = parseDateTime(text);
  return parsed === null ? null : utcDate(parsed.getFullYear(), parsed.getMonth() + 1, parsed.getDate());
}

/** Midnight UTC of the local calendar day `date` falls on. */
export function toCalendarDate(date: Date): Date {
  return utcDate(date.getFullYear(), date.getMonth() + 1, date.getDate());
}

export function utcDate(year: number, month: number, day: number): Date {
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC maps years 0-99 onto 1900-1999.
  date.setUTCFullYear(year);
  return date;
}

export function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  return day <= daysInMonth(year, month);
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/** Tests whether text matches a compiled date format. */
export type DateFormatMatcher = (text: string) => boolean;

interface Directive {
  readonly pattern: string;
  readonly group?: 'year' | 'shortYear' | 'month' | 'day';
}

const DIRECTIVES: Readonly<Record<string, Directive>> = {
  Y: { pattern: '([+-]?\\d{4})', group: 'year' },
  y: { pattern: '(\\d{2})', group: 'shortYear' },
  m: { pattern: '(0?[1-9]|1[0-2])', group: 'month' },
  d: { pattern: '(0?[1-9]|[12]\\d|3[01])', group: 'day' },
  H: { pattern: '([01]?\\d|2[0-3])' },
  M: { pattern: '([0-5]\\d)' },
  S: { pattern: '([0-5]\\d|60)' },
  z: { pattern: '(Z|[+-]\\d{2}:?\\d{2})' },
};

/**
 * Compile a `strftime`-style format into a matcher.
 *
 * Supported directives: `%Y %y %m %d %H %M %S %z` and `%%` for a literal percent.
 * Every other character matches itself.
 *
 * @throws SchemaDefinitionError for an unknown or repeated directive
 */
export function compileDateFormat(format: string): DateFormatMatcher {
  let source = '';
  const groups: Directive['group'][] = [];
  const seen = new Set<string>();

  for (let i = 0; i < format.length; i++) {
    const char = format.charAt(i);
    if (char !== '%') {
      source += escapeRegExp(char);
      continue;
    }

    i++;
    const name = format.charAt(i);
    if (name === '%') {
      source += '%';
      continue;
    }

    const directive = DIRECTIVES[name];
    if (!directive) {
      throw new SchemaDefinitionError(`Unsupported date format directive '%${name}' in '${format}'`);
    }
    if (seen.has(name)) {
      throw new SchemaDefinitionError(`Date format directive '%${name}' appears twice in '${format}'`);
    }
    seen.add(name);
    source += directive.pattern;
    groups.push(directive.group);
  }

  const regex = new RegExp(`^${source}$`);

  return (text: string) => {
    const match = regex.exec(text);
    if (!match) return false;

    const parts: Partial<Record<NonNullable<Directive['group']>, number>> = {};
    groups.forEach((group, index) => {
      if (group) parts[group] = Number(match[index + 1]);
    });

    const year = parts.year ?? (parts.shortYear === undefined ? undefined : expandShortYear(parts.shortYear));
    if (year !== undefined && parts.month !== undefined && parts.day !== undefined) {
      return isCalendarDate(year, parts.month, parts.day);
    }
    return true;
  };
}

function expandShortYear(shortYear: number): number {
  return shortYear < 69 ? 2000 + shortYear : 1900 + shortYear;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
