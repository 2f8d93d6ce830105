import { isIPv6 } from 'node:net';
import { parseDateTime, parseCalendarDate } from './dates.js';

/** Named string formats understood by `Types.string({ format })`. */
export type StringFormat = 'email' | 'uri' | 'url' | 'uuid' | 'date' | 'datetime' | 'date-time' | 'ipv4' | 'ipv6';

export const EMAIL_PATTERN = /^[\w+\-.]+@[a-z\d-]+(\.[a-z\d-]+)*\.[a-z]+$/i;
export const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
export const IPV4_PATTERN = /^((25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)\.){3}(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)$/;

interface FormatRule {
  readonly label: string;
  readonly test: (value: string) => boolean;
}

function isUri(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

const FORMAT_RULES: Readonly<Record<StringFormat, FormatRule>> = {
  email: { label: 'email', test: (v) => EMAIL_PATTERN.test(v) },
  uri: { label: 'URI', test: isUri },
  url: { label: 'URL', test: isUri },
  uuid: { label: 'UUID', test: (v) => UUID_PATTERN.test(v) },
  date: { label: 'date', test: (v) => parseCalendarDate(v) !== null },
  datetime: { label: 'datetime', test: (v) => parseDateTime(v) !== null },
  'date-time': { label: 'datetime', test: (v) => parseDateTime(v) !== null },
  ipv4: { label: 'IPv4', test: (v) => IPV4_PATTERN.test(v) },
  ipv6: { label: 'IPv6', test: isIPv6 },
};

export const STRING_FORMATS: readonly StringFormat[] = Object.freeze(
  ['email', 'uri', 'url', 'uuid', 'date', 'datetime', 'date-time', 'ipv4', 'ipv6'] satisfies StringFormat[],
);

export function isStringFormat(value: unknown): value is StringFormat {
  return typeof value === 'string' && STRING_FORMATS.some((format) => format === value);
}

/** Returns the error message for a value that breaks `format`, or `null` when it conforms. */
export function checkFormat(value: string, format: StringFormat): string | null {
  const rule = FORMAT_RULES[format];
  return rule.test(value) ? null : `Invalid ${rule.label} format`;
}
