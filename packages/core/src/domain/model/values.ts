import { inspect } from 'node:util';

/** The absent value: both `null` and `undefined` count as "no value". */
export type Nil = null | undefined;

export function isNil(value: unknown): value is Nil {
  return value === null || value === undefined;
}

/** A plain object literal (prototype `Object.prototype` or `null`), not a class instance, array or Date. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * Name of the runtime shape of a value, as used in error messages.
 * Numbers are split into `integer` and `float`; class instances report their constructor name.
 */
export function typeOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'invalid date' : 'date';
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'NaN';
    if (!Number.isFinite(value)) return 'infinity';
    return Number.isInteger(value) ? 'integer' : 'float';
  }
  if (typeof value === 'object' && value !== null && !isPlainObject(value)) return constructorName(value) ?? 'object';
  return typeof value;
}

function constructorName(value: object): string | undefined {
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== 'object' || proto === null || !('constructor' in proto)) return undefined;
  const { constructor } = proto;
  return typeof constructor === 'function' && constructor.name !== '' ? constructor.name : undefined;
}

/** Single-line rendering of a value for error messages. */
export function formatValue(value: unknown): string {
  return inspect(value, { depth: 2, breakLength: Infinity, maxArrayLength: 10, maxStringLength: 200 });
}

/**
 * Deep equality check for primitives, Dates, arrays and plain objects.
 * Used for `uniqueItems`.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (typeof a !== typeof b) return false;

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, index) => deepEqual(item, b[index]));
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) return false;
    return keysA.every((key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]));
  }

  return false;
}
