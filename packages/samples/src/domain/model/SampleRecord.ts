/** One parsed sample: column or key name to its (possibly typed) value. */
export type SampleRecord = Readonly<Record<string, unknown>>;

/** A record whose every value is null, undefined or an empty string. */
export function isBlankRecord(record: SampleRecord): boolean {
  return Object.values(record).every((value) => value === null || value === undefined || value === '');
}
