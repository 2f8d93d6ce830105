import { SchemaDefinitionError } from '../errors/SchemaErrors.js';

// Construction-time checks. A schema that passes them never throws from validate().

export function assertCount(typeName: string, name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < 0) {
    throw new SchemaDefinitionError(`${typeName} ${name} must be a non-negative integer, got ${value}`);
  }
}

export function assertFinite(typeName: string, name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isFinite(value)) {
    throw new SchemaDefinitionError(`${typeName} ${name} must be a finite number, got ${value}`);
  }
}

export function assertPositive(typeName: string, name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value <= 0) {
    throw new SchemaDefinitionError(`${typeName} ${name} must be a positive number, got ${value}`);
  }
}

export function assertOrdered(
  typeName: string,
  lower: readonly [string, number | undefined],
  upper: readonly [string, number | undefined],
): void {
  const [lowerName, lowerValue] = lower;
  const [upperName, upperValue] = upper;
  if (lowerValue !== undefined && upperValue !== undefined && lowerValue > upperValue) {
    throw new SchemaDefinitionError(
      `${typeName} ${lowerName} (${lowerValue}) cannot exceed ${upperName} (${upperValue})`,
    );
  }
}

/** Drop the `g` and `y` flags so `test()` keeps no state between calls. */
export function statelessPattern(pattern: RegExp | undefined): RegExp | undefined {
  if (pattern === undefined || (!pattern.global && !pattern.sticky)) return pattern;
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}
