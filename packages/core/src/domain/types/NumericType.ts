import type { JsonSchema } from '../model/JsonSchema.js';
import type { ValidationIssue } from '../model/ValidationResult.js';
import { issue } from '../model/ValidationResult.js';
import type { BaseConstraints, TypeMetadata } from './BaseType.js';
import { BaseType } from './BaseType.js';
import { assertFinite, assertOrdered, assertPositive } from './constraints.js';

export interface NumericConstraints extends BaseConstraints {
  readonly minimum?: number;
  readonly maximum?: number;
  readonly exclusiveMinimum?: number;
  readonly exclusiveMaximum?: number;
  readonly multipleOf?: number;
}

export type NumericOptions = Omit<NumericConstraints, 'optional'>;

const MULTIPLE_OF_TOLERANCE = 1e-9;

/** Range and divisibility checks shared by Integer and Float. */
export abstract class NumericType extends BaseType<number, NumericConstraints> {
  protected constructor(typeName: string, constraints: NumericConstraints, metadata?: TypeMetadata) {
    assertFinite(typeName, 'minimum', constraints.minimum);
    assertFinite(typeName, 'maximum', constraints.maximum);
    assertFinite(typeName, 'exclusiveMinimum', constraints.exclusiveMinimum);
    assertFinite(typeName, 'exclusiveMaximum', constraints.exclusiveMaximum);
    assertPositive(typeName, 'multipleOf', constraints.multipleOf);
    assertOrdered(typeName, ['minimum', constraints.minimum], ['maximum', constraints.maximum]);
    super(constraints, metadata);
  }

  protected override validateConstraints(value: unknown): ValidationIssue[] {
    if (typeof value !== 'number' || !Number.isFinite(value)) return [];

    const { minimum, maximum, exclusiveMinimum, exclusiveMaximum, multipleOf } = this.constraints;
    const issues: ValidationIssue[] = [];

    if (minimum !== undefined && value < minimum) {
      issues.push(issue('RANGE', `Value ${value} is below minimum ${minimum}`));
    }
    if (maximum !== undefined && value > maximum) {
      issues.push(issue('RANGE', `Value ${value} exceeds maximum ${maximum}`));
    }
    if (exclusiveMinimum !== undefined && value <= exclusiveMinimum) {
      issues.push(issue('RANGE', `Value ${value} must be greater than ${exclusiveMinimum}`));
    }
    if (exclusiveMaximum !== undefined && value >= exclusiveMaximum) {
      issues.push(issue('RANGE', `Value ${value} must be less than ${exclusiveMaximum}`));
    }
    if (multipleOf !== undefined && !isMultipleOf(value, multipleOf)) {
      issues.push(issue('MULTIPLE_OF', `Value ${value} is not a multiple of ${multipleOf}`));
    }
    return issues;
  }

  protected override applyConstraintsToSchema(schema: JsonSchema): void {
    const { minimum, maximum, exclusiveMinimum, exclusiveMaximum, multipleOf } = this.constraints;
    if (minimum !== undefined) schema.minimum = minimum;
    if (maximum !== undefined) schema.maximum = maximum;
    if (exclusiveMinimum !== undefined) schema.exclusiveMinimum = exclusiveMinimum;
    if (exclusiveMaximum !== undefined) schema.exclusiveMaximum = exclusiveMaximum;
    if (multipleOf !== undefined) schema.multipleOf = multipleOf;
  }
}

function isMultipleOf(value: number, divisor: number): boolean {
  const quotient = value / divisor;
  return Math.abs(quotient - Math.round(quotient)) < MULTIPLE_OF_TOLERANCE;
}
