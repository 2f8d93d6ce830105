import type { ValidationIssue } from '../model/ValidationResult.js';
import { issue } from '../model/ValidationResult.js';
import { UUID_PATTERN } from '../services/formats.js';
import type { TypeMetadata } from './BaseType.js';
import type { StringOptions } from './StringLikeType.js';
import { StringLikeType } from './StringLikeType.js';

export type UuidOptions = Pick<StringOptions, 'minLength' | 'maxLength'>;

/** An RFC 4122 UUID string, versions 1 to 5. */
export class UuidType extends StringLikeType {
  readonly kind = 'uuid' as const;
  readonly typeName = 'UUID';

  constructor(options: UuidOptions = {}, metadata?: TypeMetadata) {
    super(
      { minLength: options.minLength, maxLength: options.maxLength, pattern: UUID_PATTERN, format: 'uuid' },
      metadata,
    );
  }

  withMetadata(metadata: TypeMetadata): UuidType {
    return new UuidType(this.constraints, this.mergeMetadata(metadata));
  }

  // Pattern and format are implied by the type name.
  protected override formatConstraints(): string {
    const { minLength, maxLength } = this.constraints;
    return super.formatConstraints({ minLength, maxLength });
  }

  protected override validateType(value: unknown): ValidationIssue[] {
    const issues = super.validateType(value);
    if (issues.length > 0 || typeof value !== 'string') return issues;
    return UUID_PATTERN.test(value) ? [] : [issue('TYPE_MISMATCH', 'Invalid UUID format')];
  }

  protected override validateConstraints(value: unknown): ValidationIssue[] {
    return typeof value === 'string' ? this.validateLength(value) : [];
  }
}
