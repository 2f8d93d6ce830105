import type { ValidationIssue } from '../model/ValidationResult.js';
import { issue } from '../model/ValidationResult.js';
import { EMAIL_PATTERN } from '../services/formats.js';
import type { TypeMetadata } from './BaseType.js';
import type { StringOptions } from './StringLikeType.js';
import { StringLikeType } from './StringLikeType.js';

export type EmailOptions = Pick<StringOptions, 'minLength' | 'maxLength'>;

/** A string that must look like an email address. */
export class EmailType extends StringLikeType {
  readonly kind = 'email' as const;
  readonly typeName = 'Email';

  constructor(options: EmailOptions = {}, metadata?: TypeMetadata) {
    super(
      { minLength: options.minLength, maxLength: options.maxLength, pattern: EMAIL_PATTERN, format: 'email' },
      metadata,
    );
  }

  withMetadata(metadata: TypeMetadata): EmailType {
    return new EmailType(this.constraints, this.mergeMetadata(metadata));
  }

  // Pattern and format are implied by the type name.
  protected override formatConstraints(): string {
    const { minLength, maxLength } = this.constraints;
    return super.formatConstraints({ minLength, maxLength });
  }

  protected override validateType(value: unknown): ValidationIssue[] {
    const issues = super.validateType(value);
    if (issues.length > 0 || typeof value !== 'string') return issues;
    return EMAIL_PATTERN.test(value) ? [] : [issue('TYPE_MISMATCH', 'Invalid email format')];
  }

  // The address pattern is reported once, as a type mismatch.
  protected override validateConstraints(value: unknown): ValidationIssue[] {
    return typeof value === 'string' ? this.validateLength(value) : [];
  }
}
