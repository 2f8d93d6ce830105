import type { ValidationIssue } from '../model/ValidationResult.js';
import { issue } from '../model/ValidationResult.js';
import { isPlainObject } from '../model/values.js';
import type { TypeMetadata } from './BaseType.js';
import type { FieldMap } from './StructType.js';
import { StructType } from './StructType.js';

export interface HashOptions {
  /** Allow and keep undeclared keys. Defaults to `true`. */
  readonly additionalProperties?: boolean;
}

/** Open record: declared fields are checked, other keys pass through unless forbidden. */
export class HashType extends StructType {
  readonly kind = 'hash' as const;
  readonly typeName = 'Hash';

  constructor(fields: FieldMap = {}, options: HashOptions = {}, metadata?: TypeMetadata) {
    super(fields, { additionalProperties: options.additionalProperties ?? true }, metadata);
  }

  withMetadata(metadata: TypeMetadata): HashType {
    return new HashType(this.fields, this.constraints, this.mergeMetadata(metadata));
  }

  protected override keepsUnknownFields(): boolean {
    return this.additionalProperties;
  }

  protected override validateConstraints(value: unknown): ValidationIssue[] {
    const issues = super.validateConstraints(value);
    if (this.additionalProperties || !isPlainObject(value)) return issues;

    const unexpected = Object.keys(value).filter((key) => !Object.hasOwn(this.fields, key));
    if (unexpected.length > 0) {
      issues.push(issue('UNKNOWN_FIELD', `Unexpected fields: ${unexpected.join(', ')}`));
    }
    return issues;
  }
}
