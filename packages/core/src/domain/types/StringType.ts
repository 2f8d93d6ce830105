import type { TypeMetadata } from './BaseType.js';
import type { StringOptions } from './StringLikeType.js';
import { StringLikeType } from './StringLikeType.js';
import { statelessPattern } from './constraints.js';

/** Text with optional length, pattern and named-format constraints. */
export class StringType extends StringLikeType {
  readonly kind = 'string' as const;
  readonly typeName = 'String';

  constructor(options: StringOptions = {}, metadata?: TypeMetadata) {
    super({ ...options, pattern: statelessPattern(options.pattern) }, metadata);
  }

  withMetadata(metadata: TypeMetadata): StringType {
    return new StringType(this.constraints, this.mergeMetadata(metadata));
  }
}
