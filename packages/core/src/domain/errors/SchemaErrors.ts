/** Thrown at definition time for unsupported or malformed schema sources. */
export class SchemaDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaDefinitionError';
  }
}

/** Thrown by `Schema.validateOrThrow` when a value does not satisfy its type. */
export class SchemaValidationError extends Error {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Schema validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
    this.name = 'SchemaValidationError';
    this.errors = errors;
  }
}
