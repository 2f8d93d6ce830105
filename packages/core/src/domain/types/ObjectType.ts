import type { SchemaType, TypeMetadata } from './BaseType.js';
import { OptionalType } from './OptionalType.js';
import type { FieldMap } from './StructType.js';
import { StructType } from './StructType.js';

export interface FieldOptions extends TypeMetadata {
  /** Defaults to `true`; `false` wraps the field type in Optional. */
  readonly required?: boolean;
}

/**
 * Closed record built field by field.
 *
 * Undeclared keys are dropped by `coerce` and the JSON Schema says
 * `additionalProperties: false`; validation does not reject them.
 * Every `field*` call returns a new ObjectType.
 */
export class ObjectType extends StructType {
  readonly kind = 'object' as const;
  readonly typeName = 'Object';

  constructor(fields: FieldMap = {}, metadata?: TypeMetadata) {
    super(fields, { additionalProperties: false }, metadata);
  }

  withMetadata(metadata: TypeMetadata): ObjectType {
    return new ObjectType(this.fields, this.mergeMetadata(metadata));
  }

  field(name: string, type: SchemaType, options: FieldOptions = {}): ObjectType {
    const { required = true, ...metadata } = options;
    let fieldType: SchemaType = required ? type : new OptionalType(type);
    if (Object.keys(metadata).length > 0) fieldType = fieldType.withMetadata(metadata);
    return new ObjectType({ ...this.fields, [name]: fieldType }, this.metadata);
  }

  requiredField(name: string, type: SchemaType, metadata: TypeMetadata = {}): ObjectType {
    return this.field(name, type, { ...metadata, required: true });
  }

  optionalField(name: string, type: SchemaType, metadata: TypeMetadata = {}): ObjectType {
    return this.field(name, type, { ...metadata, required: false });
  }

  protected override keepsUnknownFields(): boolean {
    return false;
  }
}

/** Mutable collector handed to `Types.object()` callbacks. */
export class ObjectBuilder {
  private current = new ObjectType();

  field(name: string, type: SchemaType, options?: FieldOptions): this {
    this.current = this.current.field(name, type, options);
    return this;
  }

  requiredField(name: string, type: SchemaType, metadata?: TypeMetadata): this {
    this.current = this.current.requiredField(name, type, metadata);
    return this;
  }

  optionalField(name: string, type: SchemaType, metadata?: TypeMetadata): this {
    this.current = this.current.optionalField(name, type, metadata);
    return this;
  }

  build(): ObjectType {
    return this.current;
  }
}
