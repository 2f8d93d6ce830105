/** JSON type names emitted by schema types. */
export type JsonSchemaType = 'string' | 'integer' | 'number' | 'boolean' | 'object' | 'array';

/**
 * JSON Schema fragment (the subset this library emits), directly embeddable
 * into an OpenAPI document.
 */
export interface JsonSchema {
  type: JsonSchemaType;
  format?: string;
  description?: string;
  example?: unknown;

  // String constraints
  minLength?: number;
  maxLength?: number;
  pattern?: string;

  // Number constraints
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  exclusiveMaximum?: number;
  multipleOf?: number;

  // Array constraints
  items?: JsonSchema;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;

  // Object constraints
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
}
