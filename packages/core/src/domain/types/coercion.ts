import { CoercionError } from '../errors/CoercionError.js';

/** Parse JSON text, turning syntax errors into a `CoercionError` against `targetType`. */
export function parseJsonText(text: string, targetType: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CoercionError(text, targetType, `Invalid JSON: ${detail}`, { cause: error });
  }
}

/**
 * Re-raise a nested coercion failure against the enclosing composite,
 * prefixing the child's reason with its field name or index.
 */
export function rethrowNested(error: unknown, value: unknown, targetType: string, prefix: string): never {
  if (error instanceof CoercionError) {
    throw new CoercionError(value, targetType, `${prefix}: ${error.reason ?? error.message}`, { cause: error });
  }
  throw error;
}
