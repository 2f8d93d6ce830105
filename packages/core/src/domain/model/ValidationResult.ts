import type { ValidationError } from '../errors/ValidationError.js';

/** Machine-readable codes attached to every validation issue. */
export type ValidationIssueCode =
  | 'REQUIRED'
  | 'TYPE_MISMATCH'
  | 'LENGTH'
  | 'RANGE'
  | 'MULTIPLE_OF'
  | 'PATTERN_MISMATCH'
  | 'FORMAT_MISMATCH'
  | 'ITEM_COUNT'
  | 'DUPLICATE_VALUE'
  | 'UNKNOWN_FIELD';

/** Location of a nested value: field names and array indices from the root. */
export type IssuePath = readonly (string | number)[];

/** A single validation problem. */
export interface ValidationIssue {
  /** Human-readable message, already qualified with its field/index prefixes. */
  readonly message: string;
  /** Machine-readable error code. */
  readonly code: ValidationIssueCode;
  /** Path from the validated root to the offending value. Empty for the root itself. */
  readonly path: IssuePath;
}

/** Result of validating a value against a type. */
export interface ValidationResult {
  readonly valid: boolean;
  /** Messages of every issue, in discovery order. */
  readonly errors: readonly string[];
  /** One `ValidationError` wrapping all messages when invalid; empty when valid. */
  readonly valueErrors: readonly ValidationError[];
  readonly issues: readonly ValidationIssue[];
}

export function issue(code: ValidationIssueCode, message: string): ValidationIssue {
  return { code, message, path: [] };
}

/** Re-anchor a child issue under a parent segment, prefixing its message. */
export function nestIssue(child: ValidationIssue, segment: string | number, prefix: string): ValidationIssue {
  return {
    code: child.code,
    message: `${prefix}: ${child.message}`,
    path: [segment, ...child.path],
  };
}

/** Create a passing validation result. */
export function validResult(): ValidationResult {
  return { valid: true, errors: [], valueErrors: [], issues: [] };
}

/** Create a failing validation result from issues and the error that wraps them. */
export function invalidResult(issues: readonly ValidationIssue[], error: ValidationError): ValidationResult {
  return {
    valid: false,
    errors: issues.map((i) => i.message),
    valueErrors: [error],
    issues,
  };
}

/** Return the issues carrying one of the given codes. */
export function issuesWithCode(
  result: ValidationResult,
  ...codes: readonly ValidationIssueCode[]
): readonly ValidationIssue[] {
  return result.issues.filter((i) => codes.includes(i.code));
}
