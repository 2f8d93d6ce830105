import { describe, it, expect } from 'vitest';
import { Types } from '../../../src/domain/types/Types.js';
import { StringType } from '../../../src/domain/types/StringType.js';
import { CoercionError } from '../../../src/domain/errors/CoercionError.js';
import { SchemaDefinitionError } from '../../../src/domain/errors/SchemaErrors.js';
import { ValidationError } from '../../../src/domain/errors/ValidationError.js';

describe('StringType', () => {
  describe('validate', () => {
    const name = Types.string({ minLength: 3, maxLength: 5 });

    it('should accept a string within the length bounds', () => {
      const result = name.validate('abcd');
      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.valueErrors).toEqual([]);
    });

    it('should report a string below the minimum length', () => {
      const result = name.validate('ab');
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['String length 2 is below minimum 3']);
      expect(result.issues[0]!.code).toBe('LENGTH');
    });

    it('should report a string above the maximum length', () => {
      expect(name.validate('abcdef').errors).toEqual(['String length 6 exceeds maximum 5']);
    });

    it('should count characters rather than UTF-16 code units', () => {
      expect(Types.string({ maxLength: 2 }).validate('😀😀').valid).toBe(true);
    });

    it('should report a type mismatch without failing the constraint phase', () => {
      const result = name.validate(42);
      expect(result.errors).toEqual(['Expected string, got integer']);
      expect(result.issues[0]!.code).toBe('TYPE_MISMATCH');
    });

    it('should require a value unless optional', () => {
      const result = name.validate(null);
      expect(result.errors).toEqual(['Value is required but got null']);
      expect(result.issues[0]!.code).toBe('REQUIRED');
      expect(name.validate(undefined).errors).toEqual(['Value is required but got undefined']);
    });

    it('should wrap all messages in a single ValidationError', () => {
      const result = name.validate('ab');
      expect(result.valueErrors).toHaveLength(1);
      const error = result.valueErrors[0]!;
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.errors).toEqual(['String length 2 is below minimum 3']);
      expect(error.message).toBe(
        "Validation failed for value 'ab' against type String(minLength: 3, maxLength: 5):\n" +
          '  - String length 2 is below minimum 3',
      );
    });

    it('should report a pattern mismatch', () => {
      const slug = Types.string({ pattern: /^[a-z]+$/ });
      const result = slug.validate('Abc');
      expect(result.errors).toEqual(["String 'Abc' does not match pattern /^[a-z]+$/"]);
      expect(result.issues[0]!.code).toBe('PATTERN_MISMATCH');
    });

    it('should give the same answer on repeated calls with a global pattern', () => {
      const letters = Types.string({ pattern: /a/g });
      expect(letters.validate('a').valid).toBe(true);
      expect(letters.validate('a').valid).toBe(true);
    });

    it('should report every failing constraint at once', () => {
      const code = Types.string({ minLength: 4, pattern: /^\d+$/ });
      expect(code.validate('ab').errors).toEqual([
        'String length 2 is below minimum 4',
        "String 'ab' does not match pattern /^\\d+$/",
      ]);
    });
  });

  describe('formats', () => {
    it('should check the email format', () => {
      const result = Types.string({ format: 'email' }).validate('nope');
      expect(result.errors).toEqual(['Invalid email format']);
      expect(result.issues[0]!.code).toBe('FORMAT_MISMATCH');
    });

    it('should check URIs', () => {
      const uri = Types.string({ format: 'uri' });
      expect(uri.validate('https://example.com/path').valid).toBe(true);
      expect(uri.validate('not a url').errors).toEqual(['Invalid URI format']);
    });

    it('should check IPv4 and IPv6 addresses', () => {
      expect(Types.string({ format: 'ipv4' }).validate('192.168.0.1').valid).toBe(true);
      expect(Types.string({ format: 'ipv4' }).validate('256.1.1.1').errors).toEqual(['Invalid IPv4 format']);
      expect(Types.string({ format: 'ipv6' }).validate('::1').valid).toBe(true);
      expect(Types.string({ format: 'ipv6' }).validate('12345::').errors).toEqual(['Invalid IPv6 format']);
    });

    it('should check date strings', () => {
      expect(Types.string({ format: 'date' }).validate('2024-02-29').valid).toBe(true);
      expect(Types.string({ format: 'date' }).validate('2023-02-29').errors).toEqual(['Invalid date format']);
    });
  });

  describe('coerce', () => {
    const text = Types.string();

    it('should pass strings through', () => {
      expect(text.coerce('hello')).toBe('hello');
    });

    it('should stringify numbers and booleans', () => {
      expect(text.coerce(42)).toBe('42');
      expect(text.coerce(1.5)).toBe('1.5');
      expect(text.coerce(true)).toBe('true');
      expect(text.coerce(10n)).toBe('10');
    });

    it('should use the description of a symbol', () => {
      expect(text.coerce(Symbol('tag'))).toBe('tag');
    });

    it('should render dates in ISO form', () => {
      expect(text.coerce(new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00.000Z');
    });

    it('should use an object’s own toString', () => {
      expect(text.coerce({ toString: () => 'custom' })).toBe('custom');
    });

    it('should reject objects without a string form', () => {
      expect(() => text.coerce({})).toThrow(CoercionError);
      expect(() => text.coerce({})).toThrow('Cannot coerce {} to String: Value has no string representation');
    });

    it('should reject objects without a prototype', () => {
      const bare: unknown = Object.create(null);

      expect(() => text.coerce(bare)).toThrow(CoercionError);
      expect(() => text.coerce(bare)).toThrow(
        'Cannot coerce [Object: null prototype] {} to String: Value has no string representation',
      );
    });

    it('should raise a CoercionError when toString throws', () => {
      const failure = new Error('no text');
      const broken = {
        toString(): string {
          throw failure;
        },
      };

      let caught: unknown;
      try {
        text.coerce(broken);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(CoercionError);
      expect(caught instanceof CoercionError ? caught.cause : undefined).toBe(failure);
    });

    it('should reject absent values', () => {
      expect(() => text.coerce(null)).toThrow('Cannot coerce null to String: Required value cannot be null');
    });
  });

  describe('construction', () => {
    it('should reject negative lengths', () => {
      expect(() => Types.string({ minLength: -1 })).toThrow(SchemaDefinitionError);
      expect(() => Types.string({ minLength: -1 })).toThrow('String minLength must be a non-negative integer, got -1');
    });

    it('should reject inverted bounds', () => {
      expect(() => Types.string({ minLength: 5, maxLength: 2 })).toThrow(
        'String minLength (5) cannot exceed maxLength (2)',
      );
    });
  });

  describe('metadata and rendering', () => {
    it('should emit constraint keywords and annotations', () => {
      const schema = Types.string({ minLength: 1, maxLength: 10, pattern: /^a/ }).describe('Name').toJsonSchema();
      expect(schema).toEqual({ type: 'string', description: 'Name', minLength: 1, maxLength: 10, pattern: '^a' });
    });

    it('should emit a minimum of zero', () => {
      expect(Types.string({ minLength: 0 }).toJsonSchema()).toEqual({ type: 'string', minLength: 0 });
    });

    it('should return a new instance when annotated', () => {
      const base = Types.string();
      const described = base.describe('A name').example('Ana');
      expect(described).toBeInstanceOf(StringType);
      expect(described).not.toBe(base);
      expect(base.metadata).toEqual({});
      expect(described.metadata).toEqual({ description: 'A name', example: 'Ana' });
    });

    it('should render its constraints', () => {
      expect(Types.string().toString()).toBe('String');
      expect(Types.string({ minLength: 1 }).toString()).toBe('String(minLength: 1)');
      expect(Types.email().toString()).toBe('Email');
      expect(Types.uuid({ maxLength: 36 }).toString()).toBe('UUID(maxLength: 36)');
    });

    it('should freeze constraints', () => {
      expect(Object.isFrozen(Types.string({ minLength: 1 }).constraints)).toBe(true);
    });
  });
});

describe('EmailType', () => {
  const email = Types.email();

  it('should accept a well-formed address', () => {
    expect(email.validate('user@example.com').valid).toBe(true);
  });

  it('should report a malformed address once, as a type mismatch, with no separate pattern error', () => {
    const result = email.validate('not-an-email');
    expect(result.errors).toEqual(['Invalid email format']);
    expect(result.issues[0]!.code).toBe('TYPE_MISMATCH');
  });

  it('should report non-strings as such', () => {
    expect(email.validate(42).errors).toEqual(['Expected string, got integer']);
  });

  it('should keep length constraints', () => {
    expect(Types.email({ maxLength: 10 }).validate('someone@example.com').errors).toEqual([
      'String length 19 exceeds maximum 10',
    ]);
  });

  it('should emit its pattern and format', () => {
    expect(email.toJsonSchema()).toEqual({
      type: 'string',
      pattern: '^[\\w+\\-.]+@[a-z\\d-]+(\\.[a-z\\d-]+)*\\.[a-z]+$',
      format: 'email',
    });
  });
});

describe('UuidType', () => {
  const uuid = Types.uuid();

  it('should accept a version 1 UUID', () => {
    expect(uuid.validate('123e4567-e89b-12d3-a456-426614174000').valid).toBe(true);
  });

  it('should report a malformed identifier once, as a type mismatch, with no separate pattern error', () => {
    const result = uuid.validate('not-a-uuid');
    expect(result.errors).toEqual(['Invalid UUID format']);
    expect(result.issues[0]!.code).toBe('TYPE_MISMATCH');
  });

  it('should emit the uuid format', () => {
    expect(uuid.toJsonSchema().format).toBe('uuid');
  });
});
