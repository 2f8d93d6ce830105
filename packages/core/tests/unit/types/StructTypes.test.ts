import { describe, it, expect } from 'vitest';
import { Types } from '../../../src/domain/types/Types.js';
import { ObjectType } from '../../../src/domain/types/ObjectType.js';
import { CoercionError } from '../../../src/domain/errors/CoercionError.js';

describe('HashType', () => {
  const user = Types.hash({
    name: Types.string({ minLength: 1 }),
    age: Types.integer({ minimum: 0 }),
  });

  describe('validate', () => {
    it('should accept a conforming record', () => {
      expect(user.validate({ name: 'Ana', age: 30 }).valid).toBe(true);
    });

    it('should report every field error in declaration order', () => {
      const result = user.validate({ name: '', age: -5 });
      expect(result.errors).toEqual([
        "Field 'name': String length 0 is below minimum 1",
        "Field 'age': Value -5 is below minimum 0",
      ]);
      expect(result.issues.map((i) => i.path)).toEqual([['name'], ['age']]);
    });

    it('should report missing required fields', () => {
      expect(user.validate({ name: 'Ana' }).errors).toEqual(["Field 'age': Value is required but got undefined"]);
    });

    it('should allow extra keys by default', () => {
      expect(user.validate({ name: 'Ana', age: 1, role: 'admin' }).valid).toBe(true);
    });

    it('should list unexpected keys when additional properties are off', () => {
      const closed = Types.hash({ a: Types.integer() }, { additionalProperties: false });
      const result = closed.validate({ a: 1, b: 2, c: 3 });
      expect(result.errors).toEqual(['Unexpected fields: b, c']);
      expect(result.issues[0]!.code).toBe('UNKNOWN_FIELD');
    });

    it('should reject values that are not plain objects', () => {
      expect(user.validate([1]).errors).toEqual(['Expected object, got array']);
      expect(user.validate(new Map()).errors).toEqual(['Expected object, got Map']);
    });

    it('should ignore inherited properties', () => {
      const hash = Types.hash({ constructor: Types.string() });
      expect(hash.validate({}).errors).toEqual(["Field 'constructor': Value is required but got undefined"]);
    });
  });

  describe('coerce', () => {
    it('should coerce each field', () => {
      expect(user.coerce({ name: 'Ana', age: '30' })).toEqual({ name: 'Ana', age: 30 });
    });

    it('should keep unknown keys when additional properties are allowed', () => {
      expect(user.coerce({ name: 'Ana', age: 1, role: 'admin' })).toEqual({ name: 'Ana', age: 1, role: 'admin' });
    });

    it('should drop unknown keys when additional properties are off', () => {
      const closed = Types.hash({ a: Types.integer() }, { additionalProperties: false });
      expect(closed.coerce({ a: '1', b: 2 })).toEqual({ a: 1 });
    });

    it('should keep an undeclared __proto__ key as an own property', () => {
      const out = user.coerce('{"name":"Ana","age":1,"__proto__":{"isAdmin":true}}');

      expect(Object.keys(out)).toEqual(['name', 'age', '__proto__']);
      expect(Object.getPrototypeOf(out)).toBe(Object.prototype);
      expect('isAdmin' in out).toBe(false);
      expect(Object.getOwnPropertyDescriptor(out, '__proto__')?.value).toEqual({ isAdmin: true });
    });

    it('should omit absent optional fields', () => {
      const profile = Types.hash({ name: Types.string(), nick: Types.optional(Types.string()) });
      const result = profile.coerce({ name: 'Ana', nick: null });
      expect(result).toEqual({ name: 'Ana' });
      expect(Object.hasOwn(result, 'nick')).toBe(false);
    });

    it('should parse JSON object strings', () => {
      expect(user.coerce('{"name":"Ana","age":"30"}')).toEqual({ name: 'Ana', age: 30 });
    });

    it('should reject JSON that is not an object', () => {
      expect(() => user.coerce('[1]')).toThrow("Cannot coerce '[1]' to Hash: JSON string did not parse to hash");
    });

    it('should reject other values', () => {
      expect(() => user.coerce(5)).toThrow('Cannot coerce 5 to Hash: Value cannot be converted to hash');
    });

    it('should name the failing field', () => {
      try {
        user.coerce({ name: 'Ana', age: 'old' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CoercionError);
        if (!(error instanceof CoercionError)) return;
        expect(error.reason).toBe("Field 'age': invalid value for integer: 'old'");
        expect(error.targetType).toBe('Hash');
      }
    });

    it('should fail on a missing required field', () => {
      expect(() => user.coerce({ name: 'Ana' })).toThrow("Field 'age': Required value cannot be undefined");
    });
  });

  describe('toJsonSchema', () => {
    const profile = Types.hash({ name: Types.string(), age: Types.optional(Types.integer()) });

    it('should list properties and only the required fields', () => {
      expect(profile.toJsonSchema()).toEqual({
        type: 'object',
        properties: { name: { type: 'string' }, age: { type: 'integer' } },
        required: ['name'],
        additionalProperties: true,
      });
    });

    it('should be deterministic', () => {
      expect(profile.toJsonSchema()).toEqual(profile.toJsonSchema());
    });

    it('should leave out properties and required for an empty hash', () => {
      expect(Types.hash().toJsonSchema()).toEqual({ type: 'object', additionalProperties: true });
    });

    it('should leave out required when every field is optional', () => {
      const schema = Types.hash({ a: Types.optional(Types.string()) }).toJsonSchema();
      expect(schema.required).toBeUndefined();
    });
  });

  it('should render its fields', () => {
    const profile = Types.hash({ name: Types.string(), age: Types.optional(Types.integer()) });
    expect(profile.toString()).toBe('Hash{name: String, age: Optional[Integer]}');
    expect(Types.hash().toString()).toBe('Hash');
  });
});

describe('ObjectType', () => {
  const account = Types.object((o) =>
    o.field('id', Types.integer()).optionalField('nick', Types.string(), { description: 'Nickname' }),
  );

  it('should build fields through the builder', () => {
    expect(account).toBeInstanceOf(ObjectType);
    expect(Object.keys(account.fields)).toEqual(['id', 'nick']);
    expect(account.fields['nick']?.isOptional()).toBe(true);
  });

  it('should emit a closed schema', () => {
    expect(account.toJsonSchema()).toEqual({
      type: 'object',
      properties: { id: { type: 'integer' }, nick: { type: 'string', description: 'Nickname' } },
      required: ['id'],
      additionalProperties: false,
    });
  });

  it('should drop unknown keys when coercing', () => {
    expect(account.coerce({ id: '7', extra: 1 })).toEqual({ id: 7 });
  });

  it('should not reject unknown keys when validating', () => {
    expect(account.validate({ id: 1, extra: 1 }).valid).toBe(true);
  });

  it('should reject JSON that is not an object', () => {
    expect(() => account.coerce('3')).toThrow("Cannot coerce '3' to Object: JSON string did not parse to object");
  });

  it('should return a new object for every field call', () => {
    const base = Types.object();
    const next = base.field('a', Types.string()).requiredField('b', Types.integer());
    expect(Object.keys(base.fields)).toEqual([]);
    expect(Object.keys(next.fields)).toEqual(['a', 'b']);
    expect(next.fields['b']?.isRequired()).toBe(true);
  });

  it('should wrap fields declared as not required', () => {
    const type = Types.object().field('note', Types.string(), { required: false });
    expect(type.fields['note']?.toString()).toBe('Optional[String]');
  });

  it('should render its fields', () => {
    expect(account.toString()).toBe('Object{id: Integer, nick: Optional[String]}');
  });
});
