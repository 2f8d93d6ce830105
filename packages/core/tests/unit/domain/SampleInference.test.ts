import { describe, it, expect } from 'vitest';
import { fromSamples } from '../../../src/domain/services/SampleInference.js';
import { SchemaDefinitionError } from '../../../src/domain/errors/SchemaErrors.js';

describe('fromSamples', () => {
  it('should merge integer and float observations into Float', () => {
    const schema = fromSamples([{ price: 10 }, { price: 12.5 }]);
    expect(schema.toString()).toBe('Hash{price: Float}');
  });

  it('should fall back to String when kinds disagree', () => {
    expect(fromSamples([{ code: 1 }, { code: 'A1' }]).toString()).toBe('Hash{code: String}');
  });

  it('should mark keys missing or absent in some records as optional', () => {
    const schema = fromSamples([
      { id: 1, nick: 'a', note: 'x' },
      { id: 2, note: null },
    ]);
    expect(schema.toString()).toBe('Hash{id: Integer, nick: Optional[String], note: Optional[String]}');
  });

  it('should type keys that are always absent as optional strings', () => {
    expect(fromSamples([{ gone: null }]).toString()).toBe('Hash{gone: Optional[String]}');
  });

  it('should merge nested objects field by field', () => {
    const schema = fromSamples([
      { address: { city: 'Lyon', zip: 69001 } },
      { address: { city: 'Nice' } },
    ]);
    expect(schema.toString()).toBe('Hash{address: Hash{city: String, zip: Optional[Integer]}}');
  });

  it('should merge array items across records', () => {
    expect(fromSamples([{ n: [1, 2] }, { n: [2.5] }, { n: [] }]).toString()).toBe('Hash{n: Array[Float]}');
  });

  it('should detect formats only when every string matches', () => {
    const schema = fromSamples([
      { id: '123e4567-e89b-12d3-a456-426614174000', email: 'a@example.com', day: '2024-01-31', at: '2024-01-31T10:00:00Z' },
      { id: '123e4567-e89b-42d3-a456-426614174001', email: 'b@example.com', day: '2024-02-29', at: 'soon' },
    ]);
    expect(schema.toString().startsWith('Hash{id: UUID(')).toBe(true);
    expect(Object.entries(schema.fields).map(([name, type]) => [name, type.kind])).toEqual([
      ['id', 'uuid'],
      ['email', 'email'],
      ['day', 'date'],
      ['at', 'string'],
    ]);
  });

  it('should leave strings alone when format detection is off', () => {
    const schema = fromSamples([{ email: 'a@example.com' }], { detectFormats: false });
    expect(schema.fields['email']?.kind).toBe('string');
  });

  it('should analyse at most maxRecords records', () => {
    const schema = fromSamples([{ a: 1 }, { a: 'x' }], { maxRecords: 1 });
    expect(schema.toString()).toBe('Hash{a: Integer}');
  });

  it('should apply only and except to top-level fields', () => {
    const schema = fromSamples([{ a: 1, b: 2, c: 3 }], { except: ['b'] });
    expect(Object.keys(schema.fields)).toEqual(['a', 'c']);
  });

  it('should return an empty hash for no records', () => {
    expect(fromSamples([]).toString()).toBe('Hash');
  });

  it('should reject samples that are not plain objects', () => {
    expect(() => fromSamples([{ a: 1 }, [1]])).toThrow(SchemaDefinitionError);
    expect(() => fromSamples([{ a: 1 }, [1]])).toThrow('Sample at index 1 must be a plain object, got array');
  });
});
