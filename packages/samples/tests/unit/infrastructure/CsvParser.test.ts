import { describe, it, expect } from 'vitest';
import { CsvParser } from '../../../src/infrastructure/parsers/CsvParser.js';

describe('CsvParser', () => {
  it('should map rows to header keys with typed values', () => {
    const parser = new CsvParser();

    const records = [...parser.parse('name,age,active\nAna,30,true\nBo,41.5,false\n')];

    expect(records).toEqual([
      { name: 'Ana', age: 30, active: true },
      { name: 'Bo', age: 41.5, active: false },
    ]);
  });

  it('should keep every cell as a string without dynamic typing', () => {
    const parser = new CsvParser({ dynamicTyping: false });

    expect([...parser.parse('name,age\nAna,30')]).toEqual([{ name: 'Ana', age: '30' }]);
  });

  it('should accept a Buffer', () => {
    const parser = new CsvParser();

    expect([...parser.parse(Buffer.from('code\n7\n'))]).toEqual([{ code: 7 }]);
  });

  it('should detect the delimiter when none is configured', () => {
    const parser = new CsvParser();

    expect([...parser.parse('name;age\nAna;30\n')]).toEqual([{ name: 'Ana', age: 30 }]);
  });

  it('should honour an explicit delimiter', () => {
    const parser = new CsvParser({ delimiter: '|' });

    expect([...parser.parse('a|b\n1|x,y\n')]).toEqual([{ a: 1, b: 'x,y' }]);
  });

  it('should skip blank rows', () => {
    const parser = new CsvParser();

    expect([...parser.parse('a,b\n1,2\n,\n\n3,4\n')]).toEqual([
      { a: 1, b: 2 },
      { a: 3, b: 4 },
    ]);
  });

  it('should turn empty cells into null', () => {
    const parser = new CsvParser();

    expect([...parser.parse('a,b\n1,\n')]).toEqual([{ a: 1, b: null }]);
  });

  it('should trim header names', () => {
    const parser = new CsvParser();

    expect([...parser.parse(' id , label\n1,x\n')]).toEqual([{ id: 1, label: 'x' }]);
  });

  it('should name columns by position without a header row', () => {
    const parser = new CsvParser({ hasHeader: false });

    expect([...parser.parse('x,1\ny,2\n')]).toEqual([
      { column1: 'x', column2: 1 },
      { column1: 'y', column2: 2 },
    ]);
  });

  describe('detect()', () => {
    it('should pick the delimiter producing the most columns', () => {
      const parser = new CsvParser();

      expect(parser.detect('a\tb\tc\n1\t2\t3')).toEqual({ delimiter: '\t', encoding: 'utf-8', hasHeader: true });
    });

    it('should fall back to a comma for single-column data', () => {
      expect(new CsvParser().detect('only\n1\n').delimiter).toBe(',');
    });
  });
});
