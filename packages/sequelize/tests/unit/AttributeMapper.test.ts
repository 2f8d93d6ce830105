import { describe, it, expect } from 'vitest';
import { DataTypes } from 'sequelize';
import { SchemaDefinitionError } from '@typeweave/core';
import { typeForAttribute } from '../../src/mappers/AttributeMapper.js';

describe('typeForAttribute', () => {
  describe('data types', () => {
    it('should map strings with their declared length', () => {
      expect(typeForAttribute('name', { type: DataTypes.STRING(20), allowNull: false }).toString()).toBe(
        'String(maxLength: 20)',
      );
      expect(typeForAttribute('bio', { type: DataTypes.TEXT, allowNull: false }).toString()).toBe('String');
      expect(typeForAttribute('code', { type: DataTypes.CHAR(3), allowNull: false }).toString()).toBe(
        'String(maxLength: 3)',
      );
    });

    it('should map raw SQL type strings', () => {
      expect(typeForAttribute('sku', { type: 'VARCHAR(12)', allowNull: false }).toString()).toBe(
        'String(maxLength: 12)',
      );
      expect(typeForAttribute('ratio', { type: 'double precision', allowNull: false }).toString()).toBe('Float');
    });

    it('should map the integer and decimal families', () => {
      for (const type of [DataTypes.INTEGER, DataTypes.BIGINT, DataTypes.SMALLINT, DataTypes.TINYINT]) {
        expect(typeForAttribute('n', { type, allowNull: false }).toString()).toBe('Integer');
      }
      for (const type of [DataTypes.FLOAT, DataTypes.DOUBLE, DataTypes.REAL, DataTypes.DECIMAL(10, 2)]) {
        expect(typeForAttribute('x', { type, allowNull: false }).toString()).toBe('Float');
      }
    });

    it('should map booleans, dates, UUIDs and JSON', () => {
      expect(typeForAttribute('a', { type: DataTypes.BOOLEAN, allowNull: false }).toString()).toBe('Boolean');
      expect(typeForAttribute('b', { type: DataTypes.DATEONLY, allowNull: false }).toString()).toBe('Date');
      expect(typeForAttribute('c', { type: DataTypes.DATE, allowNull: false }).toString()).toBe('DateTime');
      expect(typeForAttribute('d', { type: DataTypes.UUID, allowNull: false }).toString()).toBe('UUID');
      expect(typeForAttribute('e', { type: DataTypes.JSON, allowNull: false }).toString()).toBe('Hash');
      expect(typeForAttribute('f', { type: DataTypes.JSONB, allowNull: false }).toString()).toBe('Hash');
    });

    it('should map arrays to arrays of their element type', () => {
      const type = typeForAttribute('scores', { type: DataTypes.ARRAY(DataTypes.INTEGER), allowNull: false });

      expect(type.toString()).toBe('Array[Integer]');
    });

    it('should map enums to an anchored alternation', () => {
      const type = typeForAttribute('status', { type: DataTypes.ENUM('draft', 'live'), allowNull: false });

      expect(type.toString()).toBe('String(pattern: /^(?:draft|live)$/)');
      expect(type.validate('live').valid).toBe(true);
      expect(type.validate('gone').errors).toEqual(["String 'gone' does not match pattern /^(?:draft|live)$/"]);
    });

    it('should reject data types without a counterpart', () => {
      expect(() => typeForAttribute('avatar', { type: DataTypes.BLOB, allowNull: false })).toThrow(SchemaDefinitionError);
      expect(() => typeForAttribute('avatar', { type: DataTypes.BLOB, allowNull: false })).toThrow(
        "Unsupported Sequelize data type 'BLOB' for attribute 'avatar'",
      );
    });
  });

  describe('optionality', () => {
    it('should make nullable columns optional', () => {
      expect(typeForAttribute('note', { type: DataTypes.TEXT }).toString()).toBe('Optional[String]');
      expect(typeForAttribute('note', { type: DataTypes.TEXT, allowNull: true }).toString()).toBe('Optional[String]');
    });

    it('should make columns with a default or auto increment optional', () => {
      expect(
        typeForAttribute('id', { type: DataTypes.UUID, allowNull: false, defaultValue: DataTypes.UUIDV4 }).toString(),
      ).toBe('Optional[UUID]');
      expect(
        typeForAttribute('id', {
          type: DataTypes.INTEGER,
          allowNull: false,
          primaryKey: true,
          autoIncrement: true,
        }).toString(),
      ).toBe('Optional[Integer]');
    });
  });

  describe('validators and comments', () => {
    it('should turn isEmail and len into an Email type', () => {
      const type = typeForAttribute('email', {
        type: DataTypes.STRING,
        allowNull: false,
        validate: { isEmail: true, len: [5, 100] },
      });

      expect(type.toString()).toBe('Email(minLength: 5, maxLength: 100)');
    });

    it('should turn isUUID into a UUID type', () => {
      expect(
        typeForAttribute('ref', { type: DataTypes.STRING(36), allowNull: false, validate: { isUUID: 4 } }).toString(),
      ).toBe('UUID(maxLength: 36)');
    });

    it('should keep the tighter of length and len', () => {
      const type = typeForAttribute('nick', {
        type: DataTypes.STRING(10),
        allowNull: false,
        validate: { len: { args: [2, 30], msg: 'Nickname length' } },
      });

      expect(type.toString()).toBe('String(minLength: 2, maxLength: 10)');
    });

    it('should carry min and max to numeric bounds', () => {
      const type = typeForAttribute('age', {
        type: DataTypes.INTEGER,
        allowNull: false,
        validate: { min: 0, max: { args: [120], msg: 'Too old' } },
      });

      expect(type.toString()).toBe('Integer(minimum: 0, maximum: 120)');
      expect(type.validate(121).errors).toEqual(['Value 121 exceeds maximum 120']);
    });

    it('should carry the comment as description', () => {
      const type = typeForAttribute('title', { type: DataTypes.STRING, comment: 'Shown in lists' });

      expect(type.toJsonSchema()).toEqual({ type: 'string', description: 'Shown in lists' });
    });
  });
});
