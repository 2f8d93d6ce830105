import { isPlainObject } from '@typeweave/core';

/** Built-in Sequelize validators that carry over to a derived schema. */
export interface AttributeValidators {
  readonly email: boolean;
  readonly uuid: boolean;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly minimum?: number;
  readonly maximum?: number;
}

/**
 * Read an attribute's `validate` options. Each validator may be given bare
 * (`min: 1`) or with a message (`min: { args: [1], msg: '...' }`).
 */
export function readValidators(validate: unknown): AttributeValidators {
  if (!isPlainObject(validate)) return { email: false, uuid: false };

  const len = argsOf(validate['len']);
  const [minLength, maxLength] = Array.isArray(len) ? [numberAt(len, 0), numberAt(len, 1)] : [undefined, undefined];

  return {
    email: isEnabled(validate['isEmail']),
    uuid: isEnabled(validate['isUUID']),
    minLength,
    maxLength,
    minimum: singleNumber(argsOf(validate['min'])),
    maximum: singleNumber(argsOf(validate['max'])),
  };
}

function argsOf(option: unknown): unknown {
  return isPlainObject(option) && 'args' in option ? option['args'] : option;
}

function isEnabled(option: unknown): boolean {
  return option !== undefined && option !== null && option !== false;
}

function numberOf(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

// `min: 1`, `min: [1]` and `min: { args: 1 }` all mean the same bound.
function singleNumber(value: unknown): number | undefined {
  return Array.isArray(value) ? numberAt(value, 0) : numberOf(value);
}

function numberAt(values: readonly unknown[], index: number): number | undefined {
  return numberOf(values[index]);
}
