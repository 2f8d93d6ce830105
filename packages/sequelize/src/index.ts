export { fromModel } from './fromModel.js';
export { typeForAttribute } from './mappers/AttributeMapper.js';
export { describeDataType, familyOf } from './mappers/DataTypeMapper.js';
export type { DataTypeShape, TypeFamily } from './mappers/DataTypeMapper.js';
export { readValidators } from './mappers/ValidatorMapper.js';
export type { AttributeValidators } from './mappers/ValidatorMapper.js';
