export * from './value-objects/currency.js';
export * from './utils/decimal-utils.js';
export * from './utils/type-guard-utils.js';
