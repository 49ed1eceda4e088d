export * from './types.js';
export * from './errors.js';
export * from './tiers.js';
export * from './offers.js';
export * from './ledger.js';
export * from './redemption.js';
export * from './ownership.js';
export * from './insights/index.js';
