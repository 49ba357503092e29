export * from './errors/index.js';
export * from './utils/type-guard-utils.js';
export * from './schemas/index.js';
export * from './currency.js';
export { normalizeAddress } from './address/address-normalizer.js';
export { createPackId } from './identity/pack-id.js';
