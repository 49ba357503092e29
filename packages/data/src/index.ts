export * from './schema/database-schema.js';
export { createTagstoreSchema, TAGSTORE_CURRENCIES } from './schema/create-schema.js';
export { DEFAULT_BATCH_SIZE, getDatabaseConfig, type DatabaseConfig } from './config/database-config.js';
export { closeDatabase, createDatabase, type KyselyDB } from './storage/database.js';
export {
  BatchBuffer,
  BatchWriter,
  MAX_BIND_PARAMETERS,
  type BatchBufferOptions,
  type BatchSink,
  type BatchWriterOptions,
  type Flushable,
} from './storage/batch-writer.js';
export { IngestedPackCache, type PackIdLoader, type PackKind } from './storage/ingested-pack-cache.js';
export { isUniqueViolation, PostgresErrorCodes } from './storage/postgres-errors.js';
export {
  loadSupportedCurrencies,
  openStoreGateway,
  StoreGateway,
  type StoreGatewayOptions,
  type TagstoreTransaction,
} from './storage/store-gateway.js';
