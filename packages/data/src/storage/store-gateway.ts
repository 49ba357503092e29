import { toError } from '@tagstore/core';
import { getLogger, type Logger } from '@tagstore/logger';
import { sql, type Transaction } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

import { DEFAULT_BATCH_SIZE, type DatabaseConfig } from '../config/database-config.js';
import type { TagstoreSchema } from '../schema/database-schema.js';

import { MAX_BIND_PARAMETERS } from './batch-writer.js';
import { closeDatabase, createDatabase, type KyselyDB } from './database.js';
import { IngestedPackCache } from './ingested-pack-cache.js';

export type TagstoreTransaction = Transaction<TagstoreSchema>;

export interface StoreGatewayOptions {
  batchSize?: number | undefined;
  /** Bound-parameter limit of the backend, passed on to batch buffers. */
  maxParameters?: number | undefined;
}

/**
 * Reads the labels of the `currency` enum, i.e. the currencies the schema
 * accepts tags for.
 */
export async function loadSupportedCurrencies(db: KyselyDB): Promise<Result<string[], Error>> {
  try {
    const result = await sql<{ currency: string }>`SELECT unnest(enum_range(NULL::currency)) AS currency`.execute(db);
    return ok(result.rows.map((row) => row.currency));
  } catch (error) {
    return err(toError(error));
  }
}

/**
 * A session bound to one tagstore schema. Owns the connection, the set of
 * currencies the schema supports and the snapshots of already ingested packs.
 */
export class StoreGateway {
  readonly tagpackIds: IngestedPackCache;
  readonly actorpackIds: IngestedPackCache;
  readonly supportedCurrencies: ReadonlySet<string>;
  readonly batchSize: number;
  readonly maxParameters: number;

  private readonly logger: Logger = getLogger('StoreGateway');

  constructor(
    readonly db: KyselyDB,
    supportedCurrencies: Iterable<string>,
    options: StoreGatewayOptions = {}
  ) {
    this.supportedCurrencies = new Set(supportedCurrencies);
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.maxParameters = options.maxParameters ?? MAX_BIND_PARAMETERS;
    this.tagpackIds = new IngestedPackCache('tagpack', () => this.selectIds('tagpack'));
    this.actorpackIds = new IngestedPackCache('actorpack', () => this.selectIds('actorpack'));
  }

  /** Exact, case-sensitive match against the currency enum labels. */
  supportsCurrency(currency: string): boolean {
    return this.supportedCurrencies.has(currency);
  }

  /**
   * Runs `fn` in a transaction. A thrown error rolls back and is returned as
   * the `Err` value.
   */
  async transaction<T>(fn: (trx: TagstoreTransaction) => Promise<T>): Promise<Result<T, Error>> {
    try {
      const value = await this.db.transaction().execute(async (trx) => {
        try {
          this.logger.debug('Starting database transaction');
          const result = await fn(trx);
          this.logger.debug('Database transaction completed successfully');
          return result;
        } catch (error) {
          this.logger.error({ error }, 'Database transaction failed, rolling back');
          throw error;
        }
      });
      return ok(value);
    } catch (error) {
      return err(toError(error));
    }
  }

  async close(): Promise<void> {
    await closeDatabase(this.db);
  }

  private async selectIds(table: 'tagpack' | 'actorpack'): Promise<Result<string[], Error>> {
    try {
      const rows = await this.db.selectFrom(table).select('id').execute();
      return ok(rows.map((row) => row.id));
    } catch (error) {
      return err(toError(error));
    }
  }
}

/**
 * Connects to the configured schema and loads its supported currencies.
 */
export async function openStoreGateway(config: DatabaseConfig): Promise<Result<StoreGateway, Error>> {
  const db = createDatabase(config);

  const currencies = await loadSupportedCurrencies(db);
  if (currencies.isErr()) {
    await db.destroy();
    return err(currencies.error);
  }

  return ok(new StoreGateway(db, currencies.value, { batchSize: config.batchSize }));
}
