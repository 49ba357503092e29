import { getLogger } from '@tagstore/logger';
import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import Cursor from 'pg-cursor';

import type { DatabaseConfig } from '../config/database-config.js';
import type { TagstoreSchema } from '../schema/database-schema.js';

const logger = getLogger('KyselyDatabase');

/**
 * Create a Kysely instance over a single persistent PostgreSQL connection
 * whose search path is pinned to the configured schema.
 */
export function createDatabase(config: DatabaseConfig): Kysely<TagstoreSchema> {
  const pool = new pg.Pool({
    connectionString: config.url,
    // One connection per store session; statements run sequentially on it
    max: 1,
    options: `-c search_path=${config.schema}`,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  });
  pool.on('error', (error) => logger.error({ error }, 'Database pool error'));

  logger.info(`Connecting to PostgreSQL (schema: ${config.schema})`);

  // Note: No CamelCasePlugin - we use snake_case to match database columns exactly
  return new Kysely<TagstoreSchema>({
    dialect: new PostgresDialect({ cursor: Cursor, pool }),
    log(event) {
      if (event.level === 'error') {
        logger.error({ error: event.error, sql: event.query.sql }, 'Query failed');
        return;
      }
      logger.trace({ durationMs: event.queryDurationMillis, sql: event.query.sql }, 'Query executed');
    },
  });
}

/**
 * Utility function to close the Kysely database connection
 */
export async function closeDatabase(db: Kysely<TagstoreSchema>): Promise<void> {
  try {
    await db.destroy();
    logger.info('Database connection closed');
  } catch (error) {
    logger.error({ error }, 'Error closing database');
    throw error;
  }
}

/**
 * Type-safe database instance type
 */
export type KyselyDB = Kysely<TagstoreSchema>;
