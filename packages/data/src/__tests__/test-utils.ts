/* eslint-disable unicorn/no-null -- null is required for db */
import Database from 'better-sqlite3';
import {
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  SqliteDialect,
  type CompiledQuery,
  type DatabaseConnection,
  type Dialect,
  type Driver,
  type QueryResult,
} from 'kysely';

import type { TagstoreSchema } from '../schema/database-schema.js';
import type { KyselyDB } from '../storage/database.js';
import { StoreGateway, type StoreGatewayOptions } from '../storage/store-gateway.js';

export const TEST_CURRENCIES = ['BCH', 'BTC', 'ETH', 'LTC', 'ZEC'];

// SQLITE_MAX_VARIABLE_NUMBER of the bundled SQLite
const SQLITE_MAX_PARAMETERS = 32_766;

/**
 * Converts values for SQLite compatibility: undefined -> null, boolean -> 0/1
 */
function convertValueForSqlite(value: unknown): unknown {
  if (value === undefined) {
    return null;
  }

  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  if (Array.isArray(value)) {
    return value.map(convertValueForSqlite);
  }

  return value;
}

/**
 * Wraps better-sqlite3 Database to convert bound parameters before they reach SQLite
 */
function wrapSqliteDatabase(db: Database.Database): Database.Database {
  return new Proxy(db, {
    get(target, prop) {
      const value = target[prop as keyof Database.Database];

      if (prop === 'prepare' && typeof value === 'function') {
        return function (sql: string): ReturnType<typeof target.prepare> {
          const statement = target.prepare(sql);

          return new Proxy(statement, {
            get(stmtTarget, stmtProp) {
              const stmtValue = stmtTarget[stmtProp as keyof typeof statement];

              if (
                (stmtProp === 'run' || stmtProp === 'get' || stmtProp === 'all' || stmtProp === 'iterate') &&
                typeof stmtValue === 'function'
              ) {
                return function (...params: unknown[]) {
                  const convertedParams = params.map(convertValueForSqlite);
                  return (stmtValue as (...args: unknown[]) => unknown).apply(stmtTarget, convertedParams);
                };
              }

              return typeof stmtValue === 'function' ? stmtValue.bind(stmtTarget) : stmtValue;
            },
          });
        };
      }

      return typeof value === 'function' ? value.bind(target) : value;
    },
  });
}

/**
 * The tagstore tables on SQLite. Enum, views and procedures are PostgreSQL
 * only and left out; currency is plain text.
 */
async function createSqliteTables(db: KyselyDB): Promise<void> {
  await db.schema
    .createTable('taxonomy')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('source', 'text', (col) => col.notNull())
    .addColumn('description', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('concept')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('label', 'text', (col) => col.notNull())
    .addColumn('taxonomy', 'text', (col) => col.notNull().references('taxonomy.id').onDelete('cascade'))
    .addColumn('source', 'text', (col) => col.notNull())
    .addColumn('description', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('confidence')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('label', 'text', (col) => col.notNull())
    .addColumn('description', 'text', (col) => col.notNull())
    .addColumn('level', 'integer', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('tagpack')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('title', 'text', (col) => col.notNull())
    .addColumn('description', 'text', (col) => col.notNull())
    .addColumn('creator', 'text', (col) => col.notNull())
    .addColumn('uri', 'text')
    .addColumn('is_public', 'integer', (col) => col.notNull().defaultTo(0))
    .execute();

  await db.schema
    .createTable('address')
    .addColumn('currency', 'text', (col) => col.notNull())
    .addColumn('address', 'text', (col) => col.notNull())
    .addColumn('is_mapped', 'integer', (col) => col.notNull().defaultTo(0))
    .addPrimaryKeyConstraint('address_pkey', ['currency', 'address'])
    .execute();

  await db.schema
    .createTable('tag')
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('label', 'text', (col) => col.notNull())
    .addColumn('source', 'text', (col) => col.notNull())
    .addColumn('category', 'text')
    .addColumn('abuse', 'text')
    .addColumn('address', 'text', (col) => col.notNull())
    .addColumn('currency', 'text', (col) => col.notNull())
    .addColumn('is_cluster_definer', 'integer')
    .addColumn('confidence', 'text')
    .addColumn('lastmod', 'text', (col) => col.notNull())
    .addColumn('context', 'text')
    .addColumn('tagpack', 'text', (col) => col.notNull().references('tagpack.id').onDelete('cascade'))
    .addForeignKeyConstraint('tag_address_fkey', ['currency', 'address'], 'address', ['currency', 'address'])
    .execute();

  await db.schema
    .createTable('actorpack')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('title', 'text', (col) => col.notNull())
    .addColumn('creator', 'text', (col) => col.notNull())
    .addColumn('description', 'text', (col) => col.notNull())
    .addColumn('is_public', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('uri', 'text')
    .execute();

  await db.schema
    .createTable('actor')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('label', 'text', (col) => col.notNull())
    .addColumn('uri', 'text')
    .addColumn('lastmod', 'text', (col) => col.notNull())
    .addColumn('actorpack', 'text', (col) => col.notNull().references('actorpack.id').onDelete('cascade'))
    .execute();

  await db.schema
    .createTable('actor_categories')
    .addColumn('actor_id', 'text', (col) => col.notNull().references('actor.id').onDelete('cascade'))
    .addColumn('category_id', 'text', (col) => col.notNull())
    .addPrimaryKeyConstraint('actor_categories_pkey', ['actor_id', 'category_id'])
    .execute();

  await db.schema
    .createTable('actor_jurisdictions')
    .addColumn('actor_id', 'text', (col) => col.notNull().references('actor.id').onDelete('cascade'))
    .addColumn('country_id', 'text', (col) => col.notNull())
    .addPrimaryKeyConstraint('actor_jurisdictions_pkey', ['actor_id', 'country_id'])
    .execute();

  await db.schema
    .createTable('address_cluster_mapping')
    .addColumn('address', 'text', (col) => col.notNull())
    .addColumn('currency', 'text', (col) => col.notNull())
    .addColumn('gs_cluster_id', 'integer', (col) => col.notNull())
    .addColumn('gs_cluster_def_addr', 'text', (col) => col.notNull())
    .addColumn('gs_cluster_no_addr', 'integer', (col) => col.notNull())
    .addPrimaryKeyConstraint('address_cluster_mapping_pkey', ['currency', 'address'])
    .addForeignKeyConstraint(
      'address_cluster_mapping_address_fkey',
      ['currency', 'address'],
      'address',
      ['currency', 'address'],
      (fk) => fk.onDelete('cascade')
    )
    .execute();

  await db.schema
    .createTable('address_quality')
    .addColumn('currency', 'text', (col) => col.notNull())
    .addColumn('address', 'text', (col) => col.notNull())
    .addColumn('quality', 'real', (col) => col.notNull())
    .addPrimaryKeyConstraint('address_quality_pkey', ['currency', 'address'])
    .execute();
}

/**
 * Create an in-memory SQLite database with the tagstore tables. For use in tests only.
 */
export async function createTestDatabase(): Promise<KyselyDB> {
  const sqliteDb = new Database(':memory:');
  sqliteDb.pragma('foreign_keys = ON');

  const db = new Kysely<TagstoreSchema>({
    dialect: new SqliteDialect({ database: wrapSqliteDatabase(sqliteDb) }),
  });

  try {
    await createSqliteTables(db);
  } catch (error) {
    await db.destroy();
    throw error;
  }

  return db;
}

/**
 * Create a store session over an in-memory database. For use in tests only.
 */
export async function createTestStore(
  options: StoreGatewayOptions & { currencies?: string[] | undefined } = {}
): Promise<StoreGateway> {
  const db = await createTestDatabase();
  return new StoreGateway(db, options.currencies ?? TEST_CURRENCIES, {
    batchSize: options.batchSize,
    maxParameters: options.maxParameters ?? SQLITE_MAX_PARAMETERS,
  });
}

export interface RecordedQuery {
  sql: string;
  parameters: readonly unknown[];
}

interface ScriptedResult {
  match: string | RegExp;
  rows: Record<string, unknown>[];
  numAffectedRows?: bigint | undefined;
}

/**
 * Collects every statement a recording database executes, including
 * transaction boundaries (recorded as `begin`, `commit` and `rollback`), and
 * answers queries with scripted rows.
 */
export class QueryRecorder {
  readonly queries: RecordedQuery[] = [];
  private readonly results: ScriptedResult[] = [];
  private failure: { match: string | RegExp; error: Error } | undefined;

  get statements(): string[] {
    return this.queries.map((query) => query.sql);
  }

  /** Answer statements matching `match` with `rows`. The first registered match wins. */
  respond(match: string | RegExp, rows: Record<string, unknown>[], numAffectedRows?: bigint): this {
    this.results.push({ match, numAffectedRows, rows });
    return this;
  }

  /** Make statements matching `match` throw `error`. */
  failOn(match: string | RegExp, error: Error): this {
    this.failure = { error, match };
    return this;
  }

  record(sql: string, parameters: readonly unknown[] = []): void {
    this.queries.push({ parameters, sql });
  }

  execute(query: CompiledQuery): { numAffectedRows?: bigint | undefined; rows: Record<string, unknown>[] } {
    this.record(query.sql, query.parameters);

    if (this.failure && matches(this.failure.match, query.sql)) {
      throw this.failure.error;
    }

    const scripted = this.results.find((result) => matches(result.match, query.sql));
    return { numAffectedRows: scripted?.numAffectedRows, rows: scripted?.rows ?? [] };
  }

  clear(): void {
    this.queries.length = 0;
  }
}

function matches(match: string | RegExp, sql: string): boolean {
  return typeof match === 'string' ? sql.includes(match) : match.test(sql);
}

class RecordingConnection implements DatabaseConnection {
  constructor(private readonly recorder: QueryRecorder) {}

  executeQuery<R>(compiledQuery: CompiledQuery): Promise<QueryResult<R>> {
    try {
      const { numAffectedRows, rows } = this.recorder.execute(compiledQuery);
      return Promise.resolve({ numAffectedRows, rows: rows as R[] });
    } catch (error) {
      return Promise.reject(error);
    }
  }

  async *streamQuery<R>(compiledQuery: CompiledQuery): AsyncIterableIterator<QueryResult<R>> {
    const { rows } = this.recorder.execute(compiledQuery);
    for (const row of rows) {
      yield { rows: [row as R] };
    }
  }
}

class RecordingDriver implements Driver {
  private readonly connection: RecordingConnection;

  constructor(private readonly recorder: QueryRecorder) {
    this.connection = new RecordingConnection(recorder);
  }

  init(): Promise<void> {
    return Promise.resolve();
  }

  acquireConnection(): Promise<DatabaseConnection> {
    return Promise.resolve(this.connection);
  }

  beginTransaction(): Promise<void> {
    this.recorder.record('begin');
    return Promise.resolve();
  }

  commitTransaction(): Promise<void> {
    this.recorder.record('commit');
    return Promise.resolve();
  }

  rollbackTransaction(): Promise<void> {
    this.recorder.record('rollback');
    return Promise.resolve();
  }

  releaseConnection(): Promise<void> {
    return Promise.resolve();
  }

  destroy(): Promise<void> {
    return Promise.resolve();
  }
}

/**
 * A Kysely instance that compiles PostgreSQL and records statements instead of
 * running them. For use in tests only.
 */
export function createRecordingDatabase(): { db: KyselyDB; recorder: QueryRecorder } {
  const recorder = new QueryRecorder();
  const dialect: Dialect = {
    createAdapter: () => new PostgresAdapter(),
    createDriver: () => new RecordingDriver(recorder),
    createIntrospector: (db) => new PostgresIntrospector(db),
    createQueryCompiler: () => new PostgresQueryCompiler(),
  };

  return { db: new Kysely<TagstoreSchema>({ dialect }), recorder };
}

/**
 * A store session over a recording database. For use in tests only.
 */
export function createRecordingStore(currencies: string[] = TEST_CURRENCIES): {
  recorder: QueryRecorder;
  store: StoreGateway;
} {
  const { db, recorder } = createRecordingDatabase();
  return { recorder, store: new StoreGateway(db, currencies) };
}
