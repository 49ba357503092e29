import { getLogger } from '@tagstore/logger';
import { sql } from 'kysely';

import type { KyselyDB } from '../storage/database.js';

const logger = getLogger('TagstoreSchema');

export const TAGSTORE_CURRENCIES = ['BCH', 'BTC', 'ETH', 'LTC', 'ZEC'] as const;

/**
 * Create the tagstore relations, views and quality procedures in `schema`.
 * The connection's search path must already point at `schema`. Running it
 * against an initialized schema fails on the first existing object.
 */
export async function createTagstoreSchema(db: KyselyDB, schema: string): Promise<void> {
  await db.transaction().execute(async (trx) => {
    await sql`CREATE SCHEMA IF NOT EXISTS ${sql.id(schema)}`.execute(trx);

    const labels = sql.join(TAGSTORE_CURRENCIES.map((currency) => sql.lit(currency)));
    await sql`CREATE TYPE currency AS ENUM (${labels})`.execute(trx);

    await trx.schema
      .createTable('taxonomy')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('source', 'varchar', (col) => col.notNull())
      .addColumn('description', 'varchar', (col) => col.notNull())
      .execute();

    await trx.schema
      .createTable('concept')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('label', 'varchar', (col) => col.notNull())
      .addColumn('taxonomy', 'varchar', (col) => col.notNull().references('taxonomy.id').onDelete('cascade'))
      .addColumn('source', 'varchar', (col) => col.notNull())
      .addColumn('description', 'varchar', (col) => col.notNull())
      .execute();

    await trx.schema
      .createTable('confidence')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('label', 'varchar', (col) => col.notNull())
      .addColumn('description', 'varchar', (col) => col.notNull())
      .addColumn('level', 'integer', (col) => col.notNull())
      .execute();

    await trx.schema
      .createTable('tagpack')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('title', 'varchar', (col) => col.notNull())
      .addColumn('description', 'varchar', (col) => col.notNull())
      .addColumn('creator', 'varchar', (col) => col.notNull())
      .addColumn('uri', 'varchar')
      .addColumn('is_public', 'boolean', (col) => col.notNull().defaultTo(false))
      .execute();

    await trx.schema
      .createTable('address')
      .addColumn('currency', sql`currency`, (col) => col.notNull())
      .addColumn('address', 'varchar', (col) => col.notNull())
      .addColumn('is_mapped', 'boolean', (col) => col.notNull().defaultTo(false))
      .addPrimaryKeyConstraint('address_pkey', ['currency', 'address'])
      .execute();

    await trx.schema
      .createTable('tag')
      .addColumn('id', 'serial', (col) => col.primaryKey())
      .addColumn('label', 'varchar', (col) => col.notNull())
      .addColumn('source', 'varchar', (col) => col.notNull())
      .addColumn('category', 'varchar', (col) => col.references('concept.id'))
      .addColumn('abuse', 'varchar', (col) => col.references('concept.id'))
      .addColumn('address', 'varchar', (col) => col.notNull())
      .addColumn('currency', sql`currency`, (col) => col.notNull())
      .addColumn('is_cluster_definer', 'boolean')
      .addColumn('confidence', 'varchar', (col) => col.references('confidence.id'))
      .addColumn('lastmod', 'timestamp', (col) => col.notNull())
      .addColumn('context', 'varchar')
      .addColumn('tagpack', 'varchar', (col) => col.notNull().references('tagpack.id').onDelete('cascade'))
      .addForeignKeyConstraint('tag_address_fkey', ['currency', 'address'], 'address', ['currency', 'address'])
      .execute();

    await trx.schema.createIndex('tag_label_idx').on('tag').column('label').execute();
    await trx.schema.createIndex('tag_address_idx').on('tag').columns(['currency', 'address']).execute();
    await trx.schema.createIndex('tag_tagpack_idx').on('tag').column('tagpack').execute();

    await trx.schema
      .createTable('actorpack')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('title', 'varchar', (col) => col.notNull())
      .addColumn('creator', 'varchar', (col) => col.notNull())
      .addColumn('description', 'varchar', (col) => col.notNull())
      .addColumn('is_public', 'boolean', (col) => col.notNull().defaultTo(false))
      .addColumn('uri', 'varchar')
      .execute();

    await trx.schema
      .createTable('actor')
      .addColumn('id', 'varchar', (col) => col.primaryKey())
      .addColumn('label', 'varchar', (col) => col.notNull())
      .addColumn('uri', 'varchar')
      .addColumn('lastmod', 'timestamp', (col) => col.notNull())
      .addColumn('actorpack', 'varchar', (col) => col.notNull().references('actorpack.id').onDelete('cascade'))
      .execute();

    await trx.schema
      .createTable('actor_categories')
      .addColumn('actor_id', 'varchar', (col) => col.notNull().references('actor.id').onDelete('cascade'))
      .addColumn('category_id', 'varchar', (col) => col.notNull())
      .addPrimaryKeyConstraint('actor_categories_pkey', ['actor_id', 'category_id'])
      .execute();

    await trx.schema
      .createTable('actor_jurisdictions')
      .addColumn('actor_id', 'varchar', (col) => col.notNull().references('actor.id').onDelete('cascade'))
      .addColumn('country_id', 'varchar', (col) => col.notNull())
      .addPrimaryKeyConstraint('actor_jurisdictions_pkey', ['actor_id', 'country_id'])
      .execute();

    await trx.schema
      .createTable('address_cluster_mapping')
      .addColumn('address', 'varchar', (col) => col.notNull())
      .addColumn('currency', sql`currency`, (col) => col.notNull())
      .addColumn('gs_cluster_id', 'bigint', (col) => col.notNull())
      .addColumn('gs_cluster_def_addr', 'varchar', (col) => col.notNull())
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

    await trx.schema
      .createTable('address_quality')
      .addColumn('currency', sql`currency`, (col) => col.notNull())
      .addColumn('address', 'varchar', (col) => col.notNull())
      .addColumn('quality', 'real', (col) => col.notNull())
      .addPrimaryKeyConstraint('address_quality_pkey', ['currency', 'address'])
      .execute();

    // Filled by calculate_quality(), copied out by insert_address_quality()
    await trx.schema
      .createTable('address_quality_stage')
      .addColumn('currency', sql`currency`, (col) => col.notNull())
      .addColumn('address', 'varchar', (col) => col.notNull())
      .addColumn('quality', 'real', (col) => col.notNull())
      .execute();

    await createMaterializedViews(trx);
    await createQualityProcedures(trx);
  });

  logger.info(`Created tagstore schema ${schema}`);
}

async function createMaterializedViews(db: KyselyDB): Promise<void> {
  await sql`
    CREATE MATERIALIZED VIEW label AS
    SELECT t.label, count(*) AS tag_count, count(DISTINCT t.tagpack) AS tagpack_count
    FROM tag t
    GROUP BY t.label
  `.execute(db);

  await sql`
    CREATE MATERIALIZED VIEW statistics AS
    SELECT
      a.currency,
      count(DISTINCT a.address) AS no_addresses,
      count(DISTINCT t.label) AS no_labels,
      count(t.id) AS no_tags,
      count(DISTINCT t.tagpack) AS no_tagpacks
    FROM address a
    LEFT JOIN tag t ON t.currency = a.currency AND t.address = a.address
    GROUP BY a.currency
  `.execute(db);

  await sql`
    CREATE MATERIALIZED VIEW tag_count_by_cluster AS
    SELECT m.currency, m.gs_cluster_id, count(t.id) AS tag_count
    FROM address_cluster_mapping m
    JOIN tag t ON t.currency = m.currency AND t.address = m.address
    GROUP BY m.currency, m.gs_cluster_id
  `.execute(db);

  await sql`
    CREATE MATERIALIZED VIEW cluster_defining_tags_by_frequency_and_maxconfidence AS
    SELECT
      m.currency,
      m.gs_cluster_id,
      t.label,
      count(*) AS frequency,
      max(c.level) AS max_confidence
    FROM address_cluster_mapping m
    JOIN tag t ON t.currency = m.currency AND t.address = m.address
    LEFT JOIN confidence c ON c.id = t.confidence
    WHERE t.is_cluster_definer
    GROUP BY m.currency, m.gs_cluster_id, t.label
  `.execute(db);
}

async function createQualityProcedures(db: KyselyDB): Promise<void> {
  // An address carrying one distinct label scores 1; each additional
  // conflicting label lowers the score
  await sql`
    CREATE PROCEDURE calculate_quality()
    LANGUAGE SQL
    AS $$
      DELETE FROM address_quality_stage;
      INSERT INTO address_quality_stage (currency, address, quality)
      SELECT t.currency, t.address, 1.0 / count(DISTINCT t.label)
      FROM tag t
      GROUP BY t.currency, t.address;
    $$
  `.execute(db);

  await sql`
    CREATE PROCEDURE insert_address_quality()
    LANGUAGE SQL
    AS $$
      DELETE FROM address_quality;
      INSERT INTO address_quality (currency, address, quality)
      SELECT s.currency, s.address, s.quality FROM address_quality_stage s;
    $$
  `.execute(db);
}
