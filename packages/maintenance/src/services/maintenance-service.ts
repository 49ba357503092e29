import { normalizeAddress, toError } from '@tagstore/core';
import {
  BatchBuffer,
  BatchWriter,
  MATERIALIZED_VIEWS,
  type MaterializedView,
  type StoreGateway,
  type TagstoreSchema,
} from '@tagstore/data';
import { getLogger } from '@tagstore/logger';
import { sql, type Insertable } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('MaintenanceService');

type ClusterMappingRow = Insertable<TagstoreSchema['address_cluster_mapping']>;

/**
 * Cluster assignment of one address, as delivered by the clustering backend.
 */
export interface ClusterMapping {
  address: string;
  currency: string;
  clusterId: number;
  clusterDefiningAddress: string;
  noAddresses: number;
}

export interface CompositionRow {
  creator: string;
  category: string | null;
  isPublic: boolean;
  /** Present only when grouped by currency. */
  currency?: string;
  labelsCount: number;
  tagsCount: number;
}

export interface StoredAddress {
  address: string;
  currency: string;
}

export class MaintenanceService {
  constructor(private readonly store: StoreGateway) {}

  /**
   * Deletes every tag that has a newer twin: same address, label and source in
   * a tagpack by the same creator. Returns the number of deleted tags.
   */
  async removeDuplicates(): Promise<Result<number, Error>> {
    const db = this.store.db;

    const ranked = db
      .selectFrom('tag as t')
      .innerJoin('tagpack as tp', 'tp.id', 't.tagpack')
      .select((eb) => [
        't.id',
        eb.fn
          .agg<number>('row_number')
          .over((ob) => ob.partitionBy(['t.address', 't.label', 't.source', 'tp.creator']).orderBy('t.id', 'desc'))
          .as('duplicate_count'),
      ])
      .as('x');

    try {
      const result = await db
        .deleteFrom('tag')
        .where('id', 'in', db.selectFrom(ranked).select('x.id').where('x.duplicate_count', '>', 1))
        .executeTakeFirst();

      const deleted = Number(result.numDeletedRows);
      logger.info(`Removed ${deleted} duplicate tags`);
      return ok(deleted);
    } catch (error) {
      return err(toError(error));
    }
  }

  /**
   * Upserts cluster assignments keyed by (currency, address); the last
   * mapping given for a key wins. Returns the number of rows written.
   */
  async insertClusterMappings(mappings: readonly ClusterMapping[]): Promise<Result<number, Error>> {
    if (mappings.length === 0) {
      return ok(0);
    }

    const byKey = new Map<string, ClusterMappingRow>();
    for (const mapping of mappings) {
      const address = normalizeAddress(mapping.currency, mapping.address);
      if (address.isErr()) {
        return err(address.error);
      }
      byKey.set(`${mapping.currency}\u0000${address.value}`, {
        address: address.value,
        currency: mapping.currency,
        gs_cluster_def_addr: mapping.clusterDefiningAddress,
        gs_cluster_id: mapping.clusterId,
        gs_cluster_no_addr: mapping.noAddresses,
      });
    }

    return this.store.transaction(async (trx) => {
      // One upsert may not touch the same key twice, hence the dedup above
      const buffer = new BatchBuffer<ClusterMappingRow>(
        'address_cluster_mapping',
        (rows) =>
          trx
            .insertInto('address_cluster_mapping')
            .values(rows)
            .onConflict((oc) =>
              oc.columns(['currency', 'address']).doUpdateSet((eb) => ({
                gs_cluster_def_addr: eb.ref('excluded.gs_cluster_def_addr'),
                gs_cluster_id: eb.ref('excluded.gs_cluster_id'),
                gs_cluster_no_addr: eb.ref('excluded.gs_cluster_no_addr'),
              }))
            )
            .execute(),
        { maxParameters: this.store.maxParameters }
      );
      const writer = new BatchWriter([buffer], { threshold: this.store.batchSize, trigger: buffer });

      for (const row of byKey.values()) {
        buffer.add(row);
        await writer.maybeFlush();
      }
      await writer.flush();

      logger.debug(`Upserted ${byKey.size} cluster mappings`);
      return byKey.size;
    });
  }

  /**
   * Marks every unmapped address of the given currencies as mapped. Returns
   * the number of addresses updated.
   */
  async finishMappingsUpdate(currencies: readonly string[]): Promise<Result<number, Error>> {
    if (currencies.length === 0) {
      return ok(0);
    }

    try {
      const result = await this.store.db
        .updateTable('address')
        .set({ is_mapped: true })
        .where('is_mapped', '=', false)
        .where('currency', 'in', currencies)
        .executeTakeFirst();
      return ok(Number(result.numUpdatedRows));
    } catch (error) {
      return err(toError(error));
    }
  }

  async refreshMaterializedViews(): Promise<Result<readonly MaterializedView[], Error>> {
    return this.store.transaction(async (trx) => {
      for (const view of MATERIALIZED_VIEWS) {
        await sql`REFRESH MATERIALIZED VIEW ${sql.table(view)}`.execute(trx);
      }
      logger.info(`Refreshed ${MATERIALIZED_VIEWS.length} materialized views`);
      return MATERIALIZED_VIEWS;
    });
  }

  /**
   * Streams tag and label counts per creator, category and visibility, and
   * per currency when `byCurrency` is set. Backend errors are thrown from the
   * iterator.
   */
  async *streamTagstoreComposition(options: { byCurrency?: boolean } = {}): AsyncGenerator<CompositionRow> {
    const byCurrency = options.byCurrency ?? false;

    const query = this.store.db
      .selectFrom('tag as t')
      .innerJoin('tagpack as tp', 'tp.id', 't.tagpack')
      .select((eb) => [
        'tp.creator',
        't.category',
        'tp.is_public',
        eb.fn.count<string | number>('t.label').distinct().as('labels_count'),
        eb.fn.countAll<string | number>().as('tags_count'),
      ])
      .$if(byCurrency, (qb) => qb.select('t.currency').groupBy('t.currency'))
      .groupBy(['tp.creator', 't.category', 'tp.is_public'])
      .orderBy('tp.creator')
      .orderBy('t.category');

    for await (const row of query.stream(this.store.batchSize)) {
      const composition: CompositionRow = {
        category: row.category,
        creator: row.creator,
        isPublic: Boolean(row.is_public),
        labelsCount: Number(row.labels_count),
        tagsCount: Number(row.tags_count),
      };
      if (row.currency !== undefined) {
        composition.currency = row.currency;
      }
      yield composition;
    }
  }

  /**
   * Streams stored addresses; only those not yet mapped to a cluster unless
   * `includeMapped` is set.
   */
  async *streamAddresses(options: { includeMapped?: boolean } = {}): AsyncGenerator<StoredAddress> {
    let query = this.store.db.selectFrom('address').select(['address', 'currency']);
    if (!options.includeMapped) {
      query = query.where('is_mapped', '=', false);
    }

    for await (const row of query.stream(this.store.batchSize)) {
      yield row;
    }
  }
}
