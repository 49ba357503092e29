import {
  CONFIDENCE_TAXONOMY_KEY,
  createPackId,
  type ActorpackSource,
  type TagpackSource,
  type Taxonomy,
} from '@tagstore/core';
import { BatchBuffer, BatchWriter, type StoreGateway } from '@tagstore/data';
import { getLogger } from '@tagstore/logger';
import { err, ok, type Result } from 'neverthrow';

import {
  toActorpackRow,
  toActorRows,
  toConceptRows,
  toConfidenceRows,
  toTagpackRow,
  toTagRows,
  toTaxonomyRow,
  type ActorCategoryRow,
  type ActorJurisdictionRow,
  type ActorRow,
  type AddressRow,
  type TagRow,
} from './ingestion-service-utils.js';

const logger = getLogger('IngestionService');

export interface InsertPackOptions {
  isPublic: boolean;
  /** Delete a pack with the same id first, in the same transaction. */
  forceInsert: boolean;
  prefix?: string | undefined;
  /** Tagpack path relative to its repository, or the actorpack name. */
  relativePath: string;
  /** Defaults to the store's configured batch size. */
  batchSize?: number | undefined;
}

export interface TagpackInsertSummary {
  tagpackId: string;
  tagsInserted: number;
  /** Tags dropped because the schema does not support their currency. */
  tagsSkipped: number;
  flushes: number;
  evicted: boolean;
}

export interface ActorpackInsertSummary {
  actorpackId: string;
  actorsInserted: number;
  flushes: number;
  evicted: boolean;
}

/**
 * Ingestion service - writes taxonomies, tagpacks and actorpacks into a
 * tagstore schema.
 *
 * Each pack is written in a single transaction: on any failure the pack,
 * including a pack evicted by `forceInsert`, is left as it was.
 */
export class IngestionService {
  constructor(private readonly store: StoreGateway) {}

  /**
   * Insert a taxonomy and its concepts. The confidence taxonomy is stored as
   * the confidence scale instead. Returns the number of concepts written.
   */
  async insertTaxonomy(taxonomy: Taxonomy): Promise<Result<number, Error>> {
    if (taxonomy.key === CONFIDENCE_TAXONOMY_KEY) {
      return this.insertConfidenceScores(taxonomy);
    }

    const importedAt = new Date();
    const concepts = toConceptRows(taxonomy);

    return this.store.transaction(async (trx) => {
      await trx.insertInto('taxonomy').values(toTaxonomyRow(taxonomy, importedAt)).execute();
      if (concepts.length > 0) {
        await trx.insertInto('concept').values(concepts).execute();
      }
      logger.info(`Inserted taxonomy ${taxonomy.key} with ${concepts.length} concepts`);
      return concepts.length;
    });
  }

  async insertConfidenceScores(scale: Taxonomy): Promise<Result<number, Error>> {
    const rowsResult = toConfidenceRows(scale);
    if (rowsResult.isErr()) {
      return err(rowsResult.error);
    }
    const rows = rowsResult.value;
    if (rows.length === 0) {
      return ok(0);
    }

    return this.store.transaction(async (trx) => {
      await trx.insertInto('confidence').values(rows).execute();
      logger.info(`Inserted ${rows.length} confidence scores`);
      return rows.length;
    });
  }

  /**
   * Answered from the store's snapshot of ingested tagpacks, which packs
   * inserted afterwards do not update.
   */
  async tagpackExists(prefix: string | undefined, relativePath: string): Promise<Result<boolean, Error>> {
    return this.store.tagpackIds.has(createPackId(prefix, relativePath));
  }

  async actorpackExists(prefix: string | undefined, name: string): Promise<Result<boolean, Error>> {
    return this.store.actorpackIds.has(createPackId(prefix, name));
  }

  async getIngestedTagpacks(): Promise<Result<string[], Error>> {
    const ids = await this.store.tagpackIds.refresh();
    return ids.map((set) => [...set]);
  }

  async getIngestedActorpacks(): Promise<Result<string[], Error>> {
    const ids = await this.store.actorpackIds.refresh();
    return ids.map((set) => [...set]);
  }

  async insertTagpack(pack: TagpackSource, options: InsertPackOptions): Promise<Result<TagpackInsertSummary, Error>> {
    const tagpackId = createPackId(options.prefix, options.relativePath);
    const headerResult = toTagpackRow(pack.contents, { id: tagpackId, isPublic: options.isPublic, uri: pack.uri });
    if (headerResult.isErr()) {
      return err(headerResult.error);
    }
    const header = headerResult.value;
    const threshold = options.batchSize ?? this.store.batchSize;
    const importedAt = new Date();

    return this.store.transaction(async (trx) => {
      let evicted = false;
      if (options.forceInsert) {
        logger.info(`Evicting and re-inserting tagpack ${tagpackId}`);
        const deleted = await trx.deleteFrom('tagpack').where('id', '=', tagpackId).executeTakeFirst();
        evicted = deleted.numDeletedRows > 0n;
      }

      await trx.insertInto('tagpack').values(header).execute();

      const bufferOptions = { maxParameters: this.store.maxParameters };
      const addresses = new BatchBuffer<AddressRow>(
        'address',
        (rows) =>
          trx
            .insertInto('address')
            .values(rows)
            .onConflict((oc) => oc.doNothing())
            .execute(),
        bufferOptions
      );
      const tags = new BatchBuffer<TagRow>('tag', (rows) => trx.insertInto('tag').values(rows).execute(), bufferOptions);
      const writer = new BatchWriter([addresses, tags], {
        onFlush: (written) => logger.debug(written, `Flushed tag batch for ${tagpackId}`),
        threshold,
        trigger: tags,
      });

      let tagsInserted = 0;
      let tagsSkipped = 0;
      for (const tag of pack.getUniqueTags()) {
        if (!this.store.supportsCurrency(tag.currency)) {
          tagsSkipped++;
          continue;
        }

        const rows = toTagRows(tag, tagpackId, importedAt);
        if (rows.isErr()) {
          throw rows.error;
        }

        addresses.add(rows.value.address);
        tags.add(rows.value.tag);
        tagsInserted++;
        await writer.maybeFlush();
      }
      await writer.flush();

      if (tagsSkipped > 0) {
        logger.warn(`Skipped ${tagsSkipped} tags with unsupported currencies in ${tagpackId}`);
      }
      logger.info(`Inserted tagpack ${tagpackId} with ${tagsInserted} tags`);

      return { evicted, flushes: writer.flushes, tagpackId, tagsInserted, tagsSkipped };
    });
  }

  async insertActorpack(
    pack: ActorpackSource,
    options: InsertPackOptions
  ): Promise<Result<ActorpackInsertSummary, Error>> {
    const actorpackId = createPackId(options.prefix, options.relativePath);
    const headerResult = toActorpackRow(pack.contents, { id: actorpackId, isPublic: options.isPublic, uri: pack.uri });
    if (headerResult.isErr()) {
      return err(headerResult.error);
    }
    const header = headerResult.value;
    const threshold = options.batchSize ?? this.store.batchSize;
    const importedAt = new Date();

    return this.store.transaction(async (trx) => {
      let evicted = false;
      if (options.forceInsert) {
        logger.info(`Evicting and re-inserting actorpack ${actorpackId}`);
        const deleted = await trx.deleteFrom('actorpack').where('id', '=', actorpackId).executeTakeFirst();
        evicted = deleted.numDeletedRows > 0n;
      }

      await trx.insertInto('actorpack').values(header).execute();

      const bufferOptions = { maxParameters: this.store.maxParameters };
      const actors = new BatchBuffer<ActorRow>(
        'actor',
        (rows) => trx.insertInto('actor').values(rows).execute(),
        bufferOptions
      );
      const categories = new BatchBuffer<ActorCategoryRow>(
        'actor_categories',
        (rows) => trx.insertInto('actor_categories').values(rows).execute(),
        bufferOptions
      );
      const jurisdictions = new BatchBuffer<ActorJurisdictionRow>(
        'actor_jurisdictions',
        (rows) => trx.insertInto('actor_jurisdictions').values(rows).execute(),
        bufferOptions
      );
      const writer = new BatchWriter([actors, categories, jurisdictions], {
        onFlush: (written) => logger.debug(written, `Flushed actor batch for ${actorpackId}`),
        threshold,
        trigger: actors,
      });

      let actorsInserted = 0;
      for (const actor of pack.getUniqueActors()) {
        const rows = toActorRows(actor, actorpackId, importedAt);
        actors.add(rows.actor);
        categories.add(...rows.categories);
        jurisdictions.add(...rows.jurisdictions);
        actorsInserted++;
        await writer.maybeFlush();
      }
      await writer.flush();

      logger.info(`Inserted actorpack ${actorpackId} with ${actorsInserted} actors`);

      return { actorpackId, actorsInserted, evicted, flushes: writer.flushes };
    });
  }
}
