import {
  DEFAULT_QUALITY_THRESHOLD,
  parseCurrencyFilter,
  parseQualityThreshold,
  toError,
  type QualityCurrency,
} from '@tagstore/core';
import type { StoreGateway } from '@tagstore/data';
import { getLogger } from '@tagstore/logger';
import { sql } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('QualityService');

/**
 * Aggregate over the per-address quality scores. `avg` and `stddev` are null
 * when no score matches.
 */
export interface QualityMeasures {
  count: number;
  avg: number | null;
  stddev: number | null;
}

export interface LowQualityAddress {
  currency: string;
  address: string;
  labels: string[];
}

function toNullableNumber(value: string | number | null | undefined): number | null {
  return value === null || value === undefined ? null : Number(value);
}

/**
 * Address quality scores. A score is computed per (currency, address) by the
 * database procedures and is lower the more distinct labels an address
 * carries.
 */
export class QualityService {
  constructor(private readonly store: StoreGateway) {}

  /**
   * Recompute every address quality score, then return the measures over all
   * currencies.
   */
  async calculateQualityMeasures(): Promise<Result<QualityMeasures, Error>> {
    const result = await this.store.transaction(async (trx) => {
      await sql`CALL calculate_quality()`.execute(trx);
      await sql`CALL insert_address_quality()`.execute(trx);
    });
    if (result.isErr()) {
      return err(result.error);
    }

    logger.info('Recalculated address quality');
    return this.getQualityMeasures();
  }

  async getQualityMeasures(currency?: string): Promise<Result<QualityMeasures, Error>> {
    const filter = parseCurrencyFilter(currency);
    if (filter.isErr()) {
      return err(filter.error);
    }

    try {
      const row = await this.measuresQuery(filter.value).executeTakeFirst();
      return ok({
        avg: toNullableNumber(row?.avg),
        count: Number(row?.count ?? 0),
        stddev: toNullableNumber(row?.stddev),
      });
    } catch (error) {
      return err(toError(error));
    }
  }

  /**
   * Addresses scoring at or below `threshold`, each with the labels of its
   * tags.
   */
  async lowQualityAddressLabels(
    threshold: number | string = DEFAULT_QUALITY_THRESHOLD,
    currency?: string
  ): Promise<Result<LowQualityAddress[], Error>> {
    const filter = parseCurrencyFilter(currency);
    if (filter.isErr()) {
      return err(filter.error);
    }
    const limit = parseQualityThreshold(threshold);
    if (limit.isErr()) {
      return err(limit.error);
    }

    try {
      let query = this.store.db
        .selectFrom('address_quality as q')
        .innerJoin('tag as t', (join) => join.onRef('t.address', '=', 'q.address').onRef('t.currency', '=', 'q.currency'))
        .select((eb) => ['q.currency', 'q.address', eb.fn.agg<string[]>('array_agg', ['t.label']).as('labels')])
        .where('q.quality', '<=', limit.value);

      if (filter.value !== undefined) {
        query = query.where('q.currency', '=', filter.value);
      }

      return ok(await query.groupBy(['q.currency', 'q.address']).execute());
    } catch (error) {
      return err(toError(error));
    }
  }

  private measuresQuery(currency: QualityCurrency | undefined) {
    const query = this.store.db
      .selectFrom('address_quality')
      .select((eb) => [
        eb.fn.count<string | number>('quality').as('count'),
        eb.fn.avg<string | number>('quality').as('avg'),
        eb.fn<string | number | null>('stddev', ['quality']).as('stddev'),
      ]);

    return currency === undefined ? query : query.where('currency', '=', currency);
  }
}
