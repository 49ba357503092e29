import { toError } from '@tagstore/core';
import type { StoreGateway, TagstoreSchema } from '@tagstore/data';
import { err, ok, type Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';

const COUNTED_TABLES = [
  'taxonomy',
  'concept',
  'confidence',
  'tagpack',
  'tag',
  'address',
  'actorpack',
  'actor',
  'address_cluster_mapping',
  'address_quality',
] as const satisfies readonly (keyof TagstoreSchema)[];

export type CountedTable = (typeof COUNTED_TABLES)[number];

export interface StoreStatus {
  supportedCurrencies: string[];
  rows: Partial<Record<CountedTable, number>>;
  unmappedAddresses: number;
}

/**
 * Status handler - row counts of the tagstore tables.
 */
export class StatusHandler implements CommandHandler<void, StoreStatus> {
  constructor(private readonly store: StoreGateway) {}

  async execute(): Promise<Result<StoreStatus, Error>> {
    try {
      const rows: Partial<Record<CountedTable, number>> = {};
      for (const table of COUNTED_TABLES) {
        const result = await this.store.db
          .selectFrom(table)
          .select((eb) => eb.fn.countAll<number | string>().as('count'))
          .executeTakeFirstOrThrow();
        rows[table] = Number(result.count);
      }

      const unmapped = await this.store.db
        .selectFrom('address')
        .select((eb) => eb.fn.countAll<number | string>().as('count'))
        .where('is_mapped', '=', false)
        .executeTakeFirstOrThrow();

      return ok({
        rows,
        supportedCurrencies: [...this.store.supportedCurrencies].sort(),
        unmappedAddresses: Number(unmapped.count),
      });
    } catch (error) {
      return err(toError(error));
    }
  }
}
