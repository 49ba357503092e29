import type { StoreGateway } from '@tagstore/data';
import { createTestStore } from '@tagstore/data/test-utils';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { StatusHandler } from '../status-handler.js';

describe('StatusHandler', () => {
  let store: StoreGateway;

  beforeEach(async () => {
    store = await createTestStore({ currencies: ['ETH', 'BTC'] });
  });

  afterEach(async () => {
    await store.close();
  });

  it('counts rows per table and unmapped addresses', async () => {
    await store.db
      .insertInto('tagpack')
      .values({ creator: 'Alice', description: 'd', id: 'packs/a.yaml', is_public: true, title: 'A', uri: null })
      .execute();
    await store.db
      .insertInto('address')
      .values([
        { address: '1A', currency: 'BTC', is_mapped: false },
        { address: '1B', currency: 'BTC', is_mapped: true },
      ])
      .execute();

    const result = await new StatusHandler(store).execute();

    const status = result._unsafeUnwrap();
    expect(status.supportedCurrencies).toEqual(['BTC', 'ETH']);
    expect(status.rows.tagpack).toBe(1);
    expect(status.rows.address).toBe(2);
    expect(status.rows.tag).toBe(0);
    expect(status.unmappedAddresses).toBe(1);
  });

  it('returns the backend error', async () => {
    await store.db.schema.dropTable('address_quality').execute();

    const result = await new StatusHandler(store).execute();

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().message).toContain('no such table: address_quality');
  });
});
