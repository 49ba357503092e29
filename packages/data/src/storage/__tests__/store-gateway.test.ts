import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createRecordingDatabase, createTestStore } from '../../__tests__/test-utils.js';
import { loadSupportedCurrencies, StoreGateway } from '../store-gateway.js';

describe('loadSupportedCurrencies', () => {
  it('reads the labels of the currency enum', async () => {
    const { db, recorder } = createRecordingDatabase();
    recorder.respond('enum_range', [{ currency: 'BTC' }, { currency: 'ETH' }]);

    const result = await loadSupportedCurrencies(db);

    expect(result._unsafeUnwrap()).toEqual(['BTC', 'ETH']);
    expect(recorder.statements).toEqual(['SELECT unnest(enum_range(NULL::currency)) AS currency']);
  });

  it('returns the backend error', async () => {
    const { db, recorder } = createRecordingDatabase();
    recorder.failOn('enum_range', new Error('type "currency" does not exist'));

    const result = await loadSupportedCurrencies(db);

    expect(result._unsafeUnwrapErr().message).toBe('type "currency" does not exist');
  });
});

describe('StoreGateway', () => {
  let store: StoreGateway;

  beforeEach(async () => {
    store = await createTestStore({ currencies: ['BTC', 'ETH'] });
  });

  afterEach(async () => {
    await store.close();
  });

  it('matches currencies exactly', () => {
    expect(store.supportsCurrency('BTC')).toBe(true);
    expect(store.supportsCurrency('btc')).toBe(false);
    expect(store.supportsCurrency('XRP')).toBe(false);
  });

  it('defaults the batch size', () => {
    expect(store.batchSize).toBe(1000);
  });

  it('commits the work of a successful transaction', async () => {
    const result = await store.transaction(async (trx) => {
      await trx
        .insertInto('tagpack')
        .values({ creator: 'Alice', description: 'd', id: 'packs/a.yaml', is_public: true, title: 'A', uri: null })
        .execute();
      return 'done';
    });

    expect(result._unsafeUnwrap()).toBe('done');
    const rows = await store.db.selectFrom('tagpack').select('id').execute();
    expect(rows).toEqual([{ id: 'packs/a.yaml' }]);
  });

  it('rolls back and returns the error when the callback throws', async () => {
    const result = await store.transaction(async (trx) => {
      await trx
        .insertInto('tagpack')
        .values({ creator: 'Alice', description: 'd', id: 'packs/a.yaml', is_public: false, title: 'A', uri: null })
        .execute();
      throw new Error('bad address');
    });

    expect(result._unsafeUnwrapErr().message).toBe('bad address');
    const rows = await store.db.selectFrom('tagpack').select('id').execute();
    expect(rows).toEqual([]);
  });

  it('loads ingested pack ids from the database', async () => {
    await store.db
      .insertInto('actorpack')
      .values({ creator: 'Bob', description: 'd', id: 'public:actors.yaml', is_public: true, title: 'Actors', uri: null })
      .execute();

    expect((await store.actorpackIds.has('public:actors.yaml'))._unsafeUnwrap()).toBe(true);
    expect((await store.tagpackIds.has('public:actors.yaml'))._unsafeUnwrap()).toBe(false);
  });
});

describe('StoreGateway on PostgreSQL', () => {
  it('wraps the callback in begin and commit', async () => {
    const { db, recorder } = createRecordingDatabase();
    const store = new StoreGateway(db, ['BTC']);

    const result = await store.transaction(async (trx) => {
      await trx.deleteFrom('tagpack').where('id', '=', 'packs/a.yaml').execute();
    });

    expect(result.isOk()).toBe(true);
    expect(recorder.statements).toEqual(['begin', 'delete from "tagpack" where "id" = $1', 'commit']);
  });

  it('rolls back when a statement fails', async () => {
    const { db, recorder } = createRecordingDatabase();
    const store = new StoreGateway(db, ['BTC']);
    recorder.failOn('delete from', Object.assign(new Error('deadlock detected'), { code: '40P01' }));

    const result = await store.transaction(async (trx) => {
      await trx.deleteFrom('tagpack').where('id', '=', 'packs/a.yaml').execute();
    });

    expect(result._unsafeUnwrapErr().message).toBe('deadlock detected');
    expect(recorder.statements).toEqual(['begin', 'delete from "tagpack" where "id" = $1', 'rollback']);
  });
});
