import { describe, expect, it } from 'vitest';

import { InMemoryLedgerStore } from '../in-memory-ledger.store';
import type { LedgerClock } from '../ledger.store';
import type { LedgerAccount } from '../ledger.types';

const clock: LedgerClock = { now: () => 1_700_000_000 };

const registryAccount = (authority: string): LedgerAccount => ({
  kind: 'admin-registry',
  data: { authority, admins: [authority], adminCount: 1 },
});

describe('InMemoryLedgerStore', () => {
  it('creates an account only once per address', async () => {
    const store = new InMemoryLedgerStore(clock);

    const first = await store.transact((tx) => tx.create('0x01', registryAccount('0xaa')));
    const second = await store.transact((tx) => tx.create('0x01', registryAccount('0xbb')));

    expect(first).toBe(true);
    expect(second).toBe(false);
    expect(await store.read('0x01')).toEqual(registryAccount('0xaa'));
  });

  it('drops staged writes and events when the body throws', async () => {
    const store = new InMemoryLedgerStore(clock);

    await expect(
      store.transact((tx) => {
        tx.create('0x01', registryAccount('0xaa'));
        tx.emit({ type: 'AdminRegistryInitialized', payload: { admin: '0xaa', authority: '0xaa' } });
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(await store.read('0x01')).toBeUndefined();
    expect(await store.events()).toEqual([]);
  });

  it('refuses to overwrite an address that was never created', async () => {
    const store = new InMemoryLedgerStore(clock);

    await expect(store.transact((tx) => tx.write('0x01', registryAccount('0xaa')))).rejects.toThrow(
      'No ledger account at 0x01',
    );
  });

  it('lets exactly one of two concurrent creations win', async () => {
    const store = new InMemoryLedgerStore(clock);

    const results = await Promise.all([
      store.transact((tx) => tx.create('0x01', registryAccount('0xaa'))),
      store.transact((tx) => tx.create('0x01', registryAccount('0xbb'))),
    ]);

    expect(results).toEqual([true, false]);
  });

  it('keeps processing after a failed transaction', async () => {
    const store = new InMemoryLedgerStore(clock);

    const failed = store.transact(() => {
      throw new Error('boom');
    });
    const next = store.transact((tx) => tx.create('0x01', registryAccount('0xaa')));

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe(true);
  });

  it('returns copies that callers cannot mutate', async () => {
    const store = new InMemoryLedgerStore(clock);
    await store.transact((tx) => tx.create('0x01', registryAccount('0xaa')));

    const account = await store.read('0x01');
    if (account?.kind !== 'admin-registry') {
      throw new Error('expected an admin registry');
    }
    account.data.admins.push('0xbb');

    expect(await store.read('0x01')).toEqual(registryAccount('0xaa'));
  });

  it('lists events newest first with filters', async () => {
    const store = new InMemoryLedgerStore(clock);
    await store.transact((tx) => {
      tx.emit({ type: 'FormApproved', payload: { documentId: 'f1', signer: '0xaa' } });
      tx.emit({ type: 'FormApproved', payload: { documentId: 'f2', signer: '0xaa' } });
    });
    await store.transact((tx) => {
      tx.emit({ type: 'FormApprovalUpdated', payload: { documentId: 'f1', signer: '0xaa', metadata: 'v2' } });
    });

    const all = await store.events();
    expect(all.map((event) => event.seq)).toEqual([3, 2, 1]);
    expect(all[0]).toEqual({
      seq: 3,
      timestamp: 1_700_000_000,
      type: 'FormApprovalUpdated',
      payload: { documentId: 'f1', signer: '0xaa', metadata: 'v2' },
    });

    expect((await store.events({ documentId: 'f1' })).map((event) => event.seq)).toEqual([3, 1]);
    expect((await store.events({ type: 'FormApproved' })).map((event) => event.seq)).toEqual([2, 1]);
    expect((await store.events({ limit: 1 })).map((event) => event.seq)).toEqual([3]);
  });
});
