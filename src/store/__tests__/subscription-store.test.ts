import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MemoryRecordStore } from '../record-store.js';
import { SubscriptionStore } from '../subscription-store.js';
import { StorageError } from '../../errors/index.js';
import type { SubscriptionRecord } from '../../types/index.js';

const makeRecord = (overrides: Partial<SubscriptionRecord> = {}): SubscriptionRecord => ({
  channelId: 'c0ffee00c0ffee00c0ffee00c0ffee00',
  scope: 'https://app.example.test/',
  endpoint: 'https://push.example.test/wpush/v2/c0ffee00',
  publicKey: 'BPUBLIC',
  privateKey: 'PRIVATE',
  authSecret: 'AUTH',
  ...overrides,
});

describe('SubscriptionStore', () => {
  let backing: MemoryRecordStore;
  let store: SubscriptionStore;

  beforeEach(() => {
    backing = new MemoryRecordStore();
    store = new SubscriptionStore(backing);
  });

  it('inserts and reads back a record', async () => {
    const record = makeRecord();
    await store.insert(record);
    expect(await store.get(record.channelId)).toEqual(record);
  });

  it('keeps records under the subscription: prefix', async () => {
    await store.insert(makeRecord({ channelId: 'abc' }));
    expect(await backing.list('subscription:')).toHaveLength(1);
    expect(await backing.get('subscription:abc')).toBeDefined();
  });

  it('returns null for an unknown channel', async () => {
    expect(await store.get('missing')).toBeNull();
  });

  it('overwrites a record with the same channel id', async () => {
    await store.insert(makeRecord({ scope: 'first' }));
    await store.insert(makeRecord({ scope: 'second' }));
    const all = await store.list();
    expect(all).toHaveLength(1);
    expect(all[0]?.scope).toBe('second');
  });

  it('round-trips the optional app server key', async () => {
    await store.insert(makeRecord({ appServerKey: 'BVAPID' }));
    expect((await store.get('c0ffee00c0ffee00c0ffee00c0ffee00'))?.appServerKey).toBe('BVAPID');
  });

  it('delete() reports whether a record existed', async () => {
    await store.insert(makeRecord());
    expect(await store.delete('c0ffee00c0ffee00c0ffee00c0ffee00')).toBe(true);
    expect(await store.delete('c0ffee00c0ffee00c0ffee00c0ffee00')).toBe(false);
  });

  it('deleteAll() returns the removed ids and leaves other keys alone', async () => {
    await backing.put('meta:identity', { uaid: 'u' });
    await store.insert(makeRecord({ channelId: 'a' }));
    await store.insert(makeRecord({ channelId: 'b' }));

    expect(await store.deleteAll()).toEqual(['a', 'b']);
    expect(await store.list()).toEqual([]);
    expect(await backing.get('meta:identity')).toEqual({ uaid: 'u' });
  });

  it('list() returns records in channel id order', async () => {
    await store.insert(makeRecord({ channelId: 'b' }));
    await store.insert(makeRecord({ channelId: 'a' }));
    expect((await store.list()).map((r) => r.channelId)).toEqual(['a', 'b']);
  });

  it('raises StorageError for a corrupt stored record', async () => {
    await backing.put('subscription:bad', { channelId: 'bad', scope: 3 });
    await expect(store.get('bad')).rejects.toBeInstanceOf(StorageError);
    await expect(store.list()).rejects.toThrow('Subscription record bad is corrupt');
  });

  it('refuses to insert an invalid record', async () => {
    await expect(store.insert(makeRecord({ endpoint: 'not a url' }))).rejects.toBeInstanceOf(StorageError);
    expect(await store.list()).toEqual([]);
  });

  it('wraps backing failures in StorageError', async () => {
    vi.spyOn(backing, 'put').mockRejectedValueOnce(new Error('disk full'));
    const err: unknown = await store.insert(makeRecord()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StorageError);
    expect((err as StorageError).message).toBe(
      'Failed to write subscription c0ffee00c0ffee00c0ffee00c0ffee00: disk full',
    );
    expect((err as StorageError).kind).toBe('storage');
  });
});
