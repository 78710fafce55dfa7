// SubscriptionStore - channel id -> subscription record, over a RecordStore.
// Records live under `subscription:<channelId>` and are validated with Zod
// whenever they are read back.

import { z } from 'zod';
import { StorageError, errorMessage } from '../errors/index.js';
import type { SubscriptionRecord } from '../types/index.js';
import type { RecordStore } from './record-store.js';

export const SUBSCRIPTION_KEY_PREFIX = 'subscription:';

const SubscriptionRecordSchema = z.object({
  channelId: z.string().min(1),
  scope: z.string(),
  endpoint: z.string().url(),
  publicKey: z.string().min(1),
  privateKey: z.string().min(1),
  authSecret: z.string().min(1),
  appServerKey: z.string().min(1).optional(),
});

function keyFor(channelId: string): string {
  return `${SUBSCRIPTION_KEY_PREFIX}${channelId}`;
}

/**
 * Owns every subscription record. Nothing else reads or writes the
 * `subscription:` keyspace; other components look records up by channel id.
 */
export class SubscriptionStore {
  constructor(private readonly backing: RecordStore) {}

  /** Insert or overwrite the record for `record.channelId`. */
  async insert(record: SubscriptionRecord): Promise<void> {
    const valid = this.validate(record, record.channelId);
    await this.guard(`write subscription ${record.channelId}`, () =>
      this.backing.put(keyFor(valid.channelId), valid),
    );
  }

  async get(channelId: string): Promise<SubscriptionRecord | null> {
    const raw = await this.guard(`read subscription ${channelId}`, () =>
      this.backing.get(keyFor(channelId)),
    );
    if (raw === undefined || raw === null) return null;
    return this.validate(raw, channelId);
  }

  /** Returns true if a record existed and was removed. */
  async delete(channelId: string): Promise<boolean> {
    const key = keyFor(channelId);
    const existing = await this.guard(`read subscription ${channelId}`, () => this.backing.get(key));
    if (existing === undefined || existing === null) return false;
    await this.guard(`delete subscription ${channelId}`, () => this.backing.delete(key));
    return true;
  }

  /** Remove every record and return the removed channel ids. */
  async deleteAll(): Promise<string[]> {
    const entries = await this.guard('list subscriptions', () =>
      this.backing.list(SUBSCRIPTION_KEY_PREFIX),
    );
    const removed: string[] = [];
    for (const [key] of entries) {
      await this.guard(`delete ${key}`, () => this.backing.delete(key));
      removed.push(key.slice(SUBSCRIPTION_KEY_PREFIX.length));
    }
    return removed;
  }

  async list(): Promise<SubscriptionRecord[]> {
    const entries = await this.guard('list subscriptions', () =>
      this.backing.list(SUBSCRIPTION_KEY_PREFIX),
    );
    return entries.map(([key, value]) =>
      this.validate(value, key.slice(SUBSCRIPTION_KEY_PREFIX.length)),
    );
  }

  private validate(value: unknown, channelId: string): SubscriptionRecord {
    const result = SubscriptionRecordSchema.safeParse(value);
    if (!result.success) {
      throw new StorageError(
        `Subscription record ${channelId} is corrupt: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      );
    }
    return result.data;
  }

  private async guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      if (err instanceof StorageError) throw err;
      throw new StorageError(`Failed to ${action}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
