// ReconciliationEngine - compares the local channel set with the relay's.
//
// It never resubscribes. It reports channels whose endpoints are gone so
// the caller can renegotiate them, and quietly asks the relay to drop
// channels nobody here knows about.

import { errorMessage } from '../errors/index.js';
import type { BridgeLogger } from '../logger/index.js';
import type { BridgeProtocolClient } from '../relay/client.js';
import type { RegistrationController } from '../registration/index.js';
import type { SubscriptionStore } from '../store/subscription-store.js';
import type { ConnectionIdentity, PushSubscriptionChanged, SubscriptionRecord } from '../types/index.js';

const COMPONENT = 'reconcile';

export class ReconciliationEngine {
  constructor(
    private readonly registration: RegistrationController,
    private readonly store: SubscriptionStore,
    private readonly client: BridgeProtocolClient,
    private readonly logger: BridgeLogger,
  ) {}

  /**
   * Returns the channels the caller must treat as changed. Order is
   * unspecified.
   */
  async verifyConnection(): Promise<PushSubscriptionChanged[]> {
    const identity = await this.registration.current();
    if (!identity) return [];

    const remote = await this.client.listChannels(identity);
    if (remote.kind === 'identity-invalid') {
      return this.reset(identity, remote.status);
    }

    const remoteIds = new Set(remote.value);
    const local = await this.store.list();
    const localIds = new Set(local.map((record) => record.channelId));

    const lost = local.filter((record) => !remoteIds.has(record.channelId));
    await this.removeAll(lost);
    const changed = lost.map(toChanged);

    for (const channelId of remoteIds) {
      if (localIds.has(channelId)) continue;
      await this.dropOrphan(identity, channelId);
    }

    if (changed.length > 0) {
      this.logger.log('info', COMPONENT, 'Channels lost by the relay', {
        uaid: identity.uaid,
        channels: changed.map((c) => c.channelId),
      });
    }
    return changed;
  }

  /**
   * The relay has forgotten this instance: drop the identity and every
   * subscription, and report all of them.
   */
  private async reset(identity: ConnectionIdentity, status: number): Promise<PushSubscriptionChanged[]> {
    this.logger.log('warn', COMPONENT, 'Relay no longer recognizes this instance; resetting', {
      uaid: identity.uaid,
      status,
    });
    const local = await this.store.list();
    await this.removeAll(local);
    try {
      await this.registration.clear();
    } catch (err: unknown) {
      await this.restore(local);
      throw err;
    }
    return local.map(toChanged);
  }

  /**
   * Delete every record or none: on a failure the records already removed
   * are put back, so the channels are still reported by the next call.
   */
  private async removeAll(records: SubscriptionRecord[]): Promise<void> {
    const removed: SubscriptionRecord[] = [];
    try {
      for (const record of records) {
        await this.store.delete(record.channelId);
        removed.push(record);
      }
    } catch (err: unknown) {
      await this.restore(removed);
      throw err;
    }
  }

  private async restore(records: SubscriptionRecord[]): Promise<void> {
    for (const record of records) {
      try {
        await this.store.insert(record);
      } catch (err: unknown) {
        this.logger.log('error', COMPONENT, 'Failed to restore subscription after an aborted reconciliation', {
          channelId: record.channelId,
          error: errorMessage(err),
        });
      }
    }
  }

  /** Best effort: a failure leaves the orphan for the next verification. */
  private async dropOrphan(identity: ConnectionIdentity, channelId: string): Promise<void> {
    try {
      const outcome = await this.client.deleteChannel(identity, channelId);
      if (outcome.kind === 'identity-invalid') {
        this.logger.log('warn', COMPONENT, 'Relay rejected orphan channel delete', {
          channelId,
          status: outcome.status,
        });
        return;
      }
      this.logger.log('debug', COMPONENT, 'Deleted orphan channel on relay', { channelId });
    } catch (err: unknown) {
      this.logger.log('warn', COMPONENT, 'Failed to delete orphan channel on relay', {
        channelId,
        error: errorMessage(err),
      });
    }
  }
}

function toChanged(record: SubscriptionRecord): PushSubscriptionChanged {
  return { channelId: record.channelId, scope: record.scope };
}
