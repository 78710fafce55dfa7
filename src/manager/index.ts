/**
 * PushManager - public surface of the bridge.
 *
 * Every operation runs through a single SerialQueue, network and disk I/O
 * included, so a subscribe can never interleave with an unsubscribe-all or
 * a second verifyConnection. Calls are interactive or daily, so
 * throughput does not matter here.
 *
 * Subscribing operations register with the relay on first use. Lookups
 * and decryption never do.
 */

import { randomUUID } from 'node:crypto';
import { DecryptionPipeline, KeyManager, isValidPublicKey } from '../crypto/index.js';
import { CommunicationError, CryptoError, errorMessage } from '../errors/index.js';
import { BridgeLogger } from '../logger/index.js';
import { ReconciliationEngine } from '../reconcile/index.js';
import { RegistrationController } from '../registration/index.js';
import { BridgeProtocolClient, normalizeChannelId } from '../relay/client.js';
import { FetchTransport } from '../relay/transport.js';
import type { HttpTransport } from '../relay/transport.js';
import { FileRecordStore, MemoryRecordStore } from '../store/record-store.js';
import type { RecordStore } from '../store/record-store.js';
import { SubscriptionStore } from '../store/subscription-store.js';
import { toDispatchInfo, toSubscriptionResponse } from '../types/index.js';
import type {
  DispatchInfo,
  PushBridgeConfig,
  PushSubscriptionChanged,
  SubscriptionRecord,
  SubscriptionResponse,
} from '../types/index.js';
import { SerialQueue } from './serial-queue.js';

const COMPONENT = 'manager';

export interface PushManagerDeps {
  config: PushBridgeConfig;
  recordStore: RecordStore;
  transport: HttpTransport;
  logger: BridgeLogger;
  keyManager?: KeyManager;
}

function newChannelId(): string {
  return randomUUID().replace(/-/g, '');
}

export class PushManager {
  private readonly queue = new SerialQueue();
  private readonly logger: BridgeLogger;
  private readonly keyManager: KeyManager;
  private readonly store: SubscriptionStore;
  private readonly client: BridgeProtocolClient;
  private readonly registration: RegistrationController;
  private readonly reconciler: ReconciliationEngine;
  private readonly pipeline: DecryptionPipeline;

  constructor(deps: PushManagerDeps) {
    const { config } = deps;
    this.logger = deps.logger;
    this.keyManager = deps.keyManager ?? new KeyManager();
    this.store = new SubscriptionStore(deps.recordStore);
    this.client = new BridgeProtocolClient(
      {
        serverHost: config.serverHost,
        httpProtocol: config.httpProtocol,
        bridgeType: config.bridgeType,
        senderId: config.senderId,
      },
      deps.transport,
    );
    this.registration = new RegistrationController(
      deps.recordStore,
      this.client,
      { senderId: config.senderId, bridgeType: config.bridgeType, nativeToken: config.nativeToken },
      this.logger,
    );
    this.reconciler = new ReconciliationEngine(this.registration, this.store, this.client, this.logger);
    this.pipeline = new DecryptionPipeline(this.store);
  }

  /**
   * Create a subscription.
   *
   * @param channelId - Caller-chosen id, or '' to generate one. An id that
   *   already has a subscription returns that subscription unchanged.
   * @param scope - Opaque scope string, may be empty
   * @param appServerKey - VAPID public key to lock the subscription to
   */
  subscribe(channelId = '', scope = '', appServerKey?: string): Promise<SubscriptionResponse> {
    return this.queue.run(async () => {
      const serverKey = appServerKey ? appServerKey : undefined;
      if (serverKey !== undefined && !isValidPublicKey(serverKey)) {
        throw new CryptoError('Application server key is not a base64url P-256 public key');
      }

      const identity = await this.registration.ensureRegistered();

      const requested = normalizeChannelId(channelId);
      if (requested !== '') {
        const existing = await this.store.get(requested);
        if (existing) {
          this.logger.log('debug', COMPONENT, 'Channel already subscribed', { channelId: requested });
          return toSubscriptionResponse(existing);
        }
      }
      const id = requested !== '' ? requested : newChannelId();

      const keys = this.keyManager.generateKeys();

      const outcome = await this.client.createChannel(identity, id, serverKey);
      if (outcome.kind === 'identity-invalid') {
        throw new CommunicationError(
          `Relay no longer recognizes this instance (HTTP ${outcome.status}); verify the connection`,
          outcome.status,
          'identity-invalid',
        );
      }

      const record: SubscriptionRecord = {
        channelId: id,
        scope,
        endpoint: outcome.value,
        ...keys,
      };
      if (serverKey !== undefined) record.appServerKey = serverKey;

      // If this fails the relay holds an orphan channel, which the next
      // verifyConnection() deletes.
      await this.store.insert(record);
      this.logger.log('info', COMPONENT, 'Subscribed', { channelId: id, scope });
      return toSubscriptionResponse(record);
    });
  }

  /**
   * Remove one subscription, or all of them when `channelId` is ''.
   * Returns false when the channel is unknown locally, or when the relay
   * no longer knows this instance (local state is removed regardless).
   */
  unsubscribe(channelId: string): Promise<boolean> {
    if (channelId === '') return this.unsubscribeAll();

    return this.queue.run(async () => {
      const id = normalizeChannelId(channelId);
      const record = await this.store.get(id);
      if (!record) return false;

      const identity = await this.registration.current();
      if (!identity) {
        await this.store.delete(id);
        return false;
      }

      const outcome = await this.client.deleteChannel(identity, id);
      await this.store.delete(id);
      if (outcome.kind === 'identity-invalid') {
        this.logger.log('warn', COMPONENT, 'Relay rejected unsubscribe; identity is no longer valid', {
          channelId: id,
          status: outcome.status,
        });
        return false;
      }
      this.logger.log('info', COMPONENT, 'Unsubscribed', { channelId: id });
      return true;
    });
  }

  /** Remove every subscription. Same return contract as unsubscribe(). */
  unsubscribeAll(): Promise<boolean> {
    return this.queue.run(async () => {
      const identity = await this.registration.current();
      if (!identity) {
        await this.store.deleteAll();
        return true;
      }

      const outcome = await this.client.deleteAllChannels(identity);
      const removed = await this.store.deleteAll();
      if (outcome.kind === 'identity-invalid') {
        this.logger.log('warn', COMPONENT, 'Relay rejected unsubscribe-all; identity is no longer valid', {
          uaid: identity.uaid,
          status: outcome.status,
        });
        return false;
      }
      this.logger.log('info', COMPONENT, 'Unsubscribed all channels', { count: removed.length });
      return true;
    });
  }

  /**
   * Report a new native push token. False means the relay has forgotten
   * this instance and verifyConnection() will report new endpoint churn.
   */
  updateNativeToken(newToken: string): Promise<boolean> {
    return this.queue.run(() => this.registration.updateNativeToken(newToken));
  }

  /**
   * Compare local subscriptions against the relay. Does not resubscribe;
   * returns the channels whose endpoints the caller must renegotiate.
   */
  verifyConnection(): Promise<PushSubscriptionChanged[]> {
    return this.queue.run(() => this.reconciler.verifyConnection());
  }

  /**
   * Decrypt an inbound message.
   *
   * @param body - Ciphertext, raw or base64url
   * @param encoding - Content encoding; '' means aes128gcm
   * @param salt - `Encryption` header (aesgcm only)
   * @param dh - `Crypto-Key` header (aesgcm only)
   */
  decrypt(
    channelId: string,
    body: string | Uint8Array,
    encoding = 'aes128gcm',
    salt?: string,
    dh?: string,
  ): Promise<Uint8Array> {
    return this.queue.run(async () => {
      const id = normalizeChannelId(channelId);
      try {
        return await this.pipeline.decrypt(id, { body, encoding, salt, dh });
      } catch (err: unknown) {
        this.logger.log('warn', 'decrypt', 'Rejected inbound message', {
          channelId: id,
          error: errorMessage(err),
        });
        throw err;
      }
    });
  }

  /** Channel id, scope and endpoint for routing a decrypted message. */
  dispatchInfoForChid(channelId: string): Promise<DispatchInfo | null> {
    return this.queue.run(async () => {
      const record = await this.store.get(normalizeChannelId(channelId));
      return record ? toDispatchInfo(record) : null;
    });
  }

  /** Flush pending log output. */
  async close(): Promise<void> {
    await this.queue.run(() => this.logger.flush());
  }
}

export interface CreatePushManagerOptions {
  recordStore?: RecordStore;
  transport?: HttpTransport;
  logger?: BridgeLogger;
}

/**
 * Build a PushManager with the default collaborators for `config`: a file
 * store at `databasePath` (memory otherwise), fetch, and a pino logger.
 */
export function createPushManager(
  config: PushBridgeConfig,
  options: CreatePushManagerOptions = {},
): PushManager {
  return new PushManager({
    config,
    recordStore:
      options.recordStore ??
      (config.databasePath !== undefined ? new FileRecordStore(config.databasePath) : new MemoryRecordStore()),
    transport: options.transport ?? new FetchTransport({ timeoutMs: config.requestTimeoutMs }),
    logger: options.logger ?? new BridgeLogger({ logDir: config.logDir, level: config.logLevel }),
  });
}
