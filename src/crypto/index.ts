// DecryptionPipeline - resolves a channel's keys and decrypts an inbound message.

import { RecordNotFoundError } from '../errors/index.js';
import type { SubscriptionStore } from '../store/subscription-store.js';
import type { SubscriptionRecord } from '../types/index.js';
import { decodeBase64, decryptPayload } from './ece.js';
import type { EncryptedMessage, ReceiverKeys } from './ece.js';

export { KeyManager, isValidPublicKey } from './keys.js';
export type { SubscriptionKeys } from './keys.js';
export { SUPPORTED_ENCODINGS } from './ece.js';
export type { ContentEncoding, EncryptedMessage } from './ece.js';

function receiverKeys(record: SubscriptionRecord): ReceiverKeys {
  return {
    publicKey: decodeBase64(record.publicKey, 'stored public key'),
    privateKey: decodeBase64(record.privateKey, 'stored private key'),
    authSecret: decodeBase64(record.authSecret, 'stored auth secret'),
  };
}

export class DecryptionPipeline {
  constructor(private readonly store: SubscriptionStore) {}

  /**
   * Decrypt `message` for `channelId`.
   * Throws RecordNotFoundError before touching any key material when the
   * channel is unknown, CryptoError for anything wrong with the message.
   */
  async decrypt(channelId: string, message: EncryptedMessage): Promise<Uint8Array> {
    const record = await this.store.get(channelId);
    if (!record) {
      throw new RecordNotFoundError(channelId);
    }
    return decryptPayload(message, receiverKeys(record));
  }
}
