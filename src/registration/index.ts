// RegistrationController - owns the connection identity (uaid) lifecycle.
// The identity is a single record under `meta:identity`; it is created
// lazily by the first subscribing call and dropped when the relay forgets it.

import { z } from 'zod';
import {
  RegistrationError,
  StorageError,
  errorMessage,
} from '../errors/index.js';
import type { BridgeLogger } from '../logger/index.js';
import type { BridgeProtocolClient } from '../relay/client.js';
import type { RecordStore } from '../store/record-store.js';
import { BRIDGE_TYPES } from '../types/index.js';
import type { BridgeType, ConnectionIdentity } from '../types/index.js';

export const IDENTITY_KEY = 'meta:identity';

const COMPONENT = 'registration';

const ConnectionIdentitySchema = z.object({
  uaid: z.string().min(1),
  secret: z.string().min(1).optional(),
  senderId: z.string().min(1),
  bridgeType: z.enum(BRIDGE_TYPES),
  nativeToken: z.string(),
});

export interface RegistrationOptions {
  senderId: string;
  bridgeType: BridgeType;
  nativeToken: string;
}

export class RegistrationController {
  private nativeToken: string;

  constructor(
    private readonly backing: RecordStore,
    private readonly client: BridgeProtocolClient,
    private readonly options: RegistrationOptions,
    private readonly logger: BridgeLogger,
  ) {
    this.nativeToken = options.nativeToken;
  }

  /** The stored identity, or null if this installation is unregistered. */
  async current(): Promise<ConnectionIdentity | null> {
    let raw: unknown;
    try {
      raw = await this.backing.get(IDENTITY_KEY);
    } catch (err: unknown) {
      throw new StorageError(`Failed to read connection identity: ${errorMessage(err)}`, { cause: err });
    }
    if (raw === undefined || raw === null) return null;

    const result = ConnectionIdentitySchema.safeParse(raw);
    if (!result.success) {
      throw new StorageError(`Stored connection identity is corrupt: ${result.error.message}`);
    }
    return result.data;
  }

  /**
   * Return the stored identity, registering a new one first if none exists.
   * Registration is attempted once; any failure becomes RegistrationError.
   */
  async ensureRegistered(): Promise<ConnectionIdentity> {
    const existing = await this.current();
    if (existing) return existing;

    this.logger.log('info', COMPONENT, 'Registering application instance', {
      senderId: this.options.senderId,
      bridgeType: this.options.bridgeType,
    });

    let identity: ConnectionIdentity;
    try {
      const registration = await this.client.register(this.nativeToken);
      identity = {
        uaid: registration.uaid,
        senderId: this.options.senderId,
        bridgeType: this.options.bridgeType,
        nativeToken: this.nativeToken,
      };
      if (registration.secret !== undefined) identity.secret = registration.secret;
      await this.save(identity);
    } catch (err: unknown) {
      this.logger.log('error', COMPONENT, 'Registration failed', { error: errorMessage(err) });
      throw new RegistrationError(`Registration with the relay failed: ${errorMessage(err)}`, { cause: err });
    }

    this.logger.log('info', COMPONENT, 'Registered', { uaid: identity.uaid });
    return identity;
  }

  /**
   * Tell the relay the native push token changed.
   * Returns false when the relay no longer knows this instance; the caller
   * should expect new endpoints from the next verifyConnection().
   */
  async updateNativeToken(newToken: string): Promise<boolean> {
    this.nativeToken = newToken;
    const identity = await this.current();
    if (!identity) {
      // Picked up by the next registration
      return true;
    }
    if (identity.nativeToken === newToken) return true;

    const outcome = await this.client.updateToken(identity, newToken);
    if (outcome.kind === 'identity-invalid') {
      this.logger.log('warn', COMPONENT, 'Relay rejected token update; identity is no longer valid', {
        uaid: identity.uaid,
        status: outcome.status,
      });
      return false;
    }

    await this.save({ ...identity, nativeToken: newToken });
    this.logger.log('info', COMPONENT, 'Native token updated', { uaid: identity.uaid });
    return true;
  }

  /** Forget the stored identity. The next subscribing call re-registers. */
  async clear(): Promise<void> {
    try {
      await this.backing.delete(IDENTITY_KEY);
    } catch (err: unknown) {
      throw new StorageError(`Failed to delete connection identity: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async save(identity: ConnectionIdentity): Promise<void> {
    try {
      await this.backing.put(IDENTITY_KEY, identity);
    } catch (err: unknown) {
      throw new StorageError(`Failed to persist connection identity: ${errorMessage(err)}`, { cause: err });
    }
  }
}
