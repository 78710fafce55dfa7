// Error hierarchy for the push bridge.
// Every error carries a `kind` so callers can switch on a single field
// instead of chaining instanceof checks.

export type PushBridgeErrorKind =
  | 'storage'
  | 'communication'
  | 'crypto'
  | 'record-not-found'
  | 'registration';

export type CommunicationClassification = 'transient' | 'identity-invalid' | 'permanent';

export abstract class PushBridgeError extends Error {
  abstract readonly kind: PushBridgeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The backing record store failed or returned data that does not validate. */
export class StorageError extends PushBridgeError {
  readonly kind = 'storage';
}

/**
 * The relay service could not be reached or rejected the call.
 * `status` is 0 when no HTTP response was received.
 */
export class CommunicationError extends PushBridgeError {
  readonly kind = 'communication';

  constructor(
    message: string,
    public readonly status: number,
    public readonly classification: CommunicationClassification,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  get retryable(): boolean {
    return this.classification === 'transient';
  }
}

/** Key generation or payload decryption failed. Never retried. */
export class CryptoError extends PushBridgeError {
  readonly kind = 'crypto';
}

export class RecordNotFoundError extends PushBridgeError {
  readonly kind = 'record-not-found';

  constructor(public readonly channelId: string) {
    super(`No subscription record for channel ${channelId}`);
  }
}

/** No connection identity is stored and registering a new one failed. */
export class RegistrationError extends PushBridgeError {
  readonly kind = 'registration';
}

/**
 * Classify an HTTP status returned by the relay.
 * 401/410 mean the relay has forgotten this instance or channel.
 */
export function classifyStatus(status: number): CommunicationClassification {
  if (status === 401 || status === 410) return 'identity-invalid';
  if (status === 0 || status >= 500 || status === 408 || status === 429) return 'transient';
  return 'permanent';
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
