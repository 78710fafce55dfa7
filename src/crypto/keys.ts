/**
 * Per-subscription key material: a P-256 ECDH key pair and a 16-byte
 * authentication secret, all base64url encoded.
 */

import { createECDH, randomBytes } from 'node:crypto';
import { CryptoError, errorMessage } from '../errors/index.js';

export const CURVE = 'prime256v1';
export const AUTH_SECRET_LENGTH = 16;
export const PUBLIC_KEY_LENGTH = 65;
export const PRIVATE_KEY_LENGTH = 32;

export interface SubscriptionKeys {
  publicKey: string;
  privateKey: string;
  authSecret: string;
}

/**
 * Left-pad a private scalar to the curve size. OpenSSL drops leading zero
 * bytes, so roughly 1 in 256 keys comes back short.
 */
function padScalar(scalar: Buffer): Buffer {
  if (scalar.length >= PRIVATE_KEY_LENGTH) return scalar;
  return Buffer.concat([Buffer.alloc(PRIVATE_KEY_LENGTH - scalar.length), scalar]);
}

export class KeyManager {
  /** Generate fresh key material from the platform CSPRNG. */
  generateKeys(): SubscriptionKeys {
    try {
      const ecdh = createECDH(CURVE);
      const publicKey = ecdh.generateKeys();
      const privateKey = padScalar(ecdh.getPrivateKey());
      const authSecret = randomBytes(AUTH_SECRET_LENGTH);
      return {
        publicKey: publicKey.toString('base64url'),
        privateKey: privateKey.toString('base64url'),
        authSecret: authSecret.toString('base64url'),
      };
    } catch (err: unknown) {
      throw new CryptoError(`Key generation failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

/**
 * Check that `key` is a base64url encoded uncompressed P-256 point, as
 * required of VAPID application server keys.
 */
export function isValidPublicKey(key: string): boolean {
  if (!/^[A-Za-z0-9_-]+={0,2}$/.test(key)) return false;
  const raw = Buffer.from(key, 'base64url');
  if (raw.length !== PUBLIC_KEY_LENGTH || raw[0] !== 0x04) return false;
  try {
    // computeSecret throws if the point is not on the curve
    const ecdh = createECDH(CURVE);
    ecdh.generateKeys();
    ecdh.computeSecret(raw);
    return true;
  } catch {
    return false;
  }
}
