/**
 * Encrypted Content-Encoding for Web Push, receiver side.
 *
 * - aes128gcm: RFC 8188 framing with RFC 8291 key derivation. Salt, record
 *   size and the sender's public key travel in a header at the front of
 *   the body.
 * - aesgcm: the earlier draft still sent by older application servers.
 *   Salt comes from the `Encryption` header and the sender key from the
 *   `Crypto-Key` header's `dh` parameter.
 *
 * All failures surface as CryptoError.
 */

import { createDecipheriv, createECDH, hkdfSync } from 'node:crypto';
import { CryptoError, errorMessage } from '../errors/index.js';
import { CURVE, PUBLIC_KEY_LENGTH } from './keys.js';

export const SUPPORTED_ENCODINGS = ['aes128gcm', 'aesgcm'] as const;
export type ContentEncoding = (typeof SUPPORTED_ENCODINGS)[number];

const TAG_LENGTH = 16;
const KEY_LENGTH = 16;
const NONCE_LENGTH = 12;
const SALT_LENGTH = 16;
const SHA_256_LENGTH = 32;
const AES128GCM_HEADER_LENGTH = 21;
const AESGCM_RECORD_SIZE = 4096;
const AESGCM_PAD_SIZE = 2;

const BASE64_PATTERN = /^[A-Za-z0-9_\-+/]+={0,2}$/;

/** Receiver key material, already decoded. */
export interface ReceiverKeys {
  publicKey: Buffer;
  privateKey: Buffer;
  authSecret: Buffer;
}

export interface EncryptedMessage {
  /** Ciphertext, raw or base64url encoded */
  body: string | Uint8Array;
  encoding: string;
  /** `Encryption` header (aesgcm only) */
  salt?: string;
  /** `Crypto-Key` header (aesgcm only) */
  dh?: string;
}

interface DerivedKey {
  key: Buffer;
  nonce: Buffer;
}

export function decodeBase64(value: string, what: string): Buffer {
  const trimmed = value.trim();
  if (!BASE64_PATTERN.test(trimmed)) {
    throw new CryptoError(`Malformed ${what}: not base64url`);
  }
  return Buffer.from(trimmed, 'base64url');
}

/** True for a value with no `name=` part; trailing base64 padding does not count. */
function isBareValue(part: string): boolean {
  return !part.replace(/=+$/, '').includes('=');
}

/**
 * Pull `name` out of a header such as `keyid=p256dh;dh=BNa...,p256ecdsa=BF...`.
 * A bare value with no parameters, padded or not, is returned as-is.
 */
export function headerParam(header: string, name: string): string | undefined {
  const parts = header.split(/[,;]/).map((p) => p.trim()).filter((p) => p.length > 0);
  for (const part of parts) {
    if (isBareValue(part)) continue;
    const eq = part.indexOf('=');
    if (part.slice(0, eq).trim().toLowerCase() === name) {
      return part.slice(eq + 1).trim().replace(/^"(.*)"$/, '$1');
    }
  }
  const [only] = parts;
  if (parts.length === 1 && only !== undefined && isBareValue(only)) {
    return only;
  }
  return undefined;
}

export function normalizeEncoding(encoding: string): ContentEncoding {
  const normalized = encoding.trim().toLowerCase();
  if (normalized === '') return 'aes128gcm';
  for (const supported of SUPPORTED_ENCODINGS) {
    if (supported === normalized) return supported;
  }
  throw new CryptoError(`Unsupported content encoding: ${encoding}`);
}

function hkdf(ikm: Buffer, salt: Buffer, info: Buffer, length: number): Buffer {
  return Buffer.from(hkdfSync('sha256', ikm, salt, info, length));
}

function sharedSecret(privateKey: Buffer, senderPublicKey: Buffer): Buffer {
  if (senderPublicKey.length !== PUBLIC_KEY_LENGTH || senderPublicKey[0] !== 0x04) {
    throw new CryptoError(`Sender public key must be a ${PUBLIC_KEY_LENGTH}-byte uncompressed point`);
  }
  try {
    const ecdh = createECDH(CURVE);
    ecdh.setPrivateKey(privateKey);
    return ecdh.computeSecret(senderPublicKey);
  } catch (err: unknown) {
    throw new CryptoError(`ECDH failed: ${errorMessage(err)}`, { cause: err });
  }
}

function info(label: string, ...parts: Buffer[]): Buffer {
  return Buffer.concat([Buffer.from(label, 'latin1'), ...parts]);
}

function lengthPrefixed(key: Buffer): Buffer {
  const len = Buffer.alloc(2);
  len.writeUInt16BE(key.length, 0);
  return Buffer.concat([len, key]);
}

/** Per-record nonce: the base nonce XOR the record sequence number. */
function recordNonce(base: Buffer, seq: number): Buffer {
  const nonce = Buffer.from(base);
  nonce.writeUInt32BE((nonce.readUInt32BE(NONCE_LENGTH - 4) ^ seq) >>> 0, NONCE_LENGTH - 4);
  return nonce;
}

function decryptRecord(derived: DerivedKey, seq: number, record: Buffer): Buffer {
  const data = record.subarray(0, record.length - TAG_LENGTH);
  const tag = record.subarray(record.length - TAG_LENGTH);
  try {
    const decipher = createDecipheriv('aes-128-gcm', derived.key, recordNonce(derived.nonce, seq));
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(data), decipher.final()]);
  } catch (err: unknown) {
    throw new CryptoError(`Record ${seq} failed authentication: ${errorMessage(err)}`, { cause: err });
  }
}

// --- aes128gcm -------------------------------------------------------------

function unpadAes128gcm(plaintext: Buffer, last: boolean, seq: number): Buffer {
  let i = plaintext.length - 1;
  while (i >= 0 && plaintext[i] === 0) i--;
  if (i < 0) {
    throw new CryptoError(`Record ${seq} has no padding delimiter`);
  }
  const expected = last ? 2 : 1;
  if (plaintext[i] !== expected) {
    throw new CryptoError(`Record ${seq} has padding delimiter ${plaintext[i]}, expected ${expected}`);
  }
  return plaintext.subarray(0, i);
}

function decryptAes128gcm(body: Buffer, keys: ReceiverKeys): Buffer {
  if (body.length < AES128GCM_HEADER_LENGTH) {
    throw new CryptoError('aes128gcm body is shorter than its header');
  }
  const salt = body.subarray(0, SALT_LENGTH);
  const rs = body.readUInt32BE(SALT_LENGTH);
  const idlen = body.readUInt8(SALT_LENGTH + 4);
  const payloadStart = AES128GCM_HEADER_LENGTH + idlen;
  if (body.length < payloadStart) {
    throw new CryptoError('aes128gcm body is shorter than its key id');
  }
  if (rs <= TAG_LENGTH + 1) {
    throw new CryptoError(`aes128gcm record size ${rs} is too small`);
  }
  const senderKey = body.subarray(AES128GCM_HEADER_LENGTH, payloadStart);
  const payload = body.subarray(payloadStart);
  if (payload.length === 0) {
    throw new CryptoError('aes128gcm body has no records');
  }

  const secret = sharedSecret(keys.privateKey, senderKey);
  const ikm = hkdf(
    secret,
    keys.authSecret,
    info('WebPush: info\0', keys.publicKey, senderKey),
    SHA_256_LENGTH,
  );
  const derived: DerivedKey = {
    key: hkdf(ikm, salt, info('Content-Encoding: aes128gcm\0'), KEY_LENGTH),
    nonce: hkdf(ikm, salt, info('Content-Encoding: nonce\0'), NONCE_LENGTH),
  };

  const chunks: Buffer[] = [];
  for (let start = 0, seq = 0; start < payload.length; seq++) {
    const end = Math.min(start + rs, payload.length);
    if (end - start <= TAG_LENGTH) {
      throw new CryptoError(`Record ${seq} is too small`);
    }
    const last = end >= payload.length;
    const plaintext = decryptRecord(derived, seq, payload.subarray(start, end));
    chunks.push(unpadAes128gcm(plaintext, last, seq));
    start = end;
  }
  return Buffer.concat(chunks);
}

// --- aesgcm ----------------------------------------------------------------

function unpadAesgcm(plaintext: Buffer, seq: number): Buffer {
  if (plaintext.length < AESGCM_PAD_SIZE) {
    throw new CryptoError(`Record ${seq} is missing its padding length`);
  }
  const padLength = plaintext.readUInt16BE(0);
  const dataStart = AESGCM_PAD_SIZE + padLength;
  if (dataStart > plaintext.length) {
    throw new CryptoError(`Record ${seq} padding exceeds record`);
  }
  for (let i = AESGCM_PAD_SIZE; i < dataStart; i++) {
    if (plaintext[i] !== 0) {
      throw new CryptoError(`Record ${seq} has non-zero padding`);
    }
  }
  return plaintext.subarray(dataStart);
}

function decryptAesgcm(body: Buffer, keys: ReceiverKeys, saltHeader?: string, dhHeader?: string): Buffer {
  const saltValue = saltHeader ? headerParam(saltHeader, 'salt') : undefined;
  if (!saltValue) {
    throw new CryptoError('aesgcm message is missing the salt parameter');
  }
  const dhValue = dhHeader ? headerParam(dhHeader, 'dh') : undefined;
  if (!dhValue) {
    throw new CryptoError('aesgcm message is missing the dh parameter');
  }
  const salt = decodeBase64(saltValue, 'salt');
  if (salt.length !== SALT_LENGTH) {
    throw new CryptoError(`Salt must be ${SALT_LENGTH} bytes, got ${salt.length}`);
  }
  const senderKey = decodeBase64(dhValue, 'dh');
  if (body.length === 0) {
    throw new CryptoError('aesgcm body is empty');
  }

  const secret = sharedSecret(keys.privateKey, senderKey);
  const ikm = hkdf(secret, keys.authSecret, info('Content-Encoding: auth\0'), SHA_256_LENGTH);
  // Receiver key first, then sender key
  const context = info('P-256\0', lengthPrefixed(keys.publicKey), lengthPrefixed(senderKey));
  const derived: DerivedKey = {
    key: hkdf(ikm, salt, info('Content-Encoding: aesgcm\0', context), KEY_LENGTH),
    nonce: hkdf(ikm, salt, info('Content-Encoding: nonce\0', context), NONCE_LENGTH),
  };

  const chunkSize = AESGCM_RECORD_SIZE + TAG_LENGTH;
  const chunks: Buffer[] = [];
  for (let start = 0, seq = 0; start < body.length; seq++) {
    const end = start + chunkSize;
    // A full-size final record means the sender's terminating record was cut off
    if (end === body.length) {
      throw new CryptoError('aesgcm payload is truncated');
    }
    const stop = Math.min(end, body.length);
    if (stop - start <= TAG_LENGTH) {
      throw new CryptoError(`Record ${seq} is too small`);
    }
    chunks.push(unpadAesgcm(decryptRecord(derived, seq, body.subarray(start, stop)), seq));
    start = stop;
  }
  return Buffer.concat(chunks);
}

/** Decrypt a Web Push message body with the receiving subscription's keys. */
export function decryptPayload(message: EncryptedMessage, keys: ReceiverKeys): Buffer {
  const encoding = normalizeEncoding(message.encoding);
  const body =
    typeof message.body === 'string'
      ? decodeBase64(message.body, 'body')
      : Buffer.from(message.body);

  if (encoding === 'aes128gcm') {
    return decryptAes128gcm(body, keys);
  }
  return decryptAesgcm(body, keys, message.salt, message.dh);
}
