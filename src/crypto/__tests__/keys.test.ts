import { describe, it, expect } from 'vitest';
import { createECDH } from 'node:crypto';
import { KeyManager, isValidPublicKey } from '../keys.js';

describe('KeyManager', () => {
  const manager = new KeyManager();

  it('generates a 65-byte uncompressed public key, 32-byte private key and 16-byte auth secret', () => {
    const keys = manager.generateKeys();
    const publicKey = Buffer.from(keys.publicKey, 'base64url');
    expect(publicKey).toHaveLength(65);
    expect(publicKey[0]).toBe(0x04);
    expect(Buffer.from(keys.privateKey, 'base64url')).toHaveLength(32);
    expect(Buffer.from(keys.authSecret, 'base64url')).toHaveLength(16);
  });

  it('private key reproduces the published public key', () => {
    const keys = manager.generateKeys();
    const ecdh = createECDH('prime256v1');
    ecdh.setPrivateKey(Buffer.from(keys.privateKey, 'base64url'));
    expect(ecdh.getPublicKey().toString('base64url')).toBe(keys.publicKey);
  });

  it('never repeats key material across calls', () => {
    const a = manager.generateKeys();
    const b = manager.generateKeys();
    expect(a.publicKey).not.toBe(b.publicKey);
    expect(a.privateKey).not.toBe(b.privateKey);
    expect(a.authSecret).not.toBe(b.authSecret);
  });
});

describe('isValidPublicKey', () => {
  it('accepts a generated public key', () => {
    const { publicKey } = new KeyManager().generateKeys();
    expect(isValidPublicKey(publicKey)).toBe(true);
  });

  it('rejects keys of the wrong length', () => {
    expect(isValidPublicKey(Buffer.alloc(33, 1).toString('base64url'))).toBe(false);
  });

  it('rejects a 65-byte value that is not on the curve', () => {
    const bogus = Buffer.alloc(65, 7);
    bogus[0] = 0x04;
    expect(isValidPublicKey(bogus.toString('base64url'))).toBe(false);
  });

  it('rejects non-base64 input', () => {
    expect(isValidPublicKey('not a key!')).toBe(false);
  });
});
