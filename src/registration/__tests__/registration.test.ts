import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RegistrationController, IDENTITY_KEY } from '../index.js';
import { BridgeProtocolClient } from '../../relay/client.js';
import { MemoryRecordStore } from '../../store/record-store.js';
import { BridgeLogger } from '../../logger/index.js';
import { FakeRelay, RELAY_HOST } from '../../__tests__/fake-relay.js';
import { CommunicationError, RegistrationError, StorageError } from '../../errors/index.js';

describe('RegistrationController', () => {
  let relay: FakeRelay;
  let backing: MemoryRecordStore;
  let logger: BridgeLogger;
  let controller: RegistrationController;

  beforeEach(() => {
    relay = new FakeRelay();
    backing = new MemoryRecordStore();
    logger = new BridgeLogger({ level: 'silent' });
    const client = new BridgeProtocolClient(
      { serverHost: RELAY_HOST, httpProtocol: 'https', bridgeType: 'fcm', senderId: 'test-sender' },
      relay,
    );
    controller = new RegistrationController(
      backing,
      client,
      { senderId: 'test-sender', bridgeType: 'fcm', nativeToken: 'native-token-1' },
      logger,
    );
  });

  describe('ensureRegistered', () => {
    it('registers once and persists the identity', async () => {
      const identity = await controller.ensureRegistered();

      expect(identity).toEqual({
        uaid: 'uaid-1',
        secret: 'secret-1',
        senderId: 'test-sender',
        bridgeType: 'fcm',
        nativeToken: 'native-token-1',
      });
      expect(await backing.get(IDENTITY_KEY)).toEqual(identity);
      expect(relay.registrations.get('uaid-1')?.token).toBe('native-token-1');
    });

    it('reuses the stored identity without a network call', async () => {
      await controller.ensureRegistered();
      const again = await controller.ensureRegistered();

      expect(again.uaid).toBe('uaid-1');
      expect(relay.requests).toHaveLength(1);
    });

    it('wraps a relay rejection in RegistrationError and stores nothing', async () => {
      relay.failNext('POST', /registration$/, { status: 400, body: '{"error":"invalid sender id"}' });

      const err: unknown = await controller.ensureRegistered().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(RegistrationError);
      expect((err as RegistrationError).cause).toBeInstanceOf(CommunicationError);
      expect((err as RegistrationError).message).toBe(
        'Registration with the relay failed: POST /registration returned 400: invalid sender id',
      );
      expect(await controller.current()).toBeNull();
    });

    it('does not retry a failed registration', async () => {
      relay.failNext('POST', /registration$/, new Error('socket hang up'));

      await expect(controller.ensureRegistered()).rejects.toBeInstanceOf(RegistrationError);
      expect(relay.count('POST', /registration$/)).toBe(1);
    });

    it('wraps a failure to persist the identity in RegistrationError', async () => {
      vi.spyOn(backing, 'put').mockRejectedValueOnce(new Error('read-only filesystem'));

      const err: unknown = await controller.ensureRegistered().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(RegistrationError);
      expect((err as RegistrationError).cause).toBeInstanceOf(StorageError);
    });

    it('logs the registration', async () => {
      await controller.ensureRegistered();
      const messages = logger.getRecentEntries().map((e) => e.message);
      expect(messages).toEqual(['Registering application instance', 'Registered']);
    });
  });

  describe('current', () => {
    it('returns null when unregistered', async () => {
      expect(await controller.current()).toBeNull();
    });

    it('raises StorageError for a corrupt identity record', async () => {
      await backing.put(IDENTITY_KEY, { uaid: '' });
      await expect(controller.current()).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe('updateNativeToken', () => {
    it('uses the new token for a later registration when not yet registered', async () => {
      expect(await controller.updateNativeToken('native-token-2')).toBe(true);
      expect(relay.requests).toHaveLength(0);

      const identity = await controller.ensureRegistered();
      expect(identity.nativeToken).toBe('native-token-2');
      expect(relay.registrations.get('uaid-1')?.token).toBe('native-token-2');
    });

    it('skips the network when the token is unchanged', async () => {
      await controller.ensureRegistered();
      expect(await controller.updateNativeToken('native-token-1')).toBe(true);
      expect(relay.requests).toHaveLength(1);
    });

    it('sends the new token and persists it', async () => {
      await controller.ensureRegistered();
      expect(await controller.updateNativeToken('native-token-2')).toBe(true);

      expect(relay.registrations.get('uaid-1')?.token).toBe('native-token-2');
      expect((await controller.current())?.nativeToken).toBe('native-token-2');
    });

    it('returns false when the relay has forgotten the identity', async () => {
      await controller.ensureRegistered();
      relay.forget('uaid-1');

      expect(await controller.updateNativeToken('native-token-2')).toBe(false);
      expect((await controller.current())?.nativeToken).toBe('native-token-1');
    });

    it('propagates transient failures', async () => {
      await controller.ensureRegistered();
      relay.failNext('PUT', /registration/, { status: 502, body: '' });

      await expect(controller.updateNativeToken('native-token-2')).rejects.toMatchObject({
        classification: 'transient',
        status: 502,
      });
    });
  });

  it('clear() forgets the identity so the next call re-registers', async () => {
    await controller.ensureRegistered();
    await controller.clear();

    expect(await controller.current()).toBeNull();
    expect((await controller.ensureRegistered()).uaid).toBe('uaid-2');
  });
});
