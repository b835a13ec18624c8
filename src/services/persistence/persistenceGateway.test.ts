import { PersistenceDisabledError } from '@errors/persistence/persistenceDisabled.error';
import { PersistenceInitError } from '@errors/persistence/persistenceInit.error';
import type { PersistenceConfiguration } from '@models/configuration.types';
import { error, warning } from '@services/logger';
import type { DocumentStorage } from '@services/storage/storage';
import { InMemoryStorage } from '@services/storage/storage.mock';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { PersistenceGateway } from './persistenceGateway';
import { ConnectedHandle, DisabledHandle } from './persistenceHandle';

vi.mock('@services/logger', () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warning: vi.fn(),
  error: vi.fn(),
}));

const connectedConfiguration: PersistenceConfiguration = {
  projectId: 'demo-project',
  credentialsPath: 'test-credentials.json',
  initTimeout: 10,
};

describe('PersistenceGateway', () => {
  let storage: InMemoryStorage;

  beforeEach(() => {
    storage = new InMemoryStorage();
  });

  it('should start uninitialized', () => {
    const gateway = new PersistenceGateway(connectedConfiguration, vi.fn());
    expect(gateway.getState()).toBe('uninitialized');
  });

  describe('without a project ID', () => {
    const disabledConfiguration = { ...connectedConfiguration, projectId: '' };

    it('should hand out a disabled handle without creating a storage', async () => {
      const createStorage = vi.fn();
      const gateway = new PersistenceGateway(disabledConfiguration, createStorage);

      const handle = await gateway.getInstance();

      expect(handle).toBeInstanceOf(DisabledHandle);
      expect(gateway.getState()).toBe('disabled');
      expect(createStorage).not.toHaveBeenCalled();
      expect(warning).toHaveBeenCalledWith('persistence', 'Firebase project ID not configured, persistence disabled');
    });

    it('should reject data operations with PersistenceDisabledError', async () => {
      const gateway = new PersistenceGateway(disabledConfiguration, vi.fn());
      const handle = await gateway.getInstance();

      await expect(handle.writeDocument('positions', 'BTC', { amount: 1 })).rejects.toThrow(PersistenceDisabledError);
    });
  });

  describe('with a project ID', () => {
    it('should connect through the storage factory', async () => {
      const createStorage = vi.fn(async () => storage);
      const gateway = new PersistenceGateway(connectedConfiguration, createStorage);

      const handle = await gateway.getInstance();

      expect(handle).toBeInstanceOf(ConnectedHandle);
      expect(gateway.getState()).toBe('connected');
      expect(createStorage).toHaveBeenCalledWith(connectedConfiguration);
    });

    it('should return the same handle on every call', async () => {
      const createStorage = vi.fn(async () => storage);
      const gateway = new PersistenceGateway(connectedConfiguration, createStorage);

      const first = await gateway.getInstance();
      const second = await gateway.getInstance();

      expect(second).toBe(first);
      expect(createStorage).toHaveBeenCalledTimes(1);
    });

    it('should initialize once for concurrent first callers', async () => {
      const createStorage = vi.fn(async () => {
        await new Promise(resolve => setTimeout(resolve, 5));
        return storage;
      });
      const gateway = new PersistenceGateway(connectedConfiguration, createStorage);

      const [first, second, third] = await Promise.all([
        gateway.getInstance(),
        gateway.getInstance(),
        gateway.getInstance(),
      ]);

      expect(second).toBe(first);
      expect(third).toBe(first);
      expect(createStorage).toHaveBeenCalledTimes(1);
    });

    it('should write through to the storage once connected', async () => {
      const gateway = new PersistenceGateway(connectedConfiguration, async () => storage);
      const handle = await gateway.getInstance();

      await handle.writeDocument('positions', 'BTC', { amount: 0.5 });

      await expect(storage.getDocument('positions', 'BTC')).resolves.toEqual({ amount: 0.5 });
    });
  });

  describe('failures', () => {
    it('should move to failed and wrap the factory error', async () => {
      const cause = new Error('DEADLINE_EXCEEDED');
      const gateway = new PersistenceGateway(connectedConfiguration, vi.fn().mockRejectedValue(cause));

      const result = gateway.getInstance();

      await expect(result).rejects.toThrow(PersistenceInitError);
      await expect(result).rejects.toThrow('[PERSISTENCE] Initialization failed: Unable to connect to demo-project');
      await expect(result).rejects.toHaveProperty('cause', cause);
      expect(gateway.getState()).toBe('failed');
      expect(error).toHaveBeenCalledWith(
        'persistence',
        '[PERSISTENCE] Initialization failed: Unable to connect to demo-project',
      );
    });

    it('should surface a PersistenceInitError from the factory as is', async () => {
      const failure = new PersistenceInitError('Malformed credentials in test-credentials.json (private_key)');
      const gateway = new PersistenceGateway(connectedConfiguration, vi.fn().mockRejectedValue(failure));

      await expect(gateway.getInstance()).rejects.toBe(failure);
    });

    it('should not retry implicitly after a failure', async () => {
      const createStorage = vi.fn().mockRejectedValue(new Error('UNAUTHENTICATED'));
      const gateway = new PersistenceGateway(connectedConfiguration, createStorage);

      const first = await gateway.getInstance().catch((err: unknown) => err);
      const second = await gateway.getInstance().catch((err: unknown) => err);

      expect(first).toBeInstanceOf(PersistenceInitError);
      expect(second).toBe(first);
      expect(createStorage).toHaveBeenCalledTimes(1);
    });

    it('should share one failure between concurrent first callers', async () => {
      const createStorage = vi.fn().mockRejectedValue(new Error('UNAUTHENTICATED'));
      const gateway = new PersistenceGateway(connectedConfiguration, createStorage);

      const [first, second] = await Promise.all([
        gateway.getInstance().catch((err: unknown) => err),
        gateway.getInstance().catch((err: unknown) => err),
      ]);

      expect(first).toBeInstanceOf(PersistenceInitError);
      expect(second).toBe(first);
      expect(createStorage).toHaveBeenCalledTimes(1);
    });

    it('should fail when the credentials file does not exist', async () => {
      const gateway = new PersistenceGateway({
        ...connectedConfiguration,
        credentialsPath: '/nonexistent/test-credentials.json',
      });

      await expect(gateway.getInstance()).rejects.toThrow(
        '[PERSISTENCE] Initialization failed: Unable to read credentials file /nonexistent/test-credentials.json',
      );
      expect(gateway.getState()).toBe('failed');
    });

    it('should time out a slow connection and close the storage once it arrives', async () => {
      let resolveStorage: (value: DocumentStorage) => void = () => {};
      const createStorage = vi.fn(
        () =>
          new Promise<DocumentStorage>(resolve => {
            resolveStorage = resolve;
          }),
      );
      const gateway = new PersistenceGateway({ ...connectedConfiguration, initTimeout: 0.01 }, createStorage);

      await expect(gateway.getInstance()).rejects.toThrow(
        '[PERSISTENCE] Initialization failed: Connection to demo-project timed out after 0.01s',
      );
      expect(gateway.getState()).toBe('failed');

      resolveStorage(storage);
      await vi.waitFor(() => expect(storage.closed).toBe(true));
    });
  });

  describe('reset', () => {
    it('should retry from scratch after a failure', async () => {
      const createStorage = vi.fn().mockRejectedValueOnce(new Error('UNAVAILABLE')).mockResolvedValueOnce(storage);
      const gateway = new PersistenceGateway(connectedConfiguration, createStorage);

      await expect(gateway.getInstance()).rejects.toThrow(PersistenceInitError);
      const handle = await gateway.reinitialize();

      expect(handle).toBeInstanceOf(ConnectedHandle);
      expect(gateway.getState()).toBe('connected');
      expect(createStorage).toHaveBeenCalledTimes(2);
    });

    it('should close the live storage and go back to uninitialized', async () => {
      const gateway = new PersistenceGateway(connectedConfiguration, async () => storage);
      const before = await gateway.getInstance();

      await gateway.reset();

      expect(storage.closed).toBe(true);
      expect(gateway.getState()).toBe('uninitialized');
      await expect(gateway.getInstance()).resolves.not.toBe(before);
    });

    it('should close the storage on shutdown', async () => {
      const gateway = new PersistenceGateway(connectedConfiguration, async () => storage);
      await gateway.getInstance();

      await gateway.close();

      expect(storage.closed).toBe(true);
    });
  });
});
