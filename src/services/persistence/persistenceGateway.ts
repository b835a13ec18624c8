import { PersistenceInitError } from '@errors/persistence/persistenceInit.error';
import type { PersistenceConfiguration } from '@models/configuration.types';
import { error, info, warning } from '@services/logger';
import { createFirestoreStorage } from '@services/storage/firestore.storage';
import type { DocumentStorage } from '@services/storage/storage';
import { AsyncMutex } from '@utils/async/asyncMutex';
import { withTimeout } from '@utils/process/process.utils';
import { secondsToMilliseconds } from 'date-fns';
import type { PersistenceState } from './persistence.types';
import { ConnectedHandle, DisabledHandle, PersistenceHandle } from './persistenceHandle';

export type StorageFactory = (configuration: PersistenceConfiguration) => Promise<DocumentStorage>;

/**
 * Owns the process-wide connection to the document store.
 *
 * The first {@link getInstance} call decides the state: `disabled` without a
 * project ID, `connected` when the storage factory succeeds, `failed` otherwise.
 * That outcome is then returned to every caller until {@link reset} is called.
 */
export class PersistenceGateway {
  private state: PersistenceState = 'uninitialized';
  private handle?: PersistenceHandle;
  private storage?: DocumentStorage;
  private failure?: PersistenceInitError;
  private readonly mutex = new AsyncMutex();

  constructor(
    private readonly configuration: PersistenceConfiguration,
    private readonly createStorage: StorageFactory = createFirestoreStorage,
  ) {}

  public getState() {
    return this.state;
  }

  public getInstance(): Promise<PersistenceHandle> {
    return this.mutex.runExclusive(() => this.initialize());
  }

  public reset() {
    return this.mutex.runExclusive(async () => {
      const storage = this.storage;
      this.storage = undefined;
      this.handle = undefined;
      this.failure = undefined;
      this.state = 'uninitialized';
      if (storage) await storage.close();
    });
  }

  public async reinitialize() {
    await this.reset();
    return this.getInstance();
  }

  public close() {
    return this.reset();
  }

  private async initialize(): Promise<PersistenceHandle> {
    if (this.handle) return this.handle;
    if (this.failure) throw this.failure;

    const { projectId, initTimeout } = this.configuration;
    if (!projectId) {
      warning('persistence', 'Firebase project ID not configured, persistence disabled');
      return this.settle('disabled', new DisabledHandle());
    }

    const pending = Promise.resolve().then(() => this.createStorage(this.configuration));
    let storage: DocumentStorage;
    try {
      storage = await withTimeout(
        pending,
        secondsToMilliseconds(initTimeout),
        () => new PersistenceInitError(`Connection to ${projectId} timed out after ${initTimeout}s`),
      );
    } catch (err) {
      this.failure =
        err instanceof PersistenceInitError
          ? err
          : new PersistenceInitError(`Unable to connect to ${projectId}`, { cause: err });
      this.state = 'failed';
      error('persistence', this.failure.message);
      this.discardLateStorage(pending);
      throw this.failure;
    }

    this.storage = storage;
    info('persistence', `Connected to Firebase project ${projectId}`);
    return this.settle('connected', new ConnectedHandle(storage));
  }

  private settle(state: PersistenceState, handle: PersistenceHandle) {
    this.state = state;
    this.handle = handle;
    return handle;
  }

  // A storage that resolves after the timeout fired is never handed out
  private discardLateStorage(pending: Promise<DocumentStorage>) {
    void pending
      .then(
        late => late.close(),
        () => undefined, // rejection already reported by initialize()
      )
      .catch((err: unknown) => {
        error('persistence', `Unable to close late storage: ${err instanceof Error ? err.message : String(err)}`);
      });
  }
}
