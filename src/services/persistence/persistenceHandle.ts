import { PersistenceDisabledError } from '@errors/persistence/persistenceDisabled.error';
import { PersistenceOperationError } from '@errors/persistence/persistenceOperation.error';
import type { Nullable } from '@models/utility.types';
import { error, warning } from '@services/logger';
import type { DocumentStorage } from '@services/storage/storage';
import type {
  ChangeListener,
  DocumentData,
  ErrorListener,
  QueryOptions,
  StoredDocument,
  Unsubscribe,
  WriteOptions,
} from '@services/storage/storage.types';
import { STATE_COLLECTION, TRADES_COLLECTION } from './persistence.const';
import type { PersistenceState } from './persistence.types';

export abstract class PersistenceHandle {
  public abstract readonly state: Extract<PersistenceState, 'disabled' | 'connected'>;

  public abstract readDocument(collection: string, id: string): Promise<Nullable<DocumentData>>;
  public abstract writeDocument(collection: string, id: string, data: DocumentData, options?: WriteOptions): Promise<void>;
  public abstract addDocument(collection: string, data: DocumentData): Promise<string>;
  public abstract deleteDocument(collection: string, id: string): Promise<void>;
  public abstract queryDocuments(collection: string, options?: QueryOptions): Promise<StoredDocument[]>;
  public abstract streamUpdates(collection: string, onChange: ChangeListener, onError?: ErrorListener): Unsubscribe;

  /** Stores the latest state of a trading component under `trading_state/<key>`. */
  public saveState(key: string, state: DocumentData) {
    return this.writeDocument(STATE_COLLECTION, key, { ...state, updatedAt: Date.now() });
  }

  public loadState(key: string) {
    return this.readDocument(STATE_COLLECTION, key);
  }

  /** Appends a trade record, returning its generated id. */
  public logTrade(trade: DocumentData) {
    return this.addDocument(TRADES_COLLECTION, { ...trade, loggedAt: Date.now() });
  }
}

export class DisabledHandle extends PersistenceHandle {
  public readonly state = 'disabled';

  public readDocument(collection: string, id: string) {
    return this.reject<Nullable<DocumentData>>(`read ${collection}/${id}`);
  }

  public writeDocument(collection: string, id: string) {
    return this.reject<void>(`write ${collection}/${id}`);
  }

  public addDocument(collection: string) {
    return this.reject<string>(`add document to ${collection}`);
  }

  public deleteDocument(collection: string, id: string) {
    return this.reject<void>(`delete ${collection}/${id}`);
  }

  public queryDocuments(collection: string) {
    return this.reject<StoredDocument[]>(`query ${collection}`);
  }

  public streamUpdates(collection: string): Unsubscribe {
    throw this.disabled(`stream updates from ${collection}`);
  }

  private disabled(operation: string) {
    warning('persistence', `Persistence disabled, ignoring attempt to ${operation}`);
    return new PersistenceDisabledError(operation);
  }

  private reject<T>(operation: string): Promise<T> {
    return Promise.reject(this.disabled(operation));
  }
}

export class ConnectedHandle extends PersistenceHandle {
  public readonly state = 'connected';

  constructor(private readonly storage: DocumentStorage) {
    super();
  }

  public readDocument(collection: string, id: string) {
    return this.wrap(`read ${collection}/${id}`, () => this.storage.getDocument(collection, id));
  }

  public writeDocument(collection: string, id: string, data: DocumentData, options?: WriteOptions) {
    return this.wrap(`write ${collection}/${id}`, () => this.storage.setDocument(collection, id, data, options));
  }

  public addDocument(collection: string, data: DocumentData) {
    return this.wrap(`add document to ${collection}`, () => this.storage.addDocument(collection, data));
  }

  public deleteDocument(collection: string, id: string) {
    return this.wrap(`delete ${collection}/${id}`, () => this.storage.deleteDocument(collection, id));
  }

  public queryDocuments(collection: string, options?: QueryOptions) {
    return this.wrap(`query ${collection}`, () => this.storage.queryDocuments(collection, options));
  }

  public streamUpdates(collection: string, onChange: ChangeListener, onError?: ErrorListener): Unsubscribe {
    const operation = `stream updates from ${collection}`;
    try {
      return this.storage.watchCollection(collection, onChange, err => {
        const wrapped = new PersistenceOperationError(operation, err);
        error('persistence', wrapped.message);
        onError?.(wrapped);
      });
    } catch (err) {
      throw new PersistenceOperationError(operation, err);
    }
  }

  private async wrap<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw new PersistenceOperationError(operation, err);
    }
  }
}
