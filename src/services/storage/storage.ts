import type { Nullable } from '@models/utility.types';
import type {
  ChangeListener,
  DocumentData,
  ErrorListener,
  QueryOptions,
  StoredDocument,
  Unsubscribe,
  WriteOptions,
} from './storage.types';

export abstract class DocumentStorage {
  public abstract getDocument(collection: string, id: string): Promise<Nullable<DocumentData>>;
  public abstract setDocument(collection: string, id: string, data: DocumentData, options?: WriteOptions): Promise<void>;
  public abstract addDocument(collection: string, data: DocumentData): Promise<string>;
  public abstract deleteDocument(collection: string, id: string): Promise<void>;
  public abstract queryDocuments(collection: string, options?: QueryOptions): Promise<StoredDocument[]>;
  public abstract watchCollection(collection: string, onChange: ChangeListener, onError: ErrorListener): Unsubscribe;
  public abstract close(): Promise<void>;
}
