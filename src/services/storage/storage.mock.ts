import type { Nullable } from '@models/utility.types';
import { cloneDeep, filter, forEach, orderBy as sortBy, take } from 'lodash-es';
import { DocumentStorage } from './storage';
import type {
  ChangeListener,
  DocumentChange,
  DocumentData,
  ErrorListener,
  QueryFilter,
  QueryOptions,
  StoredDocument,
  WriteOptions,
} from './storage.types';

const matches = (data: DocumentData, { field, operator, value }: QueryFilter) => {
  const actual = data[field];
  switch (operator) {
    case '==':
      return actual === value;
    case '!=':
      return actual !== value;
    case '<':
      return Number(actual) < Number(value);
    case '<=':
      return Number(actual) <= Number(value);
    case '>':
      return Number(actual) > Number(value);
    case '>=':
      return Number(actual) >= Number(value);
    case 'array-contains':
      return Array.isArray(actual) && actual.includes(value);
    case 'in':
      return Array.isArray(value) && value.includes(actual);
  }
};

/** In-process document storage used by tests in place of Firestore. */
export class InMemoryStorage extends DocumentStorage {
  public closed = false;
  private collections = new Map<string, Map<string, DocumentData>>();
  private listeners = new Map<string, Set<ChangeListener>>();
  private sequence = 0;

  public async getDocument(collection: string, id: string): Promise<Nullable<DocumentData>> {
    const data = this.collection(collection).get(id);
    return data ? cloneDeep(data) : null;
  }

  public async setDocument(collection: string, id: string, data: DocumentData, { merge = false }: WriteOptions = {}) {
    const documents = this.collection(collection);
    const previous = documents.get(id);
    const next = merge && previous ? { ...previous, ...cloneDeep(data) } : cloneDeep(data);
    documents.set(id, next);
    this.notify(collection, { type: previous ? 'modified' : 'added', id, data: cloneDeep(next) });
  }

  public async addDocument(collection: string, data: DocumentData) {
    this.sequence += 1;
    const id = `doc-${this.sequence}`;
    await this.setDocument(collection, id, data);
    return id;
  }

  public async deleteDocument(collection: string, id: string) {
    const documents = this.collection(collection);
    const previous = documents.get(id);
    if (!previous) return;
    documents.delete(id);
    this.notify(collection, { type: 'removed', id, data: previous });
  }

  public async queryDocuments(collection: string, { filters = [], orderBy, limit }: QueryOptions = {}) {
    const documents: StoredDocument[] = Array.from(this.collection(collection), ([id, data]) => ({
      id,
      data: cloneDeep(data),
    }));
    const filtered = filter(documents, ({ data }) => filters.every(queryFilter => matches(data, queryFilter)));
    const ordered = orderBy
      ? sortBy(filtered, ({ data }) => data[orderBy.field], orderBy.direction ?? 'asc')
      : filtered;
    return limit ? take(ordered, limit) : ordered;
  }

  public watchCollection(collection: string, onChange: ChangeListener, _onError: ErrorListener) {
    const listeners = this.listeners.get(collection) ?? new Set<ChangeListener>();
    listeners.add(onChange);
    this.listeners.set(collection, listeners);
    return () => {
      listeners.delete(onChange);
    };
  }

  public async close() {
    this.closed = true;
  }

  private collection(name: string) {
    const documents = this.collections.get(name) ?? new Map<string, DocumentData>();
    this.collections.set(name, documents);
    return documents;
  }

  private notify(collection: string, change: DocumentChange) {
    forEach(Array.from(this.listeners.get(collection) ?? []), listener => listener([change]));
  }
}
