import { PersistenceInitError } from '@errors/persistence/persistenceInit.error';
import type { PersistenceConfiguration } from '@models/configuration.types';
import type { Nullable } from '@models/utility.types';
import { debug } from '@services/logger';
import type { App } from 'firebase-admin/app';
import { cert, deleteApp, initializeApp } from 'firebase-admin/app';
import type { Firestore, Query } from 'firebase-admin/firestore';
import { getFirestore } from 'firebase-admin/firestore';
import { readFile } from 'fs/promises';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { FIREBASE_APP_PREFIX } from './storage.const';
import { DocumentStorage } from './storage';
import type {
  ChangeListener,
  DocumentData,
  ErrorListener,
  QueryOptions,
  StoredDocument,
  Unsubscribe,
  WriteOptions,
} from './storage.types';

export const serviceAccountSchema = z.looseObject({
  project_id: z.string().min(1),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export class FirestoreStorage extends DocumentStorage {
  constructor(
    private readonly app: App,
    private readonly db: Firestore,
  ) {
    super();
  }

  public async getDocument(collection: string, id: string): Promise<Nullable<DocumentData>> {
    const snapshot = await this.db.collection(collection).doc(id).get();
    return snapshot.exists ? (snapshot.data() ?? null) : null;
  }

  public async setDocument(collection: string, id: string, data: DocumentData, { merge = false }: WriteOptions = {}) {
    await this.db.collection(collection).doc(id).set(data, { merge });
  }

  public async addDocument(collection: string, data: DocumentData) {
    const reference = await this.db.collection(collection).add(data);
    return reference.id;
  }

  public async deleteDocument(collection: string, id: string) {
    await this.db.collection(collection).doc(id).delete();
  }

  public async queryDocuments(collection: string, { filters = [], orderBy, limit }: QueryOptions = {}) {
    const filtered = filters.reduce<Query>(
      (query, { field, operator, value }) => query.where(field, operator, value),
      this.db.collection(collection),
    );
    const ordered = orderBy ? filtered.orderBy(orderBy.field, orderBy.direction ?? 'asc') : filtered;
    const snapshot = await (limit ? ordered.limit(limit) : ordered).get();
    return snapshot.docs.map<StoredDocument>(doc => ({ id: doc.id, data: doc.data() }));
  }

  public watchCollection(collection: string, onChange: ChangeListener, onError: ErrorListener): Unsubscribe {
    return this.db.collection(collection).onSnapshot(
      snapshot =>
        onChange(snapshot.docChanges().map(({ type, doc }) => ({ type, id: doc.id, data: doc.data() }))),
      onError,
    );
  }

  public async close() {
    await this.db.terminate();
    await deleteApp(this.app);
    debug('storage', `Firebase app ${this.app.name} deleted`);
  }
}

const readServiceAccount = async (credentialsPath: string) => {
  let content: string;
  try {
    content = await readFile(credentialsPath, 'utf8');
  } catch (err) {
    throw new PersistenceInitError(`Unable to read credentials file ${credentialsPath}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new PersistenceInitError(`Credentials file ${credentialsPath} is not valid JSON`, { cause: err });
  }

  const result = serviceAccountSchema.safeParse(parsed);
  if (!result.success) {
    const fields = result.error.issues.map(issue => issue.path.join('.')).join(', ');
    throw new PersistenceInitError(`Malformed credentials in ${credentialsPath} (${fields})`, { cause: result.error });
  }
  return result.data;
};

/**
 * Builds a Firestore-backed storage from the persistence configuration.
 * Each call initializes its own firebase app so that a reset gateway can
 * initialize again without clashing with the previous app.
 */
export const createFirestoreStorage = async ({ projectId, credentialsPath }: PersistenceConfiguration) => {
  const serviceAccount = await readServiceAccount(credentialsPath);
  const app = initializeApp(
    {
      credential: cert({
        projectId: serviceAccount.project_id,
        clientEmail: serviceAccount.client_email,
        privateKey: serviceAccount.private_key,
      }),
      projectId,
    },
    `${FIREBASE_APP_PREFIX}-${randomUUID()}`,
  );
  const db = getFirestore(app);

  try {
    await db.listCollections();
  } catch (err) {
    await deleteApp(app);
    throw new PersistenceInitError(`Unable to reach Firestore project ${projectId}`, { cause: err });
  }

  debug('storage', `Connected to Firestore project ${projectId}`);
  return new FirestoreStorage(app, db);
};
