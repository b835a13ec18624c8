export type DocumentData = Record<string, unknown>;

export type StoredDocument = { id: string; data: DocumentData };

export type FilterOperator = '<' | '<=' | '==' | '!=' | '>=' | '>' | 'array-contains' | 'in';
export type QueryFilter = { field: string; operator: FilterOperator; value: unknown };
export type QueryOptions = {
  filters?: QueryFilter[];
  orderBy?: { field: string; direction?: 'asc' | 'desc' };
  limit?: number;
};

export type WriteOptions = { merge?: boolean };

export type DocumentChange = { type: 'added' | 'modified' | 'removed'; id: string; data: DocumentData };
export type ChangeListener = (changes: DocumentChange[]) => void;
export type ErrorListener = (err: Error) => void;
export type Unsubscribe = () => void;
