export type PersistenceState = 'uninitialized' | 'disabled' | 'connected' | 'failed';
