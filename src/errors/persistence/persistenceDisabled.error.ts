import { PersistenceError } from './persistence.error';

export class PersistenceDisabledError extends PersistenceError {
  constructor(operation: string) {
    super(`Cannot ${operation}: persistence is disabled (FIREBASE_PROJECT_ID is not set)`);
    this.name = 'PersistenceDisabledError';
  }
}
