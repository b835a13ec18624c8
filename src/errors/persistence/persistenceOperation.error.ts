import { PersistenceError } from './persistence.error';

export class PersistenceOperationError extends PersistenceError {
  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'PersistenceOperationError';
  }
}
