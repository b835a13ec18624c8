import { PersistenceError } from './persistence.error';

export class PersistenceInitError extends PersistenceError {
  constructor(message: string, options?: ErrorOptions) {
    super(`Initialization failed: ${message}`, options);
    this.name = 'PersistenceInitError';
  }
}
