import { EngineError } from '@errors/engine.error';

export class PersistenceError extends EngineError {
  constructor(message: string, options?: ErrorOptions) {
    super('persistence', message, options);
    this.name = 'PersistenceError';
  }
}
