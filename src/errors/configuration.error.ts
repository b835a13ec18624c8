import { EngineError } from '@errors/engine.error';

export class ConfigurationError extends EngineError {
  constructor(message: string) {
    super('configuration', message);
    this.name = 'ConfigurationError';
  }
}
