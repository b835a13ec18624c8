import type { Tag } from '@models/tag.types';
import { upperCase } from 'lodash-es';

export class EngineError extends Error {
  constructor(tag: Tag, message: string, options?: ErrorOptions) {
    super(`[${upperCase(tag)}] ${message}`, options);
    this.name = 'EngineError';
  }
}
