import { ConfigurationError } from '@errors/configuration.error';
import { PersistenceInitError } from '@errors/persistence/persistenceInit.error';
import { error, info, warning } from '@services/logger';
import { logVersion } from '@utils/process/process.utils';
import { bootstrap } from './engine';
import type { Engine } from './engine';

export const main = async () => {
  info('init', logVersion());

  let engine: Engine;
  try {
    engine = bootstrap();
  } catch (e) {
    error('init', e instanceof Error ? e.message : e);
    if (e instanceof ConfigurationError) process.exitCode = 1;
    return;
  }

  const { configuration, persistence } = engine;
  info('init', `Paper trading: ${configuration.execution.paperTrading}`);
  try {
    await persistence.getInstance();
  } catch (e) {
    if (e instanceof PersistenceInitError) warning('init', `${e.message}, continuing without persistence`);
    else error('init', e instanceof Error ? e.message : e);
  }
  info('init', `Persistence state: ${persistence.getState()}`);

  try {
    await persistence.close();
  } catch (e) {
    error('init', `Unable to close persistence: ${e instanceof Error ? e.message : String(e)}`);
  }
};
