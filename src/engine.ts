import type { TradingConfiguration } from '@models/configuration.types';
import { loadConfiguration } from '@services/configuration/configuration';
import { PersistenceGateway } from '@services/persistence/persistenceGateway';
import type { StorageFactory } from '@services/persistence/persistenceGateway';
import { config as loadDotenv } from 'dotenv';

export type Engine = {
  configuration: TradingConfiguration;
  persistence: PersistenceGateway;
};

export type BootstrapOptions = {
  env?: NodeJS.ProcessEnv;
  dotenvPath?: string;
  createStorage?: StorageFactory;
};

/**
 * Builds the configuration and the persistence gateway once. Values from the
 * `.env` file only fill variables missing from `env`. Components needing either
 * receive them from the returned engine.
 */
export const bootstrap = ({ env = process.env, dotenvPath, createStorage }: BootstrapOptions = {}): Engine => {
  const { parsed } = loadDotenv({ path: dotenvPath, processEnv: {} });
  const configuration = loadConfiguration({ ...parsed, ...env });
  const persistence = new PersistenceGateway(configuration.persistence, createStorage);
  return { configuration, persistence };
};
