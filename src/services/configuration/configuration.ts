import { ConfigurationError } from '@errors/configuration.error';
import type { TradingConfiguration } from '@models/configuration.types';
import { warning } from '@services/logger';
import { first, forEach, isObject } from 'lodash-es';
import { configurationSchema } from './configuration.schema';

const deepFreeze = <T extends object>(value: T): T => {
  forEach(Object.values(value), child => {
    if (isObject(child)) deepFreeze(child);
  });
  return Object.freeze(value);
};

const checkRange = (name: string, value: number, isValid: boolean, expected: string) => {
  if (!isValid) throw new ConfigurationError(`${name} must be ${expected} (got ${value})`);
};

const validateConfiguration = ({ risk, learning, execution, persistence }: TradingConfiguration) => {
  const { maxPositionSize, stopLossPercent } = risk;
  checkRange('MAX_POSITION_SIZE', maxPositionSize, maxPositionSize > 0 && maxPositionSize <= 1, 'between 0 and 1');
  checkRange('STOP_LOSS_PERCENT', stopLossPercent, stopLossPercent > 0, 'positive');

  const { learningRate, discountFactor, explorationRate } = learning;
  checkRange('RL_LEARNING_RATE', learningRate, learningRate > 0 && learningRate <= 1, 'in ]0, 1]');
  checkRange('RL_DISCOUNT_FACTOR', discountFactor, discountFactor >= 0 && discountFactor <= 1, 'in [0, 1]');
  checkRange('RL_EXPLORATION_RATE', explorationRate, explorationRate >= 0 && explorationRate <= 1, 'in [0, 1]');

  if (!persistence.projectId && !execution.paperTrading)
    warning('configuration', 'Firebase project ID not set - some features disabled');
};

/**
 * Builds the trading configuration from environment variables.
 *
 * The returned record is deeply frozen. Invariants are checked in a fixed order
 * and the first violation throws a {@link ConfigurationError}. A missing Firebase
 * project ID only logs a warning.
 */
export const loadConfiguration = (env: NodeJS.ProcessEnv = process.env): TradingConfiguration => {
  const result = configurationSchema.safeParse(env);
  if (!result.success) {
    const issue = first(result.error.issues);
    throw new ConfigurationError(`Invalid ${issue?.path.join('.') ?? 'environment'}: ${issue?.message}`);
  }

  const configuration = deepFreeze(result.data);
  validateConfiguration(configuration);
  return configuration;
};
