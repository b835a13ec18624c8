import { isString } from 'lodash-es';
import { z } from 'zod';
import {
  DEFAULT_CREDENTIALS_PATH,
  DEFAULT_CRYPTO_EXCHANGE,
  DEFAULT_HISTORICAL_DAYS,
  DEFAULT_INIT_TIMEOUT,
  DEFAULT_MAX_DRAWDOWN,
  DEFAULT_MAX_POSITION_SIZE,
  DEFAULT_MIN_LIQUIDITY,
  DEFAULT_NEWS_API,
  DEFAULT_ORDER_TIMEOUT,
  DEFAULT_PAPER_TRADING,
  DEFAULT_RL_DISCOUNT_FACTOR,
  DEFAULT_RL_EPISODES,
  DEFAULT_RL_EXPLORATION_RATE,
  DEFAULT_RL_LEARNING_RATE,
  DEFAULT_STOCKS_API,
  DEFAULT_STOP_LOSS_PERCENT,
  DEFAULT_UPDATE_INTERVAL,
  MAX_INIT_TIMEOUT,
} from './configuration.const';

// Blank numeric variables fall back to their default, like unset ones
const isBlank = (value: unknown) => value === undefined || (isString(value) && value.trim() === '');

const withDefault = <T extends z.ZodType>(fallback: number, schema: T) =>
  z.preprocess(value => (isBlank(value) ? fallback : value), schema);

const numberVariable = (fallback: number) => withDefault(fallback, z.coerce.number());
const positiveIntegerVariable = (fallback: number) => withDefault(fallback, z.coerce.number().int().positive());

export const environmentSchema = z.object({
  CRYPTO_EXCHANGE: z.string().default(DEFAULT_CRYPTO_EXCHANGE),
  STOCKS_API: z.string().default(DEFAULT_STOCKS_API),
  NEWS_API: z.string().default(DEFAULT_NEWS_API),
  UPDATE_INTERVAL: positiveIntegerVariable(DEFAULT_UPDATE_INTERVAL),
  HISTORICAL_DAYS: positiveIntegerVariable(DEFAULT_HISTORICAL_DAYS),

  RL_EPISODES: positiveIntegerVariable(DEFAULT_RL_EPISODES),
  RL_LEARNING_RATE: numberVariable(DEFAULT_RL_LEARNING_RATE),
  RL_DISCOUNT_FACTOR: numberVariable(DEFAULT_RL_DISCOUNT_FACTOR),
  RL_EXPLORATION_RATE: numberVariable(DEFAULT_RL_EXPLORATION_RATE),

  MAX_POSITION_SIZE: numberVariable(DEFAULT_MAX_POSITION_SIZE),
  STOP_LOSS_PERCENT: numberVariable(DEFAULT_STOP_LOSS_PERCENT),
  MAX_DRAWDOWN: numberVariable(DEFAULT_MAX_DRAWDOWN),

  PAPER_TRADING: z
    .string()
    .default(DEFAULT_PAPER_TRADING)
    .transform(value => value.toLowerCase() === 'true'),
  ORDER_TIMEOUT: positiveIntegerVariable(DEFAULT_ORDER_TIMEOUT),
  MIN_LIQUIDITY: withDefault(DEFAULT_MIN_LIQUIDITY, z.coerce.number().nonnegative()),

  FIREBASE_PROJECT_ID: z.string().default(''),
  FIREBASE_CREDENTIALS_PATH: z.string().default(DEFAULT_CREDENTIALS_PATH),
  FIREBASE_INIT_TIMEOUT: withDefault(DEFAULT_INIT_TIMEOUT, z.coerce.number().positive().max(MAX_INIT_TIMEOUT)),
});

export const configurationSchema = environmentSchema.transform(env => ({
  dataCollection: {
    sources: { crypto: env.CRYPTO_EXCHANGE, stocks: env.STOCKS_API, news: env.NEWS_API },
    updateInterval: env.UPDATE_INTERVAL,
    historicalDays: env.HISTORICAL_DAYS,
  },
  learning: {
    episodes: env.RL_EPISODES,
    learningRate: env.RL_LEARNING_RATE,
    discountFactor: env.RL_DISCOUNT_FACTOR,
    explorationRate: env.RL_EXPLORATION_RATE,
  },
  risk: {
    maxPositionSize: env.MAX_POSITION_SIZE,
    stopLossPercent: env.STOP_LOSS_PERCENT,
    maxDrawdown: env.MAX_DRAWDOWN,
  },
  execution: {
    paperTrading: env.PAPER_TRADING,
    orderTimeout: env.ORDER_TIMEOUT,
    minLiquidity: env.MIN_LIQUIDITY,
  },
  persistence: {
    projectId: env.FIREBASE_PROJECT_ID,
    credentialsPath: env.FIREBASE_CREDENTIALS_PATH,
    initTimeout: env.FIREBASE_INIT_TIMEOUT,
  },
}));
