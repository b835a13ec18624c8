export const DEFAULT_CRYPTO_EXCHANGE = 'binance';
export const DEFAULT_STOCKS_API = 'yfinance';
export const DEFAULT_NEWS_API = 'newsapi.org';
export const DEFAULT_PAPER_TRADING = 'True';
export const DEFAULT_CREDENTIALS_PATH = 'firebase_credentials.json';

export const DEFAULT_UPDATE_INTERVAL = 60; // seconds
export const DEFAULT_HISTORICAL_DAYS = 365;

export const DEFAULT_RL_EPISODES = 1000;
export const DEFAULT_RL_LEARNING_RATE = 0.001;
export const DEFAULT_RL_DISCOUNT_FACTOR = 0.95;
export const DEFAULT_RL_EXPLORATION_RATE = 0.1;

export const DEFAULT_MAX_POSITION_SIZE = 0.1; // 10% of portfolio
export const DEFAULT_STOP_LOSS_PERCENT = 0.02;
export const DEFAULT_MAX_DRAWDOWN = 0.15;

export const DEFAULT_ORDER_TIMEOUT = 30; // seconds
export const DEFAULT_MIN_LIQUIDITY = 10_000;
export const DEFAULT_INIT_TIMEOUT = 10; // seconds
// setTimeout delays are capped at 2^31 - 1 ms
export const MAX_INIT_TIMEOUT = 2_147_483; // seconds
