export const STATE_COLLECTION = 'trading_state';
export const TRADES_COLLECTION = 'trades';
