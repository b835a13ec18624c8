export const FIREBASE_APP_PREFIX = 'trading-engine';
