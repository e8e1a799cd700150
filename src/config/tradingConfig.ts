export const TRADING_CONFIG = {
  orders: {
    // Opening reacts to the current book, so a stale confirmation is not worth waiting for
    openTimeoutMs: 2_000,
    // Leaving a position open is worse than a slow close
    closeTimeoutMs: 10_000,
  },
  monitor: {
    pollIntervalMs: 100,
    retryDelayMs: 1_000,
  },
  feed: {
    orderbookDepth: 1,
    category: 'spot',
  },
} as const;

export type TradingConfig = typeof TRADING_CONFIG;
