// Polymarket endpoints
export const POLYMARKET_ENDPOINTS = {
  CLOB: 'https://clob.polymarket.com',
  DATA_API: 'https://data-api.polymarket.com',
} as const;

export const POLYGON_CHAIN_ID = 137;

// Activity types reported by the Data API
export const ACTIVITY_TYPES = {
  TRADE: 'TRADE',
  SPLIT: 'SPLIT',
  MERGE: 'MERGE',
  REDEEM: 'REDEEM',
  REWARD: 'REWARD',
  CONVERSION: 'CONVERSION',
} as const;

export type ActivityType = (typeof ACTIVITY_TYPES)[keyof typeof ACTIVITY_TYPES];

export const ACTIVITY_TYPE_VALUES = [
  ACTIVITY_TYPES.TRADE,
  ACTIVITY_TYPES.SPLIT,
  ACTIVITY_TYPES.MERGE,
  ACTIVITY_TYPES.REDEEM,
  ACTIVITY_TYPES.REWARD,
  ACTIVITY_TYPES.CONVERSION,
] as const;

// Trade sides
export const TRADE_SIDES = {
  BUY: 'BUY',
  SELL: 'SELL',
} as const;

export type TradeSide = (typeof TRADE_SIDES)[keyof typeof TRADE_SIDES];

// Copy sizing modes
export const COPY_MODES = {
  SCALE: 'SCALE',
  ALLOCATE: 'ALLOCATE',
} as const;

export type CopyMode = (typeof COPY_MODES)[keyof typeof COPY_MODES];

// Order types a follower can copy with
export const ORDER_TYPES = {
  MARKET: 'MARKET', // Fill or kill
  LIMIT: 'LIMIT', // Good till date
} as const;

export type OrderType = (typeof ORDER_TYPES)[keyof typeof ORDER_TYPES];

// CLOB signature types
export const SIGNATURE_TYPES = {
  EOA: 0,
  POLY_PROXY: 1,
  BROWSER_PROXY: 2,
} as const;

export type SignatureType = (typeof SIGNATURE_TYPES)[keyof typeof SIGNATURE_TYPES];

// ALLOCATE mode stand-in until balance-proportional sizing exists
export const ALLOCATE_FALLBACK_PERCENTAGE = 10;

// Defaults
export const DEFAULTS = {
  POLL_INTERVAL_SECONDS: 10,
  BATCH_SIZE: 500,
  LOOKAHEAD_SECONDS: 3600,
  BROKER_MAX_WORKERS: 10,
  MAX_EXECUTION_ATTEMPTS: 3,
  RETRY_BASE_DELAY_MS: 1000,
  LIMIT_ORDER_DURATION_SECONDS: 7200,
  REQUEST_TIMEOUT_MS: 30000,
} as const;

export function isActivityType(value: string): value is ActivityType {
  return ACTIVITY_TYPE_VALUES.some((type) => type === value);
}
