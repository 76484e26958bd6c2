/**
 * Copy Trading Module
 *
 * Main Components:
 * - CopyTradeEngine: per-follower filter, size and execute pipeline
 * - PositionSizingStrategy: copy sizes (SCALE, ALLOCATE) and min/max clamps
 * - errors: failure taxonomy and classification of thrown values
 */

export { CopyTradeEngine } from './CopyTradeEngine.js';
export type { CopyTradeEngineOptions } from './CopyTradeEngine.js';

export { calculateTradeSize, getTradeValue } from './PositionSizingStrategy.js';

export {
  CopyTradeError,
  InsufficientBalanceError,
  NetworkError,
  OrderExecutionError,
  ConfigurationError,
  classifyExecutionError,
} from './errors.js';
export type { CopyTradeErrorKind } from './errors.js';

export type { SizingCalculation, TradeStats, SkipReason, CopyTradeResult, CopyTradeEngineEvents } from './types.js';
