/**
 * Copy Trading Type Definitions
 */

import type { Activity, ExecutionResult, TradeIntent } from '../../clients/shared/interfaces.js';
import type { CopyMode } from '../../config/constants.js';
import type { CopyTradeErrorKind } from './errors.js';

/**
 * Result of sizing one copy trade
 */
export interface SizingCalculation {
  // USDC value of the source trade
  tradeValue: number;
  // Amount before min/max clamps
  baseAmount: number;
  finalAmount: number;
  copyMode: CopyMode;
  clampedTo: 'min' | 'max' | null;
  // ALLOCATE stand-in was used
  usedFallback: boolean;
  reasoning: string;
}

/**
 * Per-engine counters; only ever incremented
 */
export interface TradeStats {
  totalActivities: number;
  filteredOut: number;
  tradesAttempted: number;
  tradesSucceeded: number;
  tradesFailed: number;
}

export type SkipReason = 'not_trade' | 'below_trigger' | 'incomplete';

/**
 * Outcome of one activity handed to the engine
 */
export type CopyTradeResult =
  | { status: 'filtered'; activity: Activity; reason: Exclude<SkipReason, 'incomplete'> }
  | { status: 'skipped'; activity: Activity; reason: 'incomplete'; missing: string[] }
  | {
      status: 'copied';
      activity: Activity;
      intent: TradeIntent;
      sizing: SizingCalculation;
      execution: ExecutionResult;
      attempts: number;
    }
  | {
      status: 'failed';
      activity: Activity;
      errorKind: CopyTradeErrorKind;
      error: string;
      attempts: number;
      sizing?: SizingCalculation;
    };

/**
 * Events emitted by CopyTradeEngine
 */
export interface CopyTradeEngineEvents {
  tradeCopied: (result: Extract<CopyTradeResult, { status: 'copied' }>) => void;
  tradeSkipped: (result: Extract<CopyTradeResult, { status: 'filtered' | 'skipped' }>) => void;
  tradeFailed: (result: Extract<CopyTradeResult, { status: 'failed' }>) => void;
}
