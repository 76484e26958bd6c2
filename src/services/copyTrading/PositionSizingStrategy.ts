/**
 * Position Sizing Strategy
 *
 * Calculates the USDC amount for a copy trade:
 * - SCALE: copy a fixed percentage of the target's trade value
 * - ALLOCATE: fixed fallback percentage until balance-proportional sizing exists
 *
 * The result is then clamped to the follower's min/max trade amounts.
 */

import type { Activity } from '../../clients/shared/interfaces.js';
import { ALLOCATE_FALLBACK_PERCENTAGE, COPY_MODES } from '../../config/constants.js';
import type { CopyStrategy } from '../../config/schema.js';
import type { SizingCalculation } from './types.js';

/**
 * USDC value of an activity: the reported cash amount, or size x price when it is absent
 */
export function getTradeValue(activity: Pick<Activity, 'cashAmount' | 'size' | 'price'>): number {
  return activity.cashAmount > 0 ? activity.cashAmount : activity.size * activity.price;
}

/**
 * Calculate the copy amount for a trade of the given value
 *
 * @param tradeValue - USDC value of the target's trade
 * @param strategy - Follower's copy strategy
 */
export function calculateTradeSize(
  tradeValue: number,
  strategy: Pick<CopyStrategy, 'copyMode' | 'scalePercentage' | 'minTradeAmount' | 'maxTradeAmount'>
): SizingCalculation {
  let baseAmount: number;
  let reasoning: string;
  let usedFallback = false;

  switch (strategy.copyMode) {
    case COPY_MODES.SCALE: {
      const percentage = strategy.scalePercentage ?? 0;
      baseAmount = tradeValue * (percentage / 100);
      reasoning = `${percentage}% of $${tradeValue.toFixed(2)} = $${baseAmount.toFixed(2)}`;
      break;
    }

    case COPY_MODES.ALLOCATE:
      baseAmount = tradeValue * (ALLOCATE_FALLBACK_PERCENTAGE / 100);
      usedFallback = true;
      reasoning = `ALLOCATE fallback ${ALLOCATE_FALLBACK_PERCENTAGE}% of $${tradeValue.toFixed(2)} = $${baseAmount.toFixed(2)}`;
      break;

    default: {
      const unreachable: never = strategy.copyMode;
      throw new Error(`Unknown copy mode: ${String(unreachable)}`);
    }
  }

  let finalAmount = baseAmount;
  let clampedTo: SizingCalculation['clampedTo'] = null;

  if (strategy.minTradeAmount > 0 && finalAmount < strategy.minTradeAmount) {
    finalAmount = strategy.minTradeAmount;
    clampedTo = 'min';
    reasoning += `, raised to minimum $${strategy.minTradeAmount.toFixed(2)}`;
  }

  if (strategy.maxTradeAmount > 0 && finalAmount > strategy.maxTradeAmount) {
    finalAmount = strategy.maxTradeAmount;
    clampedTo = 'max';
    reasoning += `, capped at maximum $${strategy.maxTradeAmount.toFixed(2)}`;
  }

  return {
    tradeValue,
    baseAmount,
    finalAmount,
    copyMode: strategy.copyMode,
    clampedTo,
    usedFallback,
    reasoning,
  };
}
