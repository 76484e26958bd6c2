/**
 * Capability interfaces between the pipeline and the outside world.
 *
 * The poller, broker and copy-trade engine only ever talk to these
 * interfaces; the Polymarket adapters in ../polymarket implement them and
 * the tests substitute in-process fakes.
 */

import type { ActivityType, OrderType, TradeSide } from '../../config/constants.js';

/**
 * One observed on-chain action by a wallet. Never mutated after creation.
 */
export interface Activity {
  readonly walletAddress: string;
  readonly type: ActivityType;
  // Natural identity key
  readonly transactionHash: string;
  // Market identifier
  readonly conditionId?: string;
  readonly outcome?: string;
  // Meaningful only for TRADE
  readonly side?: TradeSide;
  readonly size: number;
  // 0-1 normalized
  readonly price: number;
  // USDC value; 0 means derive from size * price
  readonly cashAmount: number;
  readonly timestamp: Date;
  // Token id of the outcome, when the feed reports it
  readonly asset?: string;
  readonly title?: string;
}

/**
 * Parameters for one page of a wallet's activity
 */
export interface ActivityQuery {
  wallet: string;
  start: Date;
  end: Date;
  limit: number;
  offset: number;
}

/**
 * One page of the feed. `activities` holds the usable records; `rawCount`
 * and `lastTimestamp` describe everything the source returned, including
 * records that were skipped, so paging and checkpoints follow the source.
 */
export interface ActivityPage {
  activities: Activity[];
  rawCount: number;
  lastTimestamp: Date | null;
}

/**
 * Source of wallet activity. Pages are sorted ascending by timestamp;
 * a page whose `rawCount` is below `limit` means the caller has caught up.
 */
export interface ActivityFeedClient {
  fetchActivities(query: ActivityQuery): Promise<ActivityPage>;
}

/**
 * Page made of usable records only
 */
export function toActivityPage(activities: Activity[]): ActivityPage {
  let lastTimestamp: Date | null = null;
  for (const activity of activities) {
    if (!lastTimestamp || activity.timestamp.getTime() > lastTimestamp.getTime()) {
      lastTimestamp = activity.timestamp;
    }
  }
  return { activities, rawCount: activities.length, lastTimestamp };
}

/**
 * Normalized order the engine hands to the execution capability
 */
export interface TradeIntent {
  instrumentId: string;
  conditionId: string;
  outcome: string;
  side: TradeSide;
  // USDC to spend (market) or commit (limit)
  amount: number;
  // Limit price for LIMIT; converts USDC to shares for a market SELL
  price?: number;
  orderType: OrderType;
  // Good-till-date expiry for LIMIT orders
  expiresAt?: Date;
  // Source activity, for logging and correlation
  sourceTransactionHash: string;
}

/**
 * Result of a successfully submitted order
 */
export interface ExecutionResult {
  orderId: string;
  status: string;
  simulated: boolean;
  raw?: unknown;
}

/**
 * Order signing and submission capability.
 * `submit` rejects with one of the copy-trade error classes (or any other
 * error, which the engine treats as unclassified).
 */
export interface TradeExecutionClient {
  resolveInstrument(conditionId: string, outcome: string): Promise<string | null>;
  submit(intent: TradeIntent): Promise<ExecutionResult>;
}
