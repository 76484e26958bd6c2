/**
 * Copy-Trade Engine
 *
 * One instance per follower wallet. Receives batches of target-wallet activity
 * from the broker and, per activity:
 * 1. filters out non-trades and trades below the trigger amount
 * 2. skips trades missing market data
 * 3. sizes the copy with the follower's strategy
 * 4. resolves the outcome token and submits the order, retrying network failures
 *
 * Failures never escape processActivities; they are counted, logged and
 * reported in the returned results and emitted events. A throwing event
 * listener is logged and does not change the outcome of the activity.
 */

import { EventEmitter } from 'events';
import type { Activity, ExecutionResult, TradeExecutionClient, TradeIntent } from '../../clients/shared/interfaces.js';
import { ACTIVITY_TYPES, DEFAULTS, ORDER_TYPES } from '../../config/constants.js';
import type { CopyStrategy } from '../../config/schema.js';
import type { ActivityBroker, Subscription } from '../activityBroker/ActivityBroker.js';
import { errorMeta, logger, shortAddress, type Logger } from '../../utils/logger.js';
import * as metrics from '../../utils/metrics.js';
import { retry } from '../../utils/retry.js';
import { addSeconds } from '../../utils/time.js';
import {
  ConfigurationError,
  CopyTradeError,
  OrderExecutionError,
  classifyExecutionError,
} from './errors.js';
import { calculateTradeSize, getTradeValue } from './PositionSizingStrategy.js';
import type { CopyTradeEngineEvents, CopyTradeResult, SizingCalculation, TradeStats } from './types.js';

export interface CopyTradeEngineOptions {
  // Follower name, used in logs and metric labels
  name: string;
  strategy: CopyStrategy;
  executor: TradeExecutionClient;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
  log?: Logger;
}

type FailedResult = Extract<CopyTradeResult, { status: 'failed' }>;

/**
 * Reject strategies that cannot size a trade
 */
function validateStrategy(name: string, strategy: CopyStrategy): void {
  if (strategy.copyMode === 'SCALE') {
    if (strategy.scalePercentage === undefined) {
      throw new ConfigurationError(`Follower '${name}': scalePercentage is required for SCALE copy mode`);
    }
    if (!(strategy.scalePercentage > 0)) {
      throw new ConfigurationError(
        `Follower '${name}': scalePercentage must be positive, got ${strategy.scalePercentage}`
      );
    }
  }
  if (strategy.orderType === ORDER_TYPES.LIMIT && !(strategy.limitOrderDurationSeconds > 0)) {
    throw new ConfigurationError(`Follower '${name}': limitOrderDurationSeconds must be positive`);
  }
}

/**
 * Copy-Trade Engine
 */
export class CopyTradeEngine extends EventEmitter {
  readonly name: string;
  readonly strategy: CopyStrategy;

  private executor: TradeExecutionClient;
  private maxAttempts: number;
  private retryBaseDelayMs: number;
  private sleep: ((ms: number) => Promise<void>) | undefined;
  private clock: () => Date;
  private log: Logger;

  private stats: TradeStats = {
    totalActivities: 0,
    filteredOut: 0,
    tradesAttempted: 0,
    tradesSucceeded: 0,
    tradesFailed: 0,
  };

  private subscriptions: Subscription[] = [];

  constructor(options: CopyTradeEngineOptions) {
    super();
    validateStrategy(options.name, options.strategy);

    this.name = options.name;
    this.strategy = options.strategy;
    this.executor = options.executor;
    this.maxAttempts = options.maxAttempts ?? DEFAULTS.MAX_EXECUTION_ATTEMPTS;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULTS.RETRY_BASE_DELAY_MS;
    this.sleep = options.sleep;
    this.clock = options.clock ?? (() => new Date());
    this.log = options.log ?? logger(`CopyTradeEngine:${options.name}`);
  }

  /**
   * Subscribe this engine to a target wallet's activity
   */
  follow(broker: ActivityBroker, targetWallet: string): Subscription {
    const subscription = broker.subscribe(
      targetWallet,
      async (batch, wallet) => {
        await this.processActivities(batch, wallet);
      },
      `copy:${this.name}`
    );
    this.subscriptions.push(subscription);

    this.log.info('Following target wallet', {
      target: shortAddress(targetWallet),
      copyMode: this.strategy.copyMode,
      orderType: this.strategy.orderType,
    });

    return subscription;
  }

  /**
   * Drop every broker subscription made through follow()
   */
  unfollowAll(): void {
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.subscriptions = [];
  }

  /**
   * Process a batch of activities in order, one at a time
   */
  async processActivities(batch: readonly Activity[], targetWallet?: string): Promise<CopyTradeResult[]> {
    const results: CopyTradeResult[] = [];

    if (batch.length > 0) {
      this.log.debug('Processing activity batch', {
        target: targetWallet ? shortAddress(targetWallet) : undefined,
        count: batch.length,
      });
    }

    for (const activity of batch) {
      try {
        results.push(await this.processActivity(activity));
      } catch (error) {
        results.push(this.abort(activity, error));
      }
    }

    return results;
  }

  /**
   * Record an activity whose processing threw outside the execution path
   */
  private abort(activity: Activity, error: unknown): FailedResult {
    const message = error instanceof Error ? error.message : String(error);
    const failure = new CopyTradeError(
      `Unexpected error processing ${activity.transactionHash}: ${message}`,
      'unclassified',
      error
    );

    this.stats.tradesFailed++;
    metrics.copyTradingTradesFailed.labels(this.name, failure.kind).inc();
    this.log.error('Activity processing aborted', { tx: activity.transactionHash, ...errorMeta(error) });

    const result: FailedResult = {
      status: 'failed',
      activity,
      errorKind: failure.kind,
      error: failure.message,
      attempts: 0,
    };
    this.emitEvent('tradeFailed', result);
    return result;
  }

  /**
   * Process one activity through filters, sizing and execution
   */
  async processActivity(activity: Activity): Promise<CopyTradeResult> {
    this.stats.totalActivities++;
    metrics.copyTradingActivitiesReceived.labels(this.name).inc();

    if (activity.type !== ACTIVITY_TYPES.TRADE) {
      this.stats.filteredOut++;
      return this.skip({ status: 'filtered', activity, reason: 'not_trade' });
    }

    const tradeValue = getTradeValue(activity);
    if (tradeValue < this.strategy.minTriggerAmount) {
      this.stats.filteredOut++;
      this.log.debug('Trade below trigger amount', {
        tx: activity.transactionHash,
        tradeValue: tradeValue.toFixed(2),
        minTriggerAmount: this.strategy.minTriggerAmount,
      });
      return this.skip({ status: 'filtered', activity, reason: 'below_trigger' });
    }

    const { conditionId, outcome, side } = activity;
    if (!conditionId || !outcome || !side) {
      const fields: Array<string | null> = [
        conditionId ? null : 'conditionId',
        outcome ? null : 'outcome',
        side ? null : 'side',
      ];
      const missing = fields.filter((field): field is string => field !== null);

      this.log.warn('Skipping trade with incomplete market data', { tx: activity.transactionHash, missing });
      return this.skip({ status: 'skipped', activity, reason: 'incomplete', missing });
    }

    const sizing = calculateTradeSize(tradeValue, this.strategy);
    if (sizing.usedFallback) {
      this.log.warn('ALLOCATE sizing uses the fixed fallback percentage', {
        tx: activity.transactionHash,
        reasoning: sizing.reasoning,
      });
    }

    this.log.info('Copy size calculated', {
      target: shortAddress(activity.walletAddress),
      side,
      tradeValue: tradeValue.toFixed(2),
      copySize: sizing.finalAmount.toFixed(2),
      reasoning: sizing.reasoning,
    });

    this.stats.tradesAttempted++;

    let instrumentId: string | null;
    try {
      instrumentId = await this.executor.resolveInstrument(conditionId, outcome);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.fail(
        activity,
        new OrderExecutionError(`Failed to resolve token for ${conditionId}/${outcome}: ${message}`, error),
        0,
        sizing
      );
    }

    if (!instrumentId) {
      return this.fail(
        activity,
        new OrderExecutionError(`No token found for market ${conditionId} outcome '${outcome}'`),
        0,
        sizing
      );
    }

    const intent = this.buildIntent(activity, instrumentId, conditionId, outcome, side, sizing);
    if (intent instanceof CopyTradeError) {
      return this.fail(activity, intent, 0, sizing);
    }

    return this.execute(activity, intent, sizing);
  }

  /**
   * Build the order intent for the strategy's order type
   */
  private buildIntent(
    activity: Activity,
    instrumentId: string,
    conditionId: string,
    outcome: string,
    side: TradeIntent['side'],
    sizing: SizingCalculation
  ): TradeIntent | OrderExecutionError {
    const base = {
      instrumentId,
      conditionId,
      outcome,
      side,
      amount: sizing.finalAmount,
      sourceTransactionHash: activity.transactionHash,
    };

    switch (this.strategy.orderType) {
      case ORDER_TYPES.MARKET:
        // The executor needs the price to express a market SELL in shares
        return { ...base, orderType: ORDER_TYPES.MARKET, ...(activity.price > 0 ? { price: activity.price } : {}) };

      case ORDER_TYPES.LIMIT:
        if (!(activity.price > 0)) {
          return new OrderExecutionError(
            `Limit order requires a positive price, source trade ${activity.transactionHash} has ${activity.price}`
          );
        }
        return {
          ...base,
          orderType: ORDER_TYPES.LIMIT,
          price: activity.price,
          expiresAt: addSeconds(this.clock(), this.strategy.limitOrderDurationSeconds),
        };

      default: {
        const unreachable: never = this.strategy.orderType;
        return new OrderExecutionError(`Unknown order type: ${String(unreachable)}`);
      }
    }
  }

  /**
   * Submit with bounded retry; only network failures are retried
   */
  private async execute(activity: Activity, intent: TradeIntent, sizing: SizingCalculation): Promise<CopyTradeResult> {
    let attempts = 0;
    let execution: ExecutionResult;

    try {
      execution = await retry(
        async () => {
          attempts++;
          try {
            return await this.executor.submit(intent);
          } catch (error) {
            throw classifyExecutionError(error);
          }
        },
        {
          maxAttempts: this.maxAttempts,
          initialDelayMs: this.retryBaseDelayMs,
          multiplier: 2,
          jitter: 0,
          retryOn: (error) => error instanceof CopyTradeError && error.transient,
          onRetry: (attempt, error, delayMs) => {
            metrics.copyTradingExecutionRetries.labels(this.name).inc();
            this.log.warn(`Execution attempt ${attempt} failed, retrying in ${delayMs}ms`, {
              tx: activity.transactionHash,
              error: error instanceof Error ? error.message : String(error),
            });
          },
          ...(this.sleep ? { sleep: this.sleep } : {}),
          log: this.log,
        }
      );
    } catch (error) {
      return this.fail(activity, classifyExecutionError(error), attempts, sizing);
    }

    this.stats.tradesSucceeded++;
    metrics.copyTradingTradesCopied.labels(this.name, sizing.copyMode, intent.side).inc();
    metrics.copyTradingCopyLatency
      .labels(this.name)
      .observe(Math.max(0, this.clock().getTime() - activity.timestamp.getTime()));

    this.log.info('Copy trade executed', {
      orderId: execution.orderId,
      status: execution.status,
      simulated: execution.simulated,
      side: intent.side,
      orderType: intent.orderType,
      amount: intent.amount.toFixed(2),
      attempts,
    });

    const result = { status: 'copied' as const, activity, intent, sizing, execution, attempts };
    this.emitEvent('tradeCopied', result);
    return result;
  }

  private skip(result: Extract<CopyTradeResult, { status: 'filtered' | 'skipped' }>): CopyTradeResult {
    metrics.copyTradingTradesSkipped.labels(this.name, result.reason).inc();
    this.emitEvent('tradeSkipped', result);
    return result;
  }

  private fail(activity: Activity, error: CopyTradeError, attempts: number, sizing?: SizingCalculation): FailedResult {
    this.stats.tradesFailed++;
    metrics.copyTradingTradesFailed.labels(this.name, error.kind).inc();

    const context = {
      tx: activity.transactionHash,
      target: shortAddress(activity.walletAddress),
      market: activity.conditionId,
      outcome: activity.outcome,
      side: activity.side,
      kind: error.kind,
      attempts,
      error: error.message,
    };

    if (error.kind === 'unclassified') {
      this.log.error('Copy trade failed with unexpected error', {
        ...context,
        activity: { ...activity, timestamp: activity.timestamp.toISOString() },
        sizing,
        stack: error.stack,
        cause: error.cause instanceof Error ? error.cause.stack : error.cause,
      });
    } else {
      this.log.error('Copy trade failed', context);
    }

    const result: FailedResult = {
      status: 'failed',
      activity,
      errorKind: error.kind,
      error: error.message,
      attempts,
      ...(sizing ? { sizing } : {}),
    };
    this.emitEvent('tradeFailed', result);
    return result;
  }

  private emitEvent<E extends keyof CopyTradeEngineEvents>(
    event: E,
    ...args: Parameters<CopyTradeEngineEvents[E]>
  ): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      this.log.error('Event listener failed', { event, ...errorMeta(error) });
    }
  }

  /**
   * Snapshot of the engine's counters
   */
  getStats(): TradeStats {
    return { ...this.stats };
  }

  /**
   * Write the statistics summary to the log
   */
  logStats(): void {
    const { tradesAttempted, tradesSucceeded } = this.stats;
    const successRate = tradesAttempted > 0 ? ((tradesSucceeded / tradesAttempted) * 100).toFixed(1) : '0.0';
    this.log.info('Copy trading statistics', { ...this.stats, successRate: `${successRate}%` });
  }
}
