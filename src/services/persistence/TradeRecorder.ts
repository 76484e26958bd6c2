import type { Activity } from '../../clients/shared/interfaces.js';
import { activityToTradeRecord, type TradeRecord, type TradeStore } from '../../database/stores.js';
import { logger, shortAddress, type Logger } from '../../utils/logger.js';
import * as metrics from '../../utils/metrics.js';
import type { ActivityBroker, Subscription } from '../activityBroker/ActivityBroker.js';

export interface TradeRecorderOptions {
  store: TradeStore;
  log?: Logger;
}

/**
 * Persistence sink: writes every observed activity with a market to the trade store.
 * Inserts are idempotent on transaction hash, so redelivered batches record nothing new.
 */
export class TradeRecorder {
  private store: TradeStore;
  private log: Logger;
  private subscriptions: Subscription[] = [];
  private totalInserted = 0;

  constructor(options: TradeRecorderOptions) {
    this.store = options.store;
    this.log = options.log ?? logger('TradeRecorder');
  }

  /**
   * Subscribe to each wallet's activity
   */
  attach(broker: ActivityBroker, wallets: readonly string[]): void {
    for (const wallet of wallets) {
      this.subscriptions.push(
        broker.subscribe(
          wallet,
          async (batch, target) => {
            await this.record(batch, target);
          },
          'trade-recorder'
        )
      );
    }
    this.log.info('Trade recorder attached', { wallets: wallets.length });
  }

  detach(): void {
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.subscriptions = [];
  }

  /**
   * Persist a batch; returns how many records were new
   */
  async record(batch: readonly Activity[], wallet?: string): Promise<number> {
    const records = batch
      .map(activityToTradeRecord)
      .filter((record): record is TradeRecord => record !== null);

    if (records.length === 0) {
      return 0;
    }

    const inserted = await this.store.insertManyIfAbsent(records);
    this.totalInserted += inserted;

    const label = wallet ?? records[0]?.walletAddress ?? 'unknown';
    metrics.tradesRecorded.labels(label).inc(inserted);

    this.log.debug('Recorded trades', {
      wallet: shortAddress(label),
      offered: records.length,
      inserted,
      duplicates: records.length - inserted,
    });

    return inserted;
  }

  get inserted(): number {
    return this.totalInserted;
  }
}
