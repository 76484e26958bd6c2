/**
 * Activity Broker
 *
 * In-process publish/subscribe register keyed by wallet address. Each publish
 * becomes one dispatch unit per subscriber, run on a shared bounded pool.
 * Every subscriber owns a task chain so it sees batches in publish order,
 * while different subscribers run concurrently.
 */

import { EventEmitter } from 'events';
import pLimit, { type LimitFunction } from 'p-limit';
import type { Activity } from '../../clients/shared/interfaces.js';
import { DEFAULTS } from '../../config/constants.js';
import { errorMeta, logger, shortAddress, type Logger } from '../../utils/logger.js';
import * as metrics from '../../utils/metrics.js';

export type ActivityCallback = (batch: readonly Activity[], wallet: string) => void | Promise<void>;

export interface Subscription {
  readonly id: number;
  readonly wallet: string;
  readonly name: string;
  unsubscribe(): void;
}

export type DispatchOutcome =
  | { subscriberId: number; subscriber: string; ok: true }
  | { subscriberId: number; subscriber: string; ok: false; error: unknown };

export interface PublishReceipt {
  wallet: string;
  // Dispatch units queued by this publish
  dispatched: number;
  // Resolves once every unit has run; never rejects
  settled: Promise<DispatchOutcome[]>;
}

export interface DispatchFailure {
  wallet: string;
  subscriberId: number;
  subscriber: string;
  batchSize: number;
  error: unknown;
}

export interface BrokerStats {
  wallets: number;
  subscribers: number;
  batchesPublished: number;
  unitsDispatched: number;
  dispatchFailures: number;
  activeWorkers: number;
  pendingWorkers: number;
  closed: boolean;
}

export interface ActivityBrokerOptions {
  maxWorkers?: number;
  log?: Logger;
}

interface SubscriberEntry {
  id: number;
  wallet: string;
  name: string;
  callback: ActivityCallback;
  // Tail of this subscriber's ordered task chain
  tail: Promise<void>;
}

function normalizeWallet(wallet: string): string {
  return wallet.toLowerCase();
}

/**
 * Activity Broker
 */
export class ActivityBroker extends EventEmitter {
  private limit: LimitFunction;
  private log: Logger;
  private subscribers: Map<string, SubscriberEntry[]> = new Map();
  private inFlight: Set<Promise<DispatchOutcome>> = new Set();
  private nextId = 1;
  private closed = false;

  private batchesPublished = 0;
  private unitsDispatched = 0;
  private dispatchFailures = 0;

  constructor(options: ActivityBrokerOptions = {}) {
    super();
    const maxWorkers = options.maxWorkers ?? DEFAULTS.BROKER_MAX_WORKERS;
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new Error(`maxWorkers must be a positive integer, got ${maxWorkers}`);
    }
    this.limit = pLimit(maxWorkers);
    this.log = options.log ?? logger('ActivityBroker');
  }

  /**
   * Register a callback for a wallet's activity batches
   */
  subscribe(wallet: string, callback: ActivityCallback, name?: string): Subscription {
    const key = normalizeWallet(wallet);
    const id = this.nextId++;
    const entry: SubscriberEntry = {
      id,
      wallet: key,
      name: name ?? `subscriber-${id}`,
      callback,
      tail: Promise.resolve(),
    };

    // Replace rather than mutate so in-flight snapshots stay intact
    this.subscribers.set(key, [...(this.subscribers.get(key) ?? []), entry]);

    this.log.debug('Subscriber added', { wallet: shortAddress(key), subscriber: entry.name, id });

    return {
      id,
      wallet: key,
      name: entry.name,
      unsubscribe: () => this.unsubscribe(key, id),
    };
  }

  private unsubscribe(wallet: string, id: number): void {
    const current = this.subscribers.get(wallet);
    if (!current) return;

    const remaining = current.filter((entry) => entry.id !== id);
    if (remaining.length === current.length) return;

    if (remaining.length > 0) {
      this.subscribers.set(wallet, remaining);
    } else {
      this.subscribers.delete(wallet);
    }
    this.log.debug('Subscriber removed', { wallet: shortAddress(wallet), id });
  }

  /**
   * Number of subscribers for a wallet
   */
  subscriberCount(wallet: string): number {
    return this.subscribers.get(normalizeWallet(wallet))?.length ?? 0;
  }

  /**
   * Hand a batch to every subscriber of the wallet. Returns without waiting
   * for any subscriber.
   */
  publish(wallet: string, batch: readonly Activity[]): PublishReceipt {
    const key = normalizeWallet(wallet);

    if (this.closed) {
      this.log.warn('Publish after shutdown ignored', { wallet: shortAddress(key), count: batch.length });
      return { wallet: key, dispatched: 0, settled: Promise.resolve([]) };
    }

    const snapshot = this.subscribers.get(key);
    if (batch.length === 0 || !snapshot || snapshot.length === 0) {
      return { wallet: key, dispatched: 0, settled: Promise.resolve([]) };
    }

    this.batchesPublished++;
    metrics.brokerBatchesPublished.labels(key).inc();

    const units = snapshot.map((entry) => this.enqueue(entry, key, batch));

    this.log.debug('Batch published', { wallet: shortAddress(key), count: batch.length, subscribers: units.length });

    return { wallet: key, dispatched: units.length, settled: Promise.all(units) };
  }

  private enqueue(entry: SubscriberEntry, wallet: string, batch: readonly Activity[]): Promise<DispatchOutcome> {
    this.unitsDispatched++;
    metrics.brokerPendingDispatches.inc();

    const unit = entry.tail.then(() => this.limit(() => this.runUnit(entry, wallet, batch)));
    entry.tail = unit.then(() => undefined);

    this.inFlight.add(unit);
    void unit.then(() => {
      this.inFlight.delete(unit);
      metrics.brokerPendingDispatches.dec();
    });

    return unit;
  }

  private async runUnit(entry: SubscriberEntry, wallet: string, batch: readonly Activity[]): Promise<DispatchOutcome> {
    try {
      await entry.callback(batch, wallet);
      return { subscriberId: entry.id, subscriber: entry.name, ok: true };
    } catch (error) {
      this.dispatchFailures++;
      metrics.brokerDispatchFailures.labels(wallet, entry.name).inc();

      this.log.error('Subscriber callback failed', {
        wallet: shortAddress(wallet),
        subscriber: entry.name,
        batchSize: batch.length,
        ...errorMeta(error),
      });

      const failure: DispatchFailure = {
        wallet,
        subscriberId: entry.id,
        subscriber: entry.name,
        batchSize: batch.length,
        error,
      };
      try {
        this.emit('dispatchFailed', failure);
      } catch (listenerError) {
        this.log.error('dispatchFailed listener threw', { subscriber: entry.name, ...errorMeta(listenerError) });
      }

      return { subscriberId: entry.id, subscriber: entry.name, ok: false, error };
    }
  }

  /**
   * Wait until every queued dispatch unit has run
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  /**
   * Stop accepting publishes and wait for in-flight work to finish
   */
  async shutdown(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.log.info('Broker shutting down', { inFlight: this.inFlight.size });
    }
    await this.drain();
    this.log.info('Broker drained', { dispatched: this.unitsDispatched, failures: this.dispatchFailures });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getStats(): BrokerStats {
    let subscribers = 0;
    for (const entries of this.subscribers.values()) {
      subscribers += entries.length;
    }

    return {
      wallets: this.subscribers.size,
      subscribers,
      batchesPublished: this.batchesPublished,
      unitsDispatched: this.unitsDispatched,
      dispatchFailures: this.dispatchFailures,
      activeWorkers: this.limit.activeCount,
      pendingWorkers: this.limit.pendingCount,
      closed: this.closed,
    };
  }
}
