/**
 * Wallet Poller
 *
 * Turns the activity feed into an ordered, deduplicated stream per watched
 * wallet. Each wallet runs its own loop:
 * 1. fetch pages from the checkpoint forward until a short page
 * 2. publish each page to the broker
 * 3. advance and persist the checkpoint with the hashes delivered at it
 * 4. sleep for the poll interval
 *
 * A failed cycle leaves the checkpoint where it was and is retried next cycle.
 */

import type { ActivityFeedClient, ActivityPage } from '../../clients/shared/interfaces.js';
import { DEFAULTS } from '../../config/constants.js';
import type { CheckpointStore } from '../../database/stores.js';
import { errorMeta, logger, shortAddress, type Logger } from '../../utils/logger.js';
import * as metrics from '../../utils/metrics.js';
import { addSeconds, maxDate, sleep } from '../../utils/time.js';
import type { ActivityBroker } from '../activityBroker/ActivityBroker.js';

export interface WalletPollerOptions {
  feed: ActivityFeedClient;
  broker: ActivityBroker;
  checkpointStore: CheckpointStore;
  wallets: readonly string[];
  pollIntervalSeconds?: number;
  batchSize?: number;
  lookaheadSeconds?: number;
  resumeFromCheckpoint?: boolean;
  clock?: () => Date;
  log?: Logger;
}

export interface WalletPollStatus {
  wallet: string;
  checkpoint: Date | null;
  lastPollAt: Date | null;
  cyclesRun: number;
  activitiesPublished: number;
  consecutiveFailures: number;
  lastError: string | null;
}

export interface PollCycleResult {
  wallet: string;
  pages: number;
  fetched: number;
  published: number;
  checkpoint: Date;
}

interface WalletState {
  wallet: string;
  // Unset until the first cycle initializes it
  checkpoint: Date | null;
  // Transactions already delivered at exactly the checkpoint instant
  boundaryHashes: Set<string>;
  lastPollAt: Date | null;
  cyclesRun: number;
  activitiesPublished: number;
  consecutiveFailures: number;
  lastError: string | null;
}

/**
 * Wallet Poller
 */
export class WalletPoller {
  private feed: ActivityFeedClient;
  private broker: ActivityBroker;
  private checkpointStore: CheckpointStore;
  private pollIntervalMs: number;
  private batchSize: number;
  private lookaheadSeconds: number;
  private resumeFromCheckpoint: boolean;
  private clock: () => Date;
  private log: Logger;

  private states: Map<string, WalletState> = new Map();
  private loops: Map<string, Promise<void>> = new Map();
  private abortController: AbortController | null = null;

  constructor(options: WalletPollerOptions) {
    this.feed = options.feed;
    this.broker = options.broker;
    this.checkpointStore = options.checkpointStore;
    this.pollIntervalMs = (options.pollIntervalSeconds ?? DEFAULTS.POLL_INTERVAL_SECONDS) * 1000;
    this.batchSize = options.batchSize ?? DEFAULTS.BATCH_SIZE;
    this.lookaheadSeconds = options.lookaheadSeconds ?? DEFAULTS.LOOKAHEAD_SECONDS;
    this.resumeFromCheckpoint = options.resumeFromCheckpoint ?? true;
    this.clock = options.clock ?? (() => new Date());
    this.log = options.log ?? logger('WalletPoller');

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new Error(`batchSize must be a positive integer, got ${this.batchSize}`);
    }

    for (const wallet of options.wallets) {
      const key = wallet.toLowerCase();
      if (!this.states.has(key)) {
        this.states.set(key, {
          wallet: key,
          checkpoint: null,
          boundaryHashes: new Set(),
          lastPollAt: null,
          cyclesRun: 0,
          activitiesPublished: 0,
          consecutiveFailures: 0,
          lastError: null,
        });
      }
    }
  }

  get isRunning(): boolean {
    return this.abortController !== null;
  }

  get wallets(): string[] {
    return Array.from(this.states.keys());
  }

  /**
   * Start one loop per wallet
   */
  start(): void {
    if (this.abortController) {
      this.log.warn('Poller already running');
      return;
    }

    const controller = new AbortController();
    this.abortController = controller;

    this.log.info('Starting wallet poller', {
      wallets: this.states.size,
      pollIntervalMs: this.pollIntervalMs,
      batchSize: this.batchSize,
    });

    for (const state of this.states.values()) {
      this.loops.set(state.wallet, this.runLoop(state, controller.signal));
    }
  }

  /**
   * Signal every loop to stop and wait for all of them to exit
   */
  async stop(): Promise<void> {
    const controller = this.abortController;
    if (!controller) return;

    this.log.info('Stopping wallet poller');
    controller.abort();

    await Promise.all(this.loops.values());
    this.loops.clear();
    this.abortController = null;

    this.log.info('Wallet poller stopped');
  }

  private async runLoop(state: WalletState, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.pollOnce(state.wallet);
      } catch (error) {
        // pollOnce records the failure; the loop itself must survive
        this.log.debug('Poll cycle ended with error', { wallet: shortAddress(state.wallet), ...errorMeta(error) });
      }
      await sleep(this.pollIntervalMs, signal);
    }
  }

  /**
   * Initialize the cursor: stored checkpoint and its boundary hashes, or now
   */
  private async initCheckpoint(state: WalletState): Promise<Date> {
    if (state.checkpoint) {
      return state.checkpoint;
    }

    const now = this.clock();
    let checkpoint = now;

    if (this.resumeFromCheckpoint) {
      const stored = await this.checkpointStore.get(state.wallet);
      if (stored) {
        checkpoint = stored.timestamp;
        state.boundaryHashes = new Set(stored.boundaryHashes);
        this.log.info('Resuming from stored checkpoint', {
          wallet: shortAddress(state.wallet),
          checkpoint: stored.timestamp.toISOString(),
          boundaryHashes: stored.boundaryHashes.length,
        });
      } else {
        this.log.info('No stored checkpoint, starting from now', { wallet: shortAddress(state.wallet) });
      }
    } else {
      this.log.info('Checkpoint resume disabled, skipping history', { wallet: shortAddress(state.wallet) });
    }

    state.checkpoint = checkpoint;
    return checkpoint;
  }

  /**
   * Run a single poll cycle for one wallet: paginate until caught up
   */
  async pollOnce(wallet: string): Promise<PollCycleResult> {
    const state = this.states.get(wallet.toLowerCase());
    if (!state) {
      throw new Error(`Wallet ${wallet} is not watched by this poller`);
    }

    let pages = 0;
    let fetched = 0;
    let published = 0;

    try {
      // Fixed for the whole cycle; offset walks through the window
      const start = await this.initCheckpoint(state);
      const end = addSeconds(this.clock(), this.lookaheadSeconds);
      let offset = 0;

      for (;;) {
        const page = await this.feed.fetchActivities({
          wallet: state.wallet,
          start,
          end,
          limit: this.batchSize,
          offset,
        });
        pages++;
        fetched += page.rawCount;
        metrics.pollPagesFetched.labels(state.wallet).inc();

        if (page.rawCount > 0) {
          published += await this.deliverPage(state, page);
        }

        // Skipped records still occupy the source's page
        if (page.rawCount < this.batchSize) {
          break;
        }
        offset += this.batchSize;
      }

      state.cyclesRun++;
      state.lastPollAt = this.clock();
      state.consecutiveFailures = 0;
      state.lastError = null;
      metrics.pollCycles.labels(state.wallet, 'success').inc();
      if (state.checkpoint) {
        metrics.pollCheckpointLag
          .labels(state.wallet)
          .set(Math.max(0, (state.lastPollAt.getTime() - state.checkpoint.getTime()) / 1000));
      }

      if (published > 0) {
        this.log.info('Poll cycle complete', {
          wallet: shortAddress(state.wallet),
          pages,
          published,
          checkpoint: state.checkpoint?.toISOString(),
        });
      }

      return { wallet: state.wallet, pages, fetched, published, checkpoint: state.checkpoint ?? start };
    } catch (error) {
      state.cyclesRun++;
      state.lastPollAt = this.clock();
      state.consecutiveFailures++;
      state.lastError = error instanceof Error ? error.message : String(error);
      metrics.pollCycles.labels(state.wallet, 'error').inc();

      this.log.error('Poll cycle failed', {
        wallet: shortAddress(state.wallet),
        consecutiveFailures: state.consecutiveFailures,
        checkpoint: state.checkpoint?.toISOString(),
        ...errorMeta(error),
      });
      throw error;
    }
  }

  /**
   * Publish the page minus boundary duplicates, then move the checkpoint
   */
  private async deliverPage(state: WalletState, page: ActivityPage): Promise<number> {
    const checkpoint = state.checkpoint;
    const fresh = page.activities.filter((activity) => {
      if (!checkpoint) return true;
      const ts = activity.timestamp.getTime();
      if (ts < checkpoint.getTime()) return false;
      return !(ts === checkpoint.getTime() && state.boundaryHashes.has(activity.transactionHash));
    });

    if (fresh.length > 0) {
      this.broker.publish(state.wallet, fresh);
      state.activitiesPublished += fresh.length;
      metrics.pollActivitiesPublished.labels(state.wallet).inc(fresh.length);
    }

    if (!page.lastTimestamp) {
      return fresh.length;
    }

    const next = checkpoint ? maxDate(checkpoint, page.lastTimestamp) : page.lastTimestamp;
    const boundary =
      checkpoint && next.getTime() === checkpoint.getTime() ? new Set(state.boundaryHashes) : new Set<string>();
    for (const activity of fresh) {
      if (activity.timestamp.getTime() === next.getTime()) {
        boundary.add(activity.transactionHash);
      }
    }

    await this.checkpointStore.set(state.wallet, next, [...boundary]);
    state.checkpoint = next;
    state.boundaryHashes = boundary;

    return fresh.length;
  }

  /**
   * Per-wallet status snapshot
   */
  getStatus(): WalletPollStatus[] {
    return Array.from(this.states.values()).map((state) => ({
      wallet: state.wallet,
      checkpoint: state.checkpoint,
      lastPollAt: state.lastPollAt,
      cyclesRun: state.cyclesRun,
      activitiesPublished: state.activitiesPublished,
      consecutiveFailures: state.consecutiveFailures,
      lastError: state.lastError,
    }));
  }
}
