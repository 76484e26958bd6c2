import type { ActivityFeedClient, TradeExecutionClient } from './clients/shared/interfaces.js';
import type { Config, FollowerWallet } from './config/schema.js';
import { getWatchedWallets } from './config/index.js';
import type { CheckpointStore, TradeStore } from './database/stores.js';
import { ActivityBroker, CopyTradeEngine, TradeRecorder, WalletPoller } from './services/index.js';
import { logger, shortAddress, type Logger } from './utils/logger.js';

export interface PipelineDependencies {
  config: Config;
  feed: ActivityFeedClient;
  checkpointStore: CheckpointStore;
  tradeStore: TradeStore;
  // Builds (and connects) the execution client for one follower
  createExecutor: (follower: FollowerWallet) => TradeExecutionClient | Promise<TradeExecutionClient>;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  log?: Logger;
}

export interface PipelineState {
  initialized: boolean;
  running: boolean;
  wallets: string[];
  followers: string[];
}

/**
 * Copy-Trade Pipeline
 * Wires the components together:
 * - Wallet Poller → Activity Broker → {Copy-Trade Engines, Trade Recorder}
 * and owns their start/stop order.
 */
export class CopyTradePipeline {
  readonly broker: ActivityBroker;
  readonly poller: WalletPoller;
  readonly recorder: TradeRecorder;

  private deps: PipelineDependencies;
  private log: Logger;
  private wallets: string[];
  private engineList: CopyTradeEngine[] = [];
  private initialized = false;
  private running = false;

  constructor(deps: PipelineDependencies) {
    this.deps = deps;
    this.log = deps.log ?? logger('Pipeline');

    const { config } = deps;
    this.wallets = getWatchedWallets(config);

    this.broker = new ActivityBroker({
      maxWorkers: config.broker.maxWorkers,
      log: this.log.child({ component: 'ActivityBroker' }),
    });

    this.poller = new WalletPoller({
      feed: deps.feed,
      broker: this.broker,
      checkpointStore: deps.checkpointStore,
      wallets: this.wallets,
      pollIntervalSeconds: config.monitoring.pollIntervalSeconds,
      batchSize: config.monitoring.batchSize,
      lookaheadSeconds: config.monitoring.lookaheadSeconds,
      resumeFromCheckpoint: config.monitoring.resumeFromCheckpoint,
      ...(deps.clock ? { clock: deps.clock } : {}),
      log: this.log.child({ component: 'WalletPoller' }),
    });

    this.recorder = new TradeRecorder({
      store: deps.tradeStore,
      log: this.log.child({ component: 'TradeRecorder' }),
    });
  }

  get engines(): readonly CopyTradeEngine[] {
    return this.engineList;
  }

  /**
   * Build one engine per follower and register every subscription.
   * Invalid strategies throw here, before any polling starts.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    const { config } = this.deps;

    this.recorder.attach(this.broker, this.wallets);

    for (const follower of config.followers) {
      const executor = await this.deps.createExecutor(follower);
      const engine = new CopyTradeEngine({
        name: follower.name,
        strategy: follower.copyStrategy,
        executor,
        maxAttempts: config.trading.maxAttempts,
        retryBaseDelayMs: config.trading.retryBaseDelayMs,
        ...(this.deps.sleep ? { sleep: this.deps.sleep } : {}),
        ...(this.deps.clock ? { clock: this.deps.clock } : {}),
        log: this.log.child({ component: `CopyTradeEngine:${follower.name}` }),
      });

      for (const target of follower.targets) {
        engine.follow(this.broker, target);
      }
      this.engineList.push(engine);

      this.log.info('Follower configured', {
        follower: follower.name,
        address: shortAddress(follower.address),
        targets: follower.targets.length,
        copyMode: follower.copyStrategy.copyMode,
      });
    }

    this.initialized = true;
    this.log.info('Pipeline initialized', { wallets: this.wallets.length, followers: this.engineList.length });
  }

  async start(): Promise<void> {
    if (this.running) {
      this.log.warn('Pipeline already running');
      return;
    }
    await this.initialize();

    if (this.wallets.length === 0) {
      this.log.warn('No wallets to watch; set MONITOR_WALLETS or configure followers');
    }

    this.poller.start();
    this.running = true;
  }

  /**
   * Graceful stop: poller loops, then broker drain, then engine statistics
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    await this.poller.stop();
    await this.broker.shutdown();

    for (const engine of this.engineList) {
      engine.logStats();
    }
    this.log.info('Pipeline stopped', { recorded: this.recorder.inserted });
  }

  getState(): PipelineState {
    return {
      initialized: this.initialized,
      running: this.running,
      wallets: [...this.wallets],
      followers: this.engineList.map((engine) => engine.name),
    };
  }
}
