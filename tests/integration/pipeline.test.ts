import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CopyTradePipeline } from '../../src/pipeline.js';
import { InMemoryCheckpointStore, InMemoryTradeStore } from '../../src/database/stores.js';
import type { Config } from '../../src/config/schema.js';
import type { Activity } from '../../src/clients/shared/interfaces.js';
import {
  buildActivity,
  buildConfig,
  CONDITION_ID,
  OTHER_WALLET,
  secondsAfterBase,
  TARGET_WALLET,
  YES_TOKEN,
} from '../fixtures/activities.js';
import { createMockLogger } from '../mocks/logger.js';
import { FakeExecutionClient, LedgerActivityFeed } from '../mocks/polymarket.js';

const NOW = secondsAfterBase(100);

describe('Copy-trade pipeline', () => {
  let feed: LedgerActivityFeed;
  let checkpointStore: InMemoryCheckpointStore;
  let tradeStore: InMemoryTradeStore;
  let trades: Activity[];

  beforeEach(async () => {
    feed = new LedgerActivityFeed();
    checkpointStore = new InMemoryCheckpointStore();
    tradeStore = new InMemoryTradeStore();
    trades = [
      buildActivity({ timestamp: secondsAfterBase(10) }),
      buildActivity({ timestamp: secondsAfterBase(11), type: 'REDEEM' }),
      buildActivity({ timestamp: secondsAfterBase(12), side: 'SELL', cashAmount: 200 }),
    ];
    feed.add(...trades);
    await checkpointStore.set(TARGET_WALLET, secondsAfterBase(0));
  });

  function createPipeline(config: Config = buildConfig()) {
    const executors: FakeExecutionClient[] = [];
    const pipeline = new CopyTradePipeline({
      config,
      feed,
      checkpointStore,
      tradeStore,
      createExecutor: () => {
        const executor = new FakeExecutionClient().registerInstrument(CONDITION_ID, 'Yes', YES_TOKEN);
        executors.push(executor);
        return executor;
      },
      clock: () => NOW,
      sleep: async () => {},
      log: createMockLogger(),
    });
    return { pipeline, executors };
  }

  async function runOneCycle(pipeline: CopyTradePipeline): Promise<void> {
    await pipeline.start();
    await vi.waitFor(() => {
      expect(pipeline.poller.getStatus().every((status) => status.cyclesRun >= 1)).toBe(true);
    });
    await pipeline.stop();
  }

  it('should copy, record and checkpoint every new activity', async () => {
    const { pipeline, executors } = createPipeline();

    await runOneCycle(pipeline);

    const [executor] = executors;
    expect(executors).toHaveLength(1);
    expect(executor?.submitted.map((intent) => [intent.sourceTransactionHash, intent.side])).toEqual([
      [trades[0]?.transactionHash, 'BUY'],
      [trades[2]?.transactionHash, 'SELL'],
    ]);
    // 20% of 50 and of 200
    expect(executor?.submitted.map((intent) => intent.amount.toFixed(2))).toEqual(['10.00', '40.00']);

    expect(tradeStore.size()).toBe(3);
    expect(await checkpointStore.get(TARGET_WALLET)).toEqual({
      timestamp: secondsAfterBase(12),
      boundaryHashes: [trades[2]?.transactionHash],
    });
    // batchSize 2: one full page, then a short one
    expect(feed.queries.map((query) => query.offset)).toEqual([0, 2]);

    expect(pipeline.engines[0]?.getStats()).toEqual({
      totalActivities: 3,
      filteredOut: 1,
      tradesAttempted: 2,
      tradesSucceeded: 2,
      tradesFailed: 0,
    });
    expect(pipeline.recorder.inserted).toBe(3);
    expect(pipeline.getState()).toEqual({
      initialized: true,
      running: false,
      wallets: [TARGET_WALLET],
      followers: ['alpha'],
    });
  });

  it('should resume after a restart without re-executing or re-recording', async () => {
    await runOneCycle(createPipeline().pipeline);

    const newer = buildActivity({ timestamp: secondsAfterBase(20) });
    feed.add(newer);
    const { pipeline, executors } = createPipeline();
    await runOneCycle(pipeline);

    expect(feed.queries.at(-1)?.start).toEqual(secondsAfterBase(12));
    // The trade at the checkpoint instant comes back from the feed but is not republished
    expect(pipeline.poller.getStatus()[0]?.activitiesPublished).toBe(1);
    expect(executors[0]?.submitted.map((intent) => intent.sourceTransactionHash)).toEqual([newer.transactionHash]);
    expect(tradeStore.size()).toBe(4);
    expect(pipeline.recorder.inserted).toBe(1);
    expect(pipeline.engines[0]?.getStats().totalActivities).toBe(1);
    expect(await checkpointStore.get(TARGET_WALLET)).toEqual({
      timestamp: secondsAfterBase(20),
      boundaryHashes: [newer.transactionHash],
    });
  });

  it('should also poll monitored wallets that nobody copies', async () => {
    feed.add(buildActivity({ walletAddress: OTHER_WALLET, timestamp: secondsAfterBase(150) }));
    const { pipeline, executors } = createPipeline(buildConfig({ monitoringWallets: [OTHER_WALLET] }));

    await runOneCycle(pipeline);

    expect(pipeline.getState().wallets).toEqual([OTHER_WALLET, TARGET_WALLET]);
    // No stored checkpoint: starts from now, and the lookahead window covers the newer trade
    expect((await checkpointStore.get(OTHER_WALLET))?.timestamp).toEqual(secondsAfterBase(150));
    expect(tradeStore.size()).toBe(4);
    expect(executors[0]?.submitted).toHaveLength(2);
  });

  it('should refuse to start with an invalid strategy', async () => {
    const config = buildConfig();
    const follower = config.followers[0];
    if (!follower) throw new Error('fixture follower missing');
    follower.copyStrategy = { ...follower.copyStrategy, scalePercentage: undefined };

    const { pipeline } = createPipeline(config);

    await expect(pipeline.start()).rejects.toThrow("Follower 'alpha': scalePercentage is required for SCALE copy mode");
    expect(pipeline.poller.isRunning).toBe(false);
  });
});
