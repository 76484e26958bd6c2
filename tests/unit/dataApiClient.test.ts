import { describe, it, expect } from 'vitest';
import axios, { type InternalAxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { DataApiClient } from '../../src/clients/polymarket/DataApiClient.js';
import type { Activity } from '../../src/clients/shared/interfaces.js';
import { InMemoryCheckpointStore } from '../../src/database/stores.js';
import { ActivityBroker } from '../../src/services/activityBroker/ActivityBroker.js';
import { WalletPoller } from '../../src/services/walletPoller/WalletPoller.js';
import { shortAddress } from '../../src/utils/logger.js';
import { secondsAfterBase, TARGET_WALLET } from '../fixtures/activities.js';
import { createMockLogger } from '../mocks/logger.js';

function createClient(data: unknown) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      return { data, status: 200, statusText: 'OK', headers: {}, config };
    },
  });
  return { client: new DataApiClient({ http, log: createMockLogger() }), requests };
}

const query = {
  wallet: TARGET_WALLET.replace('aa', 'AA'),
  start: secondsAfterBase(0),
  end: secondsAfterBase(3600),
  limit: 500,
  offset: 1000,
};

const BASE_UNIX = 1767225600;

describe('DataApiClient', () => {
  it('should query the activity endpoint in ascending time order', async () => {
    const { client, requests } = createClient([]);

    await client.fetchActivities(query);

    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe('/activity');
    expect(requests[0]?.params).toEqual({
      user: query.wallet,
      start: BASE_UNIX,
      end: BASE_UNIX + 3600,
      limit: 500,
      offset: 1000,
      sortBy: 'TIMESTAMP',
      sortDirection: 'ASC',
    });
  });

  it('should normalize activities', async () => {
    const { client } = createClient([
      {
        proxyWallet: query.wallet,
        timestamp: BASE_UNIX + 5,
        conditionId: '0xcondition-1',
        type: 'TRADE',
        size: '120.5',
        usdcSize: 60.25,
        transactionHash: '0xtx-api-1',
        price: 0.5,
        asset: 'token-yes-1',
        side: 'BUY',
        title: 'Will it rain?',
        outcome: 'Yes',
      },
    ]);

    const page = await client.fetchActivities(query);

    expect(page.rawCount).toBe(1);
    expect(page.lastTimestamp).toEqual(secondsAfterBase(5));
    expect(page.activities).toEqual([
      {
        walletAddress: TARGET_WALLET,
        type: 'TRADE',
        transactionHash: '0xtx-api-1',
        size: 120.5,
        price: 0.5,
        cashAmount: 60.25,
        timestamp: secondsAfterBase(5),
        conditionId: '0xcondition-1',
        outcome: 'Yes',
        side: 'BUY',
        asset: 'token-yes-1',
        title: 'Will it rain?',
      },
    ]);
  });

  it('should leave absent market fields unset and default amounts to zero', async () => {
    const { client } = createClient([
      { proxyWallet: query.wallet, timestamp: BASE_UNIX, type: 'REWARD', transactionHash: '0xtx-api-2', side: '' },
    ]);

    const [activity] = (await client.fetchActivities(query)).activities;

    expect(activity).toEqual({
      walletAddress: TARGET_WALLET,
      type: 'REWARD',
      transactionHash: '0xtx-api-2',
      size: 0,
      price: 0,
      cashAmount: 0,
      timestamp: secondsAfterBase(0),
    });
  });

  it('should drop activity types it does not know but still count them', async () => {
    const { client } = createClient([
      { proxyWallet: query.wallet, timestamp: BASE_UNIX + 7, type: 'MAKER_REBATE', transactionHash: '0xtx-api-3' },
    ]);

    expect(await client.fetchActivities(query)).toEqual({
      activities: [],
      rawCount: 1,
      lastTimestamp: secondsAfterBase(7),
    });
  });

  it('should skip a malformed record and keep the rest of the page', async () => {
    const log = createMockLogger();
    const http = axios.create({
      adapter: async (config) => ({
        data: [
          { proxyWallet: query.wallet, timestamp: BASE_UNIX + 1, type: 'TRADE', transactionHash: '0xtx-api-t1' },
          { transactionHash: '' },
          { proxyWallet: query.wallet, timestamp: BASE_UNIX + 3, type: 'TRADE', transactionHash: '0xtx-api-t3' },
        ],
        status: 200,
        statusText: 'OK',
        headers: {},
        config,
      }),
    });
    const client = new DataApiClient({ http, log });

    const page = await client.fetchActivities(query);

    expect(page.activities.map((activity) => activity.transactionHash)).toEqual(['0xtx-api-t1', '0xtx-api-t3']);
    expect(page.rawCount).toBe(3);
    expect(page.lastTimestamp).toEqual(secondsAfterBase(3));
    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith(
      'Skipping malformed activity record',
      expect.objectContaining({ wallet: shortAddress(query.wallet), offset: 1001 })
    );
  });

  it('should reject a response that is not a list', async () => {
    const { client } = createClient({ error: 'bad request' });

    await expect(client.fetchActivities(query)).rejects.toThrow(
      `Invalid activity response for ${query.wallet}: expected an array`
    );
  });

  it('should propagate transport errors', async () => {
    const http = axios.create({
      adapter: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    });
    const client = new DataApiClient({ http, log: createMockLogger() });

    await expect(client.fetchActivities(query)).rejects.toThrow('connect ECONNREFUSED');
  });

  describe('paging through the poller', () => {
    const PageParamsSchema = z.object({ offset: z.number(), limit: z.number() });

    it('should keep paging past a full page of unknown activity types', async () => {
      const rows = [
        { proxyWallet: TARGET_WALLET, timestamp: BASE_UNIX + 1, type: 'MAKER_REBATE', transactionHash: '0xtx-api-r1' },
        { proxyWallet: TARGET_WALLET, timestamp: BASE_UNIX + 2, type: 'MAKER_REBATE', transactionHash: '0xtx-api-r2' },
        { proxyWallet: TARGET_WALLET, timestamp: BASE_UNIX + 3, type: 'TRADE', transactionHash: '0xtx-api-t3' },
      ];
      const offsets: number[] = [];
      const http = axios.create({
        adapter: async (config) => {
          const { offset, limit } = PageParamsSchema.parse(config.params);
          offsets.push(offset);
          return { data: rows.slice(offset, offset + limit), status: 200, statusText: 'OK', headers: {}, config };
        },
      });

      const broker = new ActivityBroker({ log: createMockLogger() });
      const delivered: Activity[] = [];
      broker.subscribe(TARGET_WALLET, (batch) => {
        delivered.push(...batch);
      });
      const store = new InMemoryCheckpointStore();
      await store.set(TARGET_WALLET, secondsAfterBase(0));

      const poller = new WalletPoller({
        feed: new DataApiClient({ http, log: createMockLogger() }),
        broker,
        checkpointStore: store,
        wallets: [TARGET_WALLET],
        batchSize: 2,
        lookaheadSeconds: 60,
        clock: () => secondsAfterBase(100),
        log: createMockLogger(),
      });

      const result = await poller.pollOnce(TARGET_WALLET);
      await broker.drain();

      expect(offsets).toEqual([0, 2]);
      expect(result).toEqual({ wallet: TARGET_WALLET, pages: 2, fetched: 3, published: 1, checkpoint: secondsAfterBase(3) });
      expect(delivered.map((activity) => activity.transactionHash)).toEqual(['0xtx-api-t3']);
      expect(await store.get(TARGET_WALLET)).toEqual({ timestamp: secondsAfterBase(3), boundaryHashes: ['0xtx-api-t3'] });
    });
  });
});
