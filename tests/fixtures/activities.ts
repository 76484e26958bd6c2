/**
 * Test fixtures: activities, strategies and configuration
 */

import type { Activity } from '../../src/clients/shared/interfaces.js';
import { ConfigSchema, type Config, type CopyStrategy } from '../../src/config/schema.js';

export const TARGET_WALLET = '0x00000000000000000000000000000000000000aa';
export const OTHER_WALLET = '0x00000000000000000000000000000000000000bb';
export const CONDITION_ID = '0xcondition-1';
export const YES_TOKEN = 'token-yes-1';

// 2026-01-01T00:00:00Z
export const BASE_TIME = new Date(Date.UTC(2026, 0, 1));

export function secondsAfterBase(seconds: number): Date {
  return new Date(BASE_TIME.getTime() + seconds * 1000);
}

let txCounter = 0;

/**
 * A BUY trade of 100 shares at 0.5 (50 USDC) on the Yes outcome
 */
export function buildActivity(overrides: Partial<Activity> = {}): Activity {
  txCounter++;
  return {
    walletAddress: TARGET_WALLET,
    type: 'TRADE',
    transactionHash: `0xtx-${txCounter}`,
    conditionId: CONDITION_ID,
    outcome: 'Yes',
    side: 'BUY',
    size: 100,
    price: 0.5,
    cashAmount: 50,
    timestamp: BASE_TIME,
    ...overrides,
  };
}

/**
 * `count` trades one second apart starting at `startSecond`
 */
export function buildActivityRun(count: number, startSecond = 0, overrides: Partial<Activity> = {}): Activity[] {
  return Array.from({ length: count }, (_, index) =>
    buildActivity({ timestamp: secondsAfterBase(startSecond + index), ...overrides })
  );
}

export function buildStrategy(overrides: Partial<CopyStrategy> = {}): CopyStrategy {
  return {
    copyMode: 'SCALE',
    scalePercentage: 20,
    minTriggerAmount: 0,
    minTradeAmount: 0,
    maxTradeAmount: 0,
    orderType: 'MARKET',
    limitOrderDurationSeconds: 7200,
    ...overrides,
  };
}

/**
 * Validated configuration with one follower copying TARGET_WALLET
 */
export function buildConfig(overrides: { monitoringWallets?: string[]; strategy?: Partial<CopyStrategy> } = {}): Config {
  return ConfigSchema.parse({
    env: 'test',
    logLevel: 'error',
    database: {},
    polymarket: {},
    monitoring: {
      wallets: overrides.monitoringWallets ?? [],
      pollIntervalSeconds: 3600,
      batchSize: 2,
    },
    broker: { maxWorkers: 4 },
    trading: { dryRun: true, maxAttempts: 3, retryBaseDelayMs: 1000 },
    api: {},
    followers: [
      {
        name: 'alpha',
        address: '0x0000000000000000000000000000000000000001',
        privateKeyEnv: 'ALPHA_TEST_KEY',
        targets: [TARGET_WALLET],
        copyStrategy: { copyMode: 'SCALE', scalePercentage: 20, ...overrides.strategy },
      },
    ],
  });
}
