import { z } from 'zod';
import {
  COPY_MODES,
  DEFAULTS,
  ORDER_TYPES,
  POLYGON_CHAIN_ID,
  POLYMARKET_ENDPOINTS,
  SIGNATURE_TYPES,
} from './constants.js';

// Copy strategy for one follower wallet
export const CopyStrategySchema = z
  .object({
    copyMode: z.enum([COPY_MODES.SCALE, COPY_MODES.ALLOCATE]),
    // Percentage of the target's trade value (SCALE only)
    scalePercentage: z.number().positive().max(1000).optional(),
    // Target trades below this USDC value are ignored
    minTriggerAmount: z.number().min(0).default(0),
    minTradeAmount: z.number().min(0).default(0),
    // 0 = unbounded
    maxTradeAmount: z.number().min(0).default(0),
    orderType: z.enum([ORDER_TYPES.MARKET, ORDER_TYPES.LIMIT]).default(ORDER_TYPES.MARKET),
    limitOrderDurationSeconds: z.number().int().positive().default(DEFAULTS.LIMIT_ORDER_DURATION_SECONDS),
  })
  .superRefine((strategy, ctx) => {
    if (strategy.copyMode === COPY_MODES.SCALE && strategy.scalePercentage === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['scalePercentage'],
        message: 'scalePercentage is required when copyMode is SCALE',
      });
    }
    if (strategy.maxTradeAmount > 0 && strategy.minTradeAmount > strategy.maxTradeAmount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minTradeAmount'],
        message: 'minTradeAmount cannot exceed maxTradeAmount',
      });
    }
  });

// Follower wallet that copies one or more target wallets
export const FollowerWalletSchema = z
  .object({
    name: z.string().min(1),
    address: z.string().min(1),
    // Name of the environment variable holding the private key (never the key itself)
    privateKeyEnv: z.string().min(1),
    signatureType: z
      .union([
        z.literal(SIGNATURE_TYPES.EOA),
        z.literal(SIGNATURE_TYPES.POLY_PROXY),
        z.literal(SIGNATURE_TYPES.BROWSER_PROXY),
      ])
      .default(SIGNATURE_TYPES.EOA),
    // Funder address, required for signature type 2
    proxyAddress: z.string().optional(),
    targets: z.array(z.string().min(1)).min(1),
    copyStrategy: CopyStrategySchema,
  })
  .superRefine((follower, ctx) => {
    if (follower.signatureType === SIGNATURE_TYPES.BROWSER_PROXY && !follower.proxyAddress) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['proxyAddress'],
        message: 'proxyAddress is required when signatureType is 2',
      });
    }
  });

// Database configuration schema
const DatabaseConfigSchema = z.object({
  // Absent url runs the pipeline on in-memory stores
  url: z.string().url().optional(),
  poolSize: z.number().min(1).max(100).default(10),
});

// Polymarket configuration schema
const PolymarketConfigSchema = z.object({
  clobHost: z.string().default(POLYMARKET_ENDPOINTS.CLOB),
  dataApiUrl: z.string().default(POLYMARKET_ENDPOINTS.DATA_API),
  chainId: z.number().default(POLYGON_CHAIN_ID),
  requestTimeoutMs: z.number().positive().default(DEFAULTS.REQUEST_TIMEOUT_MS),
});

// Wallet polling configuration schema
const MonitoringConfigSchema = z.object({
  wallets: z.array(z.string().min(1)).default([]),
  pollIntervalSeconds: z.number().positive().default(DEFAULTS.POLL_INTERVAL_SECONDS),
  batchSize: z.number().int().min(1).max(500).default(DEFAULTS.BATCH_SIZE),
  lookaheadSeconds: z.number().min(0).default(DEFAULTS.LOOKAHEAD_SECONDS),
  resumeFromCheckpoint: z.boolean().default(true),
});

// Broker configuration schema
const BrokerConfigSchema = z.object({
  maxWorkers: z.number().int().min(1).max(256).default(DEFAULTS.BROKER_MAX_WORKERS),
});

// Trading configuration schema
const TradingConfigSchema = z.object({
  dryRun: z.boolean().default(true),
  maxAttempts: z.number().int().min(1).max(10).default(DEFAULTS.MAX_EXECUTION_ATTEMPTS),
  retryBaseDelayMs: z.number().min(0).default(DEFAULTS.RETRY_BASE_DELAY_MS),
});

// API configuration schema
const ApiConfigSchema = z.object({
  port: z.number().min(1).max(65535).default(3000),
  enableMetrics: z.boolean().default(true),
});

// Main configuration schema
export const ConfigSchema = z.object({
  env: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  database: DatabaseConfigSchema,
  polymarket: PolymarketConfigSchema,
  monitoring: MonitoringConfigSchema,
  broker: BrokerConfigSchema,
  trading: TradingConfigSchema,
  api: ApiConfigSchema,
  followers: z.array(FollowerWalletSchema).default([]),
});

// Export types
export type Config = z.infer<typeof ConfigSchema>;
export type CopyStrategy = z.infer<typeof CopyStrategySchema>;
export type FollowerWallet = z.infer<typeof FollowerWalletSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type PolymarketConfig = z.infer<typeof PolymarketConfigSchema>;
export type MonitoringConfig = z.infer<typeof MonitoringConfigSchema>;
export type BrokerConfig = z.infer<typeof BrokerConfigSchema>;
export type TradingConfig = z.infer<typeof TradingConfigSchema>;
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
