import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigSchema, type Config, type FollowerWallet } from './schema.js';
import { DEFAULTS, POLYGON_CHAIN_ID, POLYMARKET_ENDPOINTS } from './constants.js';

// Load environment variables
dotenv.config();

const DEFAULT_FOLLOWERS_PATH = './config/followers.json';

/**
 * Parse boolean from environment variable
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse number from environment variable
 */
function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a comma separated list, dropping blanks
 */
function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Read the follower wallet definitions from a JSON file.
 * A missing file means no followers; a malformed one is an error.
 */
export function readFollowersFile(filePath: string): unknown {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    return [];
  }

  const raw = fs.readFileSync(resolved, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Followers file ${resolved} is not valid JSON: ${reason}`);
  }

  // Accept either a bare array or { "followers": [...] }
  if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed) && 'followers' in parsed) {
    return parsed.followers;
  }
  return parsed;
}

/**
 * Build configuration object from environment variables
 */
function buildConfigFromEnv(env: NodeJS.ProcessEnv): unknown {
  return {
    env: env['NODE_ENV'] || 'development',
    logLevel: env['LOG_LEVEL'] || 'info',

    database: {
      url: env['DATABASE_URL'] || undefined,
      poolSize: parseNumber(env['DATABASE_POOL_SIZE'], 10),
    },

    polymarket: {
      clobHost: env['POLYMARKET_CLOB_HOST'] || POLYMARKET_ENDPOINTS.CLOB,
      dataApiUrl: env['POLYMARKET_DATA_API_URL'] || POLYMARKET_ENDPOINTS.DATA_API,
      chainId: parseNumber(env['POLYMARKET_CHAIN_ID'], POLYGON_CHAIN_ID),
      requestTimeoutMs: parseNumber(env['POLYMARKET_REQUEST_TIMEOUT_MS'], DEFAULTS.REQUEST_TIMEOUT_MS),
    },

    monitoring: {
      wallets: parseList(env['MONITOR_WALLETS']),
      pollIntervalSeconds: parseNumber(env['POLL_INTERVAL_SECONDS'], DEFAULTS.POLL_INTERVAL_SECONDS),
      batchSize: parseNumber(env['POLL_BATCH_SIZE'], DEFAULTS.BATCH_SIZE),
      lookaheadSeconds: parseNumber(env['POLL_LOOKAHEAD_SECONDS'], DEFAULTS.LOOKAHEAD_SECONDS),
      resumeFromCheckpoint: parseBoolean(env['RESUME_FROM_CHECKPOINT'], true),
    },

    broker: {
      maxWorkers: parseNumber(env['BROKER_MAX_WORKERS'], DEFAULTS.BROKER_MAX_WORKERS),
    },

    trading: {
      dryRun: parseBoolean(env['DRY_RUN'], true),
      maxAttempts: parseNumber(env['EXECUTION_MAX_ATTEMPTS'], DEFAULTS.MAX_EXECUTION_ATTEMPTS),
      retryBaseDelayMs: parseNumber(env['EXECUTION_RETRY_BASE_DELAY_MS'], DEFAULTS.RETRY_BASE_DELAY_MS),
    },

    api: {
      port: parseNumber(env['API_PORT'], 3000),
      enableMetrics: parseBoolean(env['ENABLE_METRICS'], true),
    },

    followers: readFollowersFile(env['FOLLOWERS_CONFIG_PATH'] || DEFAULT_FOLLOWERS_PATH),
  };
}

/**
 * Validate and load configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = buildConfigFromEnv(env);

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
      throw new Error(`Configuration validation failed:\n${issues}`);
    }
    throw error;
  }
}

// Singleton config instance
let configInstance: Config | null = null;

/**
 * Get the configuration instance (lazy loaded)
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Every wallet that needs a poller: explicitly monitored wallets plus all follower targets
 */
export function getWatchedWallets(config: Config): string[] {
  const wallets = new Set<string>();
  for (const wallet of config.monitoring.wallets) {
    wallets.add(wallet.toLowerCase());
  }
  for (const follower of config.followers) {
    for (const target of follower.targets) {
      wallets.add(target.toLowerCase());
    }
  }
  return Array.from(wallets);
}

/**
 * Load a follower's private key from the environment variable it names
 */
export function loadPrivateKey(follower: FollowerWallet, env: NodeJS.ProcessEnv = process.env): string {
  const key = env[follower.privateKeyEnv];
  if (!key) {
    throw new Error(
      `Environment variable '${follower.privateKeyEnv}' is not set; cannot load private key for wallet '${follower.name}'`
    );
  }
  return key;
}

// Re-export types and constants
export * from './schema.js';
export * from './constants.js';
