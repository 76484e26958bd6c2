import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { getConfig } from '../config/index.js';
import { errorMeta, logger, type Logger } from '../utils/logger.js';
import * as schema from './schema/index.js';

// Re-export schema
export * from './schema/index.js';

let dbInstance: ReturnType<typeof createDrizzle> | null = null;
let sqlClient: ReturnType<typeof postgres> | null = null;

const log: Logger = logger('Database');

const REQUIRED_TABLES = ['trades', 'wallet_checkpoints'] as const;

/**
 * DDL for the tables the pipeline writes to. Idempotent.
 */
export const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS trades (
    transaction_hash TEXT PRIMARY KEY,
    wallet_address TEXT NOT NULL,
    activity_type TEXT NOT NULL DEFAULT 'TRADE',
    market_id TEXT NOT NULL,
    outcome TEXT,
    side TEXT,
    amount NUMERIC(36, 18) NOT NULL,
    price NUMERIC(36, 18) NOT NULL,
    usdc_amount NUMERIC(36, 18) NOT NULL,
    timestamp TIMESTAMPTZ NOT NULL,
    created_at TIMESTAMPTZ DEFAULT NOW()
  );
  CREATE INDEX IF NOT EXISTS trades_wallet_idx ON trades (wallet_address);
  CREATE INDEX IF NOT EXISTS trades_market_idx ON trades (market_id);
  CREATE INDEX IF NOT EXISTS trades_timestamp_idx ON trades (timestamp);

  CREATE TABLE IF NOT EXISTS wallet_checkpoints (
    wallet_address TEXT PRIMARY KEY,
    last_synced_timestamp TIMESTAMPTZ,
    boundary_hashes TEXT[] NOT NULL DEFAULT '{}',
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
  ALTER TABLE wallet_checkpoints ADD COLUMN IF NOT EXISTS boundary_hashes TEXT[] NOT NULL DEFAULT '{}';
  CREATE INDEX IF NOT EXISTS wallet_checkpoints_synced_idx ON wallet_checkpoints (last_synced_timestamp);
`;

function createDrizzle(client: ReturnType<typeof postgres>, debug: boolean) {
  return drizzle(client, { schema, logger: debug });
}

/**
 * Get database connection
 * Uses singleton pattern to reuse connections
 */
export function getDb() {
  if (!dbInstance) {
    const config = getConfig();
    const url = config.database.url;
    if (!url) {
      throw new Error('DATABASE_URL is not configured');
    }

    log.info('Connecting to database', {
      url: url.replace(/:[^:@]+@/, ':****@'), // Hide password
    });

    // Create postgres client
    sqlClient = postgres(url, {
      max: config.database.poolSize,
      idle_timeout: 20,
      connect_timeout: 10,
      onnotice: () => {}, // Suppress notices
    });

    dbInstance = createDrizzle(sqlClient, config.logLevel === 'debug');

    log.info('Database connected');
  }

  return dbInstance;
}

/**
 * Close database connection
 */
export async function closeDb(): Promise<void> {
  if (sqlClient) {
    await sqlClient.end();
    sqlClient = null;
    dbInstance = null;
    log.info('Database connection closed');
  }
}

/**
 * Execute a raw SQL query
 */
export async function rawQuery<T extends object[] = object[]>(query: string): Promise<T> {
  if (!sqlClient) {
    getDb(); // Initialize connection
  }

  if (!sqlClient) {
    throw new Error('Database not connected');
  }

  return sqlClient.unsafe<T>(query);
}

/**
 * Check database connection health
 */
export async function checkHealth(): Promise<{ connected: boolean; latencyMs: number }> {
  const start = Date.now();

  try {
    await rawQuery('SELECT 1');
    return {
      connected: true,
      latencyMs: Date.now() - start,
    };
  } catch (error) {
    log.error('Database health check failed', errorMeta(error));
    return {
      connected: false,
      latencyMs: Date.now() - start,
    };
  }
}

/**
 * Initialize database: create missing tables
 */
export async function initializeDb(): Promise<void> {
  getDb(); // Ensure connection is initialized

  try {
    const result = await rawQuery<{ table_name: string }[]>(`
      SELECT table_name FROM information_schema.tables
      WHERE table_schema = 'public'
      AND table_name IN (${REQUIRED_TABLES.map((name) => `'${name}'`).join(', ')});
    `);

    const existing = new Set(result.map((row) => row.table_name));
    const missing = REQUIRED_TABLES.filter((name) => !existing.has(name));

    if (missing.length > 0) {
      log.warn('Creating missing tables', { missing });
      await rawQuery(CREATE_TABLES_SQL);
    }
    log.info('Database tables verified');
  } catch (error) {
    log.error('Failed to initialize database', errorMeta(error));
    throw error;
  }
}

// Export types
export type Database = ReturnType<typeof getDb>;
