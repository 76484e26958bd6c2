import { eq, sql } from 'drizzle-orm';
import type { Database } from './index.js';
import { trades, walletCheckpoints, type NewTradeRow } from './schema/index.js';
import type { CheckpointStore, TradeRecord, TradeStore, WalletCheckpoint } from './stores.js';
import { logger, shortAddress, type Logger } from '../utils/logger.js';

function toRow(record: TradeRecord): NewTradeRow {
  return {
    transactionHash: record.transactionHash,
    walletAddress: record.walletAddress.toLowerCase(),
    activityType: record.activityType,
    marketId: record.marketId,
    outcome: record.outcome,
    side: record.side,
    // numeric columns travel as strings
    amount: String(record.amount),
    price: String(record.price),
    usdcAmount: String(record.usdcAmount),
    timestamp: record.timestamp,
  };
}

/**
 * Trade store backed by the `trades` table.
 * Duplicates are dropped by the primary key (ON CONFLICT DO NOTHING).
 */
export class PostgresTradeStore implements TradeStore {
  private db: Database;
  private log: Logger;

  constructor(db: Database, options: { log?: Logger } = {}) {
    this.db = db;
    this.log = options.log ?? logger('PostgresTradeStore');
  }

  async insertIfAbsent(record: TradeRecord): Promise<boolean> {
    const rows = await this.db
      .insert(trades)
      .values(toRow(record))
      .onConflictDoNothing({ target: trades.transactionHash })
      .returning({ hash: trades.transactionHash });

    return rows.length > 0;
  }

  async insertManyIfAbsent(records: readonly TradeRecord[]): Promise<number> {
    if (records.length === 0) {
      return 0;
    }

    const rows = await this.db
      .insert(trades)
      .values(records.map(toRow))
      .onConflictDoNothing({ target: trades.transactionHash })
      .returning({ hash: trades.transactionHash });

    this.log.debug('Inserted trade records', { offered: records.length, inserted: rows.length });
    return rows.length;
  }
}

/**
 * Checkpoint store backed by the `wallet_checkpoints` table
 */
export class PostgresCheckpointStore implements CheckpointStore {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async get(wallet: string): Promise<WalletCheckpoint | null> {
    const rows = await this.db
      .select({
        lastSyncedTimestamp: walletCheckpoints.lastSyncedTimestamp,
        boundaryHashes: walletCheckpoints.boundaryHashes,
      })
      .from(walletCheckpoints)
      .where(eq(walletCheckpoints.walletAddress, wallet.toLowerCase()))
      .limit(1);

    const row = rows[0];
    if (!row?.lastSyncedTimestamp) {
      return null;
    }
    return { timestamp: row.lastSyncedTimestamp, boundaryHashes: row.boundaryHashes };
  }

  async set(wallet: string, timestamp: Date, boundaryHashes: readonly string[] = []): Promise<void> {
    const now = new Date();
    const stored = walletCheckpoints.lastSyncedTimestamp;
    // Every expression below sees the row as it was before the update
    await this.db
      .insert(walletCheckpoints)
      .values({
        walletAddress: wallet.toLowerCase(),
        lastSyncedTimestamp: timestamp,
        boundaryHashes: [...new Set(boundaryHashes)],
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: walletCheckpoints.walletAddress,
        set: {
          lastSyncedTimestamp: sql`GREATEST(${stored}, excluded.last_synced_timestamp)`,
          boundaryHashes: sql`CASE
            WHEN ${stored} IS NULL OR excluded.last_synced_timestamp > ${stored} THEN excluded.boundary_hashes
            WHEN excluded.last_synced_timestamp = ${stored}
              THEN ARRAY(SELECT DISTINCT unnest(${walletCheckpoints.boundaryHashes} || excluded.boundary_hashes))
            ELSE ${walletCheckpoints.boundaryHashes}
          END`,
          updatedAt: now,
        },
      });
  }

  /**
   * Every stored checkpoint, for tooling
   */
  async list(): Promise<
    Array<{ wallet: string; lastSyncedTimestamp: Date | null; boundaryHashes: string[]; updatedAt: Date }>
  > {
    const rows = await this.db.select().from(walletCheckpoints).orderBy(walletCheckpoints.walletAddress);
    return rows.map((row) => ({
      wallet: row.walletAddress,
      lastSyncedTimestamp: row.lastSyncedTimestamp,
      boundaryHashes: row.boundaryHashes,
      updatedAt: row.updatedAt,
    }));
  }
}

export function describeCheckpoint(wallet: string, timestamp: Date | null): string {
  return `${shortAddress(wallet)} -> ${timestamp ? timestamp.toISOString() : 'never'}`;
}
