import { sql } from 'drizzle-orm';
import { pgTable, text, timestamp, numeric, index } from 'drizzle-orm/pg-core';

/**
 * Trades table - every activity observed on a watched wallet, keyed by transaction hash
 */
export const trades = pgTable(
  'trades',
  {
    // Natural key: on-chain transaction hash
    transactionHash: text('transaction_hash').primaryKey(),
    walletAddress: text('wallet_address').notNull(),
    // TRADE | SPLIT | MERGE | REDEEM | REWARD | CONVERSION
    activityType: text('activity_type').notNull().default('TRADE'),
    // Condition id of the market
    marketId: text('market_id').notNull(),
    outcome: text('outcome'),
    side: text('side'),
    amount: numeric('amount', { precision: 36, scale: 18 }).notNull(),
    price: numeric('price', { precision: 36, scale: 18 }).notNull(),
    usdcAmount: numeric('usdc_amount', { precision: 36, scale: 18 }).notNull(),
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
  },
  (table) => ({
    walletIdx: index('trades_wallet_idx').on(table.walletAddress),
    marketIdx: index('trades_market_idx').on(table.marketId),
    timestampIdx: index('trades_timestamp_idx').on(table.timestamp),
  })
);

/**
 * Wallet checkpoints table - last ingested activity timestamp per watched wallet,
 * with the transactions already delivered at that instant
 */
export const walletCheckpoints = pgTable(
  'wallet_checkpoints',
  {
    walletAddress: text('wallet_address').primaryKey(),
    lastSyncedTimestamp: timestamp('last_synced_timestamp', { withTimezone: true }),
    // Transactions already published at exactly last_synced_timestamp
    boundaryHashes: text('boundary_hashes')
      .array()
      .notNull()
      .default(sql`'{}'::text[]`),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    syncedIdx: index('wallet_checkpoints_synced_idx').on(table.lastSyncedTimestamp),
  })
);

export type TradeRow = typeof trades.$inferSelect;
export type NewTradeRow = typeof trades.$inferInsert;
export type WalletCheckpointRow = typeof walletCheckpoints.$inferSelect;
