/**
 * Persistence capabilities used by the pipeline, plus the in-memory
 * implementations used when no database is configured.
 */

import type { Activity } from '../clients/shared/interfaces.js';

/**
 * Per-wallet sync position: the newest timestamp ingested, plus the
 * transactions already published at exactly that instant
 */
export interface WalletCheckpoint {
  timestamp: Date;
  boundaryHashes: readonly string[];
}

/**
 * Per-wallet sync checkpoint. `set` never moves a checkpoint backwards;
 * hashes offered for the stored instant are merged into its boundary set.
 */
export interface CheckpointStore {
  get(wallet: string): Promise<WalletCheckpoint | null>;
  set(wallet: string, timestamp: Date, boundaryHashes?: readonly string[]): Promise<void>;
}

/**
 * Combine a stored checkpoint with a newer (or equal) candidate
 */
export function mergeCheckpoint(existing: WalletCheckpoint | null, next: WalletCheckpoint): WalletCheckpoint {
  if (!existing || next.timestamp.getTime() > existing.timestamp.getTime()) {
    return { timestamp: next.timestamp, boundaryHashes: [...new Set(next.boundaryHashes)] };
  }
  if (next.timestamp.getTime() < existing.timestamp.getTime()) {
    return existing;
  }
  return {
    timestamp: existing.timestamp,
    boundaryHashes: [...new Set([...existing.boundaryHashes, ...next.boundaryHashes])],
  };
}

/**
 * Row persisted for every observed activity
 */
export interface TradeRecord {
  transactionHash: string;
  walletAddress: string;
  activityType: string;
  marketId: string;
  outcome: string | null;
  side: string | null;
  amount: number;
  price: number;
  usdcAmount: number;
  timestamp: Date;
}

/**
 * Idempotent trade sink keyed by transaction hash
 */
export interface TradeStore {
  insertIfAbsent(record: TradeRecord): Promise<boolean>;
  // Returns how many records were new
  insertManyIfAbsent(records: readonly TradeRecord[]): Promise<number>;
}

/**
 * Map an activity to its trade record; activities without a market are not recorded
 */
export function activityToTradeRecord(activity: Activity): TradeRecord | null {
  if (!activity.transactionHash || !activity.conditionId) {
    return null;
  }

  return {
    transactionHash: activity.transactionHash,
    walletAddress: activity.walletAddress.toLowerCase(),
    activityType: activity.type,
    marketId: activity.conditionId,
    outcome: activity.outcome ?? null,
    side: activity.side ?? null,
    amount: activity.size,
    price: activity.price,
    usdcAmount: activity.cashAmount > 0 ? activity.cashAmount : activity.size * activity.price,
    timestamp: activity.timestamp,
  };
}

/**
 * Checkpoint store kept in process memory; never moves a checkpoint backwards
 */
export class InMemoryCheckpointStore implements CheckpointStore {
  private checkpoints: Map<string, WalletCheckpoint> = new Map();

  async get(wallet: string): Promise<WalletCheckpoint | null> {
    const stored = this.checkpoints.get(wallet.toLowerCase());
    return stored ? { timestamp: stored.timestamp, boundaryHashes: [...stored.boundaryHashes] } : null;
  }

  async set(wallet: string, timestamp: Date, boundaryHashes: readonly string[] = []): Promise<void> {
    const key = wallet.toLowerCase();
    this.checkpoints.set(key, mergeCheckpoint(this.checkpoints.get(key) ?? null, { timestamp, boundaryHashes }));
  }
}

/**
 * Trade store kept in process memory
 */
export class InMemoryTradeStore implements TradeStore {
  private records: Map<string, TradeRecord> = new Map();

  async insertIfAbsent(record: TradeRecord): Promise<boolean> {
    if (this.records.has(record.transactionHash)) {
      return false;
    }
    this.records.set(record.transactionHash, { ...record });
    return true;
  }

  async insertManyIfAbsent(records: readonly TradeRecord[]): Promise<number> {
    let inserted = 0;
    for (const record of records) {
      if (await this.insertIfAbsent(record)) {
        inserted++;
      }
    }
    return inserted;
  }

  getAll(): TradeRecord[] {
    return Array.from(this.records.values());
  }

  size(): number {
    return this.records.size;
  }
}
