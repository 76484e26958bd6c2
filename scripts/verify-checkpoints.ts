#!/usr/bin/env tsx
/**
 * Print the stored sync checkpoint of every wallet, and of the configured
 * wallets that have none yet
 */

import { getConfig, getWatchedWallets } from '../src/config/index.js';
import { closeDb, getDb } from '../src/database/index.js';
import { PostgresCheckpointStore, describeCheckpoint } from '../src/database/repositories.js';
import { logger } from '../src/utils/logger.js';
import { formatDuration } from '../src/utils/time.js';

const log = logger('VerifyCheckpoints');

async function verifyCheckpoints(): Promise<void> {
  const config = getConfig();
  const store = new PostgresCheckpointStore(getDb());

  const stored = await store.list();
  const now = Date.now();

  for (const row of stored) {
    const lag = row.lastSyncedTimestamp ? formatDuration(now - row.lastSyncedTimestamp.getTime()) : 'n/a';
    log.info(describeCheckpoint(row.wallet, row.lastSyncedTimestamp), {
      lag,
      boundaryHashes: row.boundaryHashes.length,
      updatedAt: row.updatedAt.toISOString(),
    });
  }

  const known = new Set(stored.map((row) => row.wallet));
  const missing = getWatchedWallets(config).filter((wallet) => !known.has(wallet));
  for (const wallet of missing) {
    log.warn(describeCheckpoint(wallet, null));
  }

  log.info('Checkpoint summary', { stored: stored.length, watchedWithoutCheckpoint: missing.length });
}

verifyCheckpoints()
  .then(async () => {
    await closeDb();
    process.exit(0);
  })
  .catch(async (error: unknown) => {
    log.error('Checkpoint verification failed', { error: error instanceof Error ? error.message : String(error) });
    await closeDb();
    process.exit(1);
  });
