import express from 'express';
import type { Server } from 'http';
import { getConfig, loadPrivateKey } from './config/index.js';
import type { Config, FollowerWallet } from './config/schema.js';
import { logger } from './utils/logger.js';
import { initializeDb, closeDb, checkHealth, getDb } from './database/index.js';
import { PostgresCheckpointStore, PostgresTradeStore } from './database/repositories.js';
import {
  InMemoryCheckpointStore,
  InMemoryTradeStore,
  type CheckpointStore,
  type TradeStore,
} from './database/stores.js';
import { ClobExecutionClient, DataApiClient } from './clients/polymarket/index.js';
import { CopyTradePipeline } from './pipeline.js';
import { createHealthRouter } from './api/routes/health.js';
import { createStatsRouter } from './api/routes/stats.js';
import { getMetrics, getContentType } from './utils/metrics.js';

const log = logger('Main');

interface Stores {
  checkpointStore: CheckpointStore;
  tradeStore: TradeStore;
  persistent: boolean;
}

/**
 * PostgreSQL stores when DATABASE_URL is set, in-memory otherwise
 */
async function createStores(config: Config): Promise<Stores> {
  if (!config.database.url) {
    log.warn('DATABASE_URL not set; checkpoints and trades are kept in memory only');
    return {
      checkpointStore: new InMemoryCheckpointStore(),
      tradeStore: new InMemoryTradeStore(),
      persistent: false,
    };
  }

  await initializeDb();
  const db = getDb();
  return {
    checkpointStore: new PostgresCheckpointStore(db),
    tradeStore: new PostgresTradeStore(db, { log: logger('PostgresTradeStore') }),
    persistent: true,
  };
}

async function createExecutor(config: Config, follower: FollowerWallet): Promise<ClobExecutionClient> {
  const dryRun = config.trading.dryRun;
  const client = new ClobExecutionClient({
    host: config.polymarket.clobHost,
    chainId: config.polymarket.chainId,
    dryRun,
    ...(dryRun ? {} : { privateKey: loadPrivateKey(follower) }),
    signatureType: follower.signatureType,
    ...(follower.proxyAddress ? { funderAddress: follower.proxyAddress } : {}),
    log: logger(`ClobExecutionClient:${follower.name}`),
  });
  await client.connect();
  return client;
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  log.info('Starting copy-trade pipeline');

  // Load and validate configuration
  const config = getConfig();
  log.info('Configuration loaded', {
    env: config.env,
    dryRun: config.trading.dryRun,
    followers: config.followers.length,
    monitoredWallets: config.monitoring.wallets.length,
  });

  const stores = await createStores(config);

  const feed = new DataApiClient({
    baseUrl: config.polymarket.dataApiUrl,
    timeoutMs: config.polymarket.requestTimeoutMs,
  });

  const pipeline = new CopyTradePipeline({
    config,
    feed,
    checkpointStore: stores.checkpointStore,
    tradeStore: stores.tradeStore,
    createExecutor: (follower) => createExecutor(config, follower),
  });

  await pipeline.start();

  // Start API server
  const app = express();
  app.use(express.json());

  if (config.api.enableMetrics) {
    app.get('/metrics', async (_req, res) => {
      try {
        const metrics = await getMetrics();
        res.set('Content-Type', getContentType());
        res.send(metrics);
      } catch (error) {
        log.error('Failed to collect metrics', { error: error instanceof Error ? error.message : String(error) });
        res.status(500).send('Error collecting metrics');
      }
    });
  }

  const routeDeps = {
    poller: pipeline.poller,
    broker: pipeline.broker,
    engines: pipeline.engines,
  };

  app.use(
    '/health',
    createHealthRouter({
      ...routeDeps,
      dryRun: config.trading.dryRun,
      ...(stores.persistent ? { checkDatabase: checkHealth } : {}),
    })
  );
  app.use('/api/stats', createStatsRouter(routeDeps));

  const server: Server = app.listen(config.api.port, () => {
    log.info(`API server listening on port ${config.api.port}`);
  });

  let shuttingDown = false;

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down...`);

    try {
      await pipeline.stop();
      await closeDb();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });

      log.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      log.error('Error during shutdown', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  log.info('Copy-trade pipeline started');
  if (!config.trading.dryRun) {
    log.warn('WARNING: Live trading is enabled. Real money is at risk!');
  }
}

main().catch((error: unknown) => {
  log.error('Fatal error', { error: error instanceof Error ? error.stack : String(error) });
  process.exit(1);
});
