import { Router, type Request, type Response } from 'express';
import type { ActivityBroker } from '../../services/activityBroker/ActivityBroker.js';
import type { CopyTradeEngine } from '../../services/copyTrading/CopyTradeEngine.js';
import type { WalletPoller } from '../../services/walletPoller/WalletPoller.js';

export interface HealthCheckDependencies {
  poller: WalletPoller;
  broker: ActivityBroker;
  engines: readonly CopyTradeEngine[];
  dryRun: boolean;
  // Absent when running on in-memory stores
  checkDatabase?: () => Promise<{ connected: boolean; latencyMs: number }>;
}

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthReport {
  status: HealthStatus;
  timestamp: string;
  dryRun: boolean;
  components: Record<string, unknown>;
}

// Consecutive failed cycles before a wallet marks the service degraded
const FAILING_WALLET_THRESHOLD = 3;

/**
 * Build the health report from live component state
 */
export async function buildHealthReport(deps: HealthCheckDependencies, now: Date = new Date()): Promise<HealthReport> {
  const health: HealthReport = {
    status: 'healthy',
    timestamp: now.toISOString(),
    dryRun: deps.dryRun,
    components: {},
  };

  // Poller
  const wallets = deps.poller.getStatus();
  const failing = wallets.filter((wallet) => wallet.consecutiveFailures >= FAILING_WALLET_THRESHOLD);
  health.components['poller'] = {
    status: deps.poller.isRunning ? 'running' : 'stopped',
    wallets: wallets.length,
    failingWallets: failing.map((wallet) => wallet.wallet),
  };
  if (!deps.poller.isRunning) {
    health.status = 'unhealthy';
  } else if (failing.length > 0) {
    health.status = 'degraded';
  }

  // Broker
  const broker = deps.broker.getStats();
  health.components['broker'] = {
    status: broker.closed ? 'closed' : 'open',
    subscribers: broker.subscribers,
    activeWorkers: broker.activeWorkers,
    pendingWorkers: broker.pendingWorkers,
    dispatchFailures: broker.dispatchFailures,
  };
  if (broker.closed) {
    health.status = 'unhealthy';
  }

  // Engines
  health.components['engines'] = {
    count: deps.engines.length,
    names: deps.engines.map((engine) => engine.name),
  };

  // Database
  if (deps.checkDatabase) {
    const db = await deps.checkDatabase();
    health.components['database'] = {
      status: db.connected ? 'connected' : 'disconnected',
      latencyMs: db.latencyMs,
    };
    if (!db.connected && health.status === 'healthy') {
      health.status = 'degraded';
    }
  } else {
    health.components['database'] = { status: 'in_memory' };
  }

  return health;
}

export function createHealthRouter(deps: HealthCheckDependencies): Router {
  const router = Router();

  /**
   * GET /health
   * Health check with component status
   */
  router.get('/', async (_req: Request, res: Response) => {
    try {
      const health = await buildHealthReport(deps);
      const statusCode = health.status === 'unhealthy' ? 503 : 200;
      res.status(statusCode).json(health);
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      });
    }
  });

  return router;
}
