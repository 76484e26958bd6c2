import { Router, type Request, type Response } from 'express';
import type { ActivityBroker, BrokerStats } from '../../services/activityBroker/ActivityBroker.js';
import type { CopyTradeEngine } from '../../services/copyTrading/CopyTradeEngine.js';
import type { TradeStats } from '../../services/copyTrading/types.js';
import type { WalletPoller } from '../../services/walletPoller/WalletPoller.js';

export interface StatsDependencies {
  poller: WalletPoller;
  broker: ActivityBroker;
  engines: readonly CopyTradeEngine[];
}

export interface StatsReport {
  engines: Array<{ name: string; copyMode: string; orderType: string; stats: TradeStats }>;
  wallets: Array<{
    wallet: string;
    checkpoint: string | null;
    lastPollAt: string | null;
    cyclesRun: number;
    activitiesPublished: number;
    consecutiveFailures: number;
    lastError: string | null;
  }>;
  broker: BrokerStats;
}

export function buildStatsReport(deps: StatsDependencies): StatsReport {
  return {
    engines: deps.engines.map((engine) => ({
      name: engine.name,
      copyMode: engine.strategy.copyMode,
      orderType: engine.strategy.orderType,
      stats: engine.getStats(),
    })),
    wallets: deps.poller.getStatus().map((status) => ({
      ...status,
      checkpoint: status.checkpoint?.toISOString() ?? null,
      lastPollAt: status.lastPollAt?.toISOString() ?? null,
    })),
    broker: deps.broker.getStats(),
  };
}

export function createStatsRouter(deps: StatsDependencies): Router {
  const router = Router();

  // GET /api/stats
  router.get('/', (_req: Request, res: Response) => {
    res.json(buildStatsReport(deps));
  });

  return router;
}
