import client, { Counter, Gauge, Histogram, Registry } from 'prom-client';

// Create a custom registry
const registry = new Registry();

// Add default metrics (CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================
// Wallet Poller Metrics
// ============================================

export const pollCycles = new Counter({
  name: 'poller_cycles_total',
  help: 'Total poll cycles run per wallet',
  labelNames: ['wallet', 'status'] as const,
  registers: [registry],
});

export const pollPagesFetched = new Counter({
  name: 'poller_pages_fetched_total',
  help: 'Total activity pages fetched from the feed',
  labelNames: ['wallet'] as const,
  registers: [registry],
});

export const pollActivitiesPublished = new Counter({
  name: 'poller_activities_published_total',
  help: 'Total activities handed to the broker',
  labelNames: ['wallet'] as const,
  registers: [registry],
});

export const pollCheckpointLag = new Gauge({
  name: 'poller_checkpoint_lag_seconds',
  help: 'Seconds between now and the wallet checkpoint',
  labelNames: ['wallet'] as const,
  registers: [registry],
});

// ============================================
// Broker Metrics
// ============================================

export const brokerBatchesPublished = new Counter({
  name: 'broker_batches_published_total',
  help: 'Total batches published to at least one subscriber',
  labelNames: ['wallet'] as const,
  registers: [registry],
});

export const brokerDispatchFailures = new Counter({
  name: 'broker_dispatch_failures_total',
  help: 'Total subscriber callbacks that threw',
  labelNames: ['wallet', 'subscriber'] as const,
  registers: [registry],
});

export const brokerPendingDispatches = new Gauge({
  name: 'broker_pending_dispatches',
  help: 'Dispatch units queued or running',
  registers: [registry],
});

// ============================================
// Copy Trading Metrics
// ============================================

export const copyTradingActivitiesReceived = new Counter({
  name: 'copy_trading_activities_received_total',
  help: 'Total activities received by copy-trade engines',
  labelNames: ['follower'] as const,
  registers: [registry],
});

export const copyTradingTradesCopied = new Counter({
  name: 'copy_trading_trades_copied_total',
  help: 'Total trades successfully copied',
  labelNames: ['follower', 'copy_mode', 'side'] as const,
  registers: [registry],
});

export const copyTradingTradesSkipped = new Counter({
  name: 'copy_trading_trades_skipped_total',
  help: 'Total activities not copied',
  labelNames: ['follower', 'reason'] as const,
  registers: [registry],
});

export const copyTradingTradesFailed = new Counter({
  name: 'copy_trading_trades_failed_total',
  help: 'Total copy trade failures',
  labelNames: ['follower', 'error_type'] as const,
  registers: [registry],
});

export const copyTradingExecutionRetries = new Counter({
  name: 'copy_trading_execution_retries_total',
  help: 'Total execution retries after transient failures',
  labelNames: ['follower'] as const,
  registers: [registry],
});

export const copyTradingCopyLatency = new Histogram({
  name: 'copy_trading_copy_latency_ms',
  help: 'Time from source activity to copied order in milliseconds',
  labelNames: ['follower'] as const,
  buckets: [500, 1000, 2500, 5000, 10000, 30000, 60000, 120000],
  registers: [registry],
});

// ============================================
// Persistence & API Metrics
// ============================================

export const tradesRecorded = new Counter({
  name: 'persistence_trades_recorded_total',
  help: 'Total trade records newly inserted',
  labelNames: ['wallet'] as const,
  registers: [registry],
});

export const apiRequests = new Counter({
  name: 'api_requests_total',
  help: 'Total outbound API requests',
  labelNames: ['service', 'endpoint', 'status'] as const,
  registers: [registry],
});

export const apiLatency = new Histogram({
  name: 'api_latency_ms',
  help: 'Outbound API latency in milliseconds',
  labelNames: ['service', 'endpoint'] as const,
  buckets: [10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [registry],
});

/**
 * Start a timer; the returned function yields elapsed milliseconds
 */
export function startTimer(): () => number {
  const start = Date.now();
  return () => Date.now() - start;
}

/**
 * Helper to record an outbound API call
 */
export function recordApiCall(service: string, endpoint: string, status: 'success' | 'error', latencyMs: number): void {
  apiRequests.labels(service, endpoint, status).inc();
  apiLatency.labels(service, endpoint).observe(latencyMs);
}

/**
 * Get metrics in Prometheus text format
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

/**
 * Content type for the metrics endpoint
 */
export function getContentType(): string {
  return registry.contentType;
}
