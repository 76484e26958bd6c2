import { logger, type Logger } from './logger.js';
import { sleep as defaultSleep } from './time.js';

export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  // Fraction of the delay added or removed at random; 0 makes delays exact
  jitter: number;
  retryOn?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  log?: Logger;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
  jitter: 0.1,
};

type BackoffOptions = Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'multiplier' | 'jitter'>;

/**
 * Delay before the retry that follows `attempt` (0-based):
 * initialDelayMs * multiplier^attempt, capped at maxDelayMs, then jittered.
 */
export function calculateDelay(attempt: number, options: BackoffOptions): number {
  const base = Math.min(options.initialDelayMs * options.multiplier ** attempt, options.maxDelayMs);
  if (options.jitter === 0) {
    return Math.round(base);
  }
  const spread = base * options.jitter * (Math.random() * 2 - 1);
  return Math.round(base + spread);
}

const TRANSIENT_MESSAGES = [
  'network',
  'timeout',
  'econnrefused',
  'econnreset',
  'etimedout',
  'socket hang up',
  'rate limit',
  'too many requests',
];

/**
 * Default retry predicate: connection problems, rate limits and 5xx responses
 */
export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const message = error.message.toLowerCase();
  return TRANSIENT_MESSAGES.some((pattern) => message.includes(pattern)) || /\b(429|50[0-4])\b/.test(message);
}

/**
 * Run `fn` until it resolves, the predicate rejects an error, or attempts run out.
 * The last error is rethrown unchanged.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  if (opts.maxAttempts < 1) {
    throw new Error(`retry requires maxAttempts >= 1, got ${opts.maxAttempts}`);
  }

  const wait = opts.sleep ?? defaultSleep;
  const shouldRetry = opts.retryOn ?? isRetryableError;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const isLast = attempt + 1 >= opts.maxAttempts;
      if (isLast || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, opts);
      if (opts.onRetry) {
        opts.onRetry(attempt + 1, error, delayMs);
      } else {
        (opts.log ?? logger('Retry')).warn(`Attempt ${attempt + 1} failed, retrying in ${delayMs}ms`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }

      await wait(delayMs);
    }
  }
}
