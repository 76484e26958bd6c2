/**
 * Copy-trade failure taxonomy
 *
 * Execution adapters reject with one of these classes; the engine uses the
 * class to decide between retrying (network) and giving up (everything else).
 */

import { isAxiosError } from 'axios';

export type CopyTradeErrorKind =
  | 'insufficient_balance'
  | 'network'
  | 'order_execution'
  | 'configuration'
  | 'unclassified';

/**
 * Base class for all copy-trade errors
 */
export class CopyTradeError extends Error {
  readonly kind: CopyTradeErrorKind;
  override readonly cause?: unknown;

  constructor(message: string, kind: CopyTradeErrorKind, cause?: unknown) {
    super(message);
    this.name = 'CopyTradeError';
    this.kind = kind;
    this.cause = cause;
  }

  /**
   * Whether the failure may succeed on a later attempt
   */
  get transient(): boolean {
    return this.kind === 'network';
  }
}

/**
 * Follower wallet cannot cover the order
 */
export class InsufficientBalanceError extends CopyTradeError {
  constructor(message: string, cause?: unknown) {
    super(message, 'insufficient_balance', cause);
    this.name = 'InsufficientBalanceError';
  }
}

/**
 * Connectivity or timeout failure; retried with backoff
 */
export class NetworkError extends CopyTradeError {
  constructor(message: string, cause?: unknown) {
    super(message, 'network', cause);
    this.name = 'NetworkError';
  }
}

/**
 * The exchange rejected the order, or the order could not be built
 */
export class OrderExecutionError extends CopyTradeError {
  constructor(message: string, cause?: unknown) {
    super(message, 'order_execution', cause);
    this.name = 'OrderExecutionError';
  }
}

/**
 * Invalid strategy or wallet configuration; raised at construction
 */
export class ConfigurationError extends CopyTradeError {
  constructor(message: string, cause?: unknown) {
    super(message, 'configuration', cause);
    this.name = 'ConfigurationError';
  }
}

const BALANCE_PATTERNS = ['insufficient', 'balance', 'allowance', 'not enough'];
const NETWORK_PATTERNS = [
  'network',
  'timeout',
  'timed out',
  'econnreset',
  'econnrefused',
  'etimedout',
  'enotfound',
  'socket hang up',
  'rate limit',
  'too many requests',
];
const ORDER_PATTERNS = ['order', 'rejected', 'invalid'];

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Map any thrown value onto the taxonomy. Taxonomy instances are returned
 * unchanged; anything unrecognized becomes a CopyTradeError of kind
 * 'unclassified'.
 */
export function classifyExecutionError(error: unknown): CopyTradeError {
  if (error instanceof CopyTradeError) {
    return error;
  }

  const message = messageOf(error);
  const lower = message.toLowerCase();

  if (BALANCE_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new InsufficientBalanceError(message, error);
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined || status === 429 || status >= 500) {
      return new NetworkError(message, error);
    }
    return new OrderExecutionError(message, error);
  }

  if (NETWORK_PATTERNS.some((pattern) => lower.includes(pattern)) || /\b(429|5\d\d)\b/.test(lower)) {
    return new NetworkError(message, error);
  }

  if (ORDER_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new OrderExecutionError(message, error);
  }

  return new CopyTradeError(message, 'unclassified', error);
}
