import { ClobClient, OrderType as ClobOrderType, Side, type TickSize } from '@polymarket/clob-client';
import { Wallet } from 'ethers';
import { z } from 'zod';
import {
  DEFAULTS,
  ORDER_TYPES,
  POLYGON_CHAIN_ID,
  POLYMARKET_ENDPOINTS,
  SIGNATURE_TYPES,
  TRADE_SIDES,
  type SignatureType,
} from '../../config/constants.js';
import { OrderExecutionError, classifyExecutionError } from '../../services/copyTrading/errors.js';
import type { ExecutionResult, TradeExecutionClient, TradeIntent } from '../shared/interfaces.js';
import { logger, type Logger } from '../../utils/logger.js';
import { recordApiCall, startTimer } from '../../utils/metrics.js';
import { isRetryableError, retry } from '../../utils/retry.js';
import { toUnixSeconds } from '../../utils/time.js';
import { ClobMarketSchema, TICK_SIZES, type ClobMarket } from './types.js';

const SERVICE = 'polymarket_clob';

type SignedClobOrder = Awaited<ReturnType<ClobClient['createOrder']>>;

/**
 * The subset of ClobClient the execution client drives
 */
export interface ClobOrderApi {
  getMarket(conditionId: string): Promise<unknown>;
  createMarketOrder(
    order: Parameters<ClobClient['createMarketOrder']>[0],
    options?: Parameters<ClobClient['createMarketOrder']>[1]
  ): Promise<SignedClobOrder>;
  createOrder(
    order: Parameters<ClobClient['createOrder']>[0],
    options?: Parameters<ClobClient['createOrder']>[1]
  ): Promise<SignedClobOrder>;
  postOrder(order: SignedClobOrder, orderType?: ClobOrderType): Promise<unknown>;
}

export interface ClobExecutionClientOptions {
  host?: string;
  chainId?: number;
  // Resolve instruments but only log submissions
  dryRun: boolean;
  privateKey?: string;
  signatureType?: SignatureType;
  // Funder (proxy) address for signature types 1 and 2
  funderAddress?: string;
  // Pre-built client, skips connect()
  client?: ClobOrderApi;
  log?: Logger;
}

const PostOrderResponseSchema = z
  .object({
    success: z.boolean().optional(),
    errorMsg: z.string().optional(),
    error: z.string().optional(),
    orderID: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough();

interface MarketInfo {
  tickSize: TickSize;
  negRisk: boolean;
  // lowercased outcome -> token id
  tokens: Map<string, string>;
}

function isTickSize(value: string): value is TickSize {
  return TICK_SIZES.some((tick) => tick === value);
}

function toMarketInfo(market: ClobMarket): MarketInfo {
  const tick = market.minimum_tick_size === undefined ? '0.01' : String(market.minimum_tick_size);
  return {
    tickSize: isTickSize(tick) ? tick : '0.01',
    negRisk: market.neg_risk ?? false,
    tokens: new Map(market.tokens.map((token) => [token.outcome.toLowerCase(), token.token_id])),
  };
}

/**
 * Market BUY amounts are USDC to spend; market SELL amounts are shares to sell
 */
export function marketOrderAmount(intent: Pick<TradeIntent, 'side' | 'amount' | 'price'>): number {
  if (intent.side === TRADE_SIDES.BUY) {
    return intent.amount;
  }
  if (intent.price === undefined || !(intent.price > 0)) {
    throw new OrderExecutionError('Market sell requires a positive price to convert USDC to shares');
  }
  return intent.amount / intent.price;
}

/**
 * Trade execution on the Polymarket CLOB
 */
export class ClobExecutionClient implements TradeExecutionClient {
  private host: string;
  private chainId: number;
  private dryRun: boolean;
  private privateKey: string | undefined;
  private signatureType: SignatureType;
  private funderAddress: string | undefined;
  private log: Logger;
  private client: ClobOrderApi | null;

  private markets: Map<string, MarketInfo> = new Map();

  constructor(options: ClobExecutionClientOptions) {
    this.host = options.host ?? POLYMARKET_ENDPOINTS.CLOB;
    this.chainId = options.chainId ?? POLYGON_CHAIN_ID;
    this.dryRun = options.dryRun;
    this.privateKey = options.privateKey;
    this.signatureType = options.signatureType ?? SIGNATURE_TYPES.EOA;
    this.funderAddress = options.funderAddress;
    this.client = options.client ?? null;
    this.log = options.log ?? logger('ClobExecutionClient');

    if (!this.dryRun && !this.privateKey && !options.client) {
      throw new OrderExecutionError('A private key is required for live trading');
    }
  }

  get isDryRun(): boolean {
    return this.dryRun;
  }

  get isConnected(): boolean {
    return this.client !== null;
  }

  /**
   * Connect to the CLOB. Live mode derives API credentials from the wallet key.
   */
  async connect(): Promise<void> {
    if (this.client) {
      return;
    }

    if (this.dryRun || !this.privateKey) {
      this.log.info('Connecting in read-only mode (dry run)');
      this.client = new ClobClient(this.host, this.chainId);
      return;
    }

    const signer = new Wallet(this.privateKey);
    this.log.info('Wallet initialized', { address: signer.address, signatureType: this.signatureType });

    const tempClient = new ClobClient(this.host, this.chainId, signer);

    let apiCreds;
    try {
      apiCreds = await retry(
        async () => {
          const creds = await tempClient.createOrDeriveApiKey();
          // The SDK may resolve with an error payload instead of throwing
          if (!creds || !creds.key || !creds.secret || !creds.passphrase) {
            throw new Error('createOrDeriveApiKey returned incomplete credentials (missing key/secret/passphrase)');
          }
          return creds;
        },
        {
          maxAttempts: 3,
          initialDelayMs: 1000,
          retryOn: isRetryableError,
          onRetry: (attempt, error) => {
            this.log.warn(`API key derivation attempt ${attempt} failed`, {
              error: error instanceof Error ? error.message : String(error),
            });
          },
        }
      );
    } catch (error) {
      const errMsg = error instanceof Error ? error.message : String(error);
      this.log.error('Failed to derive API credentials', { error: errMsg, walletAddress: signer.address });
      throw new Error(`Unable to derive Polymarket API credentials: ${errMsg}`);
    }

    this.log.info('API credentials derived', { apiKey: apiCreds.key.substring(0, 8) + '...' });

    this.client = new ClobClient(this.host, this.chainId, signer, apiCreds, this.signatureType, this.funderAddress);
  }

  private async getClient(): Promise<ClobOrderApi> {
    if (!this.client) {
      await this.connect();
    }
    if (!this.client) {
      throw new OrderExecutionError('CLOB client not connected');
    }
    return this.client;
  }

  private async getMarketInfo(conditionId: string): Promise<MarketInfo> {
    const cached = this.markets.get(conditionId);
    if (cached) {
      return cached;
    }

    const client = await this.getClient();
    const timer = startTimer();
    try {
      const raw = await client.getMarket(conditionId);
      const parsed = ClobMarketSchema.safeParse(raw);
      if (!parsed.success) {
        throw new OrderExecutionError(`Unexpected market response for ${conditionId}`);
      }
      recordApiCall(SERVICE, 'getMarket', 'success', timer());

      const info = toMarketInfo(parsed.data);
      this.markets.set(conditionId, info);
      return info;
    } catch (error) {
      recordApiCall(SERVICE, 'getMarket', 'error', timer());
      throw error;
    }
  }

  /**
   * Token id for a market outcome, matched case-insensitively
   */
  async resolveInstrument(conditionId: string, outcome: string): Promise<string | null> {
    const info = await this.getMarketInfo(conditionId);
    const tokenId = info.tokens.get(outcome.toLowerCase()) ?? null;

    if (!tokenId) {
      this.log.warn('Outcome not found in market', {
        conditionId,
        outcome,
        available: Array.from(info.tokens.keys()),
      });
    }
    return tokenId;
  }

  /**
   * Build, sign and post an order for the intent
   */
  async submit(intent: TradeIntent): Promise<ExecutionResult> {
    if (this.dryRun) {
      this.log.info('[DRY RUN] Order not submitted', {
        tokenId: intent.instrumentId,
        side: intent.side,
        orderType: intent.orderType,
        amount: intent.amount.toFixed(2),
        price: intent.price,
        expiresAt: intent.expiresAt?.toISOString(),
        source: intent.sourceTransactionHash,
      });
      return { orderId: `dry-run:${intent.sourceTransactionHash}`, status: 'simulated', simulated: true };
    }

    const client = await this.getClient();
    const info = await this.getMarketInfo(intent.conditionId);
    const side = intent.side === TRADE_SIDES.BUY ? Side.BUY : Side.SELL;
    const timer = startTimer();

    try {
      let response: unknown;

      switch (intent.orderType) {
        case ORDER_TYPES.MARKET: {
          const order = await client.createMarketOrder(
            { tokenID: intent.instrumentId, amount: marketOrderAmount(intent), side },
            { tickSize: info.tickSize, negRisk: info.negRisk }
          );
          response = await client.postOrder(order, ClobOrderType.FOK);
          break;
        }

        case ORDER_TYPES.LIMIT: {
          const price = intent.price;
          if (price === undefined || !(price > 0)) {
            throw new OrderExecutionError('Limit order requires a positive price');
          }
          const expiresAt = intent.expiresAt ?? new Date(Date.now() + DEFAULTS.LIMIT_ORDER_DURATION_SECONDS * 1000);
          const order = await client.createOrder(
            {
              tokenID: intent.instrumentId,
              price,
              // Shares, not USDC
              size: intent.amount / price,
              side,
              expiration: toUnixSeconds(expiresAt),
            },
            { tickSize: info.tickSize, negRisk: info.negRisk }
          );
          response = await client.postOrder(order, ClobOrderType.GTD);
          break;
        }

        default: {
          const unreachable: never = intent.orderType;
          throw new OrderExecutionError(`Unsupported order type: ${String(unreachable)}`);
        }
      }

      const result = this.toExecutionResult(response);
      recordApiCall(SERVICE, 'postOrder', 'success', timer());

      this.log.info('Order posted', {
        orderId: result.orderId,
        status: result.status,
        tokenId: intent.instrumentId,
        side: intent.side,
        orderType: intent.orderType,
        amount: intent.amount.toFixed(2),
      });
      return result;
    } catch (error) {
      recordApiCall(SERVICE, 'postOrder', 'error', timer());
      throw classifyExecutionError(error);
    }
  }

  private toExecutionResult(response: unknown): ExecutionResult {
    const parsed = PostOrderResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new OrderExecutionError('Unexpected order response');
    }

    const { success, errorMsg, error, orderID, status } = parsed.data;
    const failure = errorMsg || error;
    if (success === false || failure || !orderID) {
      // Classified by message: balance, network or rejection
      throw classifyExecutionError(new Error(failure || 'Order was not accepted'));
    }

    return { orderId: orderID, status: status ?? 'submitted', simulated: false, raw: response };
  }
}
