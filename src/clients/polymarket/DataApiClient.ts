import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { POLYMARKET_ENDPOINTS, DEFAULTS, isActivityType } from '../../config/constants.js';
import type { Activity, ActivityFeedClient, ActivityPage, ActivityQuery } from '../shared/interfaces.js';
import { logger, shortAddress, type Logger } from '../../utils/logger.js';
import { recordApiCall, startTimer } from '../../utils/metrics.js';
import { fromUnixSeconds, toUnixSeconds } from '../../utils/time.js';
import {
  DataApiActivityPageSchema,
  DataApiActivitySchema,
  DataApiTimestampSchema,
  type DataApiActivity,
} from './types.js';

const SERVICE = 'polymarket_data_api';

export interface DataApiClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  // Injected for tests
  http?: AxiosInstance;
  log?: Logger;
}

/**
 * Activity feed backed by the Polymarket Data API `/activity` endpoint
 */
export class DataApiClient implements ActivityFeedClient {
  private http: AxiosInstance;
  private log: Logger;

  constructor(options: DataApiClientOptions = {}) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? POLYMARKET_ENDPOINTS.DATA_API,
        timeout: options.timeoutMs ?? DEFAULTS.REQUEST_TIMEOUT_MS,
        headers: { Accept: 'application/json' },
      });
    this.log = options.log ?? logger('DataApiClient');
  }

  /**
   * Fetch one page of a wallet's activity, oldest first.
   * Records that fail validation or carry an unknown type are skipped but
   * still count toward `rawCount` and `lastTimestamp`.
   */
  async fetchActivities(query: ActivityQuery): Promise<ActivityPage> {
    const timer = startTimer();

    try {
      const response = await this.http.get<unknown>('/activity', {
        params: {
          user: query.wallet,
          start: toUnixSeconds(query.start),
          end: toUnixSeconds(query.end),
          limit: query.limit,
          offset: query.offset,
          sortBy: 'TIMESTAMP',
          sortDirection: 'ASC',
        },
      });

      const rows = DataApiActivityPageSchema.parse(response.data);
      recordApiCall(SERVICE, 'activity', 'success', timer());

      const activities: Activity[] = [];
      let lastSeconds: number | null = null;

      for (const [index, row] of rows.entries()) {
        const stamp = DataApiTimestampSchema.safeParse(row);
        if (stamp.success && (lastSeconds === null || stamp.data.timestamp > lastSeconds)) {
          lastSeconds = stamp.data.timestamp;
        }

        const parsed = DataApiActivitySchema.safeParse(row);
        if (!parsed.success) {
          this.log.warn('Skipping malformed activity record', {
            wallet: shortAddress(query.wallet),
            offset: query.offset + index,
            issues: parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`),
          });
          continue;
        }

        const activity = this.toActivity(query.wallet, parsed.data);
        if (activity) {
          activities.push(activity);
        }
      }

      return {
        activities,
        rawCount: rows.length,
        lastTimestamp: lastSeconds === null ? null : fromUnixSeconds(lastSeconds),
      };
    } catch (error) {
      recordApiCall(SERVICE, 'activity', 'error', timer());

      if (error instanceof z.ZodError) {
        this.log.error('Unexpected activity response shape', {
          wallet: shortAddress(query.wallet),
          issues: error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
        throw new Error(`Invalid activity response for ${query.wallet}: expected an array`);
      }

      this.log.error('Failed to fetch activity', {
        wallet: shortAddress(query.wallet),
        offset: query.offset,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private toActivity(wallet: string, raw: DataApiActivity): Activity | null {
    if (!isActivityType(raw.type)) {
      this.log.debug('Ignoring unknown activity type', { type: raw.type, tx: raw.transactionHash });
      return null;
    }

    return {
      walletAddress: wallet.toLowerCase(),
      type: raw.type,
      transactionHash: raw.transactionHash,
      size: raw.size,
      price: raw.price,
      cashAmount: raw.usdcSize,
      timestamp: fromUnixSeconds(raw.timestamp),
      ...(raw.conditionId ? { conditionId: raw.conditionId } : {}),
      ...(raw.outcome ? { outcome: raw.outcome } : {}),
      ...(raw.side ? { side: raw.side } : {}),
      ...(raw.asset ? { asset: raw.asset } : {}),
      ...(raw.title ? { title: raw.title } : {}),
    };
  }
}
