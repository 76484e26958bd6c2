/**
 * Polymarket-specific types
 * These represent the raw data structures from the Polymarket APIs
 */

import { z } from 'zod';

// ============================================
// Data API Types (Wallet Activity)
// ============================================

// Numbers sometimes arrive as strings
const numeric = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${String(value)}` });
    return z.NEVER;
  }
  return parsed;
});

export const DataApiActivitySchema = z.object({
  proxyWallet: z.string(),
  // Unix seconds
  timestamp: numeric,
  conditionId: z.string().optional().nullable(),
  // Unknown types are dropped by the client, not rejected here
  type: z.string(),
  size: numeric.default(0),
  usdcSize: numeric.default(0),
  transactionHash: z.string().min(1),
  price: numeric.default(0),
  asset: z.string().optional().nullable(),
  side: z.enum(['BUY', 'SELL']).optional().nullable().catch(null),
  outcomeIndex: z.number().optional().nullable(),
  title: z.string().optional().nullable(),
  slug: z.string().optional().nullable(),
  outcome: z.string().optional().nullable(),
});

export type DataApiActivity = z.infer<typeof DataApiActivitySchema>;

// Records are validated one at a time so a bad row cannot sink its page
export const DataApiActivityPageSchema = z.array(z.unknown());

// Enough of a record to place it in time when the rest fails validation
export const DataApiTimestampSchema = z.object({ timestamp: numeric });

// ============================================
// CLOB Types (Market Lookup)
// ============================================

export const ClobTokenSchema = z.object({
  token_id: z.string(),
  outcome: z.string(),
  price: z.number().optional(),
});

export const ClobMarketSchema = z.object({
  condition_id: z.string(),
  question: z.string().optional(),
  tokens: z.array(ClobTokenSchema).default([]),
  minimum_tick_size: z.union([z.number(), z.string()]).optional(),
  neg_risk: z.boolean().optional(),
  active: z.boolean().optional(),
  closed: z.boolean().optional(),
});

export type ClobToken = z.infer<typeof ClobTokenSchema>;
export type ClobMarket = z.infer<typeof ClobMarketSchema>;

/**
 * Tick sizes the CLOB accepts
 */
export const TICK_SIZES = ['0.1', '0.01', '0.001', '0.0001'] as const;
