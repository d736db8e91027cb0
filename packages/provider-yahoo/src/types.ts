/**
 * @fileoverview Yahoo Finance chart API types.
 *
 * Response shapes are zod schemas so a payload is validated once, at the
 * boundary, before any field is read.
 *
 * @module @mdpoc/provider-yahoo/types
 */

import { z } from 'zod';
import type { Logger } from '@mdpoc/logger';

const PriceSeriesSchema = z.array(z.number().nullable());

/**
 * One quote block of `indicators.quote`. Yahoo sends `null` for intervals
 * without trades.
 */
export const YahooQuoteSchema = z.object({
  open: PriceSeriesSchema.optional(),
  high: PriceSeriesSchema.optional(),
  low: PriceSeriesSchema.optional(),
  close: PriceSeriesSchema.optional(),
  volume: PriceSeriesSchema.optional(),
});

export const YahooChartResultSchema = z.object({
  meta: z
    .object({
      symbol: z.string().optional(),
      exchangeTimezoneName: z.string().optional(),
    })
    .passthrough()
    .optional(),

  /** Bar open times, epoch seconds. Absent when the range has no data */
  timestamp: z.array(z.number()).optional(),

  indicators: z
    .object({
      quote: z.array(YahooQuoteSchema),
    })
    .optional(),
});

export const YahooChartErrorSchema = z.object({
  code: z.string(),
  description: z.string().nullable().optional(),
});

/**
 * Body of `GET /v8/finance/chart/{symbol}`.
 *
 * @example
 * ```json
 * {
 *   "chart": {
 *     "result": [{ "timestamp": [1736951400], "indicators": { "quote": [{ "open": [230.0], ... }] } }],
 *     "error": null
 *   }
 * }
 * ```
 */
export const YahooChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(YahooChartResultSchema).nullable().optional(),
    error: YahooChartErrorSchema.nullable().optional(),
  }),
});

export type YahooQuote = z.infer<typeof YahooQuoteSchema>;
export type YahooChartResult = z.infer<typeof YahooChartResultSchema>;
export type YahooChartResponse = z.infer<typeof YahooChartResponseSchema>;

/**
 * Options for YahooChartClient configuration.
 */
export interface YahooChartClientOptions {
  /**
   * Chart endpoint, without the trailing symbol.
   * @default 'https://query1.finance.yahoo.com/v8/finance/chart'
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds.
   * @default 10000
   */
  timeoutMs?: number;

  /** User-Agent header; Yahoo throttles requests without one */
  userAgent?: string;

  /** Logger for per-request debug entries */
  logger?: Logger;

  /** fetch implementation; defaults to the global one */
  fetch?: typeof fetch;
}
