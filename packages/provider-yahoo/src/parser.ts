/**
 * @fileoverview Extracts the latest price from a Yahoo Finance chart response.
 *
 * @module @price-sentinel/provider-yahoo/parser
 */

import { QuoteSourceError, type Quote } from '@price-sentinel/contracts';
import type { YahooChartResponse } from './types.js';

const PROVIDER_ID = 'yahoo-finance';

/**
 * Parses a chart response into the latest {@link Quote}.
 *
 * Walks the close series backwards to the last non-null value (the current
 * minute is often still null); falls back to `meta.regularMarketPrice` when
 * the series is empty.
 *
 * @param response - Raw chart payload
 * @param symbol - Symbol as requested by the tracker
 * @throws {QuoteSourceError} If the payload carries an error, no usable price, or a non-positive price
 *
 * @example
 * ```typescript
 * const quote = parseChartQuote(
 *   { chart: { result: [{ timestamp: [1700000000], indicators: { quote: [{ close: [42150.5] }] } }] } },
 *   'BTC-USD'
 * );
 * // quote.price === 42150.5, quote.timestamp === 1700000000000
 * ```
 */
export function parseChartQuote(response: YahooChartResponse, symbol: string): Quote {
  const chartError = response.chart?.error;
  if (chartError) {
    throw new QuoteSourceError(`Yahoo Finance error: ${chartError.description ?? chartError.code ?? 'unknown'}`, {
      symbol,
      provider: PROVIDER_ID,
      code: chartError.code,
    });
  }

  const result = response.chart?.result?.[0];
  if (!result) {
    throw new QuoteSourceError('Yahoo Finance response has no chart result', {
      symbol,
      provider: PROVIDER_ID,
    });
  }

  const timestamps = result.timestamp ?? [];
  const closes = result.indicators?.quote?.[0]?.close ?? [];

  for (let i = Math.min(timestamps.length, closes.length) - 1; i >= 0; i -= 1) {
    const close = closes[i];
    const time = timestamps[i];
    if (close != null && time != null) {
      return toQuote(symbol, close, time);
    }
  }

  const meta = result.meta;
  if (meta?.regularMarketPrice != null && meta.regularMarketTime != null) {
    return toQuote(symbol, meta.regularMarketPrice, meta.regularMarketTime);
  }

  throw new QuoteSourceError('Empty history data', {
    symbol,
    provider: PROVIDER_ID,
  });
}

function toQuote(symbol: string, price: number, epochSeconds: number): Quote {
  if (!Number.isFinite(price) || price <= 0) {
    throw new QuoteSourceError(`Invalid price: ${price}`, {
      symbol,
      provider: PROVIDER_ID,
      price,
    });
  }

  return {
    symbol,
    price,
    timestamp: epochSeconds * 1000,
  };
}
