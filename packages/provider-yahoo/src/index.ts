/**
 * @fileoverview Public API for @price-sentinel/provider-yahoo.
 *
 * @module @price-sentinel/provider-yahoo
 * @example
 * ```typescript
 * import { YahooQuoteSource } from '@price-sentinel/provider-yahoo';
 *
 * const source = new YahooQuoteSource({ timeoutMs: 5000 });
 * const quote = await source.getQuote('BTC-USD');
 * ```
 */

export { YahooQuoteSource } from './yahoo-quote-source.js';
export { parseChartQuote } from './parser.js';
export type { YahooChartResponse, YahooQuoteSourceOptions } from './types.js';
