/**
 * @fileoverview Yahoo Finance quote source.
 *
 * @module @price-sentinel/provider-yahoo
 */

import axios, { type AxiosInstance } from 'axios';
import type { Quote, QuoteSource } from '@price-sentinel/contracts';
import { parseChartQuote } from './parser.js';
import type { YahooChartResponse, YahooQuoteSourceOptions } from './types.js';

const YAHOO_BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

/**
 * Latest price from the Yahoo Finance v8 chart endpoint.
 *
 * One HTTP request per call, no retries: retry policy belongs to the caller.
 */
export class YahooQuoteSource implements QuoteSource {
  readonly id = 'yahoo-finance';

  private readonly http: AxiosInstance;
  private readonly interval: string;
  private readonly range: string;

  constructor(options: YahooQuoteSourceOptions = {}) {
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl ?? YAHOO_BASE_URL,
        timeout: options.timeoutMs ?? 10_000,
      });
    this.interval = options.interval ?? '1m';
    this.range = options.range ?? '1d';
  }

  async getQuote(symbol: string): Promise<Quote> {
    const { data } = await this.http.get<YahooChartResponse>(`/${encodeURIComponent(symbol)}`, {
      params: {
        interval: this.interval,
        range: this.range,
        includePrePost: false,
      },
    });

    return parseChartQuote(data, symbol);
  }
}
