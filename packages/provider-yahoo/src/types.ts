/**
 * @fileoverview Yahoo Finance provider-specific types.
 *
 * @module @price-sentinel/provider-yahoo/types
 */

import type { AxiosInstance } from 'axios';

/**
 * Subset of the v8 chart endpoint response the quote source reads.
 */
export interface YahooChartResponse {
  chart?: {
    result?: Array<{
      meta?: {
        symbol?: string;
        currency?: string;
        regularMarketPrice?: number | null;
        regularMarketTime?: number | null;
      };
      timestamp?: number[];
      indicators?: {
        quote?: Array<{
          close?: Array<number | null>;
        }>;
      };
    }> | null;
    error?: {
      code?: string;
      description?: string;
    } | null;
  };
}

/**
 * Options for YahooQuoteSource.
 */
export interface YahooQuoteSourceOptions {
  /**
   * Pre-built HTTP client. Tests pass an instance with an in-process adapter.
   */
  httpClient?: AxiosInstance;

  /**
   * Base URL of the chart endpoint.
   * @default 'https://query1.finance.yahoo.com/v8/finance/chart'
   */
  baseUrl?: string;

  /**
   * Per-request timeout in milliseconds.
   * @default 10000
   */
  timeoutMs?: number;

  /**
   * Bar interval requested from the chart endpoint.
   * @default '1m'
   */
  interval?: string;

  /**
   * Range of bars requested; the last non-empty close is used.
   * @default '1d'
   */
  range?: string;
}
