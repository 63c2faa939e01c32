/**
 * CSV output for price history
 *
 * One row per recorded point, oldest first, for analysis in spreadsheets
 * or data tools.
 *
 * CSV columns:
 * - timestamp: ISO 8601 time the price was recorded (UTC)
 * - price: Recorded price
 * - sma: Simple moving average ending at this row; empty until the period is filled
 */

import { promises as fs } from 'node:fs';
import { dirname, join } from 'node:path';
import type { PricePoint } from '@price-sentinel/contracts';

const HEADER = ['timestamp', 'price', 'sma'];

/**
 * Format price history as CSV
 *
 * @example
 * formatHistoryCsv([{ timestamp: 0, price: 100 }, { timestamp: 60000, price: 101 }], 2);
 * // timestamp,price,sma
 * // 1970-01-01T00:00:00.000Z,100,
 * // 1970-01-01T00:01:00.000Z,101,100.5
 */
export function formatHistoryCsv(points: readonly PricePoint[], smaPeriod: number): string {
  const rows = [HEADER.join(',')];
  let windowSum = 0;

  points.forEach((point, index) => {
    windowSum += point.price;
    const leaving = points[index - smaPeriod];
    if (leaving !== undefined) {
      windowSum -= leaving.price;
    }

    const sma = index + 1 >= smaPeriod ? windowSum / smaPeriod : undefined;
    rows.push([new Date(point.timestamp).toISOString(), point.price.toString(), formatNumber(sma)].join(','));
  });

  return `${rows.join('\n')}\n`;
}

/**
 * Default export file name: `<TICKER>_price_history_<YYYYMMDD_HHMMSS>.csv` (UTC)
 */
export function exportFileName(ticker: string, at: Date): string {
  const stamp = at
    .toISOString()
    .slice(0, 19)
    .replace(/[-:]/g, '')
    .replace('T', '_');
  return `${ticker.replace(/[^A-Za-z0-9._=^-]/g, '_')}_price_history_${stamp}.csv`;
}

/**
 * Write history as CSV, creating the directory if needed
 *
 * @returns Path written
 */
export async function writeHistoryCsv(
  points: readonly PricePoint[],
  options: { ticker: string; smaPeriod: number; outputDir?: string; filePath?: string; now?: Date }
): Promise<string> {
  const filePath =
    options.filePath ?? join(options.outputDir ?? '.', exportFileName(options.ticker, options.now ?? new Date()));

  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, formatHistoryCsv(points, options.smaPeriod), 'utf-8');
  return filePath;
}

/**
 * Format number for CSV, handling undefined
 */
function formatNumber(value: number | undefined): string {
  if (value === undefined) {
    return '';
  }
  return Number(value.toFixed(6)).toString();
}
