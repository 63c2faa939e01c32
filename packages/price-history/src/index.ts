/**
 * @price-sentinel/price-history
 *
 * Bounded, ordered price history with SMA and windowed change queries.
 */

export { PriceHistory } from './price-history.js';
export { historyCapacity } from './capacity.js';
export type { WindowedDrop, PriceRange, HistoryCapacityParams } from './types.js';
