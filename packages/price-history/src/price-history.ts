/**
 * Bounded price history for a single instrument.
 *
 * Points live in a fixed-size ring buffer addressed by index: `head` is the
 * slot of the oldest point and `count` the number of live points. Once the
 * buffer is full each new point overwrites the oldest one.
 */

import { OutOfOrderError, type PricePoint } from '@price-sentinel/contracts';
import type { PriceRange, WindowedDrop } from './types.js';

const MS_PER_MINUTE = 60_000;

/**
 * Ordered, append-only store of price points.
 *
 * Thread-safety: single writer. The tracker loop is the only caller of
 * `record` and `replace`; readers get copies from `export`.
 *
 * @invariant timestamps are strictly increasing in insertion order
 * @invariant size <= capacity
 *
 * Example:
 * ```typescript
 * const history = new PriceHistory(122);
 * history.record({ timestamp: Date.now(), price: 42150.5 });
 * history.sma(10); // null until ten points exist
 * ```
 */
export class PriceHistory {
  private readonly buffer: Array<PricePoint | undefined>;
  private head = 0;
  private count = 0;
  private evictedCount = 0;

  /**
   * @param capacity - Maximum number of points held (see historyCapacity)
   */
  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<PricePoint | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  /**
   * Number of points overwritten since construction or the last replace.
   */
  get evicted(): number {
    return this.evictedCount;
  }

  /**
   * Appends a point.
   *
   * @throws {OutOfOrderError} If the timestamp does not advance past the latest point; the history is left unchanged
   */
  record(point: PricePoint): void {
    const last = this.latest();
    if (last !== null && point.timestamp <= last.timestamp) {
      throw new OutOfOrderError(
        `Price point at ${new Date(point.timestamp).toISOString()} does not follow ${new Date(last.timestamp).toISOString()}`,
        { timestamp: point.timestamp, lastTimestamp: last.timestamp }
      );
    }

    this.push(point);
  }

  /**
   * Mean of the last `period` prices, or null while fewer points exist.
   */
  sma(period: number): number | null {
    if (!Number.isInteger(period) || period < 1) {
      throw new RangeError(`period must be a positive integer, got ${period}`);
    }
    if (this.count < period) {
      return null;
    }

    let sum = 0;
    for (let i = this.count - period; i < this.count; i += 1) {
      sum += this.at(i).price;
    }
    return sum / period;
  }

  /**
   * Change from the earliest point with `timestamp >= now - windowMinutes`
   * to the latest point.
   *
   * The earliest in-window point is the baseline, so irregular polling needs
   * no interpolation. Returns null with fewer than two points in the window.
   */
  windowedDrop(windowMinutes: number, now: number = Date.now()): WindowedDrop | null {
    const cutoff = now - windowMinutes * MS_PER_MINUTE;
    const first = this.firstIndexAtOrAfter(cutoff);
    const samples = this.count - first;

    if (samples < 2) {
      return null;
    }

    const baselinePoint = this.at(first);
    const current = this.at(this.count - 1).price;

    return {
      baseline: baselinePoint.price,
      baselineTimestamp: baselinePoint.timestamp,
      current,
      pctChange: ((current - baselinePoint.price) / baselinePoint.price) * 100,
      samples,
      windowMinutes,
    };
  }

  latest(): PricePoint | null {
    return this.count === 0 ? null : this.at(this.count - 1);
  }

  /**
   * Lowest and highest price held, or null when empty.
   */
  priceRange(): PriceRange | null {
    if (this.count === 0) {
      return null;
    }

    let min = Infinity;
    let max = -Infinity;
    for (let i = 0; i < this.count; i += 1) {
      const { price } = this.at(i);
      min = Math.min(min, price);
      max = Math.max(max, price);
    }
    return { min, max };
  }

  /**
   * Copy of the held points, oldest first.
   */
  export(): PricePoint[] {
    const points: PricePoint[] = [];
    for (let i = 0; i < this.count; i += 1) {
      const { timestamp, price } = this.at(i);
      points.push({ timestamp, price });
    }
    return points;
  }

  /**
   * Replaces the whole history, e.g. with a resumed session.
   *
   * Keeps the newest `capacity` points when given more.
   *
   * @throws {OutOfOrderError} If `points` is not strictly increasing; the history is left unchanged
   */
  replace(points: readonly PricePoint[]): void {
    for (let i = 1; i < points.length; i += 1) {
      const previous = points[i - 1];
      const point = points[i];
      if (previous !== undefined && point !== undefined && point.timestamp <= previous.timestamp) {
        throw new OutOfOrderError(`Replacement history is out of order at index ${i}`, {
          timestamp: point.timestamp,
          lastTimestamp: previous.timestamp,
        });
      }
    }

    this.buffer.fill(undefined);
    this.head = 0;
    this.count = 0;
    this.evictedCount = 0;

    for (const point of points.slice(-this.capacity)) {
      this.push(point);
    }
  }

  private push(point: PricePoint): void {
    const stored: PricePoint = Object.freeze({ timestamp: point.timestamp, price: point.price });

    if (this.count < this.capacity) {
      this.buffer[(this.head + this.count) % this.capacity] = stored;
      this.count += 1;
      return;
    }

    // Full: overwrite the oldest slot and advance head
    this.buffer[this.head] = stored;
    this.head = (this.head + 1) % this.capacity;
    this.evictedCount += 1;
  }

  /**
   * Point at logical index `index` (0 = oldest).
   */
  private at(index: number): PricePoint {
    const point = this.buffer[(this.head + index) % this.capacity];
    if (point === undefined) {
      throw new RangeError(`No price point at index ${index} (size ${this.count})`);
    }
    return point;
  }

  /**
   * Binary search for the first logical index whose timestamp is >= cutoff;
   * returns `size` when every point is older.
   */
  private firstIndexAtOrAfter(cutoff: number): number {
    let low = 0;
    let high = this.count;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.at(mid).timestamp < cutoff) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}
