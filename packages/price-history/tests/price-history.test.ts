/**
 * Test suite for @price-sentinel/price-history
 *
 * Covers ordering, SMA, windowed change, ring-buffer eviction, copy
 * semantics of export and whole-history replacement.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { isOutOfOrderError } from '@price-sentinel/contracts';
import { PriceHistory } from '../src/price-history.js';
import { historyCapacity } from '../src/capacity.js';

const T0 = Date.parse('2025-03-03T14:00:00.000Z');
const MINUTE = 60_000;

function fill(history: PriceHistory, prices: number[], stepMs = MINUTE): void {
  prices.forEach((price, i) => history.record({ timestamp: T0 + i * stepMs, price }));
}

// =============================================================================
// record
// =============================================================================

describe('PriceHistory.record', () => {
  let history: PriceHistory;

  beforeEach(() => {
    history = new PriceHistory(100);
  });

  it('should accept strictly increasing timestamps', () => {
    for (let i = 0; i < 50; i += 1) {
      history.record({ timestamp: T0 + i * 1000 + (i % 3), price: 100 + i });
    }

    expect(history.size).toBe(50);
    expect(history.latest()).toEqual({ timestamp: T0 + 49 * 1000 + 1, price: 149 });
  });

  it('should reject an equal timestamp and leave history unchanged', () => {
    fill(history, [100, 101]);
    const before = history.export();

    expect(() => history.record({ timestamp: T0 + MINUTE, price: 102 })).toThrow(/does not follow/);
    expect(history.export()).toEqual(before);
  });

  it('should reject an earlier timestamp with OutOfOrderError', () => {
    fill(history, [100, 101, 102]);

    let caught: unknown;
    try {
      history.record({ timestamp: T0, price: 99 });
    } catch (error) {
      caught = error;
    }

    expect(isOutOfOrderError(caught)).toBe(true);
    expect(history.size).toBe(3);
  });
});

// =============================================================================
// sma
// =============================================================================

describe('PriceHistory.sma', () => {
  it('should be null until period points exist', () => {
    const history = new PriceHistory(100);

    for (let i = 0; i < 9; i += 1) {
      history.record({ timestamp: T0 + i * MINUTE, price: 100 });
      expect(history.sma(10)).toBeNull();
    }

    history.record({ timestamp: T0 + 9 * MINUTE, price: 95 });
    expect(history.sma(10)).toBe(99.5);
  });

  it('should average only the most recent period prices', () => {
    const history = new PriceHistory(100);
    fill(history, [10, 20, 30, 40, 50]);

    expect(history.sma(3)).toBe(40);
    expect(history.sma(5)).toBe(30);
    expect(history.sma(1)).toBe(50);
  });

  it('should reject a non-positive period', () => {
    const history = new PriceHistory(10);

    expect(() => history.sma(0)).toThrow(RangeError);
  });
});

// =============================================================================
// windowedDrop
// =============================================================================

describe('PriceHistory.windowedDrop', () => {
  it('should be null with zero or one point in the window', () => {
    const history = new PriceHistory(100);
    const now = T0 + 120 * MINUTE;

    expect(history.windowedDrop(60, now)).toBeNull();

    history.record({ timestamp: T0, price: 100 }); // outside the window
    history.record({ timestamp: now - 5 * MINUTE, price: 98 });

    expect(history.windowedDrop(60, now)).toBeNull();
  });

  it('should use the earliest in-window point as baseline', () => {
    const history = new PriceHistory(100);
    history.record({ timestamp: T0, price: 200 }); // older than the window
    history.record({ timestamp: T0 + 30 * MINUTE, price: 100 });
    history.record({ timestamp: T0 + 50 * MINUTE, price: 104 });
    history.record({ timestamp: T0 + 70 * MINUTE, price: 97 });

    const drop = history.windowedDrop(60, T0 + 75 * MINUTE);

    expect(drop).not.toBeNull();
    expect(drop?.baseline).toBe(100);
    expect(drop?.baselineTimestamp).toBe(T0 + 30 * MINUTE);
    expect(drop?.current).toBe(97);
    expect(drop?.samples).toBe(3);
    expect(drop?.pctChange).toBeCloseTo(-3, 10);
  });

  it('should include a point exactly on the window boundary', () => {
    const history = new PriceHistory(100);
    history.record({ timestamp: T0, price: 50 });
    history.record({ timestamp: T0 + 60 * MINUTE, price: 55 });

    const drop = history.windowedDrop(60, T0 + 60 * MINUTE);

    expect(drop?.baseline).toBe(50);
    expect(drop?.pctChange).toBeCloseTo(10, 10);
  });

  it('should report rises as positive change', () => {
    const history = new PriceHistory(100);
    fill(history, [100, 105]);

    expect(history.windowedDrop(60, T0 + 2 * MINUTE)?.pctChange).toBeCloseTo(5, 10);
  });
});

// =============================================================================
// ring buffer
// =============================================================================

describe('PriceHistory ring buffer', () => {
  it('should overwrite the oldest points once full', () => {
    const history = new PriceHistory(3);
    fill(history, [1, 2, 3, 4, 5]);

    expect(history.size).toBe(3);
    expect(history.evicted).toBe(2);
    expect(history.export().map((p) => p.price)).toEqual([3, 4, 5]);
    expect(history.sma(3)).toBe(4);
  });

  it('should keep ordering checks against the newest point after wrapping', () => {
    const history = new PriceHistory(2);
    fill(history, [1, 2, 3]);

    expect(() => history.record({ timestamp: T0 + MINUTE, price: 9 })).toThrow(/does not follow/);
  });

  it('should find the window baseline across the wrap point', () => {
    const history = new PriceHistory(4);
    fill(history, [10, 20, 30, 40, 50, 60]); // holds 30..60 at T0+2..5 min

    const drop = history.windowedDrop(2, T0 + 5 * MINUTE);

    expect(drop?.baseline).toBe(40);
    expect(drop?.current).toBe(60);
    expect(drop?.samples).toBe(3);
  });
});

// =============================================================================
// export / replace / priceRange
// =============================================================================

describe('PriceHistory export and replace', () => {
  it('should return copies that cannot change the history', () => {
    const history = new PriceHistory(10);
    fill(history, [100, 101]);

    const exported = history.export();
    exported.pop();
    exported.push({ timestamp: 0, price: 1 });

    expect(history.export()).toEqual([
      { timestamp: T0, price: 100 },
      { timestamp: T0 + MINUTE, price: 101 },
    ]);
  });

  it('should fully replace existing points', () => {
    const history = new PriceHistory(10);
    fill(history, [1, 2, 3]);

    history.replace([
      { timestamp: T0 + 10 * MINUTE, price: 70 },
      { timestamp: T0 + 11 * MINUTE, price: 71 },
    ]);

    expect(history.export()).toEqual([
      { timestamp: T0 + 10 * MINUTE, price: 70 },
      { timestamp: T0 + 11 * MINUTE, price: 71 },
    ]);
  });

  it('should keep the newest points when replacing beyond capacity', () => {
    const history = new PriceHistory(2);

    history.replace([
      { timestamp: T0, price: 1 },
      { timestamp: T0 + MINUTE, price: 2 },
      { timestamp: T0 + 2 * MINUTE, price: 3 },
    ]);

    expect(history.export().map((p) => p.price)).toEqual([2, 3]);
  });

  it('should refuse an unordered replacement and keep the old points', () => {
    const history = new PriceHistory(10);
    fill(history, [5]);

    expect(() =>
      history.replace([
        { timestamp: T0 + MINUTE, price: 1 },
        { timestamp: T0 + MINUTE, price: 2 },
      ])
    ).toThrow(/out of order at index 1/);
    expect(history.export()).toEqual([{ timestamp: T0, price: 5 }]);
  });

  it('should report the price range', () => {
    const history = new PriceHistory(10);

    expect(history.priceRange()).toBeNull();

    fill(history, [101, 97.5, 103.25]);

    expect(history.priceRange()).toEqual({ min: 97.5, max: 103.25 });
  });
});

describe('historyCapacity', () => {
  it('should size for the alert window at the default cadence', () => {
    expect(historyCapacity({ smaPeriod: 10, alertWindowMinutes: 60, checkIntervalSeconds: 60 })).toBe(122);
  });

  it('should size for the SMA when it needs more points than the window', () => {
    expect(historyCapacity({ smaPeriod: 50, alertWindowMinutes: 5, checkIntervalSeconds: 60 })).toBe(100);
  });

  it('should reject invalid inputs', () => {
    expect(() => historyCapacity({ smaPeriod: 0, alertWindowMinutes: 60, checkIntervalSeconds: 60 })).toThrow(
      RangeError
    );
  });
});
