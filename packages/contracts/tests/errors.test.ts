/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  SentinelError,
  FetchError,
  OutOfOrderError,
  PersistenceError,
  NotificationError,
  ConfigError,
  QuoteSourceError,
  isSentinelError,
  isFetchError,
  isOutOfOrderError,
  isPersistenceError,
  isNotificationError,
  isConfigError,
} from '../src/errors.js';

describe('SentinelError', () => {
  it('should create error with code and message', () => {
    const error = new SentinelError('TEST_CODE', 'Test message');

    expect(error.name).toBe('SentinelError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.stack).toBeDefined();
    expect(error).toBeInstanceOf(Error);
  });

  it('should have valid ISO timestamp', () => {
    const error = new SentinelError('TEST_CODE', 'Test message');
    const timestamp = new Date(error.timestamp);

    expect(timestamp.toISOString()).toBe(error.timestamp);
  });

  it('should serialize to JSON correctly', () => {
    const error = new SentinelError('TEST_CODE', 'Test message', { key: 'value' });
    const parsed: unknown = JSON.parse(JSON.stringify(error));

    expect(parsed).toMatchObject({
      name: 'SentinelError',
      code: 'TEST_CODE',
      message: 'Test message',
      data: { key: 'value' },
      timestamp: error.timestamp,
    });
  });
});

describe('FetchError', () => {
  it('should carry attempts and the last cause', () => {
    const cause = new Error('socket hang up');
    const error = new FetchError('Quote fetch failed', {
      symbol: 'BTC-USD',
      attempts: 4,
      lastCause: cause,
    });

    expect(error.code).toBe('FETCH_EXHAUSTED');
    expect(error.attempts).toBe(4);
    expect(error.lastCause).toBe(cause);
    expect(error.aborted).toBe(false);
    expect(error.data).toEqual({
      symbol: 'BTC-USD',
      attempts: 4,
      lastCause: 'Error: socket hang up',
      aborted: false,
    });
  });

  it('should flag aborted sequences', () => {
    const error = new FetchError('Stopped', {
      symbol: 'AAPL',
      attempts: 2,
      lastCause: 'timeout',
      aborted: true,
    });

    expect(error.aborted).toBe(true);
    expect(error.data?.['lastCause']).toBe('timeout');
  });
});

describe('PersistenceError', () => {
  it('should record the failing operation', () => {
    const error = new PersistenceError('Could not write session', {
      operation: 'save',
      filePath: '/tmp/BTC-USD_session.json',
      cause: new Error('EACCES'),
    });

    expect(error.code).toBe('PERSISTENCE_FAILED');
    expect(error.operation).toBe('save');
    expect(error.data?.['cause']).toBe('Error: EACCES');
  });
});

describe('ConfigError', () => {
  it('should keep every issue', () => {
    const error = new ConfigError('Configuration validation failed', [
      'tracker.smaPeriod: Number must be greater than 0',
      'alerts.priceDropThreshold: Expected number, received string',
    ]);

    expect(error.issues).toHaveLength(2);
    expect(error.data).toEqual({ issues: error.issues });
  });
});

describe('type guards', () => {
  const fetchError = new FetchError('x', { symbol: 'X', attempts: 1, lastCause: 'y' });
  const orderError = new OutOfOrderError('x', { timestamp: 1, lastTimestamp: 2 });
  const persistenceError = new PersistenceError('x', { operation: 'load', filePath: 'f' });
  const notificationError = new NotificationError('x', { channel: 'telegram' });
  const configError = new ConfigError('x', []);
  const quoteError = new QuoteSourceError('x', { symbol: 'X', provider: 'yahoo-finance' });

  it('should match their own class only', () => {
    expect(isFetchError(fetchError)).toBe(true);
    expect(isFetchError(orderError)).toBe(false);
    expect(isOutOfOrderError(orderError)).toBe(true);
    expect(isPersistenceError(persistenceError)).toBe(true);
    expect(isNotificationError(notificationError)).toBe(true);
    expect(isConfigError(configError)).toBe(true);
    expect(isConfigError(new Error('plain'))).toBe(false);
  });

  it('should recognise every subclass as a SentinelError', () => {
    for (const error of [fetchError, orderError, persistenceError, notificationError, configError, quoteError]) {
      expect(isSentinelError(error)).toBe(true);
    }
    expect(isSentinelError(new Error('plain'))).toBe(false);
  });
});
