/**
 * @fileoverview Public API for @price-sentinel/contracts.
 *
 * @module @price-sentinel/contracts
 */

export type {
  PricePoint,
  Quote,
  QuoteSource,
  Notifier,
  AudioCue,
  SessionSnapshot,
} from './market.js';

export {
  SentinelError,
  QuoteSourceError,
  FetchError,
  OutOfOrderError,
  PersistenceError,
  NotificationError,
  ConfigError,
  isSentinelError,
  isFetchError,
  isOutOfOrderError,
  isPersistenceError,
  isNotificationError,
  isConfigError,
} from './errors.js';
