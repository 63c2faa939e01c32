/**
 * @fileoverview Price data types and collaborator contracts.
 *
 * Pure data structures and interfaces; no I/O. Collaborators at the edge of
 * the tracker (quote source, notifier, audio cue) are described here so the
 * core packages depend on shapes rather than transports.
 *
 * @module @price-sentinel/contracts/market
 */

/**
 * A single observed price.
 *
 * @invariant timestamp is Unix epoch milliseconds (UTC)
 * @invariant price > 0
 *
 * @example
 * ```typescript
 * const point: PricePoint = { timestamp: Date.parse('2025-01-15T14:30:00.000Z'), price: 42150.5 };
 * ```
 */
export interface PricePoint {
  readonly timestamp: number;
  readonly price: number;
}

/**
 * Latest quote returned by a {@link QuoteSource}.
 */
export interface Quote {
  /** Instrument identifier as requested (e.g., 'BTC-USD', 'AAPL') */
  symbol: string;

  /** Last traded or closing price */
  price: number;

  /** Provider-side time of the price, Unix epoch milliseconds */
  timestamp: number;
}

/**
 * Source of the latest price for an instrument.
 *
 * Implementations reject on any failure; "no recent data" and transport
 * errors are not distinguished by the tracker.
 */
export interface QuoteSource {
  /** Provider identifier used in logs (e.g., 'yahoo-finance') */
  readonly id: string;

  getQuote(symbol: string): Promise<Quote>;
}

/**
 * Delivery channel for alert messages.
 *
 * `send` rejects with a NotificationError when delivery fails.
 */
export interface Notifier {
  readonly channel: string;

  send(message: string): Promise<void>;
}

/**
 * Local audible cue played alongside an alert.
 */
export interface AudioCue {
  play(): Promise<void>;
}

/**
 * Persisted tracker state, written at checkpoints and read once at startup.
 *
 * @invariant prices are ordered by strictly increasing timestamp
 * @invariant checkpointSequenceNumber increases by one per successful save
 */
export interface SessionSnapshot {
  ticker: string;
  prices: PricePoint[];
  lastAlertTime: number | null;
  checkpointSequenceNumber: number;
}
