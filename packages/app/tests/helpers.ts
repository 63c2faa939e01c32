import type { Notifier, Quote, QuoteSource } from '@price-sentinel/contracts';
import type { Sleep } from '@price-sentinel/tracker';

export const T0 = Date.parse('2025-03-03T14:00:00.000Z');

export class FakeTime {
  readonly sleeps: number[] = [];

  constructor(public now: number = T0) {}

  readonly clock = (): number => this.now;

  readonly sleep: Sleep = async (ms, signal) => {
    if (signal?.aborted) {
      return false;
    }
    this.sleeps.push(ms);
    this.now += ms;
    return true;
  };
}

export class ListQuoteSource implements QuoteSource {
  readonly id = 'list';
  private calls = 0;

  constructor(private readonly prices: number[]) {}

  async getQuote(symbol: string): Promise<Quote> {
    const price = this.prices[Math.min(this.calls, this.prices.length - 1)];
    this.calls++;
    if (price === undefined) {
      throw new Error('No prices');
    }
    return { symbol, price, timestamp: T0 };
  }
}

export class RecordingNotifier implements Notifier {
  readonly channel = 'recording';
  readonly messages: string[] = [];

  async send(message: string): Promise<void> {
    this.messages.push(message);
  }
}
