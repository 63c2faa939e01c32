/**
 * @fileoverview Telegram Bot API notifier.
 *
 * @module @price-sentinel/notifiers/telegram
 */

import axios, { type AxiosInstance } from 'axios';
import { NotificationError, type Notifier } from '@price-sentinel/contracts';

const TELEGRAM_BASE_URL = 'https://api.telegram.org';

export interface TelegramNotifierOptions {
  botToken: string;
  chatId: string;

  /** Preconfigured axios instance (tests pass one with a custom adapter) */
  httpClient?: AxiosInstance;

  baseUrl?: string;

  /** @default 10000 */
  timeoutMs?: number;
}

interface SendMessageResponse {
  ok: boolean;
  result?: { message_id: number };
  description?: string;
}

/**
 * Sends plain-text alerts to one chat through `sendMessage`.
 *
 * Rejects with a NotificationError on transport failure or an `ok: false`
 * reply. The bot token never appears in error messages or data.
 *
 * @example
 * ```typescript
 * const notifier = new TelegramNotifier({ botToken: 'test-token', chatId: '12345' });
 * await notifier.send('BTC-USD dropped 5%');
 * ```
 */
export class TelegramNotifier implements Notifier {
  readonly channel = 'telegram';

  private readonly http: AxiosInstance;
  private readonly botToken: string;
  private readonly chatId: string;

  constructor(options: TelegramNotifierOptions) {
    if (options.botToken.trim() === '') {
      throw new TypeError('Telegram bot token is required');
    }
    if (options.chatId.trim() === '') {
      throw new TypeError('Telegram chat id is required');
    }

    this.botToken = options.botToken;
    this.chatId = options.chatId;
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl ?? TELEGRAM_BASE_URL,
        timeout: options.timeoutMs ?? 10_000,
      });
  }

  async send(message: string): Promise<void> {
    let reply: SendMessageResponse;

    try {
      const response = await this.http.post<SendMessageResponse>(`/bot${this.botToken}/sendMessage`, {
        chat_id: this.chatId,
        text: message,
        disable_web_page_preview: true,
      });
      reply = response.data;
    } catch (error) {
      throw new NotificationError(`Telegram delivery failed: ${describeFailure(error)}`, {
        channel: this.channel,
        status: axios.isAxiosError(error) ? error.response?.status : undefined,
      });
    }

    if (!reply.ok) {
      throw new NotificationError(`Telegram delivery failed: ${reply.description ?? 'Unknown Telegram API error'}`, {
        channel: this.channel,
      });
    }
  }
}

function describeFailure(error: unknown): string {
  if (axios.isAxiosError<SendMessageResponse>(error)) {
    const description = error.response?.data?.description;
    if (description !== undefined) {
      return description;
    }
    return error.code ?? error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
