/**
 * @fileoverview Tests for the Telegram notifier and the terminal bell.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Writable } from 'node:stream';
import axios, { AxiosError, type InternalAxiosRequestConfig } from 'axios';
import { isNotificationError } from '@price-sentinel/contracts';
import { TelegramNotifier } from '../src/telegram.js';
import { TerminalBell } from '../src/terminal-bell.js';

describe('TelegramNotifier', () => {
  let requests: InternalAxiosRequestConfig[];

  function notifierReplying(data: unknown): TelegramNotifier {
    const httpClient = axios.create({
      baseURL: 'https://telegram.test',
      adapter: async (config) => {
        requests.push(config);
        return { data, status: 200, statusText: 'OK', headers: {}, config };
      },
    });
    return new TelegramNotifier({ botToken: 'test-token', chatId: '12345', httpClient });
  }

  beforeEach(() => {
    requests = [];
  });

  it('should post the message to sendMessage', async () => {
    const notifier = notifierReplying({ ok: true, result: { message_id: 7 } });

    await notifier.send('BTC-USD dropped');

    expect(requests).toHaveLength(1);
    expect(requests[0]?.method).toBe('post');
    expect(requests[0]?.url).toBe('/bottest-token/sendMessage');
    expect(JSON.parse(String(requests[0]?.data))).toEqual({
      chat_id: '12345',
      text: 'BTC-USD dropped',
      disable_web_page_preview: true,
    });
  });

  it('should reject an ok: false reply', async () => {
    const notifier = notifierReplying({ ok: false, description: 'Bad Request: message text is empty' });

    const error: unknown = await notifier.send('').catch((err: unknown) => err);

    expect(isNotificationError(error)).toBe(true);
    expect(error).toHaveProperty('message', 'Telegram delivery failed: Bad Request: message text is empty');
    expect(error).toHaveProperty('code', 'NOTIFICATION_FAILED');
  });

  it('should use the API description from an HTTP error', async () => {
    const httpClient = axios.create({
      adapter: async (config) => {
        throw new AxiosError('Request failed with status code 400', 'ERR_BAD_REQUEST', config, null, {
          data: { ok: false, description: 'Bad Request: chat not found' },
          status: 400,
          statusText: 'Bad Request',
          headers: {},
          config,
        });
      },
    });
    const notifier = new TelegramNotifier({ botToken: 'test-token', chatId: '12345', httpClient });

    const error: unknown = await notifier.send('hello').catch((err: unknown) => err);

    expect(isNotificationError(error)).toBe(true);
    expect(error).toHaveProperty('message', 'Telegram delivery failed: Bad Request: chat not found');
    expect(error).toHaveProperty('data', { channel: 'telegram', status: 400 });
  });

  it('should wrap network failures without exposing the token', async () => {
    const httpClient = axios.create({
      adapter: async () => {
        throw new Error('getaddrinfo ENOTFOUND telegram.test');
      },
    });
    const notifier = new TelegramNotifier({ botToken: 'test-token', chatId: '12345', httpClient });

    const error: unknown = await notifier.send('hello').catch((err: unknown) => err);

    expect(error).toHaveProperty('message', 'Telegram delivery failed: getaddrinfo ENOTFOUND telegram.test');
  });

  it('should require a token and a chat id', () => {
    expect(() => new TelegramNotifier({ botToken: '', chatId: '12345' })).toThrow('Telegram bot token is required');
    expect(() => new TelegramNotifier({ botToken: 'test-token', chatId: ' ' })).toThrow(
      'Telegram chat id is required'
    );
  });
});

describe('TerminalBell', () => {
  function sink(): { stream: Writable; written: string[] } {
    const written: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        written.push(chunk.toString('utf-8'));
        callback();
      },
    });
    return { stream, written };
  }

  it('should ring twice with a pause in between', async () => {
    const { stream, written } = sink();
    const pauses: number[] = [];
    const bell = new TerminalBell({
      output: stream,
      sleep: async (ms) => {
        pauses.push(ms);
      },
    });

    await bell.play();

    expect(written).toEqual(['\x07', '\x07']);
    expect(pauses).toEqual([200]);
  });

  it('should honour a custom ring count', async () => {
    const { stream, written } = sink();
    const bell = new TerminalBell({ output: stream, rings: 3, gapMs: 0, sleep: async () => undefined });

    await bell.play();

    expect(written).toHaveLength(3);
  });
});
