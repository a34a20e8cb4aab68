/**
 * Telegram channel — sends alerts through the Bot API `sendMessage` method.
 */
import type { TelegramChannelConfig } from '@/config/types.js';
import { DELIVERY_TIMEOUT_MS } from '../types.js';
import type { DeliveryResult, NotificationChannel } from '../types.js';
import { deliverHttp, truncate } from './http.js';

export const TELEGRAM_API_BASE = 'https://api.telegram.org';

/** Telegram rejects texts longer than this. */
const TELEGRAM_MAX_TEXT = 4096;

export interface TelegramChannelOptions {
  timeoutMs?: number;
}

/** Build the `sendMessage` URL with the chat id and text as query parameters. */
export function buildTelegramUrl(config: TelegramChannelConfig, text: string): string {
  const query = new URLSearchParams({
    chat_id: config.chatId,
    text: truncate(text, TELEGRAM_MAX_TEXT),
  });
  return `${TELEGRAM_API_BASE}/bot${config.botToken}/sendMessage?${query.toString()}`;
}

/**
 * Create a Telegram notification channel.
 */
export function createTelegramChannel(
  config: TelegramChannelConfig,
  options: TelegramChannelOptions = {},
): NotificationChannel {
  const timeoutMs = options.timeoutMs ?? DELIVERY_TIMEOUT_MS;

  return {
    name: 'telegram',

    send(message: string): Promise<DeliveryResult> {
      return deliverHttp('telegram', buildTelegramUrl(config, message), { method: 'GET' }, timeoutMs);
    },
  };
}
