/**
 * Posts alerts to a Discord incoming webhook.
 */
import type { DiscordChannelConfig } from '@/config/types.js';
import { DELIVERY_TIMEOUT_MS } from '../types.js';
import type { DeliveryResult, NotificationChannel } from '../types.js';
import { deliverHttp, truncate } from './http.js';

/** Discord rejects message content longer than this. */
const DISCORD_MAX_CONTENT = 2000;

export interface DiscordChannelOptions {
  timeoutMs?: number;
}

/**
 * Create a Discord webhook notification channel.
 */
export function createDiscordChannel(
  config: DiscordChannelConfig,
  options: DiscordChannelOptions = {},
): NotificationChannel {
  const timeoutMs = options.timeoutMs ?? DELIVERY_TIMEOUT_MS;

  return {
    name: 'discord',

    send(message: string): Promise<DeliveryResult> {
      return deliverHttp(
        'discord',
        config.webhookUrl,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ content: truncate(message, DISCORD_MAX_CONTENT) }),
        },
        timeoutMs,
      );
    },
  };
}
