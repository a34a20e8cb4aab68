import type { ChannelConfig } from '@/config/types.js';
import type { NotificationChannel } from '../types.js';
import { createDiscordChannel } from './discord.js';
import type { DiscordChannelOptions } from './discord.js';
import { createSmtpChannel } from './smtp.js';
import type { SmtpChannelOptions } from './smtp.js';
import { createTelegramChannel } from './telegram.js';
import type { TelegramChannelOptions } from './telegram.js';

export { createTelegramChannel, buildTelegramUrl, TELEGRAM_API_BASE } from './telegram.js';
export { createDiscordChannel } from './discord.js';
export { createSmtpChannel, buildTransportOptions, SMTP_SUBJECT } from './smtp.js';
export type {
  MailMessage,
  MailTransport,
  MailTransportFactory,
  SmtpTransportOptions,
} from './smtp.js';
export { deliverHttp, truncate } from './http.js';

export interface ChannelFactoryOptions {
  telegram?: TelegramChannelOptions;
  discord?: DiscordChannelOptions;
  smtp?: SmtpChannelOptions;
}

/**
 * Instantiate a channel for every entry present in the config,
 * in the order Telegram, Discord, SMTP.
 */
export function createChannels(
  config: Readonly<ChannelConfig>,
  options: ChannelFactoryOptions = {},
): NotificationChannel[] {
  const channels: NotificationChannel[] = [];

  if (config.telegram) {
    channels.push(createTelegramChannel(config.telegram, options.telegram));
  }
  if (config.discord) {
    channels.push(createDiscordChannel(config.discord, options.discord));
  }
  if (config.smtp) {
    channels.push(createSmtpChannel(config.smtp, options.smtp));
  }

  return channels;
}
