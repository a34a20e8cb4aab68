// Failure alert fanout and channel adapters
export type {
  ChannelDelivery,
  DeliveryResult,
  FanoutOutcome,
  NotificationChannel,
  NotificationChannelName,
  NotificationFanout,
} from './types.js';
export { DELIVERY_TIMEOUT_MS } from './types.js';

export { createNotificationFanout, formatFailureMessage } from './fanout.js';
export type { NotificationFanoutDeps } from './fanout.js';

export {
  createChannels,
  createTelegramChannel,
  createDiscordChannel,
  createSmtpChannel,
  SMTP_SUBJECT,
} from './adapters/index.js';
export type { ChannelFactoryOptions, MailTransport, MailTransportFactory } from './adapters/index.js';
