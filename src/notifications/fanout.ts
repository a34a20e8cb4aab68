/**
 * Notification fanout — delivers one failure alert across every enabled
 * channel. Each channel is attempted on its own; a failing channel never
 * stops the others and nothing is thrown back to the caller.
 */
import { NotificationDeliveryError, errorMessage } from '@/core/errors.js';
import { err } from '@/core/result.js';
import type { Logger } from '@/observability/logger.js';
import type {
  ChannelDelivery,
  DeliveryResult,
  FanoutOutcome,
  NotificationChannel,
  NotificationFanout,
} from './types.js';

/** Text of every failure alert. */
export function formatFailureMessage(taskName: string, errorText: string): string {
  return `Task '${taskName}' failed.\nError: ${errorText}`;
}

export interface NotificationFanoutDeps {
  channels: readonly NotificationChannel[];
  logger: Logger;
}

/**
 * Create a fanout over the given channels.
 */
export function createNotificationFanout(deps: NotificationFanoutDeps): NotificationFanout {
  const { channels, logger } = deps;

  async function deliver(
    channel: NotificationChannel,
    message: string,
    taskName: string,
  ): Promise<ChannelDelivery> {
    let result: DeliveryResult;
    try {
      result = await channel.send(message);
    } catch (error) {
      // Adapters return results, but a throwing one must stay contained too
      result = err(new NotificationDeliveryError(channel.name, errorMessage(error), error));
    }

    if (result.ok) {
      logger.info(`${channel.name} notification sent`, {
        component: 'notification-fanout',
        channel: channel.name,
        taskName,
      });
    } else {
      logger.error(`Failed to send ${channel.name} notification`, {
        component: 'notification-fanout',
        channel: channel.name,
        taskName,
        error: result.error.message,
      });
    }

    return { channel: channel.name, result };
  }

  return {
    channels: channels.map((channel) => channel.name),

    async notify(taskName: string, errorText: string): Promise<FanoutOutcome> {
      const message = formatFailureMessage(taskName, errorText);

      if (channels.length === 0) {
        logger.warn('Task failed but no notification channel is configured', {
          component: 'notification-fanout',
          taskName,
        });
        return { message, deliveries: [] };
      }

      logger.debug('Notifying about failure', {
        component: 'notification-fanout',
        taskName,
        channels: channels.map((channel) => channel.name),
      });

      const deliveries = await Promise.all(
        channels.map((channel) => deliver(channel, message, taskName)),
      );

      return { message, deliveries };
    },
  };
}
