import type { NotificationDeliveryError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';

// ─── Channel Types ──────────────────────────────────────────────

export type NotificationChannelName = 'telegram' | 'discord' | 'smtp';

/** Per-call timeout for HTTP and SMTP deliveries. */
export const DELIVERY_TIMEOUT_MS = 10_000;

export type DeliveryResult = Result<void, NotificationDeliveryError>;

// ─── Notification Channel ───────────────────────────────────────

export interface NotificationChannel {
  readonly name: NotificationChannelName;

  /** Deliver one message. Failures come back as results, not exceptions. */
  send(message: string): Promise<DeliveryResult>;
}

// ─── Fanout ─────────────────────────────────────────────────────

export interface ChannelDelivery {
  channel: NotificationChannelName;
  result: DeliveryResult;
}

/** Aggregate outcome of one fanout call. */
export interface FanoutOutcome {
  message: string;
  deliveries: ChannelDelivery[];
}

export interface NotificationFanout {
  /** Enabled channels, in delivery order. */
  readonly channels: readonly NotificationChannelName[];

  /** Alert every enabled channel that a task failed. Never rejects. */
  notify(taskName: string, errorMessage: string): Promise<FanoutOutcome>;
}
