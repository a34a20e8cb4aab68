/**
 * Shared fetch wrapper for the HTTP notification channels.
 */
import { NotificationDeliveryError, errorMessage } from '@/core/errors.js';
import { err, ok } from '@/core/result.js';
import type { DeliveryResult, NotificationChannelName } from '../types.js';

const MAX_ERROR_BODY_LENGTH = 200;

/**
 * Cut a message down to a channel's length limit (in UTF-16 units),
 * never splitting a surrogate pair.
 */
export function truncate(text: string, limit: number): string {
  if (text.length <= limit) return text;

  let end = limit - 1;
  const last = text.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) end -= 1;
  return `${text.slice(0, end)}…`;
}

/**
 * Perform one HTTP request with a hard timeout. Network errors, timeouts and
 * non-2xx responses all become a NotificationDeliveryError.
 */
export async function deliverHttp(
  channel: NotificationChannelName,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<DeliveryResult> {
  let response: Response;
  try {
    response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    const reason =
      error instanceof Error && error.name === 'TimeoutError'
        ? `request timed out after ${timeoutMs}ms`
        : errorMessage(error);
    return err(new NotificationDeliveryError(channel, reason, error));
  }

  if (!response.ok) {
    // The body only feeds the diagnostic; an unreadable one is left out
    const body = await response.text().then(
      (text) => truncate(text.trim(), MAX_ERROR_BODY_LENGTH),
      () => '',
    );
    const suffix = body ? `: ${body}` : '';
    return err(new NotificationDeliveryError(channel, `HTTP ${response.status}${suffix}`));
  }

  return ok(undefined);
}
