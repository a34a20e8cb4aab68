import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { NotificationDeliveryError } from '@/core/errors.js';
import { err, ok } from '@/core/result.js';
import { createMockLogger } from '@/testing/helpers/index.js';

import { createChannels } from './adapters/index.js';
import { createNotificationFanout, formatFailureMessage } from './fanout.js';
import type { NotificationChannel } from './types.js';

describe('formatFailureMessage', () => {
  it('names the task and the error', () => {
    expect(formatFailureMessage('B', 'boom')).toBe("Task 'B' failed.\nError: boom");
  });
});

describe('createNotificationFanout', () => {
  it('attempts every channel and reports each outcome', async () => {
    const logger = createMockLogger();
    const failure = new NotificationDeliveryError('telegram', 'HTTP 502');
    const telegram: NotificationChannel = {
      name: 'telegram',
      send: vi.fn<NotificationChannel['send']>().mockResolvedValue(err(failure)),
    };
    const discord: NotificationChannel = {
      name: 'discord',
      send: vi.fn<NotificationChannel['send']>().mockResolvedValue(ok(undefined)),
    };
    const fanout = createNotificationFanout({ channels: [telegram, discord], logger });

    const outcome = await fanout.notify('B', 'boom');

    expect(outcome).toEqual({
      message: "Task 'B' failed.\nError: boom",
      deliveries: [
        { channel: 'telegram', result: { ok: false, error: failure } },
        { channel: 'discord', result: { ok: true, value: undefined } },
      ],
    });
    expect(discord.send).toHaveBeenCalledWith("Task 'B' failed.\nError: boom");
    expect(logger.error).toHaveBeenCalledWith('Failed to send telegram notification', {
      component: 'notification-fanout',
      channel: 'telegram',
      taskName: 'B',
      error: 'telegram delivery failed: HTTP 502',
    });
    expect(logger.info).toHaveBeenCalledWith('discord notification sent', {
      component: 'notification-fanout',
      channel: 'discord',
      taskName: 'B',
    });
  });

  it('contains a channel that throws instead of returning a result', async () => {
    const exploding: NotificationChannel = {
      name: 'smtp',
      send: () => Promise.reject(new Error('socket closed')),
    };
    const fanout = createNotificationFanout({ channels: [exploding], logger: createMockLogger() });

    const outcome = await fanout.notify('A', 'x');

    const delivery = outcome.deliveries[0];
    expect(delivery?.channel).toBe('smtp');
    expect(delivery?.result.ok).toBe(false);
    if (!delivery || delivery.result.ok) return;
    expect(delivery.result.error.message).toBe('smtp delivery failed: socket closed');
  });

  it('warns and returns no deliveries when no channel is configured', async () => {
    const logger = createMockLogger();
    const fanout = createNotificationFanout({ channels: [], logger });

    const outcome = await fanout.notify('A', 'x');

    expect(outcome.deliveries).toEqual([]);
    expect(fanout.channels).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Task failed but no notification channel is configured', {
      component: 'notification-fanout',
      taskName: 'A',
    });
  });
});

describe('fanout over the HTTP channels', () => {
  const mockFetch = vi.fn<typeof fetch>();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('still attempts Discord when Telegram raises a network error', async () => {
    mockFetch.mockImplementation((input) =>
      String(input).startsWith('https://api.telegram.org/')
        ? Promise.reject(new TypeError('fetch failed'))
        : Promise.resolve(new Response(null, { status: 204 })),
    );
    const channels = createChannels({
      telegram: { botToken: 'test-token', chatId: '1' },
      discord: { webhookUrl: 'https://discord.example.test/api/webhooks/1/test' },
    });
    const fanout = createNotificationFanout({ channels, logger: createMockLogger() });

    const outcome = await fanout.notify('B', 'boom');

    expect(fanout.channels).toEqual(['telegram', 'discord']);
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(outcome.deliveries.map((delivery) => [delivery.channel, delivery.result.ok])).toEqual([
      ['telegram', false],
      ['discord', true],
    ]);
  });
});
