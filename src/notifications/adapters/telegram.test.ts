import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { NotificationDeliveryError } from '@/core/errors.js';

import { buildTelegramUrl, createTelegramChannel } from './telegram.js';

const config = { botToken: 'test-token', chatId: '-100200' };

describe('buildTelegramUrl', () => {
  it('URL-encodes the chat id and text as query parameters', () => {
    expect(buildTelegramUrl(config, "Task 'B' failed.\nError: boom")).toBe(
      'https://api.telegram.org/bottest-token/sendMessage?chat_id=-100200&text=Task+%27B%27+failed.%0AError%3A+boom',
    );
  });

  it('truncates text to the Telegram limit', () => {
    const url = new URL(buildTelegramUrl(config, 'x'.repeat(5000)));

    expect(url.searchParams.get('text')).toBe(`${'x'.repeat(4095)}…`);
  });

  it('keeps a trailing emoji whole when truncating', () => {
    const url = new URL(buildTelegramUrl(config, `${'x'.repeat(4094)}😀😀`));

    expect(url.searchParams.get('text')).toBe(`${'x'.repeat(4094)}…`);
  });
});

describe('createTelegramChannel', () => {
  const mockFetch = vi.fn<typeof fetch>();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends a GET request to sendMessage', async () => {
    mockFetch.mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
    const channel = createTelegramChannel(config);

    const result = await channel.send('hello');

    expect(result).toEqual({ ok: true, value: undefined });
    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.telegram.org/bottest-token/sendMessage?chat_id=-100200&text=hello',
      expect.objectContaining({ method: 'GET' }),
    );
  });

  it('reports a non-2xx status with the response body', async () => {
    mockFetch.mockResolvedValue(
      new Response('{"ok":false,"description":"Unauthorized"}', { status: 401 }),
    );
    const channel = createTelegramChannel(config);

    const result = await channel.send('hello');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(NotificationDeliveryError);
    expect(result.error.message).toBe(
      'telegram delivery failed: HTTP 401: {"ok":false,"description":"Unauthorized"}',
    );
  });

  it('reports network errors', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));
    const channel = createTelegramChannel(config);

    const result = await channel.send('hello');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('telegram delivery failed: fetch failed');
    expect(result.error.channel).toBe('telegram');
  });

  it('reports timeouts', async () => {
    mockFetch.mockRejectedValue(
      Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }),
    );
    const channel = createTelegramChannel(config, { timeoutMs: 250 });

    const result = await channel.send('hello');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('telegram delivery failed: request timed out after 250ms');
  });
});
