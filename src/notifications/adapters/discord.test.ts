import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createDiscordChannel } from './discord.js';

const webhookUrl = 'https://discord.example.test/api/webhooks/1/test-secret';

describe('createDiscordChannel', () => {
  const mockFetch = vi.fn<typeof fetch>();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the message as JSON content', async () => {
    mockFetch.mockResolvedValue(new Response(null, { status: 204 }));
    const channel = createDiscordChannel({ webhookUrl });

    const result = await channel.send("Task 'B' failed.\nError: boom");

    expect(result.ok).toBe(true);
    expect(mockFetch).toHaveBeenCalledWith(
      webhookUrl,
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"content":"Task \'B\' failed.\\nError: boom"}',
      }),
    );
  });

  it('truncates content to 2000 characters', async () => {
    mockFetch.mockResolvedValue(new Response(null, { status: 204 }));
    const channel = createDiscordChannel({ webhookUrl });

    await channel.send('y'.repeat(2500));

    const init = mockFetch.mock.calls[0]?.[1];
    expect(init?.body).toBe(JSON.stringify({ content: `${'y'.repeat(1999)}…` }));
  });

  it('reports a non-2xx status', async () => {
    mockFetch.mockResolvedValue(new Response('  rate limited  ', { status: 429 }));
    const channel = createDiscordChannel({ webhookUrl });

    const result = await channel.send('hello');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('discord delivery failed: HTTP 429: rate limited');
  });

  it('omits an empty error body', async () => {
    mockFetch.mockResolvedValue(new Response('', { status: 500 }));
    const channel = createDiscordChannel({ webhookUrl });

    const result = await channel.send('hello');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('discord delivery failed: HTTP 500');
  });
});
