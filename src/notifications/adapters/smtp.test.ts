import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';

import { NotificationDeliveryError } from '@/core/errors.js';

import { buildTransportOptions, createSmtpChannel, SMTP_SUBJECT } from './smtp.js';
import type { MailTransport, MailTransportFactory } from './smtp.js';

const { createTransport } = vi.hoisted(() => ({ createTransport: vi.fn() }));

vi.mock('nodemailer', () => ({ createTransport }));

const config = {
  server: 'mail.example.test',
  port: 587,
  username: 'alerts',
  password: 'test-secret',
  fromEmail: 'alerts@example.test',
  toEmail: 'ops@example.test',
};

function fakeTransport(sendMail: MailTransport['sendMail']): MailTransport & { close: Mock<() => void> } {
  return { sendMail, close: vi.fn<() => void>() };
}

describe('buildTransportOptions', () => {
  it('requires STARTTLS and authenticates with both credentials', () => {
    expect(buildTransportOptions(config, 10_000)).toEqual({
      host: 'mail.example.test',
      port: 587,
      secure: false,
      requireTLS: true,
      auth: { user: 'alerts', pass: 'test-secret' },
      connectionTimeout: 10_000,
      greetingTimeout: 10_000,
      socketTimeout: 10_000,
    });
  });

  it('skips authentication without a password', () => {
    const options = buildTransportOptions({ ...config, password: undefined }, 10_000);

    expect(options.auth).toBeUndefined();
  });
});

describe('createSmtpChannel', () => {
  beforeEach(() => {
    createTransport.mockReset();
  });

  it('sends a plain-text alert and closes the connection', async () => {
    const sendMail = vi.fn<MailTransport['sendMail']>().mockResolvedValue({ messageId: '1' });
    const transport = fakeTransport(sendMail);
    const factory = vi.fn<MailTransportFactory>().mockReturnValue(transport);
    const channel = createSmtpChannel(config, { transportFactory: factory, timeoutMs: 5_000 });

    const result = await channel.send("Task 'B' failed.\nError: boom");

    expect(result).toEqual({ ok: true, value: undefined });
    expect(factory).toHaveBeenCalledWith(expect.objectContaining({ host: 'mail.example.test', socketTimeout: 5_000 }));
    expect(sendMail).toHaveBeenCalledWith({
      from: 'alerts@example.test',
      to: 'ops@example.test',
      subject: SMTP_SUBJECT,
      text: "Task 'B' failed.\nError: boom",
    });
    expect(transport.close).toHaveBeenCalledTimes(1);
  });

  it('returns a delivery error when the server rejects the message', async () => {
    const transport = fakeTransport(() => Promise.reject(new Error('535 Authentication failed')));
    const channel = createSmtpChannel(config, { transportFactory: () => transport });

    const result = await channel.send('hello');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(NotificationDeliveryError);
    expect(result.error.message).toBe('smtp delivery failed: 535 Authentication failed');
    expect(transport.close).toHaveBeenCalledTimes(1);
  });

  it('uses nodemailer by default', async () => {
    const transport = fakeTransport(() => Promise.resolve({}));
    createTransport.mockReturnValue(transport);
    const channel = createSmtpChannel(config);

    await channel.send('hello');

    expect(createTransport).toHaveBeenCalledWith(buildTransportOptions(config, 10_000));
  });
});
