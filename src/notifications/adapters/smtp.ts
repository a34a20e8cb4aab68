/**
 * Emails alerts over a STARTTLS-upgraded SMTP connection.
 */
import { createTransport } from 'nodemailer';

import type { SmtpChannelConfig } from '@/config/types.js';
import { NotificationDeliveryError, errorMessage } from '@/core/errors.js';
import { err, ok } from '@/core/result.js';
import { DELIVERY_TIMEOUT_MS } from '../types.js';
import type { DeliveryResult, NotificationChannel } from '../types.js';

export const SMTP_SUBJECT = 'Qzark Task Failure Notification';

// ─── Transport ──────────────────────────────────────────────────

export interface SmtpTransportOptions {
  host: string;
  port: number;
  secure: false;
  requireTLS: true;
  auth?: { user: string; pass: string };
  connectionTimeout: number;
  greetingTimeout: number;
  socketTimeout: number;
}

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/** The part of a nodemailer transporter this channel uses. */
export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
  close(): void;
}

export type MailTransportFactory = (options: SmtpTransportOptions) => MailTransport;

const nodemailerTransport: MailTransportFactory = (options) => createTransport(options);

/** Map channel config onto nodemailer SMTP options. */
export function buildTransportOptions(
  config: SmtpChannelConfig,
  timeoutMs: number,
): SmtpTransportOptions {
  return {
    host: config.server,
    port: config.port,
    // Plain connection first, then a mandatory STARTTLS upgrade
    secure: false,
    requireTLS: true,
    auth:
      config.username && config.password
        ? { user: config.username, pass: config.password }
        : undefined,
    connectionTimeout: timeoutMs,
    greetingTimeout: timeoutMs,
    socketTimeout: timeoutMs,
  };
}

// ─── Channel ────────────────────────────────────────────────────

export interface SmtpChannelOptions {
  timeoutMs?: number;
  transportFactory?: MailTransportFactory;
}

/**
 * Create an SMTP notification channel. A fresh connection is opened for
 * every alert and closed afterwards.
 */
export function createSmtpChannel(
  config: SmtpChannelConfig,
  options: SmtpChannelOptions = {},
): NotificationChannel {
  const timeoutMs = options.timeoutMs ?? DELIVERY_TIMEOUT_MS;
  const transportFactory = options.transportFactory ?? nodemailerTransport;

  return {
    name: 'smtp',

    async send(message: string): Promise<DeliveryResult> {
      let transport: MailTransport | undefined;
      try {
        transport = transportFactory(buildTransportOptions(config, timeoutMs));
        await transport.sendMail({
          from: config.fromEmail,
          to: config.toEmail,
          subject: SMTP_SUBJECT,
          text: message,
        });
        return ok(undefined);
      } catch (error) {
        return err(new NotificationDeliveryError('smtp', errorMessage(error), error));
      } finally {
        transport?.close();
      }
    },
  };
}
