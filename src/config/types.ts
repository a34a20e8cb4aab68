// ─── Channel Config ─────────────────────────────────────────────

export interface TelegramChannelConfig {
  botToken: string;
  chatId: string;
}

export interface DiscordChannelConfig {
  webhookUrl: string;
}

export interface SmtpChannelConfig {
  server: string;
  port: number;
  username?: string;
  password?: string;
  fromEmail: string;
  toEmail: string;
}

/** Enabled notification channels. An absent key means the channel is off. */
export interface ChannelConfig {
  telegram?: TelegramChannelConfig;
  discord?: DiscordChannelConfig;
  smtp?: SmtpChannelConfig;
}

// ─── Settings ───────────────────────────────────────────────────

/**
 * Read-only settings built once at startup and passed by parameter to
 * every component that needs them.
 */
export interface Settings {
  /** Global timeout in seconds; bounds the graceful shutdown. */
  readonly timeoutSeconds: number;
  readonly channels: Readonly<ChannelConfig>;
}
