/**
 * Multi-Destination Output
 *
 * Fans every outbound message out to all configured destinations (Discord
 * webhooks and Telegram chats). Each destination reports its own success;
 * one failing destination never blocks the others.
 */

import {
  TransportError,
  describeError,
  type DeliveryReport,
  type NotificationTransport,
  type OutboundMessage,
} from '../core/index.js';
import { createLogger, truncateText } from '../utils/index.js';

const logger = createLogger('transport');

// =============================================================================
// DESTINATIONS
// =============================================================================

export interface Destination {
  /** Stable label for logs and delivery reports; never the secret URL. */
  readonly name: string;
  send(message: OutboundMessage): Promise<boolean>;
}

const DISCORD_MAX_LENGTH = 2000;
const TELEGRAM_MAX_LENGTH = 4096;
const TELEGRAM_API = 'https://api.telegram.org';

const WEBHOOK_USERNAMES: Record<OutboundMessage['kind'], string> = {
  whale: 'Whale Watcher | WHALES',
  insight: 'Whale Watcher | INSIGHTS',
  status: 'Whale Watcher | STATUS',
  test: 'Whale Watcher',
};

/**
 * Discord webhook destination
 */
export class DiscordWebhookDestination implements Destination {
  constructor(
    readonly name: string,
    private readonly webhookUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async send(message: OutboundMessage): Promise<boolean> {
    try {
      const response = await this.fetchImpl(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          content: truncateText(message.content, DISCORD_MAX_LENGTH),
          username: WEBHOOK_USERNAMES[message.kind],
        }),
      });

      if (!response.ok) {
        logger.error(`${this.name} webhook error: ${response.status}`);
        return false;
      }
      return true;
    } catch (error) {
      logger.error(`${this.name} send error: ${describeError(error)}`);
      return false;
    }
  }
}

/**
 * Telegram has no markdown here: bold markers and italic lines are stripped.
 */
export function toPlainText(content: string): string {
  return content
    .replace(/\*\*/g, '')
    .replace(/^_(.+)_$/gm, '$1');
}

/**
 * Telegram bot destination for one chat
 */
export class TelegramDestination implements Destination {
  readonly name: string;

  constructor(
    private readonly botToken: string,
    private readonly chatId: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.name = `telegram:${chatId}`;
  }

  async send(message: OutboundMessage): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${TELEGRAM_API}/bot${this.botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.chatId,
          text: truncateText(toPlainText(message.content), TELEGRAM_MAX_LENGTH),
          disable_web_page_preview: true,
        }),
      });

      if (!response.ok) {
        logger.error(`${this.name} sendMessage error: ${response.status}`);
        return false;
      }
      return true;
    } catch (error) {
      logger.error(`${this.name} send error: ${describeError(error)}`);
      return false;
    }
  }
}

// =============================================================================
// TRANSPORT
// =============================================================================

export class ChannelTransport implements NotificationTransport {
  constructor(private readonly destinations: readonly Destination[]) {}

  /**
   * Send to every destination simultaneously
   */
  async broadcast(message: OutboundMessage): Promise<DeliveryReport> {
    const results = new Map<string, boolean>();

    await Promise.all(
      this.destinations.map(async destination => {
        let ok: boolean;
        try {
          ok = await destination.send(message);
        } catch (error) {
          logger.error(`${destination.name} threw: ${describeError(error)}`);
          ok = false;
        }
        results.set(destination.name, ok);
      })
    );

    const failed = [...results].filter(([, ok]) => !ok).map(([name]) => name);
    const report: DeliveryReport = {
      results,
      delivered: results.size - failed.length,
      failed,
    };

    if (failed.length > 0) {
      report.error = new TransportError(`${message.kind} not delivered to ${failed.join(', ')}`, failed);
      logger.warn(report.error.message);
    }

    return report;
  }
}

/**
 * Build the destinations named by configuration.
 */
export function createTransport(
  config: {
    discordWebhookUrls: readonly string[];
    telegramBotToken?: string;
    telegramChatIds: readonly string[];
  },
  fetchImpl: typeof fetch = fetch
): ChannelTransport {
  const destinations: Destination[] = config.discordWebhookUrls.map(
    (url, index) => new DiscordWebhookDestination(`discord:webhook-${index + 1}`, url, fetchImpl)
  );

  const { telegramBotToken } = config;
  if (telegramBotToken) {
    for (const chatId of config.telegramChatIds) {
      destinations.push(new TelegramDestination(telegramBotToken, chatId, fetchImpl));
    }
  }

  logger.info(`Initialized ${destinations.length} destinations`);
  return new ChannelTransport(destinations);
}
