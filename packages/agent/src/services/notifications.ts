import { formatAppMessage, type MessageParams } from '../../../shared/src';
import { logger } from '../logger';

export interface MessagingClient {
  /** Resolves false when delivery failed; never rejects for transport errors. */
  sendMessage(text: string, formatted: boolean): Promise<boolean>;
}

export type OutboundMessage = {
  text: string;
  formatted: boolean;
};

export interface Notifier {
  notify(event: string, params?: MessageParams): void;
}

export const DEFAULT_QUEUE_LIMIT = 50;

/** Telegram legacy Markdown needs these escaped outside of entities. */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

export function renderNotification(event: string, params: MessageParams | undefined, formatted: boolean): string {
  const safeParams =
    formatted && params
      ? Object.fromEntries(
          Object.entries(params).map(([key, value]) => [key, typeof value === 'string' ? escapeMarkdown(value) : value])
        )
      : params;
  const { title, body } = formatAppMessage(event, safeParams);
  const heading = formatted ? `*${escapeMarkdown(title)}*` : title;
  return body ? `${heading}\n\n${body}` : heading;
}

/**
 * Outbound notifications, delivered one at a time by a single consumer.
 * When full, the oldest undelivered message is dropped.
 */
export class NotificationQueue implements Notifier {
  private readonly pending: OutboundMessage[] = [];
  private active: Promise<void> | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(
    private readonly client: MessagingClient,
    private readonly options: { limit?: number; formatted?: boolean } = {}
  ) {}

  get size(): number {
    return this.pending.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  notify(event: string, params?: MessageParams): void {
    const formatted = this.options.formatted ?? true;
    this.enqueue({ text: renderNotification(event, params, formatted), formatted });
  }

  enqueue(message: OutboundMessage): void {
    if (this.closed) {
      logger.warn('notifications: queue closed; message discarded');
      return;
    }
    const limit = this.options.limit ?? DEFAULT_QUEUE_LIMIT;
    this.pending.push(message);
    while (this.pending.length > limit) {
      this.pending.shift();
      this.droppedCount += 1;
      logger.warn({ limit, dropped: this.droppedCount }, 'notifications: queue full; dropped oldest message');
    }
    if (!this.active) {
      this.active = this.consume().finally(() => {
        this.active = null;
      });
    }
  }

  private async consume(): Promise<void> {
    let next = this.pending.shift();
    while (next) {
      try {
        const delivered = await this.client.sendMessage(next.text, next.formatted);
        if (!delivered) logger.warn('notifications: delivery failed');
      } catch (err) {
        logger.warn({ err }, 'notifications: delivery threw');
      }
      next = this.pending.shift();
    }
  }

  /** Resolves once everything queued so far has been attempted. */
  async drain(): Promise<void> {
    while (this.active) {
      await this.active;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
  }
}
