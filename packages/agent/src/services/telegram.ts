import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../logger';
import type { MessagingClient } from './notifications';

const TOKEN_FILE = 'telegram.token';
const API_ROOT = 'https://api.telegram.org';
const POLL_TIMEOUT_SECONDS = 25;
const POLL_RETRY_MS = 5_000;

const TelegramMessageSchema = z.object({
  message_id: z.number(),
  chat: z.object({ id: z.union([z.number(), z.string()]) }),
  text: z.string().optional()
});

const TelegramUpdateSchema = z.object({
  update_id: z.number(),
  message: TelegramMessageSchema.optional()
});
export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

const TelegramResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional()
});

/** `TELEGRAM_BOT_TOKEN`, else `telegram.token` in the config directory. */
export function loadTelegramToken(configDir: string): string | null {
  const fromEnv = process.env.TELEGRAM_BOT_TOKEN?.trim();
  if (fromEnv) return fromEnv;
  const tokenFile = join(configDir, TOKEN_FILE);
  if (!existsSync(tokenFile)) return null;
  const token = readFileSync(tokenFile, 'utf8').trim();
  return token || null;
}

export class TelegramClient implements MessagingClient {
  private readonly http: AxiosInstance;

  constructor(token: string, private readonly chatId: string, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: `${API_ROOT}/bot${token}/`,
        timeout: (POLL_TIMEOUT_SECONDS + 10) * 1000
      });
  }

  async sendMessage(text: string, formatted: boolean): Promise<boolean> {
    return this.sendTo(this.chatId, text, formatted);
  }

  async sendTo(chatId: string, text: string, formatted: boolean): Promise<boolean> {
    try {
      const response = await this.http.post('sendMessage', {
        chat_id: chatId,
        text,
        ...(formatted ? { parse_mode: 'Markdown' } : {})
      });
      const body = TelegramResponseSchema.safeParse(response.data);
      if (!body.success || !body.data.ok) {
        logger.warn({ description: body.success ? body.data.description : undefined }, 'telegram: sendMessage rejected');
        return false;
      }
      return true;
    } catch (err) {
      logger.warn({ err }, 'telegram: sendMessage failed');
      return false;
    }
  }

  async getUpdates(offset: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const response = await this.http.get('getUpdates', {
      params: { offset, timeout: POLL_TIMEOUT_SECONDS, allowed_updates: JSON.stringify(['message']) },
      signal
    });
    const body = TelegramResponseSchema.parse(response.data);
    if (!body.ok) {
      throw new Error(`getUpdates rejected: ${body.description ?? 'unknown reason'}`);
    }
    return z.array(TelegramUpdateSchema).parse(body.result ?? []);
  }
}

export type CommandReply = (chatId: string, text: string) => Promise<string | null>;

/**
 * Long-polls the bot for slash commands and answers each one through
 * `reply`. One poller per bot token.
 */
export class CommandPoller {
  private offset = 0;
  private stopped = false;
  private loop: Promise<void> | null = null;
  private controller = new AbortController();

  constructor(
    private readonly client: Pick<TelegramClient, 'getUpdates' | 'sendTo'>,
    private readonly reply: CommandReply,
    private readonly retryMs = POLL_RETRY_MS
  ) {}

  start(): void {
    if (this.loop) return;
    this.loop = this.run();
  }

  async pollOnce(): Promise<number> {
    const updates = await this.client.getUpdates(this.offset, this.controller.signal);
    for (const update of updates) {
      this.offset = Math.max(this.offset, update.update_id + 1);
      const text = update.message?.text?.trim();
      if (!update.message || !text?.startsWith('/')) continue;
      const chatId = String(update.message.chat.id);
      const answer = await this.reply(chatId, text);
      if (answer) {
        await this.client.sendTo(chatId, answer, false);
      }
    }
    return updates.length;
  }

  private async run(): Promise<void> {
    while (!this.stopped) {
      try {
        await this.pollOnce();
      } catch (err) {
        if (this.stopped) break;
        logger.warn({ err }, 'telegram: command polling failed; retrying');
        await new Promise((resolve) => setTimeout(resolve, this.retryMs));
      }
    }
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.controller.abort();
    await this.loop;
    this.loop = null;
  }
}
