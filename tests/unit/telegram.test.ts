import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import axios, { type InternalAxiosRequestConfig } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../packages/agent/src/logger', () => ({
  logger: { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() }
}));

import {
  CommandPoller,
  loadTelegramToken,
  TelegramClient,
  type TelegramUpdate
} from '../../packages/agent/src/services/telegram';

function stubHttp(respond: (config: InternalAxiosRequestConfig) => unknown) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      return { data: respond(config), status: 200, statusText: 'OK', headers: {}, config };
    }
  });
  return { http, requests };
}

describe('TelegramClient', () => {
  it('posts Markdown messages to the configured chat', async () => {
    const { http, requests } = stubHttp(() => ({ ok: true, result: {} }));
    const client = new TelegramClient('test-token', '42', http);

    await expect(client.sendMessage('*hello*', true)).resolves.toBe(true);

    expect(requests[0].url).toBe('sendMessage');
    expect(JSON.parse(String(requests[0].data))).toEqual({ chat_id: '42', text: '*hello*', parse_mode: 'Markdown' });
  });

  it('sends plain text without a parse mode', async () => {
    const { http, requests } = stubHttp(() => ({ ok: true }));
    await new TelegramClient('test-token', '42', http).sendTo('7', 'status', false);
    expect(JSON.parse(String(requests[0].data))).toEqual({ chat_id: '7', text: 'status' });
  });

  it('resolves false when the API rejects or the request fails', async () => {
    const rejected = stubHttp(() => ({ ok: false, description: 'chat not found' }));
    await expect(new TelegramClient('test-token', '42', rejected.http).sendMessage('x', false)).resolves.toBe(false);

    const broken = axios.create({
      adapter: async () => {
        throw new Error('socket hang up');
      }
    });
    await expect(new TelegramClient('test-token', '42', broken).sendMessage('x', false)).resolves.toBe(false);
  });

  it('reads updates from the given offset', async () => {
    const { http, requests } = stubHttp(() => ({
      ok: true,
      result: [{ update_id: 5, message: { message_id: 1, chat: { id: 42 }, text: '/status' } }]
    }));

    const updates = await new TelegramClient('test-token', '42', http).getUpdates(5);

    expect(updates).toEqual([{ update_id: 5, message: { message_id: 1, chat: { id: 42 }, text: '/status' } }]);
    expect(requests[0].url).toBe('getUpdates');
    expect(requests[0].params).toMatchObject({ offset: 5, timeout: 25 });
  });

  it('throws when getUpdates is rejected', async () => {
    const { http } = stubHttp(() => ({ ok: false, description: 'Conflict' }));
    await expect(new TelegramClient('test-token', '42', http).getUpdates(0)).rejects.toThrow(
      'getUpdates rejected: Conflict'
    );
  });
});

describe('CommandPoller', () => {
  it('answers slash commands and advances the offset', async () => {
    const batches: TelegramUpdate[][] = [
      [
        { update_id: 10, message: { message_id: 1, chat: { id: 42 }, text: '/status' } },
        { update_id: 11, message: { message_id: 2, chat: { id: 42 }, text: 'thanks' } },
        { update_id: 12 }
      ],
      []
    ];
    const offsets: number[] = [];
    const sent: Array<[string, string, boolean]> = [];
    const client = {
      getUpdates: async (offset: number) => {
        offsets.push(offset);
        return batches.shift() ?? [];
      },
      sendTo: async (chatId: string, text: string, formatted: boolean) => {
        sent.push([chatId, text, formatted]);
        return true;
      }
    };
    const reply = vi.fn(async (_chatId: string, text: string) => `reply to ${text}`);
    const poller = new CommandPoller(client, reply);

    expect(await poller.pollOnce()).toBe(3);
    expect(await poller.pollOnce()).toBe(0);

    expect(offsets).toEqual([0, 13]);
    expect(reply).toHaveBeenCalledTimes(1);
    expect(sent).toEqual([['42', 'reply to /status', false]]);
  });

  it('sends nothing when the command has no answer', async () => {
    const sendTo = vi.fn(async () => true);
    const client = {
      getUpdates: async () => [{ update_id: 1, message: { message_id: 1, chat: { id: 42 }, text: '/unknown' } }],
      sendTo
    };
    await new CommandPoller(client, async () => null).pollOnce();
    expect(sendTo).not.toHaveBeenCalled();
  });
});

describe('loadTelegramToken', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'chip-warden-token-'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(configDir, { recursive: true, force: true });
  });

  it('prefers the environment variable', () => {
    vi.stubEnv('TELEGRAM_BOT_TOKEN', ' test-secret ');
    writeFileSync(join(configDir, 'telegram.token'), 'file-token');
    expect(loadTelegramToken(configDir)).toBe('test-secret');
  });

  it('falls back to the token file beside the config', () => {
    vi.stubEnv('TELEGRAM_BOT_TOKEN', '');
    writeFileSync(join(configDir, 'telegram.token'), 'test-secret\n');
    expect(loadTelegramToken(configDir)).toBe('test-secret');
  });

  it('returns null when no token is configured', () => {
    vi.stubEnv('TELEGRAM_BOT_TOKEN', '');
    expect(loadTelegramToken(configDir)).toBeNull();
  });
});
