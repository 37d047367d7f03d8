'use strict';

import { z } from 'zod';

import { parseCommandText, type CommandSource, type OperatorRequest } from './command-source';
import type { TelegramSettings } from './config';
import type { EventKind, EventSink } from './event-sink';
import { createLogger, describeError, type Logger } from './logger';
import type { CommandResult } from './operator-commands';

export interface FetchResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchFn = (url: string, init: {
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}) => Promise<FetchResponse>;

export const TELEGRAM_API_BASE = 'https://api.telegram.org';

const MAX_LISTED_DEVICES = 50;

const apiResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  result: z.unknown().optional(),
});

const updateSchema = z.object({
  update_id: z.number(),
  message: z.object({
    text: z.string().optional(),
    chat: z.object({ id: z.union([z.number(), z.string()]) }),
  }).passthrough().optional(),
}).passthrough();

export type TelegramUpdate = z.infer<typeof updateSchema>;

export interface TelegramClientOptions {
  fetch?: FetchFn;
  apiBase?: string;
  logger?: Logger;
}

/** Thin Bot API client: `sendMessage` and long-poll `getUpdates`. */
export class TelegramClient {

  private readonly fetchFn: FetchFn;

  private readonly apiBase: string;

  private readonly logger: Logger;

  constructor(private readonly settings: TelegramSettings, options: TelegramClientOptions = {}) {
    this.fetchFn = options.fetch ?? fetch;
    this.apiBase = options.apiBase ?? TELEGRAM_API_BASE;
    this.logger = options.logger ?? createLogger('telegram');
  }

  get chatId(): string {
    return this.settings.chatId;
  }

  async sendMessage(text: string) {
    const body = new URLSearchParams({ chat_id: this.settings.chatId, text, parse_mode: 'HTML' });

    await this.call('sendMessage', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
      signal: AbortSignal.timeout(this.settings.timeoutMs),
    });
  }

  async getUpdates(offset: number, timeoutSeconds = 0): Promise<TelegramUpdate[]> {
    const query = new URLSearchParams({ offset: String(offset), timeout: String(timeoutSeconds) });
    const result = await this.call(`getUpdates?${query.toString()}`, {
      method: 'GET',
      signal: AbortSignal.timeout(this.settings.timeoutMs + timeoutSeconds * 1000),
    });

    const updates = z.array(updateSchema).safeParse(result ?? []);
    if (!updates.success) {
      throw new Error('Telegram getUpdates returned an unexpected payload.');
    }

    return updates.data;
  }

  private async call(method: string, init: Parameters<FetchFn>[1]): Promise<unknown> {
    const name = method.split('?')[0] ?? method;
    const url = `${this.apiBase}/bot${this.settings.botToken}/${method}`;

    let response: FetchResponse;
    try {
      response = await this.fetchFn(url, init);
    } catch (error) {
      throw new Error(`Telegram ${name} request failed: ${describeError(error)}`, { cause: error });
    }

    const parsed = apiResponseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new Error(`Telegram ${name} answered HTTP ${response.status} without a Bot API body.`);
    }

    if (!parsed.data.ok) {
      throw new Error(`Telegram ${name} failed: ${parsed.data.description ?? `HTTP ${response.status}`}.`);
    }

    this.logger.log(`Telegram ${name} ok.`);
    return parsed.data.result;
  }

}

export class TelegramEventSink implements EventSink {

  constructor(private readonly client: TelegramClient) {}

  async notify(kind: EventKind, deviceName: string, address: string) {
    await this.client.sendMessage(formatEvent(kind, deviceName, address));
  }

}

/**
 * Operator commands sent to the bot. Only the configured chat is obeyed;
 * everything else is acknowledged and dropped.
 */
export class TelegramCommandSource implements CommandSource {

  private lastUpdateId = 0;

  private readonly logger: Logger;

  constructor(private readonly client: TelegramClient, logger?: Logger) {
    this.logger = logger ?? createLogger('telegram');
  }

  async poll(): Promise<OperatorRequest[]> {
    const updates = await this.client.getUpdates(this.lastUpdateId + 1);
    const requests: OperatorRequest[] = [];

    for (const update of updates) {
      this.lastUpdateId = Math.max(this.lastUpdateId, update.update_id);

      const message = update.message;
      if (!message?.text) {
        continue;
      }

      if (String(message.chat.id) !== this.client.chatId) {
        this.logger.log(`Ignoring message from chat ${message.chat.id}.`);
        continue;
      }

      const parsed = parseCommandText(message.text);
      if (!parsed) {
        continue;
      }

      requests.push({
        ...parsed,
        reply: (result) => this.client.sendMessage(formatResult(result)),
      });
    }

    return requests;
  }

}

export function formatEvent(kind: EventKind, deviceName: string, address: string): string {
  const name = escapeHtml(deviceName);
  const ip = escapeHtml(address || 'unknown');

  switch (kind) {
    case 'arrived':
      return `🟢 <b>${name}</b> arrived\nIP: <code>${ip}</code>`;
    case 'departed':
      return `🔴 <b>${name}</b> left\nIP: <code>${ip}</code>`;
    case 'lockdown-started':
      return `🔒 <b>Lockdown started</b>\n${name}`;
    case 'lockdown-stopped':
      return `🔓 <b>Lockdown stopped</b>\n${name}`;
    case 'monitor-started':
      return `🔔 <b>Presence monitor started</b>\n${name}`;
    default:
      return name;
  }
}

export function formatResult(result: CommandResult): string {
  const lines = [`${result.success ? '✅' : '❌'} ${escapeHtml(result.message)}`];

  const listed = result.devices.slice(0, MAX_LISTED_DEVICES);
  if (listed.length) {
    lines.push('');
    for (const device of listed) {
      const detail = device.detail ? ` - ${escapeHtml(device.detail)}` : '';
      lines.push(`• ${escapeHtml(device.name)} <code>${escapeHtml(device.mac)}</code>${detail}`);
    }
  }

  if (result.devices.length > listed.length) {
    lines.push(`... and ${result.devices.length - listed.length} more`);
  }

  return lines.join('\n');
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
