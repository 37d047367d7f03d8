'use strict';

import * as path from 'path';
import { z } from 'zod';

import { readJsonFile } from './json-file';
import type { LogLevel } from './logger';
import { safeNormalizeMac } from './mac';
import type { AllowlistEntry } from './types';

export interface RouterSettings {
  baseUrl: string;
  username: string;
  password: string;
  allowInsecureTls: boolean;
  probeTimeoutMs: number;
  readTimeoutMs: number;
  writeTimeoutMs: number;
}

export interface PresenceSettings {
  pollIntervalSeconds: number;
  /** Case-insensitive name substrings whose transitions are sent to the sink. */
  notifyPatterns: string[];
  /** Minutes absent from snapshots before a device is reported stale; 0 disables. */
  staleAfterMinutes: number;
}

export interface StorageSettings {
  dataDir: string;
  allowlistFile: string;
  lockdownStateFile: string;
  presenceLogFile: string;
}

export interface TelegramSettings {
  botToken: string;
  chatId: string;
  timeoutMs: number;
}

export interface AppConfig {
  router: RouterSettings;
  presence: PresenceSettings;
  storage: StorageSettings;
  /** Access points and other gear seeded into a fresh allowlist. */
  infrastructure: AllowlistEntry[];
  telegram: TelegramSettings | null;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG_FILE = 'lanwatch.config.json';

const DEFAULT_ROUTER_SETTINGS: RouterSettings = {
  baseUrl: 'http://192.168.0.1',
  username: '',
  password: '',
  allowInsecureTls: false,
  probeTimeoutMs: 5000,
  readTimeoutMs: 10000,
  writeTimeoutMs: 15000,
};

const DEFAULT_PRESENCE_SETTINGS: PresenceSettings = {
  pollIntervalSeconds: 30,
  notifyPatterns: [],
  staleAfterMinutes: 0,
};

const looseNumber = z.union([z.number(), z.string()]).optional();

const fileSchema = z.object({
  router: z.object({
    baseUrl: z.string().optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    allowInsecureTls: z.boolean().optional(),
    probeTimeoutMs: looseNumber,
    readTimeoutMs: looseNumber,
    writeTimeoutMs: looseNumber,
  }).default({}),
  presence: z.object({
    pollIntervalSeconds: looseNumber,
    notifyPatterns: z.array(z.string()).optional(),
    staleAfterMinutes: looseNumber,
  }).default({}),
  storage: z.object({
    dataDir: z.string().optional(),
    allowlistFile: z.string().optional(),
    lockdownStateFile: z.string().optional(),
    presenceLogFile: z.string().optional(),
  }).default({}),
  infrastructure: z.array(z.object({
    name: z.string(),
    mac: z.string(),
    reason: z.string().optional(),
  })).default([]),
  telegram: z.object({
    botToken: z.string().optional(),
    chatId: z.union([z.string(), z.number()]).optional(),
    timeoutMs: looseNumber,
  }).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type ConfigFile = z.infer<typeof fileSchema>;

export interface LoadConfigOptions {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Configuration comes from an optional JSON file, overridden by LANWATCH_*
 * environment variables. Only a file named explicitly has to exist.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const explicitFile = options.configFile ?? env.LANWATCH_CONFIG;
  const configPath = path.resolve(cwd, explicitFile ?? DEFAULT_CONFIG_FILE);

  const read = readJsonFile(configPath, fileSchema);
  if (read.status === 'invalid') {
    throw new Error(`Invalid configuration: ${read.reason}`);
  }
  if (read.status === 'missing' && explicitFile) {
    throw new Error(`Configuration file not found: ${configPath}`);
  }

  const file: ConfigFile = read.status === 'ok' ? read.value : fileSchema.parse({});
  return buildConfig(file, env, cwd);
}

export function buildConfig(file: ConfigFile, env: NodeJS.ProcessEnv, cwd: string): AppConfig {
  const router = file.router;
  const presence = file.presence;

  const dataDir = path.resolve(cwd, cleanText(env.LANWATCH_DATA_DIR ?? file.storage.dataDir, 512) || 'data');
  const inDataDir = (value: string | undefined, fallback: string) => path.resolve(dataDir, cleanText(value, 512) || fallback);

  const notifyPatterns = env.LANWATCH_NOTIFY_PATTERNS !== undefined
    ? env.LANWATCH_NOTIFY_PATTERNS.split(',')
    : presence.notifyPatterns ?? DEFAULT_PRESENCE_SETTINGS.notifyPatterns;

  const botToken = cleanText(env.LANWATCH_TELEGRAM_TOKEN ?? file.telegram?.botToken, 256);
  const chatId = cleanText(env.LANWATCH_TELEGRAM_CHAT_ID ?? file.telegram?.chatId, 64);

  return {
    router: {
      baseUrl: normalizeBaseUrl(env.LANWATCH_ROUTER_URL ?? router.baseUrl ?? DEFAULT_ROUTER_SETTINGS.baseUrl),
      username: cleanText(env.LANWATCH_ROUTER_USERNAME ?? router.username, 128),
      password: cleanText(env.LANWATCH_ROUTER_PASSWORD ?? router.password, 256),
      allowInsecureTls: env.LANWATCH_ROUTER_INSECURE_TLS !== undefined
        ? parseBoolean(env.LANWATCH_ROUTER_INSECURE_TLS)
        : Boolean(router.allowInsecureTls),
      probeTimeoutMs: clampNumber(router.probeTimeoutMs, 1000, 30000, DEFAULT_ROUTER_SETTINGS.probeTimeoutMs),
      readTimeoutMs: clampNumber(router.readTimeoutMs, 2000, 60000, DEFAULT_ROUTER_SETTINGS.readTimeoutMs),
      writeTimeoutMs: clampNumber(router.writeTimeoutMs, 2000, 120000, DEFAULT_ROUTER_SETTINGS.writeTimeoutMs),
    },
    presence: {
      pollIntervalSeconds: clampNumber(
        env.LANWATCH_POLL_INTERVAL ?? presence.pollIntervalSeconds,
        5,
        3600,
        DEFAULT_PRESENCE_SETTINGS.pollIntervalSeconds,
      ),
      notifyPatterns: notifyPatterns.map((pattern) => cleanText(pattern, 80)).filter(Boolean),
      staleAfterMinutes: clampNumber(presence.staleAfterMinutes, 0, 10080, DEFAULT_PRESENCE_SETTINGS.staleAfterMinutes),
    },
    storage: {
      dataDir,
      allowlistFile: inDataDir(file.storage.allowlistFile, 'allowlist.json'),
      lockdownStateFile: inDataDir(file.storage.lockdownStateFile, 'lockdown-state.json'),
      presenceLogFile: inDataDir(file.storage.presenceLogFile, 'presence-history.csv'),
    },
    infrastructure: file.infrastructure
      .map((device) => ({
        name: cleanText(device.name, 80) || 'Infrastructure',
        mac: safeNormalizeMac(device.mac),
        reason: cleanText(device.reason, 120) || 'Infrastructure',
      }))
      .filter((device) => Boolean(device.mac)),
    telegram: botToken && chatId
      ? {
        botToken,
        chatId,
        timeoutMs: clampNumber(file.telegram?.timeoutMs, 2000, 60000, 10000),
      }
      : null,
    logLevel: normalizeLogLevel(env.LOG_LEVEL ?? file.logLevel),
  };
}

export function normalizeBaseUrl(value: string): string {
  const text = cleanText(value, 256);

  if (!text) {
    throw new Error('Router base URL is not configured.');
  }

  const withProtocol = /^https?:\/\//i.test(text) ? text : `http://${text}`;

  try {
    const url = new URL(withProtocol);
    return `${url.protocol}//${url.host}`;
  } catch (error) {
    throw new Error('Router base URL is invalid.');
  }
}

export function cleanText(value: unknown, maxLength: number): string {
  return String(value ?? '').trim().slice(0, maxLength);
}

export function clampNumber(value: unknown, min: number, max: number, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = Number(value);

  if (Number.isNaN(parsed)) {
    return fallback;
  }

  return Math.min(max, Math.max(min, Math.round(parsed)));
}

function parseBoolean(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function normalizeLogLevel(value: string | undefined): LogLevel {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }

  return 'info';
}
