'use strict';

import { AllowlistStore, type MacDetector } from './allowlist-store';
import type { CommandSource } from './command-source';
import type { AppConfig } from './config';
import { CompositeEventSink, LoggingEventSink, type EventSink } from './event-sink';
import type { HttpTransport } from './http';
import { LockdownController } from './lockdown-controller';
import { Monitor } from './monitor';
import { OperatorCommands } from './operator-commands';
import { PresenceLog } from './presence-log';
import { PresenceTracker } from './presence-tracker';
import { NetworkFilter } from './router/network-filter';
import { RouterSession } from './router/router-session';
import {
  TelegramClient,
  TelegramCommandSource,
  TelegramEventSink,
  type FetchFn,
} from './telegram';

export interface AppContextOptions {
  transport?: HttpTransport;
  fetch?: FetchFn;
  detectMac?: MacDetector;
  clock?: () => Date;
}

export interface AppContext {
  config: AppConfig;
  session: RouterSession;
  filter: NetworkFilter;
  allowlist: AllowlistStore;
  history: PresenceLog;
  sink: EventSink;
  tracker: PresenceTracker;
  lockdown: LockdownController;
  commands: OperatorCommands;
  commandSource: CommandSource | null;
  monitor: Monitor;
}

/** Wires every component against one shared router session. */
export function createAppContext(config: AppConfig, options: AppContextOptions = {}): AppContext {
  const session = new RouterSession(config.router, { transport: options.transport });
  const filter = new NetworkFilter(session);
  const allowlist = new AllowlistStore(config.storage.allowlistFile, {
    infrastructure: config.infrastructure,
    detectMac: options.detectMac,
  });
  const history = new PresenceLog(config.storage.presenceLogFile);

  const telegram = config.telegram ? new TelegramClient(config.telegram, { fetch: options.fetch }) : null;
  const sinks: EventSink[] = [new LoggingEventSink()];
  if (telegram) {
    sinks.push(new TelegramEventSink(telegram));
  }
  const sink = new CompositeEventSink(sinks);

  const tracker = new PresenceTracker({
    notifyPatterns: config.presence.notifyPatterns,
    staleAfterMinutes: config.presence.staleAfterMinutes,
    history,
    sink,
  });

  const lockdown = new LockdownController({
    session,
    filter,
    allowlist,
    stateFile: config.storage.lockdownStateFile,
    sink,
    clock: options.clock,
  });

  const commands = new OperatorCommands({
    session,
    filter,
    allowlist,
    lockdown,
    tracker,
    history,
    infrastructure: config.infrastructure,
    clock: options.clock,
  });

  const commandSource = telegram ? new TelegramCommandSource(telegram) : null;

  const monitor = new Monitor({
    session,
    tracker,
    commands,
    commandSource: commandSource ?? undefined,
    sink,
    pollIntervalSeconds: config.presence.pollIntervalSeconds,
    clock: options.clock,
  });

  return {
    config,
    session,
    filter,
    allowlist,
    history,
    sink,
    tracker,
    lockdown,
    commands,
    commandSource,
    monitor,
  };
}
