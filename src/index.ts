'use strict';

export { AllowlistStore, detectOwnMac } from './allowlist-store';
export type { AddOutcome, AllowlistStoreOptions, MacDetector, RemoveOutcome } from './allowlist-store';
export { createAppContext } from './app-context';
export type { AppContext, AppContextOptions } from './app-context';
export { parseCommandText } from './command-source';
export type { CommandSource, OperatorRequest } from './command-source';
export { buildConfig, loadConfig } from './config';
export type { AppConfig, PresenceSettings, RouterSettings, StorageSettings, TelegramSettings } from './config';
export { renderResult } from './console-output';
export { AuthFailureError, isRouterError, ProtocolError, RouterError, SessionExpiredError, TransportError } from './errors';
export type { RouterErrorKind, StateConflict } from './errors';
export { CompositeEventSink, LoggingEventSink } from './event-sink';
export type { EventKind, EventSink } from './event-sink';
export { LockdownController } from './lockdown-controller';
export type { LockdownMode, LockdownResult, LockdownState, StartOptions } from './lockdown-controller';
export { configureLogging, createLogger } from './logger';
export type { Logger, LogLevel } from './logger';
export { normalizeMac } from './mac';
export { Monitor } from './monitor';
export type { CycleReport } from './monitor';
export { OperatorCommands } from './operator-commands';
export type { CommandDevice, CommandResult } from './operator-commands';
export { PresenceLog } from './presence-log';
export type { PresenceLogRecord, PresenceStats } from './presence-log';
export { PresenceTracker } from './presence-tracker';
export type { PresenceSummary, PresenceTransition, TrackedDevice } from './presence-tracker';
export { NetworkFilter } from './router/network-filter';
export { RouterSession } from './router/router-session';
export { TelegramClient, TelegramCommandSource, TelegramEventSink } from './telegram';
export type * from './types';
