'use strict';

import createDebug from 'debug';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const ROOT_NAMESPACE = 'lanwatch';

export function createLogger(scope: string): Logger {
  const log = createDebug(`${ROOT_NAMESPACE}:${scope}`);
  const error = createDebug(`${ROOT_NAMESPACE}:${scope}:error`);

  return {
    log: (...args: unknown[]) => emit(log, args),
    error: (...args: unknown[]) => emit(error, args),
  };
}

/**
 * Turns namespaces on for the given level unless DEBUG already names them.
 * `error` keeps only the `:error` channels, anything else enables everything.
 */
export function configureLogging(level: LogLevel, env: NodeJS.ProcessEnv = process.env) {
  if (env.DEBUG) {
    createDebug.enable(env.DEBUG);
    return;
  }

  createDebug.enable(level === 'error' ? `${ROOT_NAMESPACE}:*:error` : `${ROOT_NAMESPACE}:*`);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function emit(channel: createDebug.Debugger, args: unknown[]) {
  const [first, ...rest] = args;

  if (typeof first === 'string') {
    channel(first, ...rest);
    return;
  }

  channel('%O', ...args);
}
