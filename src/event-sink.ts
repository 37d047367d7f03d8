'use strict';

import { createLogger, describeError, type Logger } from './logger';

export type EventKind = 'arrived' | 'departed' | 'lockdown-started' | 'lockdown-stopped' | 'monitor-started';

/**
 * Receives presence transitions, lockdown changes and the startup notice.
 * For the latter two `deviceName` carries a short summary and `address` is empty.
 */
export interface EventSink {
  notify(kind: EventKind, deviceName: string, address: string): Promise<void>;
}

export class LoggingEventSink implements EventSink {

  constructor(private readonly logger: Logger = createLogger('events')) {}

  async notify(kind: EventKind, deviceName: string, address: string) {
    this.logger.log(address ? `${kind}: ${deviceName} (${address})` : `${kind}: ${deviceName}`);
  }

}

/** Fans out to every sink; one failing sink does not stop the others. */
export class CompositeEventSink implements EventSink {

  private readonly logger: Logger;

  constructor(private readonly sinks: EventSink[], logger?: Logger) {
    this.logger = logger ?? createLogger('events');
  }

  async notify(kind: EventKind, deviceName: string, address: string) {
    const results = await Promise.allSettled(this.sinks.map((sink) => sink.notify(kind, deviceName, address)));

    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error(`Event sink failed for ${kind}:`, describeError(result.reason));
      }
    }
  }

}
